// Shared types for the bridge server and its clients

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (sockets, argument parsing).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Result utilities for ergonomic chaining
export const Result = {
  /** Get value or return default */
  unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
    return result.ok ? result.value : defaultValue;
  },
};

// ============ Front End ============

export type Coupling = 'DC1M' | 'AC1M' | 'DC50';

export const COUPLINGS: readonly Coupling[] = ['DC1M', 'AC1M', 'DC50'];

export type TriggerDirection = 'rising' | 'falling' | 'either';

/**
 * Where the trigger comes from. The wire protocol flattens this into one
 * integer id; everything past the protocol boundary uses this union.
 */
export type TriggerSource =
  | { kind: 'analog'; channel: number }
  | { kind: 'digital'; pod: number; lane: number }
  | { kind: 'aux' }
  | { kind: 'none' };

export type AcquisitionPhase = 'disarmed' | 'armed';

// ============ Function Generator ============

export type WaveformShape =
  | 'SINE'
  | 'SQUARE'
  | 'TRIANGLE'
  | 'RAMP_UP'
  | 'RAMP_DOWN'
  | 'SINC'
  | 'GAUSSIAN'
  | 'HALF_SINE'
  | 'DC'
  | 'WHITENOISE'
  | 'PRBS'
  | 'ARBITRARY';

export const WAVEFORM_SHAPES: readonly WaveformShape[] = [
  'SINE', 'SQUARE', 'TRIANGLE', 'RAMP_UP', 'RAMP_DOWN', 'SINC',
  'GAUSSIAN', 'HALF_SINE', 'DC', 'WHITENOISE', 'PRBS', 'ARBITRARY',
];

export interface GeneratorState {
  enabled: boolean;
  shape: WaveformShape;
  frequencyHz: number;
  /** 0..1 */
  dutyCycle: number;
  rangeVpp: number;
  offsetVolts: number;
}

// ============ Status API ============

export interface InstrumentIdentity {
  make: string;
  model: string;
  serial: string;
  firmware: string;
  family: string;
}

export interface ChannelView {
  index: number;
  enabled: boolean;
  coupling: Coupling;
  requestedRangeVolts: number;
  rangeVolts: number;
  offsetVolts: number;
  bandwidthMhz: number;
}

export interface PodView {
  index: number;
  enabled: boolean;
  thresholdsVolts: number[];
  hysteresisMv: number;
}

export interface TriggerView {
  source: TriggerSource;
  direction: TriggerDirection;
  levelVolts: number;
  delayFs: number;
  oneShot: boolean;
  forced: boolean;
}

export interface AcquisitionView {
  phase: AcquisitionPhase;
  sampleIntervalFs: number;
  timebase: number;
  memoryDepth: number;
  adcBits: number;
  capturesCompleted: number;
}

export interface InstrumentStateView {
  channels: ChannelView[];
  pods: PodView[];
  trigger: TriggerView;
  acquisition: AcquisitionView;
  generator: GeneratorState;
}

export interface HealthResponse {
  status: 'ok';
  clientConnected: boolean;
  phase: AcquisitionPhase;
}

export interface ApiError {
  error: string;
  message: string;
}
