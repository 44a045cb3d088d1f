// Re-export shared types
export * from '../../shared/types.js';

import type {
  Result,
  Coupling,
  TriggerSource,
  TriggerDirection,
  GeneratorState,
  InstrumentIdentity,
  WaveformShape,
} from '../../shared/types.js';
import type { DriverBinding } from './binding.js';

// ============ Errors ============

/**
 * busy: the device is mid-capture and needs a stop before it accepts the call.
 * unsupported: the model cannot do this; callers log and carry on.
 * fatal: anything else; callers disarm and give up.
 */
export type DeviceErrorKind = 'busy' | 'unsupported' | 'fatal';

export interface DeviceError {
  kind: DeviceErrorKind;
  status: number;
  operation: string;
  message: string;
}

export type DeviceResult<T> = Result<T, DeviceError>;

// ============ Capabilities ============

export interface GeneratorCapabilities {
  present: boolean;
  /** false: every change needs an acquisition stop/restart around it */
  dedicatedApply: boolean;
  shapes: WaveformShape[];
}

export interface DigitizerCapabilities {
  analogChannels: number;
  digitalPods: number;
  /** Half-scale input ranges in volts, largest first */
  rangesVolts: number[];
  /** Largest range usable with 50 ohm coupling, null when no cap applies */
  fiftyOhmMaxRangeVolts: number | null;
  /** Supported limiter cutoffs in MHz; empty when the model has no limiter */
  bandwidthLimitsMhz: number[];
  resolutions: number[];
  perLaneThresholds: boolean;
  /** Selectable hysteresis bands in mV; empty when hysteresis is fixed */
  hysteresisLevelsMv: number[];
  generator: GeneratorCapabilities;
}

// ============ Adapter Operations ============

export interface AnalogFrontEnd {
  enabled: boolean;
  coupling: Coupling;
  /** Must be one of capabilities.rangesVolts */
  rangeVolts: number;
  offsetVolts: number;
  /** 0 = full bandwidth */
  bandwidthMhz: number;
}

export interface PodFrontEnd {
  enabled: boolean;
  thresholdsVolts: number[];
  hysteresisMv: number;
}

export interface OffsetLimits {
  min: number;
  max: number;
}

export interface TimebaseEntry {
  timebase: number;
  intervalFs: number;
}

export interface DeviceTrigger {
  source: TriggerSource;
  thresholdCode: number;
  direction: TriggerDirection;
  /** Post-trigger hardware delay */
  delaySamples: number;
  /** 0 waits forever */
  timeoutUs: number;
}

export interface CaptureRequest {
  channels: number[];
  pods: number[];
  samples: number;
  reallocate: boolean;
}

export interface CaptureData {
  analog: Map<number, Int16Array>;
  digital: Map<number, Uint16Array>;
  samples: number;
}

/**
 * Uniform interface over every supported hardware family.
 * Callers never branch on model; anything model-specific lives behind this.
 */
export interface DigitizerAdapter {
  readonly info: InstrumentIdentity;
  readonly capabilities: DigitizerCapabilities;

  setChannel(channel: number, settings: AnalogFrontEnd): Promise<DeviceResult<void>>;
  getOffsetLimits(rangeVolts: number, coupling: Coupling): Promise<DeviceResult<OffsetLimits>>;
  getAdcFullScale(): Promise<DeviceResult<number>>;
  setResolution(bits: number): Promise<DeviceResult<void>>;
  /** ADC bit depth currently in effect */
  getResolution(): number;

  setPod(pod: number, settings: PodFrontEnd): Promise<DeviceResult<void>>;
  probePod(pod: number): Promise<DeviceResult<boolean>>;

  /** Fastest first, at the current resolution */
  getSupportedRates(): Promise<DeviceResult<TimebaseEntry[]>>;
  getSupportedDepths(): Promise<DeviceResult<number[]>>;
  /** Largest capture the device can take with the channels now enabled */
  getMaxSamples(): Promise<DeviceResult<number>>;
  /** Quantize a rate to a timebase at the current resolution */
  timebaseForRate(rateHz: number): number;
  intervalForTimebase(timebase: number): number;

  configureTrigger(trigger: DeviceTrigger): Promise<DeviceResult<void>>;
  arm(preTriggerSamples: number, postTriggerSamples: number, timebase: number): Promise<DeviceResult<void>>;
  disarm(): Promise<DeviceResult<void>>;
  isCaptureReady(): Promise<DeviceResult<boolean>>;
  readCapture(request: CaptureRequest): Promise<DeviceResult<CaptureData>>;

  applyGenerator(state: GeneratorState): Promise<DeviceResult<void>>;

  close(): Promise<DeviceResult<void>>;
}

// ============ Families ============

/**
 * Forward and inverse timebase maps. The inverse lives with the adapter,
 * the forward map is what the driver reports back for a timebase.
 */
export interface TimebaseModel {
  timebaseForRate(rateHz: number, adcBits: number): number;
  /** Interval in fs, or null when the timebase is not valid at this resolution */
  intervalForTimebase(timebase: number, adcBits: number): number | null;
  /** Timebases worth listing in the supported-rate set */
  candidateTimebases(adcBits: number): number[];
}

export interface DigitizerFamily {
  id: string;
  displayName: string;
  match: { model: RegExp };
  /** Higher wins when several families match */
  specificity?: number;
  timing: TimebaseModel;
  /** Default ADC resolution after open */
  defaultResolution(model: string): number;
  create(binding: DriverBinding): DigitizerAdapter;
}
