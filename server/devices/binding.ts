/**
 * Driver Binding
 *
 * The low-level device handle. It speaks vendor encodings (range codes,
 * coupling codes, timebase integers) and reports failures as numeric status
 * codes. Family adapters translate between this and the normalized
 * DigitizerAdapter interface; nothing above the adapters touches it.
 */

import type { Result } from '../../shared/types.js';

export const DriverStatus = {
  OK: 0x00,
  NOT_FOUND: 0x03,
  NOT_RESPONDING: 0x07,
  INVALID_CHANNEL: 0x0c,
  INVALID_TIMEBASE: 0x0e,
  INVALID_VOLTAGE_RANGE: 0x0f,
  INVALID_PARAMETER: 0x10,
  DRIVER_FUNCTION: 0x11,
  INVALID_COUPLING: 0x12,
  NOT_USED: 0x18,
  INVALID_SAMPLE_RATIO: 0x19,
  SIGGEN_WAVE_TYPE_NOT_SUPPORTED: 0x27,
  BUSY: 0x44,
  NO_POD_CONNECTED: 0x170,
  HARDWARE_CAPTURING_CALL_STOP: 0x171,
  RESOLUTION_NOT_SUPPORTED: 0x172,
  INTERNAL_ERROR: 0xffffff,
} as const;

export type DriverStatusCode = number;

/** Setters resolve to Ok(undefined) or Err(status). */
export type BindingResult<T> = Result<T, DriverStatusCode>;

export const RawCoupling = {
  AC: 0,
  DC: 1,
  DC_50OHM: 50,
} as const;

/** Half-scale input ranges in volts, indexed by the driver's range code. */
export const RANGE_CODE_VOLTS: readonly number[] = [
  0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10, 20, 50, 100, 200,
];

export const RawBandwidth = {
  FULL: 0,
  BW_20MHZ: 1,
  BW_200MHZ: 2,
  BW_1MHZ: 3,
} as const;

export const RawDirection = {
  RISING: 2,
  FALLING: 3,
  RISING_OR_FALLING: 4,
} as const;

export const RawHysteresis = {
  VERY_HIGH_400MV: 0,
  HIGH_200MV: 1,
  NORMAL_100MV: 2,
  LOW_50MV: 3,
} as const;

/** Channel id of the external trigger input in simple-trigger calls. */
export const RAW_EXTERNAL_CHANNEL = 0x3e8;

export interface RawChannelSettings {
  enabled: boolean;
  coupling: number;
  rangeCode: number;
  /** Volts, applied inside the front end (sign as the driver expects) */
  analogOffset: number;
  bandwidth: number;
}

export interface RawPodSettings {
  enabled: boolean;
  /** One code per lane, or a single code on hardware with a shared threshold */
  thresholdCodes: number[];
  hysteresis: number;
}

export interface RawTimebaseInfo {
  intervalNs: number;
  maxSamples: number;
}

export interface RawSimpleTrigger {
  enabled: boolean;
  channel: number;
  thresholdCode: number;
  direction: number;
  delaySamples: number;
  autoTriggerUs: number;
}

export interface RawDigitalTrigger {
  port: number;
  bit: number;
  direction: number;
}

export interface RawCaptureRequest {
  channels: number[];
  ports: number[];
  samples: number;
  /** Buffers must be reallocated before reading */
  reallocate: boolean;
}

export interface RawCapture {
  analog: Map<number, Int16Array>;
  digital: Map<number, Uint16Array>;
  samples: number;
}

export interface RawSignalGenerator {
  outputEnabled: boolean;
  /** Built-in wave type code, ignored when arbitraryBuffer is set */
  waveType: number;
  arbitraryBuffer?: Int16Array;
  frequencyHz: number;
  offsetMicrovolts: number;
  pkToPkMicrovolts: number;
  dutyCyclePercent: number;
}

export interface BindingIdentity {
  model: string;
  serial: string;
  firmware: string;
}

export interface DriverBinding {
  readonly identity: BindingIdentity;

  setChannel(channel: number, settings: RawChannelSettings): Promise<BindingResult<void>>;
  getAnalogueOffsetLimits(rangeCode: number, coupling: number): Promise<BindingResult<{ min: number; max: number }>>;
  getMaximumValue(): Promise<BindingResult<number>>;
  setDeviceResolution(bits: number): Promise<BindingResult<void>>;

  setDigitalPort(port: number, settings: RawPodSettings): Promise<BindingResult<void>>;
  /** Only meaningful on hardware with detachable pods */
  isDigitalPortConnected(port: number): Promise<BindingResult<boolean>>;

  getTimebase(timebase: number, samples: number): Promise<BindingResult<RawTimebaseInfo>>;

  setSimpleTrigger(trigger: RawSimpleTrigger): Promise<BindingResult<void>>;
  /** null clears any digital trigger condition */
  setDigitalTrigger(trigger: RawDigitalTrigger | null): Promise<BindingResult<void>>;

  runBlock(preTriggerSamples: number, postTriggerSamples: number, timebase: number): Promise<BindingResult<void>>;
  isReady(): Promise<BindingResult<boolean>>;
  getValues(request: RawCaptureRequest): Promise<BindingResult<RawCapture>>;
  stop(): Promise<BindingResult<void>>;

  setSignalGenerator(settings: RawSignalGenerator): Promise<BindingResult<void>>;

  close(): Promise<BindingResult<void>>;
}
