/**
 * Acquisition State
 *
 * The live configuration (one record per channel and pod, the trigger, the
 * acquisition settings and the generator) plus the snapshot frozen at the
 * last arm. Only the AcquisitionController mutates this, under its lock.
 */

import type {
  AcquisitionPhase,
  Coupling,
  GeneratorState,
  TriggerDirection,
  TriggerSource,
} from '../../shared/types.js';
import type { DigitizerCapabilities } from '../devices/types.js';
import { LANES_PER_POD } from './trigger-source.js';

export const DEFAULT_MEMORY_DEPTH = 1_000_000;
export const DEFAULT_SAMPLE_RATE_HZ = 1e9;
export const DEFAULT_RANGE_VOLTS = 1;

export interface ChannelState {
  index: number;
  enabled: boolean;
  coupling: Coupling;
  requestedRangeVolts: number;
  /** Requested range rounded onto the ladder for the current coupling */
  rangeVolts: number;
  /** As requested by the client */
  offsetVolts: number;
  /** After clamping to the device limits for range and coupling */
  appliedOffsetVolts: number;
  bandwidthMhz: number;
}

export interface PodState {
  index: number;
  enabled: boolean;
  thresholdsVolts: number[];
  hysteresisMv: number;
}

export interface TriggerState {
  source: TriggerSource;
  direction: TriggerDirection;
  levelVolts: number;
  delayFs: number;
}

export interface AcquisitionSettings {
  requestedRateHz: number;
  timebase: number;
  sampleIntervalFs: number;
  memoryDepth: number;
  adcBits: number;
  /** Largest ADC code at the current resolution */
  adcFullScale: number;
}

export interface ChannelSnapshot {
  readonly index: number;
  readonly enabled: boolean;
  readonly rangeVolts: number;
  readonly offsetVolts: number;
  readonly adcFullScale: number;
}

export interface PodSnapshot {
  readonly index: number;
  readonly enabled: boolean;
}

/** Settings in force when a capture was armed. Never mutated once taken. */
export interface ArmSnapshot {
  readonly captureId: number;
  readonly channels: readonly ChannelSnapshot[];
  readonly pods: readonly PodSnapshot[];
  readonly sampleIntervalFs: number;
  readonly memoryDepth: number;
  readonly triggerSampleIndex: number;
}

export interface AcquisitionState {
  channels: ChannelState[];
  pods: PodState[];
  trigger: TriggerState;
  settings: AcquisitionSettings;
  generator: GeneratorState;

  phase: AcquisitionPhase;
  oneShot: boolean;
  lastTriggerWasForced: boolean;
  /** Capture buffers must be reallocated at the next download */
  memoryDepthChanged: boolean;
  snapshot: ArmSnapshot | null;
  nextCaptureId: number;
  capturesCompleted: number;
}

export function createAcquisitionState(capabilities: DigitizerCapabilities, adcBits: number): AcquisitionState {
  const channels: ChannelState[] = [];
  for (let index = 0; index < capabilities.analogChannels; index++) {
    channels.push({
      index,
      enabled: false,
      coupling: 'DC1M',
      requestedRangeVolts: DEFAULT_RANGE_VOLTS,
      rangeVolts: DEFAULT_RANGE_VOLTS,
      offsetVolts: 0,
      appliedOffsetVolts: 0,
      bandwidthMhz: 0,
    });
  }

  const pods: PodState[] = [];
  for (let index = 0; index < capabilities.digitalPods; index++) {
    pods.push({
      index,
      enabled: false,
      thresholdsVolts: new Array<number>(LANES_PER_POD).fill(0),
      hysteresisMv: capabilities.hysteresisLevelsMv[0] ?? 0,
    });
  }

  return {
    channels,
    pods,
    trigger: {
      source: capabilities.analogChannels > 0 ? { kind: 'analog', channel: 0 } : { kind: 'none' },
      direction: 'rising',
      levelVolts: 0,
      delayFs: 0,
    },
    settings: {
      requestedRateHz: DEFAULT_SAMPLE_RATE_HZ,
      timebase: 0,
      sampleIntervalFs: 0,
      memoryDepth: DEFAULT_MEMORY_DEPTH,
      adcBits,
      adcFullScale: 32767,
    },
    generator: {
      enabled: false,
      shape: 'SINE',
      frequencyHz: 1000,
      dutyCycle: 0.5,
      rangeVpp: 0,
      offsetVolts: 0,
    },
    phase: 'disarmed',
    oneShot: false,
    lastTriggerWasForced: false,
    memoryDepthChanged: true,
    snapshot: null,
    nextCaptureId: 1,
    capturesCompleted: 0,
  };
}

export function hasEnabledInputs(state: AcquisitionState): boolean {
  return state.channels.some(c => c.enabled) || state.pods.some(p => p.enabled);
}

export function takeSnapshot(state: AcquisitionState, triggerSampleIndex: number): ArmSnapshot {
  const { settings } = state;
  return Object.freeze({
    captureId: state.nextCaptureId++,
    channels: Object.freeze(
      state.channels.map(c =>
        Object.freeze({
          index: c.index,
          enabled: c.enabled,
          rangeVolts: c.rangeVolts,
          offsetVolts: c.appliedOffsetVolts,
          adcFullScale: settings.adcFullScale,
        })
      )
    ),
    pods: Object.freeze(state.pods.map(p => Object.freeze({ index: p.index, enabled: p.enabled }))),
    sampleIntervalFs: settings.sampleIntervalFs,
    memoryDepth: settings.memoryDepth,
    triggerSampleIndex,
  });
}

/** Copy of a snapshot with every input marked disabled. */
export function disabledSnapshot(snapshot: ArmSnapshot): ArmSnapshot {
  return Object.freeze({
    ...snapshot,
    channels: Object.freeze(snapshot.channels.map(c => Object.freeze({ ...c, enabled: false }))),
    pods: Object.freeze(snapshot.pods.map(p => Object.freeze({ ...p, enabled: false }))),
  });
}
