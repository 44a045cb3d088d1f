/**
 * Family Adapter Base
 *
 * Everything the hardware families share. A family module describes its
 * encodings in a FamilyProfile and gets a complete DigitizerAdapter from
 * createFamilyAdapter(); only pod, generator and timing behaviour differ.
 */

import { Ok, Err } from '../../../shared/types.js';
import { WAVEFORM_SHAPES } from '../../../shared/types.js';
import type { Coupling, GeneratorState, TriggerDirection, WaveformShape } from '../../../shared/types.js';
import {
  DriverStatus,
  RawCoupling,
  RawDirection,
  RANGE_CODE_VOLTS,
  RAW_EXTERNAL_CHANNEL,
  type DriverBinding,
  type RawPodSettings,
} from '../binding.js';
import { deviceError, fromBinding } from '../recovery.js';
import type {
  DigitizerAdapter,
  DigitizerCapabilities,
  DeviceResult,
  PodFrontEnd,
  TimebaseEntry,
  TimebaseModel,
} from '../types.js';

export const INSTRUMENT_MAKE = 'Lab Digitizer';

export const FS_PER_NS = 1_000_000;
export const FS_PER_SECOND = 1e15;

/** Timebase integers are 32-bit on every family */
export const MAX_TIMEBASE = 0xffffffff;

// ============ Model String Helpers ============

/** Analog channel count is the digit right after the two-character family prefix (H6424E -> 4). */
export function channelCountFromModel(model: string): number {
  const digit = parseInt(model.charAt(2), 10);
  return Number.isNaN(digit) || digit < 1 ? 2 : digit;
}

export function isMixedSignal(model: string): boolean {
  return model.toUpperCase().includes('MSO');
}

// ============ Encodings ============

export function rangeCodeForVolts(volts: number): number {
  return RANGE_CODE_VOLTS.findIndex(v => Math.abs(v - volts) <= v * 1e-9);
}

export function rawCoupling(coupling: Coupling): number {
  switch (coupling) {
    case 'AC1M':
      return RawCoupling.AC;
    case 'DC50':
      return RawCoupling.DC_50OHM;
    default:
      return RawCoupling.DC;
  }
}

export function rawDirection(direction: TriggerDirection): number {
  switch (direction) {
    case 'falling':
      return RawDirection.FALLING;
    case 'either':
      return RawDirection.RISING_OR_FALLING;
    default:
      return RawDirection.RISING;
  }
}

/** Converts a threshold voltage into the pod's signed 16-bit code for a given full-scale voltage. */
export function thresholdCode(volts: number, fullScaleVolts: number): number {
  const code = Math.round((volts * 32767) / fullScaleVolts);
  return Math.max(-32767, Math.min(32767, code));
}

export const WAVE_TYPE_CODES: Record<Exclude<WaveformShape, 'ARBITRARY'>, number> = {
  SINE: 0,
  SQUARE: 1,
  TRIANGLE: 2,
  RAMP_UP: 3,
  RAMP_DOWN: 4,
  SINC: 5,
  GAUSSIAN: 6,
  HALF_SINE: 7,
  DC: 8,
  WHITENOISE: 9,
  PRBS: 10,
};

/** Every shape with a built-in wave type */
export const BUILT_IN_SHAPES: WaveformShape[] = WAVEFORM_SHAPES.filter(shape => shape !== 'ARBITRARY');

export function waveTypeCode(shape: WaveformShape): number | null {
  return shape === 'ARBITRARY' ? null : WAVE_TYPE_CODES[shape];
}

/**
 * Arbitrary-waveform buffer holding one square period with the given duty
 * cycle. Used where the built-in square wave has a fixed 50% duty.
 */
export function generateSquareWave(bufferSize: number, dutyPercent: number): Int16Array {
  const buffer = new Int16Array(bufferSize);
  const highSamples = Math.round((bufferSize * Math.max(0, Math.min(100, dutyPercent))) / 100);
  for (let i = 0; i < bufferSize; i++) {
    buffer[i] = i < highSamples ? 32767 : -32768;
  }
  return buffer;
}

// ============ Timing Helpers ============

const PREFERRED_MANTISSAS = [8, 5, 4, 2.5, 2, 1.25, 1];

/**
 * Timebases reached by quantizing a ladder of round rates (8, 5, 4, 2.5, 2,
 * 1.25, 1 per decade) from 8 GS/s down to 1 kS/s. Invalid and duplicate
 * timebases are dropped; result is fastest first.
 */
export function preferredTimebases(
  timing: Pick<TimebaseModel, 'timebaseForRate' | 'intervalForTimebase'>,
  adcBits: number
): number[] {
  const seen = new Set<number>();
  for (let exponent = 9; exponent >= 3; exponent--) {
    for (const mantissa of PREFERRED_MANTISSAS) {
      const rate = mantissa * 10 ** exponent;
      const timebase = timing.timebaseForRate(rate, adcBits);
      if (timing.intervalForTimebase(timebase, adcBits) !== null) {
        seen.add(timebase);
      }
    }
  }
  return [...seen].sort((a, b) => a - b);
}

export function clampTimebase(timebase: number, min: number): number {
  if (!Number.isFinite(timebase)) return MAX_TIMEBASE;
  return Math.max(min, Math.min(MAX_TIMEBASE, timebase));
}

/** Memory depths offered to clients: 1-2-5 steps from 1k up to the device maximum. */
export function depthLadder(maxSamples: number): number[] {
  const depths: number[] = [];
  for (let decade = 1000; decade < maxSamples; decade *= 10) {
    for (const step of [1, 2, 5]) {
      const depth = decade * step;
      if (depth < maxSamples) depths.push(depth);
    }
  }
  depths.push(maxSamples);
  return depths;
}

// ============ Adapter Base ============

export interface FamilyProfile {
  family: string;
  make: string;
  capabilities: DigitizerCapabilities;
  timing: TimebaseModel;
  initialResolution: number;
  /** Raw bandwidth code for a supported limit, 0 MHz meaning full */
  encodeBandwidth(mhz: number): number;
  encodePod(settings: PodFrontEnd): RawPodSettings;
  probePod(binding: DriverBinding, pod: number): Promise<DeviceResult<boolean>>;
  applyGenerator(binding: DriverBinding, state: GeneratorState): Promise<DeviceResult<void>>;
}

export function createFamilyAdapter(binding: DriverBinding, profile: FamilyProfile): DigitizerAdapter {
  const { capabilities, timing } = profile;
  let adcBits = profile.initialResolution;

  function minTimebase(): number {
    const candidates = timing.candidateTimebases(adcBits);
    return candidates.length > 0 ? candidates[0] : 0;
  }

  async function maxSamples(): Promise<DeviceResult<number>> {
    const info = await binding.getTimebase(minTimebase(), 1);
    if (!info.ok) return Err(deviceError('getTimebase', info.error));
    return Ok(info.value.maxSamples);
  }

  return {
    info: {
      make: profile.make,
      model: binding.identity.model,
      serial: binding.identity.serial,
      firmware: binding.identity.firmware,
      family: profile.family,
    },
    capabilities,

    async setChannel(channel, settings) {
      if (channel < 0 || channel >= capabilities.analogChannels) {
        return Err(deviceError('setChannel', DriverStatus.INVALID_CHANNEL));
      }
      const rangeCode = rangeCodeForVolts(settings.rangeVolts);
      if (rangeCode < 0 || !capabilities.rangesVolts.includes(RANGE_CODE_VOLTS[rangeCode])) {
        return Err(deviceError('setChannel', DriverStatus.INVALID_VOLTAGE_RANGE));
      }
      const result = await binding.setChannel(channel, {
        enabled: settings.enabled,
        coupling: rawCoupling(settings.coupling),
        rangeCode,
        // the front end adds this voltage to the input, so it is the negated offset
        analogOffset: -settings.offsetVolts,
        bandwidth: profile.encodeBandwidth(settings.bandwidthMhz),
      });
      return fromBinding('setChannel', result);
    },

    async getOffsetLimits(rangeVolts, coupling) {
      const rangeCode = rangeCodeForVolts(rangeVolts);
      if (rangeCode < 0) {
        return Err(deviceError('getAnalogueOffsetLimits', DriverStatus.INVALID_VOLTAGE_RANGE));
      }
      return fromBinding(
        'getAnalogueOffsetLimits',
        await binding.getAnalogueOffsetLimits(rangeCode, rawCoupling(coupling))
      );
    },

    async getAdcFullScale() {
      return fromBinding('getMaximumValue', await binding.getMaximumValue());
    },

    async setResolution(bits) {
      if (!capabilities.resolutions.includes(bits)) {
        return Err(deviceError('setDeviceResolution', DriverStatus.RESOLUTION_NOT_SUPPORTED));
      }
      if (capabilities.resolutions.length === 1) {
        adcBits = bits;
        return Ok(undefined);
      }
      const result = fromBinding('setDeviceResolution', await binding.setDeviceResolution(bits));
      if (result.ok) adcBits = bits;
      return result;
    },

    getResolution() {
      return adcBits;
    },

    async setPod(pod, settings) {
      if (pod < 0 || pod >= capabilities.digitalPods) {
        return Err(deviceError('setDigitalPort', DriverStatus.INVALID_CHANNEL));
      }
      return fromBinding('setDigitalPort', await binding.setDigitalPort(pod, profile.encodePod(settings)));
    },

    async probePod(pod) {
      if (pod < 0 || pod >= capabilities.digitalPods) return Ok(false);
      return profile.probePod(binding, pod);
    },

    async getSupportedRates() {
      const entries: TimebaseEntry[] = [];
      for (const timebase of timing.candidateTimebases(adcBits)) {
        const info = await binding.getTimebase(timebase, 1);
        if (!info.ok) {
          // not usable with the current channel set, skip it
          if (info.error === DriverStatus.INVALID_TIMEBASE) continue;
          return Err(deviceError('getTimebase', info.error));
        }
        entries.push({ timebase, intervalFs: Math.round(info.value.intervalNs * FS_PER_NS) });
      }
      return Ok(entries);
    },

    async getSupportedDepths() {
      const max = await maxSamples();
      if (!max.ok) return max;
      return Ok(depthLadder(max.value));
    },

    getMaxSamples: maxSamples,

    timebaseForRate(rateHz) {
      return timing.timebaseForRate(rateHz, adcBits);
    },

    intervalForTimebase(timebase) {
      return timing.intervalForTimebase(timebase, adcBits) ?? timing.intervalForTimebase(minTimebase(), adcBits) ?? 0;
    },

    async configureTrigger(trigger) {
      const { source } = trigger;
      const direction = rawDirection(trigger.direction);
      const simple = {
        enabled: source.kind === 'analog' || source.kind === 'aux',
        channel: source.kind === 'analog' ? source.channel : RAW_EXTERNAL_CHANNEL,
        thresholdCode: trigger.thresholdCode,
        direction,
        delaySamples: trigger.delaySamples,
        autoTriggerUs: trigger.timeoutUs,
      };

      const digital = await binding.setDigitalTrigger(
        source.kind === 'digital' ? { port: source.pod, bit: source.lane, direction } : null
      );
      if (!digital.ok) return Err(deviceError('setDigitalTrigger', digital.error));

      return fromBinding('setSimpleTrigger', await binding.setSimpleTrigger(simple));
    },

    async arm(preTriggerSamples, postTriggerSamples, timebase) {
      return fromBinding('runBlock', await binding.runBlock(preTriggerSamples, postTriggerSamples, timebase));
    },

    async disarm() {
      return fromBinding('stop', await binding.stop());
    },

    async isCaptureReady() {
      return fromBinding('isReady', await binding.isReady());
    },

    async readCapture(request) {
      return fromBinding(
        'getValues',
        await binding.getValues({
          channels: request.channels,
          ports: request.pods,
          samples: request.samples,
          reallocate: request.reallocate,
        })
      );
    },

    async applyGenerator(state) {
      if (!capabilities.generator.present) {
        return Err(deviceError('setSignalGenerator', DriverStatus.NOT_USED));
      }
      if (!capabilities.generator.shapes.includes(state.shape)) {
        return Err(deviceError('setSignalGenerator', DriverStatus.SIGGEN_WAVE_TYPE_NOT_SUPPORTED));
      }
      return profile.applyGenerator(binding, state);
    },

    async close() {
      return fromBinding('close', await binding.close());
    },
  };
}

// ============ Shared Pod / Generator Behaviour ============

/** Pods with one threshold for all lanes: the first lane's value wins. */
export function encodeSharedThresholdPod(settings: PodFrontEnd, fullScaleVolts: number): RawPodSettings {
  const volts = settings.thresholdsVolts.length > 0 ? settings.thresholdsVolts[0] : 0;
  return {
    enabled: settings.enabled,
    thresholdCodes: [thresholdCode(volts, fullScaleVolts)],
    hysteresis: 0,
  };
}

/** Presence is fixed by the model: pods exist exactly when the model is mixed-signal. */
export async function staticPodPresence(binding: DriverBinding): Promise<DeviceResult<boolean>> {
  return Ok(isMixedSignal(binding.identity.model));
}

/**
 * Generators that only take built-in shapes at 50% duty. Square waves with
 * another duty cycle go through the arbitrary buffer. Turning the generator
 * off means zero amplitude and offset.
 */
export function createBufferedGenerator(bufferSize: number) {
  return async (binding: DriverBinding, state: GeneratorState): Promise<DeviceResult<void>> => {
    const frequencyHz = state.frequencyHz;
    const waveType = waveTypeCode(state.shape) ?? WAVE_TYPE_CODES.SINE;

    if (!state.enabled) {
      return fromBinding(
        'setSignalGenerator',
        await binding.setSignalGenerator({
          outputEnabled: false,
          waveType: WAVE_TYPE_CODES.DC,
          frequencyHz,
          offsetMicrovolts: 0,
          pkToPkMicrovolts: 0,
          dutyCyclePercent: 50,
        })
      );
    }

    const dutyCyclePercent = state.dutyCycle * 100;
    const useBuffer = state.shape === 'SQUARE' && Math.abs(dutyCyclePercent - 50) > 1e-6;

    return fromBinding(
      'setSignalGenerator',
      await binding.setSignalGenerator({
        outputEnabled: true,
        waveType,
        arbitraryBuffer: useBuffer ? generateSquareWave(bufferSize, dutyCyclePercent) : undefined,
        frequencyHz,
        offsetMicrovolts: Math.round(state.offsetVolts * 1e6),
        pkToPkMicrovolts: Math.round(state.rangeVpp * 1e6),
        dutyCyclePercent: 50,
      })
    );
  };
}
