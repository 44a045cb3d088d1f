/**
 * High-performance family (H6)
 *
 * 5 GS/s timebase with a 6.4 ns linear region, 10 mV..200 V inputs
 * (5 V max at 50 ohm), per-lane pod thresholds with selectable hysteresis,
 * and a generator with its own apply call.
 */

import { Err } from '../../../shared/types.js';
import { DriverStatus, RawBandwidth, RawHysteresis, type RawPodSettings } from '../binding.js';
import { deviceError, fromBinding } from '../recovery.js';
import type { DigitizerFamily, PodFrontEnd, TimebaseModel } from '../types.js';
import {
  BUILT_IN_SHAPES,
  FS_PER_NS,
  INSTRUMENT_MAKE,
  MAX_TIMEBASE,
  channelCountFromModel,
  clampTimebase,
  createFamilyAdapter,
  preferredTimebases,
  thresholdCode,
  waveTypeCode,
} from './common.js';

const HIGHPERF_RANGES = [200, 100, 50, 20, 10, 5, 2, 1, 0.5, 0.2, 0.1, 0.05, 0.02, 0.01];

/** Per-lane thresholds span +/-8 V */
const LANE_THRESHOLD_FULL_SCALE_V = 8;

export const HYSTERESIS_LEVELS_MV = [50, 100, 200, 400];

function minTimebase(adcBits: number): number {
  return adcBits >= 12 ? 1 : 0;
}

export const highperfTiming: TimebaseModel = {
  timebaseForRate(rateHz, adcBits) {
    if (!(rateHz > 0)) return MAX_TIMEBASE;
    const periodNs = 1e9 / rateHz;
    const clockDivisor = periodNs / 0.2;
    const floor = minTimebase(adcBits);
    if (periodNs < 5) {
      return Math.max(floor, Math.min(4, Math.round(Math.log2(Math.max(1, clockDivisor)))));
    }
    return clampTimebase(Math.round(clockDivisor / 32) + 4, floor);
  },

  intervalForTimebase(timebase, adcBits) {
    if (!Number.isInteger(timebase) || timebase < minTimebase(adcBits) || timebase > MAX_TIMEBASE) {
      return null;
    }
    const ns = timebase <= 4 ? 0.2 * 2 ** timebase : (timebase - 4) * 6.4;
    return Math.round(ns * FS_PER_NS);
  },

  candidateTimebases(adcBits) {
    return preferredTimebases(highperfTiming, adcBits);
  },
};

export function hysteresisCode(millivolts: number): number {
  if (millivolts <= 50) return RawHysteresis.LOW_50MV;
  if (millivolts <= 100) return RawHysteresis.NORMAL_100MV;
  if (millivolts <= 200) return RawHysteresis.HIGH_200MV;
  return RawHysteresis.VERY_HIGH_400MV;
}

function encodeLanePod(settings: PodFrontEnd): RawPodSettings {
  return {
    enabled: settings.enabled,
    thresholdCodes: settings.thresholdsVolts.map(v => thresholdCode(v, LANE_THRESHOLD_FULL_SCALE_V)),
    hysteresis: hysteresisCode(settings.hysteresisMv),
  };
}

function encodeBandwidth(mhz: number): number {
  if (mhz === 20) return RawBandwidth.BW_20MHZ;
  if (mhz === 200) return RawBandwidth.BW_200MHZ;
  return RawBandwidth.FULL;
}

export const highperfFamily: DigitizerFamily = {
  id: 'highperf',
  displayName: 'High performance series',
  match: { model: /^H6\d/i },
  timing: highperfTiming,
  defaultResolution: () => 8,
  create: binding =>
    createFamilyAdapter(binding, {
      family: 'highperf',
      make: INSTRUMENT_MAKE,
      capabilities: {
        analogChannels: channelCountFromModel(binding.identity.model),
        digitalPods: 2,
        rangesVolts: HIGHPERF_RANGES,
        fiftyOhmMaxRangeVolts: 5,
        bandwidthLimitsMhz: [20, 200],
        resolutions: [8, 10, 12],
        perLaneThresholds: true,
        hysteresisLevelsMv: HYSTERESIS_LEVELS_MV,
        generator: { present: true, dedicatedApply: true, shapes: BUILT_IN_SHAPES },
      },
      timing: highperfTiming,
      initialResolution: 8,
      encodeBandwidth,
      encodePod: encodeLanePod,
      // pods are detachable on this family, so ask the hardware
      probePod: async (device, pod) =>
        fromBinding('isDigitalPortConnected', await device.isDigitalPortConnected(pod)),
      applyGenerator: async (device, state) => {
        const waveType = waveTypeCode(state.shape);
        if (waveType === null) {
          return Err(deviceError('setSignalGenerator', DriverStatus.SIGGEN_WAVE_TYPE_NOT_SUPPORTED));
        }
        return fromBinding(
          'setSignalGenerator',
          await device.setSignalGenerator({
            outputEnabled: state.enabled,
            waveType,
            frequencyHz: state.frequencyHz,
            offsetMicrovolts: Math.round(state.offsetVolts * 1e6),
            pkToPkMicrovolts: Math.round(state.rangeVpp * 1e6),
            dutyCyclePercent: state.dutyCycle * 100,
          })
        );
      },
    }),
};
