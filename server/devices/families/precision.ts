/**
 * Precision family (P4)
 *
 * High-resolution, analog-only digitizers on an 80 MHz linear timebase.
 * No digital pods and no signal generator.
 */

import { Ok, Err } from '../../../shared/types.js';
import { DriverStatus, RawBandwidth } from '../binding.js';
import { deviceError } from '../recovery.js';
import type { DigitizerFamily, TimebaseModel } from '../types.js';
import {
  FS_PER_NS,
  INSTRUMENT_MAKE,
  MAX_TIMEBASE,
  channelCountFromModel,
  clampTimebase,
  createFamilyAdapter,
  encodeSharedThresholdPod,
  preferredTimebases,
} from './common.js';

const PRECISION_RANGES = [20, 10, 5, 2, 1, 0.5, 0.2, 0.1, 0.05, 0.02, 0.01];

/** Interval is (n + 1) * 12.5 ns. */
export const linearTiming: TimebaseModel = {
  timebaseForRate(rateHz) {
    if (!(rateHz > 0)) return MAX_TIMEBASE;
    return clampTimebase(Math.trunc(80e6 / rateHz - 1), 0);
  },

  intervalForTimebase(timebase) {
    if (!Number.isInteger(timebase) || timebase < 0 || timebase > MAX_TIMEBASE) return null;
    return Math.round((timebase + 1) * 12.5 * FS_PER_NS);
  },

  candidateTimebases(adcBits) {
    return preferredTimebases(linearTiming, adcBits);
  },
};

/** The 4-channel 4444 variant also offers a 14-bit mode. */
function resolutionsFor(model: string): number[] {
  return /^P4444/i.test(model) ? [12, 14] : [12];
}

export const precisionFamily: DigitizerFamily = {
  id: 'precision',
  displayName: 'Precision series',
  match: { model: /^P4\d/i },
  timing: linearTiming,
  defaultResolution: () => 12,
  create: binding =>
    createFamilyAdapter(binding, {
      family: 'precision',
      make: INSTRUMENT_MAKE,
      capabilities: {
        analogChannels: channelCountFromModel(binding.identity.model),
        digitalPods: 0,
        rangesVolts: PRECISION_RANGES,
        fiftyOhmMaxRangeVolts: null,
        bandwidthLimitsMhz: [1],
        resolutions: resolutionsFor(binding.identity.model),
        perLaneThresholds: false,
        hysteresisLevelsMv: [],
        generator: { present: false, dedicatedApply: false, shapes: [] },
      },
      timing: linearTiming,
      initialResolution: 12,
      encodeBandwidth: mhz => (mhz === 1 ? RawBandwidth.BW_1MHZ : RawBandwidth.FULL),
      encodePod: settings => encodeSharedThresholdPod(settings, 5),
      probePod: async () => Ok(false),
      applyGenerator: async () => Err(deviceError('setSignalGenerator', DriverStatus.NOT_USED)),
    }),
};
