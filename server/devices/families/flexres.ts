/**
 * Flexible-resolution family (F5)
 *
 * ADC resolution is switchable between 8 and 16 bits. Every resolution has
 * its own fastest timebase and its own split between the power-of-two and
 * the linear region, so rate quantization is keyed on the current bit depth.
 */

import { RawBandwidth } from '../binding.js';
import type { DigitizerFamily, TimebaseModel } from '../types.js';
import {
  BUILT_IN_SHAPES,
  FS_PER_NS,
  INSTRUMENT_MAKE,
  MAX_TIMEBASE,
  channelCountFromModel,
  clampTimebase,
  createBufferedGenerator,
  createFamilyAdapter,
  encodeSharedThresholdPod,
  isMixedSignal,
  preferredTimebases,
  staticPodPresence,
} from './common.js';
import { gigasampleTiming } from './legacy.js';

const FLEXRES_RANGES = [20, 10, 5, 2, 1, 0.5, 0.2, 0.1, 0.05, 0.02, 0.01];

export const FLEXRES_RESOLUTIONS = [8, 12, 14, 15, 16];

/** Lowest valid timebase per resolution */
function minTimebase(adcBits: number): number {
  if (adcBits >= 16) return 4;
  if (adcBits >= 14) return 3;
  if (adcBits >= 12) return 1;
  return 0;
}

function intervalNs(timebase: number, adcBits: number): number {
  if (adcBits >= 16) return (timebase - 3) * 16;
  if (adcBits >= 14) return (timebase - 2) * 8;
  if (adcBits >= 12) return timebase <= 3 ? 2 ** (timebase - 1) * 2 : (timebase - 3) * 16;
  return timebase <= 2 ? 2 ** timebase : (timebase - 2) * 8;
}

export const flexresTiming: TimebaseModel = {
  timebaseForRate(rateHz, adcBits) {
    if (adcBits < 12) return gigasampleTiming.timebaseForRate(rateHz, adcBits);
    if (!(rateHz > 0)) return MAX_TIMEBASE;

    const periodNs = 1e9 / rateHz;
    const floor = minTimebase(adcBits);

    if (adcBits >= 16) {
      return periodNs < 32 ? floor : clampTimebase(Math.round(62.5e6 / rateHz + 3), floor);
    }
    if (adcBits >= 14) {
      return periodNs < 16 ? floor : clampTimebase(Math.round(125e6 / rateHz + 2), floor);
    }
    if (periodNs < 4) return floor;
    if (periodNs < 16) return clampTimebase(Math.round(Math.log2(5e8 / rateHz) + 1), floor);
    return clampTimebase(Math.round(62.5e6 / rateHz + 3), floor);
  },

  intervalForTimebase(timebase, adcBits) {
    if (!Number.isInteger(timebase) || timebase < minTimebase(adcBits) || timebase > MAX_TIMEBASE) {
      return null;
    }
    return Math.round(intervalNs(timebase, adcBits) * FS_PER_NS);
  },

  candidateTimebases(adcBits) {
    return preferredTimebases(flexresTiming, adcBits);
  },
};

export const flexresFamily: DigitizerFamily = {
  id: 'flexres',
  displayName: 'Flexible resolution series',
  match: { model: /^F5\d/i },
  timing: flexresTiming,
  defaultResolution: () => 8,
  create: binding =>
    createFamilyAdapter(binding, {
      family: 'flexres',
      make: INSTRUMENT_MAKE,
      capabilities: {
        analogChannels: channelCountFromModel(binding.identity.model),
        digitalPods: isMixedSignal(binding.identity.model) ? 2 : 0,
        rangesVolts: FLEXRES_RANGES,
        fiftyOhmMaxRangeVolts: null,
        bandwidthLimitsMhz: [20],
        resolutions: FLEXRES_RESOLUTIONS,
        perLaneThresholds: false,
        hysteresisLevelsMv: [],
        generator: { present: true, dedicatedApply: false, shapes: BUILT_IN_SHAPES },
      },
      timing: flexresTiming,
      initialResolution: 8,
      encodeBandwidth: mhz => (mhz === 20 ? RawBandwidth.BW_20MHZ : RawBandwidth.FULL),
      encodePod: settings => encodeSharedThresholdPod(settings, 5),
      probePod: staticPodPresence,
      applyGenerator: createBufferedGenerator(49152),
    }),
};
