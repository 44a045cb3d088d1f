/**
 * Legacy 8-bit families (E2 entry, M3 mainstream)
 *
 * 1 GS/s timebase, 20 mV..20 V inputs, a single shared threshold on the
 * MSO pods and a signal generator that only re-applies through an
 * acquisition stop/restart.
 */

import type { WaveformShape } from '../../../shared/types.js';
import { RawBandwidth } from '../binding.js';
import type { DigitizerCapabilities, DigitizerFamily, TimebaseModel } from '../types.js';
import {
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

const LEGACY_RANGES = [20, 10, 5, 2, 1, 0.5, 0.2, 0.1, 0.05, 0.02];

/** MSO pod thresholds span +/-5 V */
const SHARED_THRESHOLD_FULL_SCALE_V = 5;

const BASIC_SHAPES: WaveformShape[] = [
  'SINE', 'SQUARE', 'TRIANGLE', 'RAMP_UP', 'RAMP_DOWN', 'SINC', 'GAUSSIAN', 'HALF_SINE', 'DC',
];

/**
 * 1 GS/s timebase: 2^n ns for n <= 2, then 8 ns steps.
 * Also the 8-bit mode of the flexible-resolution family.
 */
export const gigasampleTiming: TimebaseModel = {
  timebaseForRate(rateHz) {
    if (!(rateHz > 0)) return MAX_TIMEBASE;
    const periodNs = 1e9 / rateHz;
    if (periodNs < 2) return 0;
    if (periodNs < 8) return Math.round(Math.log2(1e9 / rateHz));
    return clampTimebase(Math.round(125e6 / rateHz + 2), 0);
  },

  intervalForTimebase(timebase) {
    if (!Number.isInteger(timebase) || timebase < 0 || timebase > MAX_TIMEBASE) return null;
    const ns = timebase <= 2 ? 2 ** timebase : (timebase - 2) * 8;
    return Math.round(ns * FS_PER_NS);
  },

  candidateTimebases(adcBits) {
    return preferredTimebases(gigasampleTiming, adcBits);
  },
};

interface LegacyVariant {
  family: string;
  bandwidthLimitsMhz: number[];
  shapes: WaveformShape[];
  arbitraryBufferSize: number;
}

const ENTRY: LegacyVariant = {
  family: 'legacy-entry',
  bandwidthLimitsMhz: [],
  shapes: BASIC_SHAPES,
  arbitraryBufferSize: 8192,
};

const MAINSTREAM: LegacyVariant = {
  family: 'legacy-mainstream',
  bandwidthLimitsMhz: [20],
  shapes: [...BASIC_SHAPES, 'WHITENOISE', 'PRBS'],
  arbitraryBufferSize: 32768,
};

function legacyCapabilities(model: string, variant: LegacyVariant): DigitizerCapabilities {
  return {
    analogChannels: channelCountFromModel(model),
    digitalPods: isMixedSignal(model) ? 2 : 0,
    rangesVolts: LEGACY_RANGES,
    fiftyOhmMaxRangeVolts: null,
    bandwidthLimitsMhz: variant.bandwidthLimitsMhz,
    resolutions: [8],
    perLaneThresholds: false,
    hysteresisLevelsMv: [],
    generator: { present: true, dedicatedApply: false, shapes: variant.shapes },
  };
}

function createLegacyFamily(variant: LegacyVariant, displayName: string, model: RegExp): DigitizerFamily {
  return {
    id: variant.family,
    displayName,
    match: { model },
    timing: gigasampleTiming,
    defaultResolution: () => 8,
    create: binding =>
      createFamilyAdapter(binding, {
        family: variant.family,
        make: INSTRUMENT_MAKE,
        capabilities: legacyCapabilities(binding.identity.model, variant),
        timing: gigasampleTiming,
        initialResolution: 8,
        encodeBandwidth: mhz => (mhz === 20 && variant.bandwidthLimitsMhz.includes(20) ? RawBandwidth.BW_20MHZ : RawBandwidth.FULL),
        encodePod: settings => encodeSharedThresholdPod(settings, SHARED_THRESHOLD_FULL_SCALE_V),
        probePod: staticPodPresence,
        applyGenerator: createBufferedGenerator(variant.arbitraryBufferSize),
      }),
  };
}

export const legacyEntryFamily = createLegacyFamily(ENTRY, 'Legacy entry series', /^E2\d/i);

export const legacyMainstreamFamily = createLegacyFamily(MAINSTREAM, 'Legacy mainstream series', /^M3\d/i);
