/**
 * Front-End Normalization
 *
 * Pure conversions from engineering units (volts, hertz, femtoseconds) to
 * the discrete settings the hardware accepts, plus the inverse needed to
 * express trigger levels in ADC codes.
 */

import type { Coupling } from '../../shared/types.js';
import type { DigitizerCapabilities, OffsetLimits } from '../devices/types.js';

const RELATIVE_TOLERANCE = 1e-9;

/** External trigger input spans +/-1 V */
export const AUX_INPUT_RANGE_VOLTS = 1;
export const AUX_HALF_SCALE_CODE = 32767;

/** Ranges selectable for a coupling, largest first. 50 ohm inputs have a lower ceiling on some models. */
export function rangeLadder(capabilities: DigitizerCapabilities, coupling: Coupling): number[] {
  const cap = capabilities.fiftyOhmMaxRangeVolts;
  if (coupling !== 'DC50' || cap === null) return capabilities.rangesVolts;
  const capped = capabilities.rangesVolts.filter(v => v <= cap);
  return capped.length > 0 ? capped : capabilities.rangesVolts;
}

/**
 * Smallest range that still covers the request. Walks the ladder from the
 * top and stops at the first range below the request; a request above the
 * largest range gets the largest, one below the smallest gets the smallest.
 */
export function roundRange(requestedVolts: number, ladder: readonly number[]): number {
  if (ladder.length === 0) return requestedVolts;
  if (Number.isNaN(requestedVolts)) return ladder[0];

  let selected = ladder[0];
  for (const range of ladder) {
    if (range < requestedVolts * (1 - RELATIVE_TOLERANCE)) break;
    selected = range;
  }
  return selected;
}

export function clampOffset(volts: number, limits: OffsetLimits): number {
  return Math.max(limits.min, Math.min(limits.max, volts));
}

/** Trigger level in ADC codes: (volts - offset) / (range / halfScaleCode), nearest integer. */
export function voltsToCode(volts: number, offsetVolts: number, rangeVolts: number, halfScaleCode: number): number {
  let voltsPerCode = rangeVolts / halfScaleCode;
  if (voltsPerCode === 0 || !Number.isFinite(voltsPerCode)) voltsPerCode = 1;
  return Math.round((volts - offsetVolts) / voltsPerCode);
}

export interface TriggerSplit {
  preTriggerSamples: number;
  postTriggerSamples: number;
  /** Samples to wait after the trigger before capturing (positive delays only) */
  delaySamples: number;
}

/**
 * Split a capture of `depth` samples around the trigger. Negative delays
 * move the trigger point into the capture (pre-trigger samples), clamped to
 * [0, depth]; positive delays become a hardware delay after the trigger.
 */
export function triggerSplit(delayFs: number, sampleIntervalFs: number, depth: number): TriggerSplit {
  if (!(sampleIntervalFs > 0)) {
    return { preTriggerSamples: 0, postTriggerSamples: depth, delaySamples: 0 };
  }
  const delaySamples = delayFs / sampleIntervalFs;
  const preTriggerSamples = Math.max(0, Math.min(depth, Math.round(-delaySamples)));
  return {
    preTriggerSamples,
    postTriggerSamples: depth - preTriggerSamples,
    delaySamples: delaySamples > 0 ? Math.round(delaySamples) : 0,
  };
}

/** Nearest supported limiter cutoff; 0 (full bandwidth) when there is no limiter. */
export function coerceBandwidth(requestedMhz: number, supportedMhz: readonly number[]): number {
  if (!(requestedMhz > 0) || supportedMhz.length === 0) return 0;
  return nearest(requestedMhz, supportedMhz);
}

/** Smallest band covering the request, or the widest band. */
export function coerceHysteresis(requestedMv: number, levelsMv: readonly number[]): number {
  if (levelsMv.length === 0) return 0;
  const sorted = [...levelsMv].sort((a, b) => a - b);
  return sorted.find(level => requestedMv <= level) ?? sorted[sorted.length - 1];
}

export function nearest(value: number, candidates: readonly number[]): number {
  let best = candidates[0];
  for (const candidate of candidates) {
    if (Math.abs(candidate - value) < Math.abs(best - value)) best = candidate;
  }
  return best;
}
