/**
 * Command subjects
 *
 *   A, B, ...   analog channels
 *   1, 2        digital pods (1-based)
 *   1D3         pod 1, lane 3 (lane digit at index 2)
 *   EX          external trigger input
 *
 * Out-of-range indices clamp to the last channel, pod or lane. Pod subjects
 * still resolve on models without pods, so pod queries get their answer.
 */

import type { TriggerDirection, TriggerSource } from '../../shared/types.js';
import { LANES_PER_POD, decodeTriggerSource, type ChannelLayout } from '../acquisition/trigger-source.js';

export type ChannelRef =
  | { kind: 'analog'; channel: number }
  | { kind: 'digital'; pod: number; lane: number | null }
  | { kind: 'aux' };

function clamp(value: number, max: number): number {
  return Math.max(0, Math.min(max, value));
}

function isDigit(char: string | undefined): char is string {
  return char !== undefined && char >= '0' && char <= '9';
}

export function resolveSubject(subject: string, layout: ChannelLayout): ChannelRef | null {
  const text = subject.trim().toUpperCase();
  if (text === '') return null;
  if (text === 'EX') return { kind: 'aux' };

  const first = text[0];
  if (first >= 'A' && first <= 'Z') {
    if (layout.analogChannels === 0) return null;
    return { kind: 'analog', channel: clamp(first.charCodeAt(0) - 65, layout.analogChannels - 1) };
  }

  if (isDigit(first)) {
    const pod = clamp(Number(first) - 1, Math.max(0, layout.digitalPods - 1));
    const laneChar = text[2];
    const lane = isDigit(laneChar) ? clamp(Number(laneChar), LANES_PER_POD - 1) : null;
    return { kind: 'digital', pod, lane };
  }

  return null;
}

/**
 * Trigger source argument: a subject, or '#' followed by the numeric wire
 * id. A bare pod subject triggers on lane 0.
 */
export function resolveTriggerSource(text: string, layout: ChannelLayout): TriggerSource | null {
  const trimmed = text.trim();
  const wireId = /^#(\d+)$/.exec(trimmed);
  if (wireId) {
    const source = decodeTriggerSource(Number(wireId[1]), layout);
    return source.kind === 'none' ? null : source;
  }

  const ref = resolveSubject(trimmed, layout);
  if (ref === null) return null;
  switch (ref.kind) {
    case 'analog':
      return { kind: 'analog', channel: ref.channel };
    case 'digital':
      if (layout.digitalPods === 0) return null;
      return { kind: 'digital', pod: ref.pod, lane: ref.lane ?? 0 };
    case 'aux':
      return { kind: 'aux' };
  }
}

const DIRECTIONS: Record<string, TriggerDirection> = {
  RISING: 'rising',
  FALLING: 'falling',
  ANY: 'either',
};

export function parseDirection(text: string | undefined): TriggerDirection | null {
  if (text === undefined) return null;
  return DIRECTIONS[text.trim().toUpperCase()] ?? null;
}
