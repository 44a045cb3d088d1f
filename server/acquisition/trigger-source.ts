/**
 * Trigger source wire ids
 *
 * Clients address trigger sources with a single channel-space number:
 * analog channels first, then the digital lanes (analogCount + pod*8 + lane),
 * and a reserved id for the external input. Decoding happens once, here;
 * the rest of the server only sees TriggerSource.
 */

import type { TriggerSource } from '../../shared/types.js';

export const LANES_PER_POD = 8;
export const AUX_SOURCE_ID = 0x7fff;
export const NO_SOURCE_ID = -1;

export interface ChannelLayout {
  analogChannels: number;
  digitalPods: number;
}

export function encodeTriggerSource(source: TriggerSource, layout: ChannelLayout): number {
  switch (source.kind) {
    case 'analog':
      return source.channel;
    case 'digital':
      return layout.analogChannels + source.pod * LANES_PER_POD + source.lane;
    case 'aux':
      return AUX_SOURCE_ID;
    case 'none':
      return NO_SOURCE_ID;
  }
}

export function decodeTriggerSource(id: number, layout: ChannelLayout): TriggerSource {
  if (id === AUX_SOURCE_ID) return { kind: 'aux' };
  if (!Number.isInteger(id) || id < 0) return { kind: 'none' };
  if (id < layout.analogChannels) return { kind: 'analog', channel: id };

  const digitalIndex = id - layout.analogChannels;
  if (digitalIndex < layout.digitalPods * LANES_PER_POD) {
    return {
      kind: 'digital',
      pod: Math.floor(digitalIndex / LANES_PER_POD),
      lane: digitalIndex % LANES_PER_POD,
    };
  }
  return { kind: 'none' };
}

export function describeTriggerSource(source: TriggerSource): string {
  switch (source.kind) {
    case 'analog':
      return `channel ${String.fromCharCode(65 + source.channel)}`;
    case 'digital':
      return `pod ${source.pod + 1} lane ${source.lane}`;
    case 'aux':
      return 'external input';
    case 'none':
      return 'none';
  }
}
