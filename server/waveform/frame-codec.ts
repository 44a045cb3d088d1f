/**
 * Data-plane frame codec
 *
 * One frame per completed capture, little-endian throughout:
 *
 *   header (24 bytes)
 *     u16 magic 0x4446, u16 block count, u32 enabled bitmap,
 *     u64 sample interval (fs), u64 trigger sample index
 *   block (16 bytes + samples)
 *     u16 channel index, u8 kind, u8 bytes per sample, u32 sample count,
 *     f32 volts per code, f32 offset volts, then the samples
 *
 * Analog bitmap bit i is channel i; bit 16 + p is pod p. Pod blocks are
 * numbered after the analog channels.
 */

import { Result, Ok, Err } from '../../shared/types.js';
import type { ArmSnapshot } from '../acquisition/state.js';
import type { CaptureData } from '../devices/types.js';

export const FRAME_MAGIC = 0x4446;
export const FRAME_HEADER_BYTES = 24;
export const BLOCK_HEADER_BYTES = 16;
export const BYTES_PER_SAMPLE = 2;
export const POD_BITMAP_SHIFT = 16;

export type BlockKind = 'analog' | 'digital';

const KIND_CODES: Record<BlockKind, number> = { analog: 0, digital: 1 };

export interface FrameBlock {
  channelIndex: number;
  kind: BlockKind;
  voltsPerCode: number;
  offsetVolts: number;
  samples: Int16Array | Uint16Array;
}

export interface Frame {
  enabledBitmap: number;
  sampleIntervalFs: number;
  triggerSampleIndex: number;
  blocks: FrameBlock[];
}

/**
 * Build a frame from a capture and the snapshot it was armed with. Only
 * inputs enabled in the snapshot appear, in channel order, analog first.
 */
export function buildFrame(snapshot: ArmSnapshot, data: CaptureData): Frame {
  const analogCount = snapshot.channels.length;
  const blocks: FrameBlock[] = [];
  let enabledBitmap = 0;

  for (const channel of snapshot.channels) {
    if (!channel.enabled) continue;
    const samples = data.analog.get(channel.index);
    if (!samples) continue;
    enabledBitmap |= 1 << channel.index;
    blocks.push({
      channelIndex: channel.index,
      kind: 'analog',
      voltsPerCode: channel.adcFullScale > 0 ? channel.rangeVolts / channel.adcFullScale : 0,
      offsetVolts: channel.offsetVolts,
      samples: samples.subarray(0, data.samples),
    });
  }

  for (const pod of snapshot.pods) {
    if (!pod.enabled) continue;
    const samples = data.digital.get(pod.index);
    if (!samples) continue;
    enabledBitmap |= 1 << (POD_BITMAP_SHIFT + pod.index);
    blocks.push({
      channelIndex: analogCount + pod.index,
      kind: 'digital',
      voltsPerCode: 1,
      offsetVolts: 0,
      samples: samples.subarray(0, data.samples),
    });
  }

  return {
    // keep the bitmap unsigned once bit 31 is in play
    enabledBitmap: enabledBitmap >>> 0,
    sampleIntervalFs: snapshot.sampleIntervalFs,
    triggerSampleIndex: snapshot.triggerSampleIndex,
    blocks,
  };
}

export function frameSize(frame: Frame): number {
  return frame.blocks.reduce(
    (size, block) => size + BLOCK_HEADER_BYTES + block.samples.length * BYTES_PER_SAMPLE,
    FRAME_HEADER_BYTES
  );
}

export function encodeFrame(frame: Frame): Buffer {
  const buffer = Buffer.alloc(frameSize(frame));

  buffer.writeUInt16LE(FRAME_MAGIC, 0);
  buffer.writeUInt16LE(frame.blocks.length, 2);
  buffer.writeUInt32LE(frame.enabledBitmap, 4);
  buffer.writeBigUInt64LE(BigInt(Math.round(frame.sampleIntervalFs)), 8);
  buffer.writeBigUInt64LE(BigInt(Math.round(frame.triggerSampleIndex)), 16);

  let offset = FRAME_HEADER_BYTES;
  for (const block of frame.blocks) {
    buffer.writeUInt16LE(block.channelIndex, offset);
    buffer.writeUInt8(KIND_CODES[block.kind], offset + 2);
    buffer.writeUInt8(BYTES_PER_SAMPLE, offset + 3);
    buffer.writeUInt32LE(block.samples.length, offset + 4);
    buffer.writeFloatLE(block.voltsPerCode, offset + 8);
    buffer.writeFloatLE(block.offsetVolts, offset + 12);
    offset += BLOCK_HEADER_BYTES;

    if (block.kind === 'analog') {
      for (const sample of block.samples) {
        buffer.writeInt16LE(sample, offset);
        offset += BYTES_PER_SAMPLE;
      }
    } else {
      for (const sample of block.samples) {
        buffer.writeUInt16LE(sample, offset);
        offset += BYTES_PER_SAMPLE;
      }
    }
  }

  return buffer;
}

/**
 * Parse a single encoded frame. Used by clients and tests; the server only
 * ever encodes.
 */
export function decodeFrame(buffer: Buffer): Result<Frame, string> {
  if (buffer.length < FRAME_HEADER_BYTES) {
    return Err('buffer too short for frame header');
  }
  const magic = buffer.readUInt16LE(0);
  if (magic !== FRAME_MAGIC) {
    return Err(`bad magic 0x${magic.toString(16)}`);
  }

  const blockCount = buffer.readUInt16LE(2);
  const frame: Frame = {
    enabledBitmap: buffer.readUInt32LE(4),
    sampleIntervalFs: Number(buffer.readBigUInt64LE(8)),
    triggerSampleIndex: Number(buffer.readBigUInt64LE(16)),
    blocks: [],
  };

  let offset = FRAME_HEADER_BYTES;
  for (let i = 0; i < blockCount; i++) {
    if (buffer.length < offset + BLOCK_HEADER_BYTES) {
      return Err(`buffer too short for block ${i} header`);
    }
    const channelIndex = buffer.readUInt16LE(offset);
    const kindCode = buffer.readUInt8(offset + 2);
    const bytesPerSample = buffer.readUInt8(offset + 3);
    const count = buffer.readUInt32LE(offset + 4);
    const voltsPerCode = buffer.readFloatLE(offset + 8);
    const offsetVolts = buffer.readFloatLE(offset + 12);
    offset += BLOCK_HEADER_BYTES;

    if (kindCode !== KIND_CODES.analog && kindCode !== KIND_CODES.digital) {
      return Err(`unknown block kind ${kindCode}`);
    }
    if (bytesPerSample !== BYTES_PER_SAMPLE) {
      return Err(`unsupported sample width ${bytesPerSample}`);
    }
    if (buffer.length < offset + count * BYTES_PER_SAMPLE) {
      return Err(`buffer too short for block ${i} samples`);
    }

    const kind: BlockKind = kindCode === KIND_CODES.analog ? 'analog' : 'digital';
    const samples = kind === 'analog' ? new Int16Array(count) : new Uint16Array(count);
    for (let s = 0; s < count; s++) {
      samples[s] = kind === 'analog' ? buffer.readInt16LE(offset) : buffer.readUInt16LE(offset);
      offset += BYTES_PER_SAMPLE;
    }

    frame.blocks.push({ channelIndex, kind, voltsPerCode, offsetVolts, samples });
  }

  return Ok(frame);
}
