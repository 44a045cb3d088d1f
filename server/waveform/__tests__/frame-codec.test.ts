import { describe, it, expect } from 'vitest';
import {
  BLOCK_HEADER_BYTES,
  FRAME_HEADER_BYTES,
  FRAME_MAGIC,
  buildFrame,
  decodeFrame,
  encodeFrame,
  frameSize,
} from '../frame-codec.js';
import type { ArmSnapshot } from '../../acquisition/state.js';
import type { CaptureData } from '../../devices/types.js';

function snapshot(overrides: Partial<ArmSnapshot> = {}): ArmSnapshot {
  return {
    captureId: 1,
    channels: [
      { index: 0, enabled: true, rangeVolts: 2, offsetVolts: 0.5, adcFullScale: 32000 },
      { index: 1, enabled: false, rangeVolts: 1, offsetVolts: 0, adcFullScale: 32000 },
      { index: 2, enabled: false, rangeVolts: 1, offsetVolts: 0, adcFullScale: 32000 },
      { index: 3, enabled: false, rangeVolts: 1, offsetVolts: 0, adcFullScale: 32000 },
    ],
    pods: [
      { index: 0, enabled: false },
      { index: 1, enabled: true },
    ],
    sampleIntervalFs: 800_000,
    memoryDepth: 3,
    triggerSampleIndex: 1,
    ...overrides,
  };
}

function capture(): CaptureData {
  return {
    analog: new Map([
      [0, Int16Array.from([1, -2, 3])],
      [1, Int16Array.from([9, 9, 9])],
    ]),
    digital: new Map([[1, Uint16Array.from([0xffff, 1, 2])]]),
    samples: 3,
  };
}

describe('frame codec', () => {
  describe('buildFrame', () => {
    it('includes only inputs enabled at arm time, analog first', () => {
      const frame = buildFrame(snapshot(), capture());

      expect(frame.enabledBitmap).toBe(0b10_0000_0000_0000_0001);
      expect(frame.sampleIntervalFs).toBe(800_000);
      expect(frame.triggerSampleIndex).toBe(1);
      expect(frame.blocks.map(b => [b.channelIndex, b.kind])).toEqual([
        [0, 'analog'],
        [5, 'digital'],
      ]);
    });

    it('scales analog blocks from the snapshot and leaves digital blocks raw', () => {
      const [analog, digital] = buildFrame(snapshot(), capture()).blocks;

      expect(analog.voltsPerCode).toBe(2 / 32000);
      expect(analog.offsetVolts).toBe(0.5);
      expect(digital.voltsPerCode).toBe(1);
      expect(digital.offsetVolts).toBe(0);
    });

    it('trims blocks to the number of samples read', () => {
      const data = capture();
      data.analog.set(0, Int16Array.from([1, 2, 3, 4, 5]));
      const frame = buildFrame(snapshot(), data);
      expect(Array.from(frame.blocks[0].samples)).toEqual([1, 2, 3]);
    });

    it('builds an empty frame when nothing was enabled', () => {
      const empty = snapshot({
        channels: [{ index: 0, enabled: false, rangeVolts: 1, offsetVolts: 0, adcFullScale: 32000 }],
        pods: [],
      });
      const frame = buildFrame(empty, capture());

      expect(frame.blocks).toEqual([]);
      expect(frame.enabledBitmap).toBe(0);
      expect(frameSize(frame)).toBe(FRAME_HEADER_BYTES);
    });

    it('keeps the bitmap unsigned for high pods', () => {
      const pods = Array.from({ length: 16 }, (_, index) => ({ index, enabled: index === 15 }));
      const data = capture();
      data.digital.set(15, Uint16Array.from([0, 0, 0]));

      const frame = buildFrame(snapshot({ channels: [], pods }), data);
      expect(frame.enabledBitmap).toBe(2 ** 31);
    });
  });

  describe('encodeFrame', () => {
    it('writes the header and blocks little-endian', () => {
      const buffer = encodeFrame(buildFrame(snapshot(), capture()));

      expect(buffer.length).toBe(FRAME_HEADER_BYTES + 2 * (BLOCK_HEADER_BYTES + 6));
      expect(buffer.readUInt16LE(0)).toBe(FRAME_MAGIC);
      expect(buffer.readUInt16LE(2)).toBe(2);
      expect(buffer.readUInt32LE(4)).toBe(0x20001);
      expect(buffer.readBigUInt64LE(8)).toBe(800_000n);
      expect(buffer.readBigUInt64LE(16)).toBe(1n);

      // first block: channel 0, analog, 2 bytes per sample, 3 samples
      expect(buffer.readUInt16LE(24)).toBe(0);
      expect(buffer.readUInt8(26)).toBe(0);
      expect(buffer.readUInt8(27)).toBe(2);
      expect(buffer.readUInt32LE(28)).toBe(3);
      expect(buffer.readFloatLE(32)).toBeCloseTo(2 / 32000, 9);
      expect(buffer.readFloatLE(36)).toBe(0.5);
      expect(buffer.readInt16LE(40)).toBe(1);
      expect(buffer.readInt16LE(42)).toBe(-2);

      // second block: pod 1, after the four analog channels
      expect(buffer.readUInt16LE(46)).toBe(5);
      expect(buffer.readUInt8(48)).toBe(1);
      expect(buffer.readUInt16LE(62)).toBe(0xffff);
    });
  });

  describe('decodeFrame', () => {
    it('reads back what was encoded', () => {
      const decoded = decodeFrame(encodeFrame(buildFrame(snapshot(), capture())));

      expect(decoded.ok).toBe(true);
      if (decoded.ok) {
        expect(decoded.value.enabledBitmap).toBe(0x20001);
        expect(decoded.value.triggerSampleIndex).toBe(1);
        expect(Array.from(decoded.value.blocks[0].samples)).toEqual([1, -2, 3]);
        expect(Array.from(decoded.value.blocks[1].samples)).toEqual([0xffff, 1, 2]);
      }
    });

    it('rejects short buffers', () => {
      expect(decodeFrame(Buffer.alloc(10))).toEqual({ ok: false, error: 'buffer too short for frame header' });
    });

    it('rejects bad magic', () => {
      expect(decodeFrame(Buffer.alloc(FRAME_HEADER_BYTES))).toEqual({ ok: false, error: 'bad magic 0x0' });
    });

    it('rejects truncated sample data', () => {
      const buffer = encodeFrame(buildFrame(snapshot(), capture()));
      expect(decodeFrame(buffer.subarray(0, buffer.length - 1))).toEqual({
        ok: false,
        error: 'buffer too short for block 1 samples',
      });
    });
  });
});
