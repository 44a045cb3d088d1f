import { describe, it, expect, beforeEach } from 'vitest';
import { createSimulatedBinding, maximumAdcValue, type SimulatedBinding } from '../simulated-binding.js';
import { highperfTiming } from '../../families/highperf.js';
import { DriverStatus, RawCoupling } from '../../binding.js';

const CHANNEL = { enabled: true, coupling: RawCoupling.DC, rangeCode: 6, analogOffset: 0, bandwidth: 0 };

describe('SimulatedBinding', () => {
  let binding: SimulatedBinding;

  beforeEach(() => {
    binding = createSimulatedBinding({
      model: 'H6424E',
      timing: highperfTiming,
      adcBits: 8,
      analogChannels: 4,
      memorySamples: 100_000,
      captureLatencyMs: 0,
    });
  });

  it('reports the ADC maximum for the resolution', async () => {
    expect(await binding.getMaximumValue()).toEqual({ ok: true, value: 32512 });
    await binding.setDeviceResolution(12);
    expect(await binding.getMaximumValue()).toEqual({ ok: true, value: 32767 });
    expect(maximumAdcValue(10)).toBe(32767);
  });

  it('shares memory between enabled channels', async () => {
    await binding.setChannel(0, CHANNEL);
    await binding.setChannel(1, CHANNEL);

    const info = await binding.getTimebase(2, 1);
    expect(info).toEqual({ ok: true, value: { intervalNs: 0.8, maxSamples: 50_000 } });
  });

  it('rejects timebases the timing model does not allow', async () => {
    await binding.setDeviceResolution(12);
    expect(await binding.getTimebase(0, 1)).toEqual({ ok: false, error: DriverStatus.INVALID_TIMEBASE });
  });

  it('answers offset limits by range', async () => {
    expect(await binding.getAnalogueOffsetLimits(4, RawCoupling.DC)).toEqual({ ok: true, value: { min: -0.25, max: 0.25 } });
    expect(await binding.getAnalogueOffsetLimits(7, RawCoupling.DC)).toEqual({ ok: true, value: { min: -2.5, max: 2.5 } });
  });

  it('refuses to arm twice', async () => {
    await binding.setChannel(0, CHANNEL);
    expect((await binding.runBlock(0, 100, 2)).ok).toBe(true);
    expect(await binding.runBlock(0, 100, 2)).toEqual({ ok: false, error: DriverStatus.HARDWARE_CAPTURING_CALL_STOP });
    expect(binding.getState().runBlockCalls).toBe(1);
  });

  it('synthesizes the armed capture once and then disarms', async () => {
    await binding.setChannel(0, CHANNEL);
    await binding.runBlock(10, 90, 2);
    expect(await binding.isReady()).toEqual({ ok: true, value: true });

    const capture = await binding.getValues({ channels: [0], ports: [1], samples: 100, reallocate: true });
    expect(capture.ok).toBe(true);
    if (capture.ok) {
      expect(capture.value.samples).toBe(100);
      expect(capture.value.analog.get(0)).toHaveLength(100);
      expect(Array.from(capture.value.digital.get(1)?.slice(0, 3) ?? [])).toEqual([0x80, 0x81, 0x82]);
    }

    const state = binding.getState();
    expect(state.capturing).toBe(false);
    expect(state.capturesRead).toBe(1);
    expect(await binding.isReady()).toEqual({ ok: true, value: false });
  });

  it('keeps analog codes within the ADC limits', async () => {
    await binding.setChannel(0, { ...CHANNEL, rangeCode: 0, analogOffset: 5 });
    await binding.runBlock(0, 50, 2);
    const capture = await binding.getValues({ channels: [0], ports: [], samples: 50, reallocate: false });
    if (!capture.ok) throw new Error('capture failed');
    expect(Array.from(capture.value.analog.get(0) ?? []).every(code => code === 32512)).toBe(true);
  });

  it('fails reading a channel that was not set up', async () => {
    await binding.setChannel(0, CHANNEL);
    await binding.runBlock(0, 10, 2);
    expect(await binding.getValues({ channels: [3], ports: [], samples: 10, reallocate: false })).toEqual({
      ok: false,
      error: DriverStatus.INVALID_CHANNEL,
    });
  });

  it('injects faults for a number of calls', async () => {
    binding.injectFault('setChannel', DriverStatus.BUSY, 2);
    expect((await binding.setChannel(0, CHANNEL)).ok).toBe(false);
    expect((await binding.setChannel(0, CHANNEL)).ok).toBe(false);
    expect((await binding.setChannel(0, CHANNEL)).ok).toBe(true);
  });

  it('rejects every call after close', async () => {
    await binding.close();
    expect(await binding.isReady()).toEqual({ ok: false, error: DriverStatus.NOT_FOUND });
    expect(binding.getState().closed).toBe(true);
  });

  it('reports missing pods', async () => {
    const podless = createSimulatedBinding({
      model: 'H6424E',
      timing: highperfTiming,
      adcBits: 8,
      analogChannels: 4,
      podsConnected: false,
    });
    expect(await podless.isDigitalPortConnected(0)).toEqual({ ok: true, value: false });
    expect(await podless.setDigitalPort(0, { enabled: true, thresholdCodes: [0], hysteresis: 0 })).toEqual({
      ok: false,
      error: DriverStatus.NO_POD_CONNECTED,
    });
  });
});
