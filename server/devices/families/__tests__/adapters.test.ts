import { describe, it, expect } from 'vitest';
import { createDefaultRegistry } from '../../registry.js';
import { createSimulatedInstrument, type SimulatedInstrument } from '../../simulation/index.js';
import { DriverStatus, RAW_EXTERNAL_CHANNEL, RawBandwidth, RawCoupling, RawDirection, RawHysteresis } from '../../binding.js';
import type { GeneratorState } from '../../types.js';

function open(model: string, podsConnected = true): SimulatedInstrument {
  const result = createSimulatedInstrument(createDefaultRegistry(), { model, captureLatencyMs: 0, podsConnected });
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

const GENERATOR: GeneratorState = {
  enabled: true,
  shape: 'SQUARE',
  frequencyHz: 1000,
  dutyCycle: 0.25,
  rangeVpp: 2,
  offsetVolts: 0.5,
};

describe('family adapters', () => {
  describe('analog front end', () => {
    it('encodes range, coupling, offset and bandwidth', async () => {
      const { adapter, binding } = open('H6424E');
      const result = await adapter.setChannel(1, {
        enabled: true,
        coupling: 'DC50',
        rangeVolts: 0.5,
        offsetVolts: 0.1,
        bandwidthMhz: 200,
      });

      expect(result.ok).toBe(true);
      expect(binding.getState().channels.get(1)).toEqual({
        enabled: true,
        coupling: RawCoupling.DC_50OHM,
        rangeCode: 5,
        analogOffset: -0.1,
        bandwidth: RawBandwidth.BW_200MHZ,
      });
    });

    it('rejects ranges that are not on the ladder', async () => {
      const { adapter } = open('H6424E');
      const result = await adapter.setChannel(0, {
        enabled: true,
        coupling: 'DC1M',
        rangeVolts: 0.3,
        offsetVolts: 0,
        bandwidthMhz: 0,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('fatal');
        expect(result.error.status).toBe(DriverStatus.INVALID_VOLTAGE_RANGE);
      }
    });

    it('rejects ranges the family does not have', async () => {
      const { adapter } = open('E2206B');
      const result = await adapter.setChannel(0, {
        enabled: true,
        coupling: 'DC1M',
        rangeVolts: 0.01,
        offsetVolts: 0,
        bandwidthMhz: 0,
      });
      expect(result.ok).toBe(false);
    });

    it('reports the channel count from the model', () => {
      expect(open('H6424E').adapter.capabilities.analogChannels).toBe(4);
      expect(open('P4262').adapter.capabilities.analogChannels).toBe(2);
    });
  });

  describe('digital pods', () => {
    it('writes per-lane thresholds and hysteresis on the high performance family', async () => {
      const { adapter, binding } = open('H6424E');
      await adapter.setPod(0, {
        enabled: true,
        thresholdsVolts: [1, 1, 1, 1, 1, 1, 1, -8],
        hysteresisMv: 100,
      });

      expect(binding.getState().ports.get(0)).toEqual({
        enabled: true,
        thresholdCodes: [4096, 4096, 4096, 4096, 4096, 4096, 4096, -32767],
        hysteresis: RawHysteresis.NORMAL_100MV,
      });
    });

    it('writes one shared threshold on the legacy families', async () => {
      const { adapter, binding } = open('M3406DMSO');
      await adapter.setPod(1, {
        enabled: true,
        thresholdsVolts: new Array<number>(8).fill(1),
        hysteresisMv: 400,
      });

      expect(binding.getState().ports.get(1)).toEqual({
        enabled: true,
        thresholdCodes: [6553],
        hysteresis: 0,
      });
    });

    it('probes detachable pods', async () => {
      expect(await open('H6424E', false).adapter.probePod(0)).toEqual({ ok: true, value: false });
      expect(await open('H6424E', true).adapter.probePod(1)).toEqual({ ok: true, value: true });
    });

    it('derives pod presence from the model on fixed-pod families', async () => {
      expect(await open('M3406DMSO').adapter.probePod(0)).toEqual({ ok: true, value: true });
      expect(await open('M3406D').adapter.probePod(0)).toEqual({ ok: true, value: false });
      expect(open('M3406D').adapter.capabilities.digitalPods).toBe(0);
    });

    it('classifies a missing pod as unsupported', async () => {
      const { adapter } = open('H6424E', false);
      const result = await adapter.setPod(0, { enabled: true, thresholdsVolts: new Array<number>(8).fill(0), hysteresisMv: 50 });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('unsupported');
    });
  });

  describe('resolution', () => {
    it('changes the timebase rules with the bit depth', async () => {
      const { adapter } = open('F5242D');
      expect(adapter.timebaseForRate(1e9)).toBe(0);

      expect((await adapter.setResolution(16)).ok).toBe(true);
      expect(adapter.getResolution()).toBe(16);
      expect(adapter.timebaseForRate(1e9)).toBe(4);
      expect(adapter.intervalForTimebase(4)).toBe(16_000_000);
    });

    it('reports resolutions the family lacks as unsupported', async () => {
      const { adapter } = open('E2206B');
      const result = await adapter.setResolution(12);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('unsupported');
    });

    it('offers 14 bit only on the four-channel precision model', () => {
      expect(open('P4444').adapter.capabilities.resolutions).toEqual([12, 14]);
      expect(open('P4262').adapter.capabilities.resolutions).toEqual([12]);
    });
  });

  describe('trigger', () => {
    it('routes a digital source through the digital trigger', async () => {
      const { adapter, binding } = open('H6424E');
      await adapter.configureTrigger({
        source: { kind: 'digital', pod: 1, lane: 6 },
        thresholdCode: 0,
        direction: 'falling',
        delaySamples: 0,
        timeoutUs: 0,
      });

      const state = binding.getState();
      expect(state.digitalTrigger).toEqual({ port: 1, bit: 6, direction: RawDirection.FALLING });
      expect(state.simpleTrigger?.enabled).toBe(false);
    });

    it('uses the external channel id for the aux input and clears digital triggers', async () => {
      const { adapter, binding } = open('H6424E');
      await adapter.configureTrigger({
        source: { kind: 'aux' },
        thresholdCode: 1234,
        direction: 'either',
        delaySamples: 10,
        timeoutUs: 1,
      });

      const state = binding.getState();
      expect(state.digitalTrigger).toBeNull();
      expect(state.simpleTrigger).toEqual({
        enabled: true,
        channel: RAW_EXTERNAL_CHANNEL,
        thresholdCode: 1234,
        direction: RawDirection.RISING_OR_FALLING,
        delaySamples: 10,
        autoTriggerUs: 1,
      });
    });
  });

  describe('rates and depths', () => {
    it('lists supported rates fastest first', async () => {
      const { adapter } = open('H6424E');
      const rates = await adapter.getSupportedRates();
      expect(rates.ok).toBe(true);
      if (rates.ok) {
        expect(rates.value[0]).toEqual({ timebase: 0, intervalFs: 200_000 });
        const intervals = rates.value.map(entry => entry.intervalFs);
        expect([...intervals].sort((a, b) => a - b)).toEqual(intervals);
      }
    });

    it('ends the depth list at the device maximum', async () => {
      const { adapter } = open('H6424E');
      const depths = await adapter.getSupportedDepths();
      expect(depths.ok).toBe(true);
      if (depths.ok) {
        expect(depths.value[0]).toBe(1000);
        expect(depths.value[depths.value.length - 1]).toBe(64 * 1024 * 1024);
      }
    });
  });

  describe('signal generator', () => {
    it('reports no generator on the precision family', async () => {
      const result = await open('P4262').adapter.applyGenerator(GENERATOR);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('unsupported');
    });

    it('uses the arbitrary buffer for square waves that are not 50% duty', async () => {
      const { adapter, binding } = open('M3406D');
      await adapter.applyGenerator(GENERATOR);

      const generator = binding.getState().generator;
      expect(generator?.outputEnabled).toBe(true);
      expect(generator?.arbitraryBuffer).toHaveLength(32768);
      expect(generator?.offsetMicrovolts).toBe(500_000);
      expect(generator?.pkToPkMicrovolts).toBe(2_000_000);
    });

    it('turns the buffered generator off with zero amplitude', async () => {
      const { adapter, binding } = open('E2206B');
      await adapter.applyGenerator({ ...GENERATOR, enabled: false });

      const generator = binding.getState().generator;
      expect(generator?.outputEnabled).toBe(false);
      expect(generator?.pkToPkMicrovolts).toBe(0);
      expect(generator?.offsetMicrovolts).toBe(0);
    });

    it('passes duty cycle straight through on the dedicated generator', async () => {
      const { adapter, binding } = open('H6424E');
      await adapter.applyGenerator(GENERATOR);

      const generator = binding.getState().generator;
      expect(generator?.dutyCyclePercent).toBe(25);
      expect(generator?.arbitraryBuffer).toBeUndefined();
    });

    it('rejects shapes the model lacks', async () => {
      const result = await open('E2206B').adapter.applyGenerator({ ...GENERATOR, shape: 'PRBS' });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.status).toBe(DriverStatus.SIGGEN_WAVE_TYPE_NOT_SUPPORTED);
    });
  });
});
