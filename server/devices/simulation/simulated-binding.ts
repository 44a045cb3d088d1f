/**
 * Simulated Driver Binding
 * Implements DriverBinding in process, for running without hardware
 *
 * Keeps the raw settings the adapter writes, answers timebase and offset
 * queries the way the hardware would, and synthesizes captures: a sine per
 * analog channel and a counting pattern per digital port. Data is generated
 * from the settings in force when runBlock() was called, like a real
 * capture buffer.
 */

import { Ok, Err } from '../../../shared/types.js';
import {
  DriverStatus,
  RANGE_CODE_VOLTS,
  type BindingResult,
  type DriverBinding,
  type RawCapture,
  type RawChannelSettings,
  type RawDigitalTrigger,
  type RawPodSettings,
  type RawSignalGenerator,
  type RawSimpleTrigger,
} from '../binding.js';
import type { TimebaseModel } from '../types.js';

export interface SimulatedBindingConfig {
  model: string;
  serial?: string;
  firmware?: string;
  timing: TimebaseModel;
  adcBits: number;
  analogChannels: number;
  /** Sample memory shared by the enabled channels (default: 64M) */
  memorySamples?: number;
  /** Time from runBlock() to data ready in ms (default: 20) */
  captureLatencyMs?: number;
  /** Whether detachable pods are plugged in (default: true) */
  podsConnected?: boolean;
  /** Test signal on every analog channel */
  signalFrequencyHz?: number;
  signalAmplitudeVolts?: number;
}

export type SimulatedOperation =
  | 'setChannel'
  | 'setDigitalPort'
  | 'setDeviceResolution'
  | 'setSimpleTrigger'
  | 'setDigitalTrigger'
  | 'runBlock'
  | 'stop'
  | 'getValues'
  | 'setSignalGenerator';

interface ArmedCapture {
  preTriggerSamples: number;
  postTriggerSamples: number;
  timebase: number;
  readyAt: number;
  channels: Map<number, RawChannelSettings>;
  ports: Map<number, RawPodSettings>;
}

export interface SimulatedBindingState {
  channels: Map<number, RawChannelSettings>;
  ports: Map<number, RawPodSettings>;
  adcBits: number;
  simpleTrigger: RawSimpleTrigger | null;
  digitalTrigger: RawDigitalTrigger | null;
  generator: RawSignalGenerator | null;
  capturing: boolean;
  runBlockCalls: number;
  capturesRead: number;
  closed: boolean;
}

export interface SimulatedBinding extends DriverBinding {
  /** Make the next `count` calls of `operation` fail with `status` */
  injectFault(operation: SimulatedOperation, status: number, count?: number): void;
  getState(): SimulatedBindingState;
}

/** Largest ADC code the hardware reports for a resolution */
export function maximumAdcValue(adcBits: number): number {
  return adcBits <= 8 ? 32512 : 32767;
}

/** Offset range the front end can apply on a given input range */
function offsetLimitFor(rangeVolts: number): number {
  if (rangeVolts <= 0.2) return 0.25;
  if (rangeVolts <= 2) return 2.5;
  if (rangeVolts <= 20) return 20;
  return 200;
}

export function createSimulatedBinding(config: SimulatedBindingConfig): SimulatedBinding {
  const {
    timing,
    memorySamples = 64 * 1024 * 1024,
    captureLatencyMs = 20,
    podsConnected = true,
    signalFrequencyHz = 1e6,
    signalAmplitudeVolts = 0.4,
  } = config;

  const channels = new Map<number, RawChannelSettings>();
  const ports = new Map<number, RawPodSettings>();
  const faults = new Map<SimulatedOperation, { status: number; remaining: number }>();

  let adcBits = config.adcBits;
  let simpleTrigger: RawSimpleTrigger | null = null;
  let digitalTrigger: RawDigitalTrigger | null = null;
  let generator: RawSignalGenerator | null = null;
  let armed: ArmedCapture | null = null;
  let runBlockCalls = 0;
  let capturesRead = 0;
  let closed = false;

  function takeFault(operation: SimulatedOperation): number | null {
    const fault = faults.get(operation);
    if (!fault) return null;
    fault.remaining--;
    if (fault.remaining <= 0) faults.delete(operation);
    return fault.status;
  }

  function done(operation: SimulatedOperation): BindingResult<void> {
    if (closed) return Err(DriverStatus.NOT_FOUND);
    const fault = takeFault(operation);
    return fault === null ? Ok(undefined) : Err(fault);
  }

  function enabledChannelCount(): number {
    let count = 0;
    for (const settings of channels.values()) {
      if (settings.enabled) count++;
    }
    return count;
  }

  function maxSamples(): number {
    return Math.floor(memorySamples / Math.max(1, enabledChannelCount()));
  }

  function synthesizeAnalog(channel: number, settings: RawChannelSettings, capture: ArmedCapture, samples: number): Int16Array {
    const data = new Int16Array(samples);
    const rangeVolts = RANGE_CODE_VOLTS[settings.rangeCode] ?? 1;
    const maxCode = maximumAdcValue(adcBits);
    const voltsPerCode = rangeVolts / maxCode;
    const intervalS = (timing.intervalForTimebase(capture.timebase, adcBits) ?? 1e6) / 1e15;
    const phase = (channel * Math.PI) / 4;

    for (let i = 0; i < samples; i++) {
      const t = (i - capture.preTriggerSamples) * intervalS;
      const volts = signalAmplitudeVolts * Math.sin(2 * Math.PI * signalFrequencyHz * t + phase);
      const code = Math.round((volts + settings.analogOffset) / voltsPerCode);
      data[i] = Math.max(-maxCode, Math.min(maxCode, code));
    }
    return data;
  }

  function synthesizeDigital(port: number, samples: number): Uint16Array {
    const data = new Uint16Array(samples);
    for (let i = 0; i < samples; i++) {
      data[i] = (i + port * 0x80) & 0xff;
    }
    return data;
  }

  return {
    identity: {
      model: config.model,
      serial: config.serial ?? 'SIM000001',
      firmware: config.firmware ?? '1.0.0-sim',
    },

    async setChannel(channel, settings) {
      if (channel < 0 || channel >= config.analogChannels) return Err(DriverStatus.INVALID_CHANNEL);
      if (settings.rangeCode < 0 || settings.rangeCode >= RANGE_CODE_VOLTS.length) {
        return Err(DriverStatus.INVALID_VOLTAGE_RANGE);
      }
      const result = done('setChannel');
      if (result.ok) channels.set(channel, { ...settings });
      return result;
    },

    async getAnalogueOffsetLimits(rangeCode, _coupling) {
      if (closed) return Err(DriverStatus.NOT_FOUND);
      const rangeVolts = RANGE_CODE_VOLTS[rangeCode];
      if (rangeVolts === undefined) return Err(DriverStatus.INVALID_VOLTAGE_RANGE);
      const limit = offsetLimitFor(rangeVolts);
      return Ok({ min: -limit, max: limit });
    },

    async getMaximumValue() {
      if (closed) return Err(DriverStatus.NOT_FOUND);
      return Ok(maximumAdcValue(adcBits));
    },

    async setDeviceResolution(bits) {
      if (armed) return Err(DriverStatus.HARDWARE_CAPTURING_CALL_STOP);
      const result = done('setDeviceResolution');
      if (result.ok) adcBits = bits;
      return result;
    },

    async setDigitalPort(port, settings) {
      if (!podsConnected) return Err(DriverStatus.NO_POD_CONNECTED);
      const result = done('setDigitalPort');
      if (result.ok) ports.set(port, { ...settings, thresholdCodes: [...settings.thresholdCodes] });
      return result;
    },

    async isDigitalPortConnected(_port) {
      if (closed) return Err(DriverStatus.NOT_FOUND);
      return Ok(podsConnected);
    },

    async getTimebase(timebase, samples) {
      if (closed) return Err(DriverStatus.NOT_FOUND);
      const intervalFs = timing.intervalForTimebase(timebase, adcBits);
      if (intervalFs === null) return Err(DriverStatus.INVALID_TIMEBASE);
      const max = maxSamples();
      if (samples > max) return Err(DriverStatus.INVALID_PARAMETER);
      return Ok({ intervalNs: intervalFs / 1e6, maxSamples: max });
    },

    async setSimpleTrigger(trigger) {
      const result = done('setSimpleTrigger');
      if (result.ok) simpleTrigger = { ...trigger };
      return result;
    },

    async setDigitalTrigger(trigger) {
      const result = done('setDigitalTrigger');
      if (result.ok) digitalTrigger = trigger === null ? null : { ...trigger };
      return result;
    },

    async runBlock(preTriggerSamples, postTriggerSamples, timebase) {
      if (armed) return Err(DriverStatus.HARDWARE_CAPTURING_CALL_STOP);
      if (timing.intervalForTimebase(timebase, adcBits) === null) return Err(DriverStatus.INVALID_TIMEBASE);
      if (preTriggerSamples + postTriggerSamples > maxSamples()) return Err(DriverStatus.INVALID_PARAMETER);

      const result = done('runBlock');
      if (!result.ok) return result;

      runBlockCalls++;
      // a 1 us auto-trigger fires straight away
      const forced = simpleTrigger !== null && simpleTrigger.autoTriggerUs > 0 && simpleTrigger.autoTriggerUs <= 1;
      armed = {
        preTriggerSamples,
        postTriggerSamples,
        timebase,
        readyAt: Date.now() + (forced ? 0 : captureLatencyMs),
        channels: new Map([...channels].map(([index, settings]) => [index, { ...settings }])),
        ports: new Map([...ports].map(([index, settings]) => [index, { ...settings }])),
      };
      return Ok(undefined);
    },

    async isReady() {
      if (closed) return Err(DriverStatus.NOT_FOUND);
      return Ok(armed !== null && Date.now() >= armed.readyAt);
    },

    async getValues(request) {
      const result = done('getValues');
      if (!result.ok) return result;
      if (!armed || Date.now() < armed.readyAt) return Err(DriverStatus.DRIVER_FUNCTION);

      const capture = armed;
      const samples = Math.min(request.samples, capture.preTriggerSamples + capture.postTriggerSamples);
      const data: RawCapture = { analog: new Map(), digital: new Map(), samples };

      for (const channel of request.channels) {
        const settings = capture.channels.get(channel);
        if (!settings) return Err(DriverStatus.INVALID_CHANNEL);
        data.analog.set(channel, synthesizeAnalog(channel, settings, capture, samples));
      }
      for (const port of request.ports) {
        data.digital.set(port, synthesizeDigital(port, samples));
      }

      // block mode: the capture is over once read
      armed = null;
      capturesRead++;
      return Ok(data);
    },

    async stop() {
      const result = done('stop');
      if (result.ok) armed = null;
      return result;
    },

    async setSignalGenerator(settings) {
      const result = done('setSignalGenerator');
      if (result.ok) generator = { ...settings };
      return result;
    },

    async close() {
      closed = true;
      armed = null;
      return Ok(undefined);
    },

    injectFault(operation, status, count = 1) {
      faults.set(operation, { status, remaining: count });
    },

    getState() {
      return {
        channels: new Map(channels),
        ports: new Map(ports),
        adcBits,
        simpleTrigger,
        digitalTrigger,
        generator,
        capturing: armed !== null,
        runBlockCalls,
        capturesRead,
        closed,
      };
    },
  };
}
