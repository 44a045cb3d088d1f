/**
 * Acquisition Controller
 *
 * Owns the acquisition state and is the only way to change it. Every
 * operation runs under one mutex shared by the control plane and the data
 * plane, covering the state change and the device calls that depend on it,
 * and nothing else: callers do their network I/O after the promise resolves.
 *
 * Operations resolve to Err only for fatal device errors. Busy devices are
 * stopped and retried once, unsupported settings are coerced or ignored,
 * and both end up as warnings in the log.
 */

import { Ok, Result } from '../../shared/types.js';
import type {
  Coupling,
  GeneratorState,
  InstrumentIdentity,
  InstrumentStateView,
  TriggerDirection,
  TriggerSource,
  WaveformShape,
} from '../../shared/types.js';
import type {
  CaptureData,
  DeviceResult,
  DigitizerAdapter,
  DigitizerCapabilities,
  TimebaseEntry,
} from '../devices/types.js';
import { withBusyRetry, ignoreUnsupported } from '../devices/recovery.js';
import { createLogger } from '../logger.js';
import { createMutex } from './mutex.js';
import {
  clampOffset,
  coerceBandwidth,
  coerceHysteresis,
  nearest,
  rangeLadder,
  roundRange,
} from './normalization.js';
import {
  createAcquisitionState,
  disabledSnapshot,
  type AcquisitionState,
  type ArmSnapshot,
} from './state.js';
import { createTriggerStateMachine } from './TriggerStateMachine.js';
import { LANES_PER_POD } from './trigger-source.js';

const log = createLogger('Acquisition');

export const FS_PER_SECOND = 1e15;
export const MIN_GENERATOR_FREQUENCY_HZ = 1e-3;

export interface CompletedCapture {
  snapshot: ArmSnapshot;
  data: CaptureData;
}

export type CommandResult = DeviceResult<void>;

export interface AcquisitionController {
  readonly info: InstrumentIdentity;
  readonly capabilities: DigitizerCapabilities;

  /** Push the initial (all inputs off) configuration to the device */
  initialize(): Promise<CommandResult>;

  // Analog channels
  setChannelEnabled(channel: number, enabled: boolean): Promise<CommandResult>;
  setCoupling(channel: number, coupling: Coupling): Promise<CommandResult>;
  setRange(channel: number, volts: number): Promise<CommandResult>;
  setOffset(channel: number, volts: number): Promise<CommandResult>;
  setBandwidthLimit(channel: number, mhz: number): Promise<CommandResult>;
  getBandwidthLimit(channel: number): number;

  // Digital pods
  setPodEnabled(pod: number, enabled: boolean): Promise<CommandResult>;
  /** lane null sets every lane */
  setPodThreshold(pod: number, lane: number | null, volts: number): Promise<CommandResult>;
  setPodHysteresis(pod: number, millivolts: number): Promise<CommandResult>;
  isPodPresent(pod: number): Promise<boolean>;

  // Acquisition settings
  setResolution(bits: number): Promise<CommandResult>;
  setMemoryDepth(depth: number): Promise<CommandResult>;
  setSampleRate(rateHz: number): Promise<CommandResult>;
  /** Supported rates in Hz, fastest first */
  getSampleRates(): Promise<number[]>;
  getMemoryDepths(): Promise<number[]>;

  // Trigger
  setTriggerSource(source: TriggerSource): Promise<CommandResult>;
  setTriggerLevel(volts: number): Promise<CommandResult>;
  setTriggerDelay(delayFs: number): Promise<CommandResult>;
  setTriggerDirection(direction: TriggerDirection): Promise<CommandResult>;
  start(): Promise<CommandResult>;
  single(): Promise<CommandResult>;
  stop(): Promise<CommandResult>;
  forceTrigger(): Promise<CommandResult>;

  // Function generator
  setGeneratorEnabled(enabled: boolean): Promise<CommandResult>;
  setGeneratorFrequency(hz: number): Promise<CommandResult>;
  setGeneratorDutyCycle(fraction: number): Promise<CommandResult>;
  setGeneratorOffset(volts: number): Promise<CommandResult>;
  setGeneratorRange(vpp: number): Promise<CommandResult>;
  setGeneratorShape(shape: WaveformShape): Promise<CommandResult>;

  /**
   * Data plane: if the armed capture is ready, read it out against its
   * arm-time snapshot and re-arm (continuous) or disarm (one-shot).
   * Resolves to Ok(null) when nothing is ready.
   */
  pollCapture(): Promise<DeviceResult<CompletedCapture | null>>;

  /** Disarm and switch every channel and pod off */
  resetToSafeState(): Promise<CommandResult>;

  describe(): InstrumentStateView;
  isArmed(): boolean;
  close(): Promise<CommandResult>;
}

export function createAcquisitionController(adapter: DigitizerAdapter): AcquisitionController {
  const { capabilities } = adapter;
  const state: AcquisitionState = createAcquisitionState(capabilities, adapter.getResolution());
  const machine = createTriggerStateMachine(adapter, state);
  const mutex = createMutex();

  // ============ Helpers (call with the mutex held) ============

  /**
   * Run a device reconfiguration. A busy device is stopped and the call
   * retried; if that stop interrupted a running capture, it is re-armed.
   */
  async function reconfigure(operation: () => Promise<CommandResult>): Promise<CommandResult> {
    let interrupted = false;
    const result = await withBusyRetry(operation, async () => {
      interrupted = state.phase === 'armed';
      return adapter.disarm();
    });
    const settled = await settle(result);
    if (settled.ok && interrupted) {
      return machine.restartIfArmed();
    }
    return settled;
  }

  /** Map a device result onto the controller's error policy. */
  async function settle(result: CommandResult): Promise<CommandResult> {
    if (result.ok) return result;
    const { error } = result;
    if (error.kind === 'unsupported') return ignoreUnsupported(result);
    if (error.kind === 'busy') {
      log.warn(`${error.message} (device still busy after retry)`);
      return Ok(undefined);
    }
    log.error(error.message);
    state.phase = 'disarmed';
    await adapter.disarm();
    return result;
  }

  function validChannel(channel: number): boolean {
    if (channel >= 0 && channel < state.channels.length) return true;
    log.warn(`No analog channel ${channel}`);
    return false;
  }

  function validPod(pod: number): boolean {
    if (pod >= 0 && pod < state.pods.length) return true;
    log.warn(`No digital pod ${pod}`);
    return false;
  }

  function isTriggerChannel(channel: number): boolean {
    const { source } = state.trigger;
    return source.kind === 'analog' && source.channel === channel;
  }

  async function applyChannel(index: number): Promise<CommandResult> {
    const channel = state.channels[index];
    channel.rangeVolts = roundRange(channel.requestedRangeVolts, rangeLadder(capabilities, channel.coupling));

    const limits = await adapter.getOffsetLimits(channel.rangeVolts, channel.coupling);
    if (limits.ok) {
      channel.appliedOffsetVolts = clampOffset(channel.offsetVolts, limits.value);
      if (channel.appliedOffsetVolts !== channel.offsetVolts) {
        log.verbose(`Channel ${index} offset ${channel.offsetVolts} V clamped to ${channel.appliedOffsetVolts} V`);
      }
    } else {
      log.warn(limits.error.message);
      channel.appliedOffsetVolts = channel.offsetVolts;
    }

    const result = await reconfigure(() =>
      adapter.setChannel(index, {
        enabled: channel.enabled,
        coupling: channel.coupling,
        rangeVolts: channel.rangeVolts,
        offsetVolts: channel.appliedOffsetVolts,
        bandwidthMhz: channel.bandwidthMhz,
      })
    );
    if (!result.ok) return result;

    // previously allocated capture buffers no longer match the channel set
    state.memoryDepthChanged = true;

    if (isTriggerChannel(index)) {
      return machine.updateTrigger();
    }
    return result;
  }

  async function applyPod(index: number): Promise<CommandResult> {
    const pod = state.pods[index];
    return reconfigure(() =>
      adapter.setPod(index, {
        enabled: pod.enabled,
        thresholdsVolts: [...pod.thresholdsVolts],
        hysteresisMv: pod.hysteresisMv,
      })
    );
  }

  async function refreshFullScale(): Promise<CommandResult> {
    const fullScale = await adapter.getAdcFullScale();
    if (!fullScale.ok) return settle(fullScale);
    state.settings.adcFullScale = fullScale.value;
    return Ok(undefined);
  }

  function applyTimebase(): void {
    const { settings } = state;
    settings.timebase = adapter.timebaseForRate(settings.requestedRateHz);
    settings.sampleIntervalFs = adapter.intervalForTimebase(settings.timebase);
  }

  /** Stop/apply/restart bracket for generators without their own apply call. */
  async function applyGenerator(): Promise<CommandResult> {
    if (!capabilities.generator.present) {
      log.warn('This model has no function generator');
      return Ok(undefined);
    }
    if (capabilities.generator.dedicatedApply) {
      return settle(await adapter.applyGenerator({ ...state.generator }));
    }

    const wasArmed = state.phase === 'armed';
    if (wasArmed) {
      const stopped = await settle(await adapter.disarm());
      if (!stopped.ok) return stopped;
    }
    const applied = await settle(await adapter.applyGenerator({ ...state.generator }));
    if (!applied.ok) return applied;
    return wasArmed ? machine.restartIfArmed() : applied;
  }

  function updateGenerator(change: Partial<GeneratorState>): Promise<CommandResult> {
    return mutex.runExclusive(async () => {
      Object.assign(state.generator, change);
      return applyGenerator();
    });
  }

  // ============ Controller ============

  return {
    info: adapter.info,
    capabilities,

    initialize() {
      return mutex.runExclusive(async () => {
        const fullScale = await refreshFullScale();
        if (!fullScale.ok) return fullScale;

        applyTimebase();
        const max = await adapter.getMaxSamples();
        if (max.ok) state.settings.memoryDepth = Math.min(state.settings.memoryDepth, max.value);

        for (const channel of state.channels) {
          const result = await applyChannel(channel.index);
          if (!result.ok) return result;
        }
        for (const pod of state.pods) {
          const result = await applyPod(pod.index);
          if (!result.ok) return result;
        }
        return settle(await machine.pushTrigger());
      });
    },

    setChannelEnabled(channel, enabled) {
      return mutex.runExclusive(async () => {
        if (!validChannel(channel)) return Ok(undefined);
        state.channels[channel].enabled = enabled;
        return applyChannel(channel);
      });
    },

    setCoupling(channel, coupling) {
      return mutex.runExclusive(async () => {
        if (!validChannel(channel)) return Ok(undefined);
        state.channels[channel].coupling = coupling;
        return applyChannel(channel);
      });
    },

    setRange(channel, volts) {
      return mutex.runExclusive(async () => {
        if (!validChannel(channel)) return Ok(undefined);
        if (!(volts > 0)) {
          log.warn(`Ignoring range ${volts} V`);
          return Ok(undefined);
        }
        state.channels[channel].requestedRangeVolts = volts;
        return applyChannel(channel);
      });
    },

    setOffset(channel, volts) {
      return mutex.runExclusive(async () => {
        if (!validChannel(channel)) return Ok(undefined);
        state.channels[channel].offsetVolts = volts;
        return applyChannel(channel);
      });
    },

    setBandwidthLimit(channel, mhz) {
      return mutex.runExclusive(async () => {
        if (!validChannel(channel)) return Ok(undefined);
        const coerced = coerceBandwidth(mhz, capabilities.bandwidthLimitsMhz);
        if (coerced !== mhz && mhz > 0) {
          log.warn(`Bandwidth limit ${mhz} MHz not supported, using ${coerced === 0 ? 'full bandwidth' : `${coerced} MHz`}`);
        }
        state.channels[channel].bandwidthMhz = coerced;
        return applyChannel(channel);
      });
    },

    getBandwidthLimit(channel) {
      return state.channels[channel]?.bandwidthMhz ?? 0;
    },

    setPodEnabled(pod, enabled) {
      return mutex.runExclusive(async () => {
        if (!validPod(pod)) return Ok(undefined);
        state.pods[pod].enabled = enabled;
        return applyPod(pod);
      });
    },

    setPodThreshold(pod, lane, volts) {
      return mutex.runExclusive(async () => {
        if (!validPod(pod)) return Ok(undefined);
        const record = state.pods[pod];
        if (lane !== null && capabilities.perLaneThresholds) {
          record.thresholdsVolts[Math.max(0, Math.min(LANES_PER_POD - 1, lane))] = volts;
        } else {
          if (lane !== null) log.verbose('Pod thresholds are shared on this model, setting every lane');
          record.thresholdsVolts.fill(volts);
        }
        return applyPod(pod);
      });
    },

    setPodHysteresis(pod, millivolts) {
      return mutex.runExclusive(async () => {
        if (!validPod(pod)) return Ok(undefined);
        if (capabilities.hysteresisLevelsMv.length === 0) {
          log.warn('Pod hysteresis is fixed on this model');
          return Ok(undefined);
        }
        state.pods[pod].hysteresisMv = coerceHysteresis(millivolts, capabilities.hysteresisLevelsMv);
        return applyPod(pod);
      });
    },

    isPodPresent(pod) {
      return mutex.runExclusive(async () => {
        const present = await adapter.probePod(pod);
        if (!present.ok) log.warn(present.error.message);
        return Result.unwrapOr(present, false);
      });
    },

    setResolution(bits) {
      return mutex.runExclusive(async () => {
        const supported = capabilities.resolutions;
        const target = supported.includes(bits) ? bits : nearest(bits, supported);
        if (target !== bits) log.warn(`${bits}-bit resolution not supported, using ${target} bits`);
        if (target === state.settings.adcBits) return Ok(undefined);

        const wasArmed = state.phase === 'armed';
        const stopped = await settle(await adapter.disarm());
        if (!stopped.ok) return stopped;
        state.phase = 'disarmed';

        const changed = await settle(await adapter.setResolution(target));
        if (!changed.ok) return changed;
        state.settings.adcBits = target;
        state.memoryDepthChanged = true;

        const fullScale = await refreshFullScale();
        if (!fullScale.ok) return fullScale;
        applyTimebase();

        for (const channel of state.channels) {
          if (!channel.enabled) continue;
          const result = await applyChannel(channel.index);
          if (!result.ok) return result;
        }
        const trigger = await machine.pushTrigger();
        if (!trigger.ok) return settle(trigger);

        if (wasArmed) {
          state.phase = 'armed';
          return machine.restartIfArmed();
        }
        return Ok(undefined);
      });
    },

    setMemoryDepth(depth) {
      return mutex.runExclusive(async () => {
        if (!Number.isInteger(depth) || depth <= 0) {
          log.warn(`Ignoring memory depth ${depth}`);
          return Ok(undefined);
        }
        let target = depth;
        const max = await adapter.getMaxSamples();
        if (!max.ok) {
          const failed = await settle(max);
          if (!failed.ok) return failed;
        } else if (depth > max.value) {
          log.warn(`Memory depth ${depth} exceeds the device maximum, using ${max.value}`);
          target = max.value;
        }
        state.settings.memoryDepth = target;
        return settle(await machine.updateTrigger());
      });
    },

    setSampleRate(rateHz) {
      return mutex.runExclusive(async () => {
        if (!(rateHz > 0) || !Number.isFinite(rateHz)) {
          log.warn(`Ignoring sample rate ${rateHz}`);
          return Ok(undefined);
        }
        state.settings.requestedRateHz = rateHz;
        applyTimebase();
        log.verbose(`Rate ${rateHz} Hz -> timebase ${state.settings.timebase} (${state.settings.sampleIntervalFs} fs)`);
        return settle(await machine.updateTrigger());
      });
    },

    getSampleRates() {
      return mutex.runExclusive(async () => {
        const rates = await adapter.getSupportedRates();
        if (!rates.ok) {
          log.warn(rates.error.message);
          return [];
        }
        return rates.value.map((entry: TimebaseEntry) => Math.round(FS_PER_SECOND / entry.intervalFs));
      });
    },

    getMemoryDepths() {
      return mutex.runExclusive(async () => {
        const depths = await adapter.getSupportedDepths();
        if (!depths.ok) log.warn(depths.error.message);
        return Result.unwrapOr(depths, []);
      });
    },

    setTriggerSource(source) {
      return mutex.runExclusive(async () => {
        if (source.kind === 'analog') {
          if (!validChannel(source.channel)) return Ok(undefined);
        } else if (source.kind === 'digital') {
          if (!validPod(source.pod)) return Ok(undefined);
        }

        const wasArmed = state.phase === 'armed';
        if (wasArmed) {
          const stopped = await settle(await adapter.disarm());
          if (!stopped.ok) return stopped;
        }

        state.trigger.source = source;

        // selecting a source switches it on
        if (source.kind === 'analog' && !state.channels[source.channel].enabled) {
          state.channels[source.channel].enabled = true;
          const enabled = await applyChannel(source.channel);
          if (!enabled.ok) return enabled;
        } else if (source.kind === 'digital' && !state.pods[source.pod].enabled) {
          state.pods[source.pod].enabled = true;
          const enabled = await applyPod(source.pod);
          if (!enabled.ok) return enabled;
        }

        const pushed = await settle(await machine.pushTrigger());
        if (!pushed.ok) return pushed;
        return wasArmed ? machine.restartIfArmed() : pushed;
      });
    },

    setTriggerLevel(volts) {
      return mutex.runExclusive(async () => {
        state.trigger.levelVolts = volts;
        return settle(await machine.updateTrigger());
      });
    },

    setTriggerDelay(delayFs) {
      return mutex.runExclusive(async () => {
        state.trigger.delayFs = delayFs;
        return settle(await machine.updateTrigger());
      });
    },

    setTriggerDirection(direction) {
      return mutex.runExclusive(async () => {
        state.trigger.direction = direction;
        return settle(await machine.updateTrigger());
      });
    },

    start() {
      return mutex.runExclusive(() => machine.start(false));
    },

    single() {
      return mutex.runExclusive(() => machine.start(true));
    },

    stop() {
      return mutex.runExclusive(() => machine.stop());
    },

    forceTrigger() {
      return mutex.runExclusive(() => machine.force());
    },

    setGeneratorEnabled(enabled) {
      return updateGenerator({ enabled });
    },

    setGeneratorFrequency(hz) {
      return updateGenerator({ frequencyHz: hz >= MIN_GENERATOR_FREQUENCY_HZ ? hz : 1 });
    },

    setGeneratorDutyCycle(fraction) {
      return updateGenerator({ dutyCycle: Math.max(0, Math.min(1, fraction)) });
    },

    setGeneratorOffset(volts) {
      return updateGenerator({ offsetVolts: volts });
    },

    setGeneratorRange(vpp) {
      return updateGenerator({ rangeVpp: Math.abs(vpp) });
    },

    setGeneratorShape(shape) {
      if (!capabilities.generator.shapes.includes(shape)) {
        log.warn(`Waveform shape ${shape} not supported on this model`);
        return Promise.resolve(Ok(undefined));
      }
      return updateGenerator({ shape });
    },

    pollCapture() {
      return mutex.runExclusive(async (): Promise<DeviceResult<CompletedCapture | null>> => {
        const snapshot = state.snapshot;
        if (state.phase !== 'armed' || snapshot === null) return Ok(null);

        const ready = await adapter.isCaptureReady();
        if (!ready.ok) {
          const settled = await settle(ready);
          return settled.ok ? Ok(null) : settled;
        }
        if (!ready.value) return Ok(null);

        const data = await adapter.readCapture({
          channels: snapshot.channels.filter(c => c.enabled).map(c => c.index),
          pods: snapshot.pods.filter(p => p.enabled).map(p => p.index),
          samples: snapshot.memoryDepth,
          reallocate: state.memoryDepthChanged,
        });
        state.memoryDepthChanged = false;
        if (!data.ok) {
          state.phase = 'disarmed';
          const settled = await settle(data);
          return settled.ok ? Ok(null) : settled;
        }

        const next = await machine.captureCompleted();
        if (!next.ok) return next;
        return Ok({ snapshot, data: data.value });
      });
    },

    resetToSafeState() {
      return mutex.runExclusive(async () => {
        let failure: CommandResult = Ok(undefined);

        state.phase = 'disarmed';
        state.oneShot = true;
        const stopped = ignoreUnsupported(await adapter.disarm());
        if (!stopped.ok && stopped.error.kind === 'fatal') failure = stopped;

        for (const channel of state.channels) {
          channel.enabled = false;
          const result = await adapter.setChannel(channel.index, {
            enabled: false,
            coupling: channel.coupling,
            rangeVolts: channel.rangeVolts,
            offsetVolts: channel.appliedOffsetVolts,
            bandwidthMhz: channel.bandwidthMhz,
          });
          if (!result.ok) {
            log.warn(`Could not disable channel ${channel.index}: ${result.error.message}`);
            if (failure.ok && result.error.kind === 'fatal') failure = result;
          }
        }
        for (const pod of state.pods) {
          pod.enabled = false;
          const result = ignoreUnsupported(
            await adapter.setPod(pod.index, {
              enabled: false,
              thresholdsVolts: [...pod.thresholdsVolts],
              hysteresisMv: pod.hysteresisMv,
            })
          );
          if (!result.ok) {
            log.warn(`Could not disable pod ${pod.index}: ${result.error.message}`);
            if (failure.ok && result.error.kind === 'fatal') failure = result;
          }
        }

        if (state.snapshot) state.snapshot = disabledSnapshot(state.snapshot);
        state.memoryDepthChanged = true;
        return failure;
      });
    },

    describe(): InstrumentStateView {
      return {
        channels: state.channels.map(c => ({
          index: c.index,
          enabled: c.enabled,
          coupling: c.coupling,
          requestedRangeVolts: c.requestedRangeVolts,
          rangeVolts: c.rangeVolts,
          offsetVolts: c.appliedOffsetVolts,
          bandwidthMhz: c.bandwidthMhz,
        })),
        pods: state.pods.map(p => ({
          index: p.index,
          enabled: p.enabled,
          thresholdsVolts: [...p.thresholdsVolts],
          hysteresisMv: p.hysteresisMv,
        })),
        trigger: {
          source: { ...state.trigger.source },
          direction: state.trigger.direction,
          levelVolts: state.trigger.levelVolts,
          delayFs: state.trigger.delayFs,
          oneShot: state.oneShot,
          forced: state.lastTriggerWasForced,
        },
        acquisition: {
          phase: state.phase,
          sampleIntervalFs: state.settings.sampleIntervalFs,
          timebase: state.settings.timebase,
          memoryDepth: state.settings.memoryDepth,
          adcBits: state.settings.adcBits,
          capturesCompleted: state.capturesCompleted,
        },
        generator: { ...state.generator },
      };
    },

    isArmed() {
      return state.phase === 'armed';
    },

    close() {
      return mutex.runExclusive(async () => {
        state.phase = 'disarmed';
        await adapter.disarm();
        return adapter.close();
      });
    },
  };
}
