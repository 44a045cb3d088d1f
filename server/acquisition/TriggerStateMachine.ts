/**
 * Trigger / Acquisition State Machine
 *
 *   disarmed --START/SINGLE/FORCE--> armed --capture read--> armed (continuous)
 *                                      |                  \-> disarmed (one-shot)
 *                                      +--STOP--> disarmed
 *
 * FORCE arms with a 1 us auto-trigger timeout and one-shot semantics; the
 * next ordinary arm puts the configured trigger back first.
 *
 * Nothing here locks. The controller calls in while holding its mutex.
 */

import { Ok } from '../../shared/types.js';
import type { DeviceResult, DigitizerAdapter } from '../devices/types.js';
import { withBusyRetry, ignoreUnsupported } from '../devices/recovery.js';
import { createLogger } from '../logger.js';
import {
  AUX_HALF_SCALE_CODE,
  AUX_INPUT_RANGE_VOLTS,
  triggerSplit,
  voltsToCode,
  type TriggerSplit,
} from './normalization.js';
import { hasEnabledInputs, takeSnapshot, type AcquisitionState } from './state.js';
import { describeTriggerSource } from './trigger-source.js';

const log = createLogger('Trigger');

/** Auto-trigger timeout used to force an immediate capture */
export const FORCE_TIMEOUT_US = 1;

export interface TriggerStateMachine {
  /** Push the configured trigger to the device and re-arm if armed */
  updateTrigger(): Promise<DeviceResult<void>>;
  /** Push the configured trigger without touching acquisition */
  pushTrigger(): Promise<DeviceResult<void>>;
  start(oneShot: boolean): Promise<DeviceResult<void>>;
  force(): Promise<DeviceResult<void>>;
  stop(): Promise<DeviceResult<void>>;
  /** Stop and arm again with a fresh snapshot, when armed */
  restartIfArmed(): Promise<DeviceResult<void>>;
  /** Called once a capture has been read out */
  captureCompleted(): Promise<DeviceResult<void>>;
  currentSplit(): TriggerSplit;
  thresholdCode(): number;
}

export function createTriggerStateMachine(adapter: DigitizerAdapter, state: AcquisitionState): TriggerStateMachine {
  const stopDevice = () => adapter.disarm();

  function currentSplit(): TriggerSplit {
    return triggerSplit(state.trigger.delayFs, state.settings.sampleIntervalFs, state.settings.memoryDepth);
  }

  function thresholdCode(): number {
    const { source, levelVolts } = state.trigger;
    switch (source.kind) {
      case 'analog': {
        const channel = state.channels[source.channel];
        if (!channel) return 0;
        return voltsToCode(levelVolts, channel.appliedOffsetVolts, channel.rangeVolts, state.settings.adcFullScale);
      }
      case 'aux':
        return voltsToCode(levelVolts, 0, AUX_INPUT_RANGE_VOLTS, AUX_HALF_SCALE_CODE);
      default:
        return 0;
    }
  }

  async function configure(force: boolean): Promise<DeviceResult<void>> {
    const result = await withBusyRetry(
      () =>
        adapter.configureTrigger({
          source: state.trigger.source,
          thresholdCode: thresholdCode(),
          direction: state.trigger.direction,
          delaySamples: currentSplit().delaySamples,
          timeoutUs: force ? FORCE_TIMEOUT_US : 0,
        }),
      stopDevice
    );
    if (!result.ok) return result;

    state.lastTriggerWasForced = force;
    if (force) state.oneShot = true;
    return Ok(undefined);
  }

  /** Shrink the memory depth to what the enabled channels leave room for */
  async function fitMemoryDepth(): Promise<DeviceResult<void>> {
    const max = await adapter.getMaxSamples();
    if (!max.ok) {
      if (max.error.kind === 'fatal') return max;
      log.warn(max.error.message);
      return Ok(undefined);
    }
    const { settings } = state;
    if (settings.memoryDepth > max.value) {
      log.warn(`Memory depth ${settings.memoryDepth} exceeds the device maximum, using ${max.value}`);
      settings.memoryDepth = max.value;
    }
    return Ok(undefined);
  }

  /** Arm with a fresh snapshot. Busy arms are retried once after a stop. */
  async function startCapture(force: boolean): Promise<DeviceResult<void>> {
    if (state.lastTriggerWasForced && !force) {
      state.oneShot = false;
      const stopped = ignoreUnsupported(await adapter.disarm());
      if (!stopped.ok && stopped.error.kind === 'fatal') return failArm(stopped.error.message, stopped);
      const restored = await configure(false);
      if (!restored.ok) return failArm(restored.error.message, restored);
    }

    const fitted = await fitMemoryDepth();
    if (!fitted.ok) return failArm(fitted.error.message, fitted);

    const split = currentSplit();
    const snapshot = takeSnapshot(state, split.preTriggerSamples);
    if (state.snapshot === null || state.snapshot.memoryDepth !== snapshot.memoryDepth) {
      state.memoryDepthChanged = true;
    }

    const armed = await withBusyRetry(
      () => adapter.arm(split.preTriggerSamples, split.postTriggerSamples, state.settings.timebase),
      stopDevice
    );
    if (!armed.ok) return failArm(armed.error.message, armed);

    state.snapshot = snapshot;
    state.phase = 'armed';
    log.verbose(
      `Armed capture ${snapshot.captureId}: ${split.preTriggerSamples} pre / ${split.postTriggerSamples} post, ` +
        `timebase ${state.settings.timebase}, trigger on ${describeTriggerSource(state.trigger.source)}`
    );
    return Ok(undefined);
  }

  /**
   * A failed arm leaves the machine disarmed. Fatal failures also stop the
   * device and propagate; anything else is only a warning.
   */
  async function failArm(message: string, result: DeviceResult<void>): Promise<DeviceResult<void>> {
    state.phase = 'disarmed';
    if (!result.ok && result.error.kind === 'fatal') {
      log.error(`Arm failed: ${message}`);
      await adapter.disarm();
      return result;
    }
    log.warn(`Arm failed: ${message}`);
    return Ok(undefined);
  }

  async function restartIfArmed(): Promise<DeviceResult<void>> {
    if (state.phase !== 'armed') return Ok(undefined);
    const stopped = ignoreUnsupported(await adapter.disarm());
    if (!stopped.ok) return failArm(stopped.error.message, stopped);
    return startCapture(false);
  }

  return {
    currentSplit,
    thresholdCode,

    async pushTrigger() {
      return configure(false);
    },

    async updateTrigger() {
      const pushed = await configure(false);
      if (!pushed.ok) return pushed;
      return restartIfArmed();
    },

    async start(oneShot) {
      if (state.phase === 'armed') {
        log.verbose('Ignoring start request, already armed');
        return Ok(undefined);
      }
      if (!hasEnabledInputs(state)) {
        log.verbose('Ignoring start request, no channels or pods enabled');
        return Ok(undefined);
      }
      const result = await startCapture(false);
      state.oneShot = oneShot;
      return result;
    },

    async force() {
      if (state.trigger.source.kind === 'digital') {
        log.warn('Force trigger is not supported with a digital trigger source');
        return Ok(undefined);
      }
      if (state.phase === 'armed') {
        const stopped = ignoreUnsupported(await adapter.disarm());
        if (!stopped.ok) return failArm(stopped.error.message, stopped);
        state.phase = 'disarmed';
      }
      const configured = await configure(true);
      if (!configured.ok) return failArm(configured.error.message, configured);
      return startCapture(true);
    },

    async stop() {
      state.oneShot = true;
      state.phase = 'disarmed';
      const stopped = ignoreUnsupported(await adapter.disarm());
      if (!stopped.ok) {
        log.error(stopped.error.message);
        return stopped.error.kind === 'fatal' ? stopped : Ok(undefined);
      }
      return Ok(undefined);
    },

    restartIfArmed,

    async captureCompleted() {
      state.capturesCompleted++;
      if (state.oneShot) {
        state.phase = 'disarmed';
        return Ok(undefined);
      }
      // block mode: the device is idle again after readout
      state.phase = 'disarmed';
      return startCapture(false);
    },
  };
}
