/**
 * DataPlaneStreamer - Ships completed captures to the data-plane socket
 *
 * One loop per client:
 * - Polls the controller for a finished capture (under the shared lock)
 * - Encodes it against its arm-time snapshot
 * - Writes the frame with the lock released, waiting for the write to land
 *   before polling again, so frames never interleave
 *
 * stop() ends the loop and resolves once it has exited.
 */

import type { Writable } from 'stream';
import type { AcquisitionController } from '../acquisition/AcquisitionController.js';
import type { DeviceError } from '../devices/types.js';
import { createLogger } from '../logger.js';
import { buildFrame, encodeFrame } from '../waveform/frame-codec.js';

const log = createLogger('DataPlane');

export interface DataPlaneStreamerConfig {
  /** Idle time between readiness polls (default: 5ms) */
  pollIntervalMs?: number;
  /** Called when the device fails fatally; the loop has already stopped */
  onFatal?: (error: DeviceError) => void;
}

export interface DataPlaneStreamer {
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
  getFramesSent(): number;
}

const DEFAULT_CONFIG = {
  pollIntervalMs: 5,
};

export function createDataPlaneStreamer(
  controller: AcquisitionController,
  socket: Writable,
  config: DataPlaneStreamerConfig = {}
): DataPlaneStreamer {
  const pollIntervalMs = config.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs;

  let running = false;
  let generation = 0;  // Bumped on stop so a stale loop exits at its next check
  let framesSent = 0;
  let loop: Promise<void> | null = null;
  let wake: (() => void) | null = null;

  function sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        wake = null;
        resolve();
      }
      wake = done;
    });
  }

  /** Resolves true once the frame is flushed, false if the socket failed or closed. */
  function writeFrame(frame: Buffer): Promise<boolean> {
    if (socket.destroyed || socket.writableEnded) return Promise.resolve(false);

    return new Promise(resolve => {
      const onClose = () => finish(false);
      function finish(ok: boolean) {
        socket.off('close', onClose);
        resolve(ok);
      }
      socket.once('close', onClose);
      socket.write(frame, err => {
        if (err) log.warn(`Frame write failed: ${err.message}`);
        finish(!err);
      });
    });
  }

  async function run(myGeneration: number): Promise<void> {
    const current = () => running && myGeneration === generation;

    while (current()) {
      const polled = await controller.pollCapture();
      if (!polled.ok) {
        log.error(`Capture download failed: ${polled.error.message}`);
        running = false;
        config.onFatal?.(polled.error);
        break;
      }

      if (polled.value === null) {
        await sleep(pollIntervalMs);
        continue;
      }

      // a stop that landed while downloading still drops this frame
      if (!current()) break;

      const { snapshot, data } = polled.value;
      const frame = encodeFrame(buildFrame(snapshot, data));
      if (!(await writeFrame(frame))) {
        log.verbose('Data socket gone, stopping stream');
        running = false;
        break;
      }
      framesSent++;
      log.debug(`Sent capture ${snapshot.captureId} (${frame.length} bytes)`);
    }
  }

  function handleSocketClose(): void {
    running = false;
    wake?.();
  }

  return {
    start() {
      if (running) return;
      running = true;
      const myGeneration = ++generation;
      socket.once('close', handleSocketClose);
      loop = run(myGeneration).catch(err => {
        running = false;
        log.error('Streaming loop failed:', err);
      });
    },

    async stop() {
      running = false;
      generation++;
      socket.off('close', handleSocketClose);
      wake?.();
      if (loop) {
        await loop;
        loop = null;
      }
    },

    isRunning() {
      return running;
    },

    getFramesSent() {
      return framesSent;
    },
  };
}
