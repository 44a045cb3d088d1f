/**
 * ControlSession - Line-oriented control plane for one client
 *
 * Reads newline-terminated commands, hands each to the dispatcher in order
 * and writes query replies back. Resolves when the client sends EXIT, the
 * socket closes, or a fatal device error ends the session.
 */

import type { Duplex } from 'stream';
import { createInterface } from 'readline';
import type { DeviceError } from '../devices/types.js';
import type { CommandDispatcher } from '../protocol/CommandDispatcher.js';
import { createLogger } from '../logger.js';

const log = createLogger('Control');

export type ControlSessionEnd =
  | { reason: 'exit' }
  | { reason: 'disconnect' }
  | { reason: 'fatal'; error: DeviceError };

export async function runControlSession(socket: Duplex, dispatcher: CommandDispatcher): Promise<ControlSessionEnd> {
  const lines = createInterface({ input: socket, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      const outcome = await dispatcher.handleLine(line);

      if (outcome.reply !== undefined && !socket.destroyed) {
        socket.write(`${outcome.reply}\n`);
      }
      if (outcome.error) {
        return { reason: 'fatal', error: outcome.error };
      }
      if (outcome.close) {
        return { reason: 'exit' };
      }
    }
    return { reason: 'disconnect' };
  } catch (err) {
    log.warn('Control connection failed:', err instanceof Error ? err.message : err);
    return { reason: 'disconnect' };
  } finally {
    lines.close();
  }
}
