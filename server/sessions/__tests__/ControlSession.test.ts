import { describe, it, expect, vi } from 'vitest';
import { Duplex } from 'stream';
import { runControlSession } from '../ControlSession.js';
import type { CommandDispatcher, DispatchOutcome } from '../../protocol/CommandDispatcher.js';
import type { DeviceError } from '../../devices/types.js';

function createMockSocket(input: string) {
  const written: string[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  socket.push(input);
  socket.push(null);
  return { socket, written };
}

function createMockDispatcher(outcomes: Record<string, DispatchOutcome> = {}) {
  const handleLine = vi.fn(async (line: string): Promise<DispatchOutcome> => outcomes[line] ?? { close: false });
  const dispatcher: CommandDispatcher = { handleLine };
  return { dispatcher, handleLine };
}

const FATAL: DeviceError = {
  kind: 'fatal',
  status: 0x07,
  operation: 'setChannel',
  message: 'setChannel failed: NOT_RESPONDING',
};

describe('runControlSession', () => {
  it('dispatches lines in order and writes query replies', async () => {
    const { socket, written } = createMockSocket('A:ON\n*IDN?\nB:ON\n');
    const { dispatcher, handleLine } = createMockDispatcher({ '*IDN?': { reply: 'Lab Digitizer,X', close: false } });

    expect(await runControlSession(socket, dispatcher)).toEqual({ reason: 'disconnect' });
    expect(handleLine.mock.calls.map(call => call[0])).toEqual(['A:ON', '*IDN?', 'B:ON']);
    expect(written).toEqual(['Lab Digitizer,X\n']);
  });

  it('strips CRLF line endings', async () => {
    const { socket } = createMockSocket('START\r\n');
    const { dispatcher, handleLine } = createMockDispatcher();

    await runControlSession(socket, dispatcher);
    expect(handleLine).toHaveBeenCalledWith('START');
  });

  it('ends on EXIT without reading further lines', async () => {
    const { socket } = createMockSocket('EXIT\nA:ON\n');
    const { dispatcher, handleLine } = createMockDispatcher({ EXIT: { close: true } });

    expect(await runControlSession(socket, dispatcher)).toEqual({ reason: 'exit' });
    expect(handleLine).toHaveBeenCalledTimes(1);
  });

  it('ends with the error on a fatal device failure', async () => {
    const { socket } = createMockSocket('A:RANGE 2\nA:ON\n');
    const { dispatcher } = createMockDispatcher({ 'A:RANGE 2': { close: true, error: FATAL } });

    expect(await runControlSession(socket, dispatcher)).toEqual({ reason: 'fatal', error: FATAL });
  });

  it('waits for each line before handling the next', async () => {
    const { socket } = createMockSocket('SLOW\nFAST\n');
    const order: string[] = [];
    const dispatcher: CommandDispatcher = {
      async handleLine(line) {
        if (line === 'SLOW') await new Promise(resolve => setTimeout(resolve, 20));
        order.push(line);
        return { close: false };
      },
    };

    await runControlSession(socket, dispatcher);
    expect(order).toEqual(['SLOW', 'FAST']);
  });
});
