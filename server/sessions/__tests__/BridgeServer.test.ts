import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createConnection, type Socket } from 'net';
import { createDefaultRegistry } from '../../devices/registry.js';
import { createSimulatedInstrument } from '../../devices/simulation/index.js';
import { createAcquisitionController, type AcquisitionController } from '../../acquisition/AcquisitionController.js';
import { decodeFrame } from '../../waveform/frame-codec.js';
import { createBridgeServer, type BridgeAddresses, type BridgeServer } from '../BridgeServer.js';

const HOST = '127.0.0.1';

function connect(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ port, host: HOST }, () => {
      socket.off('error', reject);
      resolve(socket);
    });
    socket.once('error', reject);
  });
}

function whenClosed(socket: Socket): Promise<void> {
  return new Promise(resolve => {
    if (socket.destroyed) resolve();
    else socket.once('close', () => resolve());
  });
}

/** Collects newline-terminated replies from a control socket */
function collectLines(socket: Socket): string[] {
  const lines: string[] = [];
  let pending = '';
  socket.setEncoding('utf8');
  socket.on('data', (chunk: string) => {
    pending += chunk;
    let newline = pending.indexOf('\n');
    while (newline >= 0) {
      lines.push(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  });
  return lines;
}

function collectBytes(socket: Socket): Buffer[] {
  const chunks: Buffer[] = [];
  socket.on('data', (chunk: Buffer) => chunks.push(chunk));
  return chunks;
}

// one analog channel, 1000 samples
const FRAME_BYTES = 24 + 16 + 2000;

describe('BridgeServer', () => {
  let controller: AcquisitionController;
  let bridge: BridgeServer;
  let ports: BridgeAddresses;
  const sockets: Socket[] = [];

  async function open(port: number): Promise<Socket> {
    const socket = await connect(port);
    socket.on('error', () => {});
    sockets.push(socket);
    return socket;
  }

  beforeEach(async () => {
    const sim = createSimulatedInstrument(createDefaultRegistry(), { model: 'H6424E', captureLatencyMs: 0 });
    if (!sim.ok) throw new Error(sim.error);
    controller = createAcquisitionController(sim.value.adapter);
    await controller.initialize();

    bridge = createBridgeServer(controller, { controlPort: 0, dataPort: 0, host: HOST, pollIntervalMs: 1 });
    ports = await bridge.listen();
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) socket.destroy();
    await bridge.close();
  });

  it('listens on the ports it was given', () => {
    expect(ports.controlPort).toBeGreaterThan(0);
    expect(ports.dataPort).toBeGreaterThan(0);
    expect(ports.dataPort).not.toBe(ports.controlPort);
  });

  it('answers control queries', async () => {
    const control = await open(ports.controlPort);
    const replies = collectLines(control);

    control.write('*IDN?\nCHANS?\n');
    await vi.waitFor(() => expect(replies).toEqual(['Lab Digitizer,H6424E,SIM000001,1.0.0-sim', '4']));
  });

  it('streams captures to the data plane', async () => {
    const control = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    const data = await open(ports.dataPort);
    const chunks = collectBytes(data);

    control.write('DEPTH 1000\nA:ON\nSINGLE\n');
    await vi.waitFor(() => expect(Buffer.concat(chunks).length).toBe(FRAME_BYTES));

    const frame = decodeFrame(Buffer.concat(chunks));
    expect(frame.ok).toBe(true);
    if (frame.ok) {
      expect(frame.value.blocks).toHaveLength(1);
      expect(frame.value.blocks[0].channelIndex).toBe(0);
    }
  });

  it('holds a data connection that arrives before the control connection', async () => {
    const data = await open(ports.dataPort);
    const chunks = collectBytes(data);
    const control = await open(ports.controlPort);

    control.write('DEPTH 1000\nA:ON\nSINGLE\n');
    await vi.waitFor(() => expect(Buffer.concat(chunks).length).toBe(FRAME_BYTES));
  });

  it('rejects a second control client', async () => {
    const first = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));

    const second = await open(ports.controlPort);
    await whenClosed(second);

    const replies = collectLines(first);
    first.write('CHANS?\n');
    await vi.waitFor(() => expect(replies).toEqual(['4']));
  });

  it('resets the instrument and closes the connection on EXIT', async () => {
    const control = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    const closed = whenClosed(control);

    control.write('DEPTH 1000\nA:ON\nSTART\nEXIT\n');
    await bridge.whenIdle();
    await closed;

    expect(bridge.isClientConnected()).toBe(false);
    expect(controller.isArmed()).toBe(false);
    expect(controller.describe().channels.every(c => !c.enabled)).toBe(true);
  });

  it('hands the next client an instrument with every input off', async () => {
    const first = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    const firstClosed = whenClosed(first);
    first.write('DEPTH 1000\nA:ON\n1:ON\nSTART\nEXIT\n');
    await firstClosed;
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(false));

    const second = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    const data = await open(ports.dataPort);
    const chunks = collectBytes(data);
    const replies = collectLines(second);

    // START with nothing enabled must not arm
    second.write('START\nCHANS?\n');
    await vi.waitFor(() => expect(replies).toEqual(['4']));
    await new Promise(resolve => setTimeout(resolve, 50));

    expect(controller.isArmed()).toBe(false);
    expect(chunks).toHaveLength(0);
  });

  it('accepts a new client after the previous one disconnects', async () => {
    const first = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    first.destroy();
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(false));

    const second = await open(ports.controlPort);
    const replies = collectLines(second);
    second.write('CHANS?\n');
    await vi.waitFor(() => expect(replies).toEqual(['4']));
  });

  it('closes the data connection when the control client leaves', async () => {
    const control = await open(ports.controlPort);
    await vi.waitFor(() => expect(bridge.isClientConnected()).toBe(true));
    const data = await open(ports.dataPort);
    const chunks = collectBytes(data);
    const dataClosed = whenClosed(data);

    // a frame arriving proves the data socket is attached to this client
    control.write('DEPTH 1000\nA:ON\nSINGLE\n');
    await vi.waitFor(() => expect(Buffer.concat(chunks).length).toBe(FRAME_BYTES));

    control.destroy();
    await dataClosed;
    expect(bridge.isClientConnected()).toBe(false);
  });
});
