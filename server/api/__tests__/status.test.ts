import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'http';
import express from 'express';
import { createDefaultRegistry } from '../../devices/registry.js';
import { createSimulatedInstrument } from '../../devices/simulation/index.js';
import { createAcquisitionController, type AcquisitionController } from '../../acquisition/AcquisitionController.js';
import { createStatusRoutes } from '../status.js';

describe('Status API', () => {
  let controller: AcquisitionController;
  let server: Server;
  let baseUrl: string;
  let clientConnected: boolean;

  beforeEach(async () => {
    const sim = createSimulatedInstrument(createDefaultRegistry(), { model: 'H6424E', captureLatencyMs: 0 });
    if (!sim.ok) throw new Error(sim.error);
    controller = createAcquisitionController(sim.value.adapter);
    await controller.initialize();
    clientConnected = false;

    const app = express();
    app.use('/api', createStatusRoutes({ controller, isClientConnected: () => clientConnected }));
    server = createServer(app);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('status server has no port');
    baseUrl = `http://127.0.0.1:${address.port}/api`;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('reports health and client state', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', clientConnected: false, phase: 'disarmed' });

    clientConnected = true;
    expect(await (await fetch(`${baseUrl}/health`)).json()).toMatchObject({ clientConnected: true });
  });

  it('describes the instrument', async () => {
    const body: unknown = await (await fetch(`${baseUrl}/instrument`)).json();
    expect(body).toMatchObject({
      info: {
        make: 'Lab Digitizer',
        model: 'H6424E',
        serial: 'SIM000001',
        firmware: '1.0.0-sim',
        family: 'highperf',
      },
      capabilities: { analogChannels: 4, digitalPods: 2, resolutions: [8, 10, 12] },
    });
  });

  it('reports live acquisition state', async () => {
    await controller.setChannelEnabled(1, true);
    await controller.setRange(1, 0.3);

    const body: unknown = await (await fetch(`${baseUrl}/state`)).json();
    expect(body).toMatchObject({
      channels: [{ index: 0, enabled: false }, { index: 1, enabled: true, rangeVolts: 0.5 }, { index: 2 }, { index: 3 }],
      acquisition: { phase: 'disarmed', memoryDepth: 1_000_000 },
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/devices`);
    expect(response.status).toBe(404);
  });
});
