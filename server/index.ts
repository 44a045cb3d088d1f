#!/usr/bin/env node
/**
 * Digitizer Bridge Server
 * Exposes one digitizer over a line-based control plane and a binary data plane,
 * with an optional read-only HTTP status API
 */

import { createServer, type Server } from 'http';
import express from 'express';
import cors from 'cors';
import { loadConfig, USAGE, type ServerConfig } from './config.js';
import { createLogger, setLogLevel } from './logger.js';
import { createDefaultRegistry } from './devices/registry.js';
import { createSimulatedInstrument } from './devices/simulation/index.js';
import { createAcquisitionController } from './acquisition/AcquisitionController.js';
import { createBridgeServer } from './sessions/BridgeServer.js';
import { createStatusRoutes } from './api/status.js';

const log = createLogger('Server');

async function start(config: ServerConfig): Promise<void> {
  setLogLevel(config.logLevel);

  log.info('Digitizer Bridge starting...');
  log.info(`  Model: ${config.model}`);
  log.info(`  Poll interval: ${config.pollIntervalMs}ms`);

  const registry = createDefaultRegistry();
  const instrument = createSimulatedInstrument(registry, {
    model: config.model,
    captureLatencyMs: config.captureLatencyMs,
  });
  if (!instrument.ok) {
    log.error(`Cannot open instrument: ${instrument.error}`);
    process.exit(1);
  }

  const controller = createAcquisitionController(instrument.value.adapter);
  const initialized = await controller.initialize();
  if (!initialized.ok) {
    log.error(`Instrument initialization failed: ${initialized.error.message}`);
    process.exit(1);
  }
  const { info, capabilities } = controller;
  log.info(
    `Opened ${info.make} ${info.model} (${info.family}), serial ${info.serial}: ` +
      `${capabilities.analogChannels} analog channels, ${capabilities.digitalPods} pods`
  );

  const bridge = createBridgeServer(controller, {
    controlPort: config.controlPort,
    dataPort: config.dataPort,
    pollIntervalMs: config.pollIntervalMs,
  });
  await bridge.listen();

  let statusServer: Server | null = null;
  if (config.statusPort > 0) {
    const app = express();
    app.use(cors());
    app.use('/api', createStatusRoutes({ controller, isClientConnected: () => bridge.isClientConnected() }));

    const server = createServer(app);
    statusServer = server;
    server.listen(config.statusPort, () => {
      log.info(`Status API on http://localhost:${config.statusPort}/api`);
      log.info('  GET  /api/health      - Liveness and client state');
      log.info('  GET  /api/instrument  - Identity and capabilities');
      log.info('  GET  /api/state       - Live acquisition settings');
    });
  }

  let shuttingDown = false;
  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down...');

    statusServer?.close();
    await bridge.close();
    const closed = await controller.close();
    if (!closed.ok) log.warn(`Instrument close failed: ${closed.error.message}`);

    log.info('Server closed');
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch(err => {
      log.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

const loaded = loadConfig();
if (!loaded.ok) {
  console.error(loaded.error);
  console.error(USAGE);
  process.exit(1);
} else if (loaded.value.kind === 'help') {
  console.log(USAGE);
} else {
  start(loaded.value.config).catch(err => {
    log.error('Startup failed:', err);
    process.exit(1);
  });
}
