/**
 * BridgeServer - Control and data listeners for the single client
 *
 * - One client at a time: a second control connection is dropped
 * - A data connection that arrives before its control connection is held
 *   until the control side shows up
 * - When the control session ends (EXIT, socket close, fatal error) the
 *   instrument goes back to a safe state, the streamer is joined and both
 *   sockets are closed before the next client is accepted
 */

import { createServer, type Server, type Socket } from 'net';
import type { AcquisitionController } from '../acquisition/AcquisitionController.js';
import { createCommandDispatcher, type CommandDispatcher } from '../protocol/CommandDispatcher.js';
import { createLogger } from '../logger.js';
import { runControlSession } from './ControlSession.js';
import { createDataPlaneStreamer, type DataPlaneStreamer } from './DataPlaneStreamer.js';

const log = createLogger('Bridge');

export interface BridgeServerConfig {
  controlPort: number;
  dataPort: number;
  host?: string;
  pollIntervalMs?: number;
}

export interface BridgeAddresses {
  controlPort: number;
  dataPort: number;
}

export interface BridgeServer {
  listen(): Promise<BridgeAddresses>;
  close(): Promise<void>;
  isClientConnected(): boolean;
  /** Resolves once the current client (if any) has been fully torn down */
  whenIdle(): Promise<void>;
}

interface ClientConnection {
  control: Socket;
  data: Socket | null;
  streamer: DataPlaneStreamer | null;
  session: Promise<void>;
}

function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
}

function listenOn(server: Server, port: number, host: string | undefined): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise(resolve => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(err => {
      if (err) log.warn(`Listener close failed: ${err.message}`);
      resolve();
    });
  });
}

export function createBridgeServer(controller: AcquisitionController, config: BridgeServerConfig): BridgeServer {
  const dispatcher: CommandDispatcher = createCommandDispatcher(controller);
  const controlServer = createServer();
  const dataServer = createServer();

  let client: ClientConnection | null = null;
  let pendingData: Socket | null = null;

  function attachData(connection: ClientConnection, socket: Socket): void {
    connection.data = socket;
    connection.streamer = createDataPlaneStreamer(controller, socket, {
      pollIntervalMs: config.pollIntervalMs,
      onFatal: () => connection.control.destroy(),
    });
    connection.streamer.start();
    log.info(`Data plane connected from ${describePeer(socket)}`);
  }

  async function teardown(connection: ClientConnection): Promise<void> {
    const reset = await controller.resetToSafeState();
    if (!reset.ok) log.error(`Could not reset instrument: ${reset.error.message}`);

    if (connection.streamer) await connection.streamer.stop();
    connection.data?.destroy();
    if (!connection.control.destroyed) connection.control.end();
  }

  async function serveClient(connection: ClientConnection): Promise<void> {
    const end = await runControlSession(connection.control, dispatcher);
    switch (end.reason) {
      case 'fatal':
        log.error(`Closing session after device failure: ${end.error.message}`);
        break;
      case 'exit':
        log.info('Client sent EXIT');
        break;
      case 'disconnect':
        log.info('Client disconnected');
        break;
    }
    await teardown(connection);
  }

  controlServer.on('connection', (socket: Socket) => {
    socket.setNoDelay(true);
    socket.on('error', err => log.warn(`Control socket error: ${err.message}`));

    if (client) {
      log.warn(`Rejecting control connection from ${describePeer(socket)}: a client is already connected`);
      socket.destroy();
      return;
    }

    log.info(`Control plane connected from ${describePeer(socket)}`);
    const connection: ClientConnection = { control: socket, data: null, streamer: null, session: Promise.resolve() };
    client = connection;

    if (pendingData && !pendingData.destroyed) {
      attachData(connection, pendingData);
    }
    pendingData = null;

    connection.session = serveClient(connection)
      .catch(err => log.error('Client session failed:', err))
      .finally(() => {
        if (client === connection) client = null;
      });
  });

  dataServer.on('connection', (socket: Socket) => {
    socket.setNoDelay(true);
    socket.on('error', err => log.warn(`Data socket error: ${err.message}`));

    if (client === null) {
      if (pendingData) pendingData.destroy();
      log.verbose(`Holding data connection from ${describePeer(socket)} until a control client connects`);
      pendingData = socket;
      return;
    }

    if (client.data && !client.data.destroyed) {
      log.warn(`Rejecting data connection from ${describePeer(socket)}: data plane already connected`);
      socket.destroy();
      return;
    }

    const connection = client;
    const previous = connection.streamer;
    if (previous) {
      connection.streamer = null;
      previous
        .stop()
        .then(() => {
          if (client === connection && connection.streamer === null) attachData(connection, socket);
          else socket.destroy();
        })
        .catch(err => log.error('Could not replace data stream:', err));
      return;
    }
    attachData(connection, socket);
  });

  return {
    async listen() {
      const controlPort = await listenOn(controlServer, config.controlPort, config.host);
      const dataPort = await listenOn(dataServer, config.dataPort, config.host);
      log.info(`Control plane listening on port ${controlPort}, data plane on port ${dataPort}`);
      return { controlPort, dataPort };
    },

    async close() {
      const closing = Promise.all([closeServer(controlServer), closeServer(dataServer)]);
      pendingData?.destroy();
      pendingData = null;
      if (client) {
        const connection = client;
        connection.control.destroy();
        await connection.session;
      }
      await closing;
    },

    isClientConnected() {
      return client !== null;
    },

    async whenIdle() {
      if (client) await client.session;
    },
  };
}
