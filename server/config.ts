/**
 * Server configuration
 *
 * Command-line flags win over environment variables, which win over the
 * defaults below.
 */

import { parseArgs } from 'util';
import { Result, Ok, Err } from '../shared/types.js';
import type { LogLevel } from './logger.js';
import { isLogLevel } from './logger.js';

export interface ServerConfig {
  controlPort: number;
  dataPort: number;
  /** 0 disables the status API */
  statusPort: number;
  model: string;
  captureLatencyMs: number;
  pollIntervalMs: number;
  logLevel: LogLevel;
}

export type ConfigOutcome = { kind: 'run'; config: ServerConfig } | { kind: 'help' };

export const USAGE = `Usage: digitizer-bridge [options]

Options:
  --control-port <port>  Control-plane TCP port (default 5025, env CONTROL_PORT)
  --data-port <port>     Data-plane TCP port (default 5026, env DATA_PORT)
  --status-port <port>   Status HTTP port, 0 to disable (default 3001, env STATUS_PORT)
  --model <model>        Simulated instrument model (default H6424E, env SIM_MODEL)
  --quiet                Only log warnings and errors
  --verbose              Log arm snapshots and ignored requests
  --debug                Log every control line
  --help                 Show this message
`;

const DEFAULTS = {
  CONTROL_PORT: '5025',
  DATA_PORT: '5026',
  STATUS_PORT: '3001',
  SIM_MODEL: 'H6424E',
  SIM_CAPTURE_LATENCY_MS: '20',
  POLL_INTERVAL: '5',
  LOG_LEVEL: 'info',
};

function parsePort(name: string, text: string, allowZero: boolean): Result<number, string> {
  const port = parseInt(text, 10);
  if (isNaN(port) || String(port) !== text.trim() || port < (allowZero ? 0 : 1) || port > 65535) {
    return Err(`Invalid ${name}: "${text}"`);
  }
  return Ok(port);
}

function parseDuration(name: string, text: string): Result<number, string> {
  const ms = parseInt(text, 10);
  if (isNaN(ms) || ms < 0) {
    return Err(`Invalid ${name}: "${text}"`);
  }
  return Ok(ms);
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Result<ConfigOutcome, string> {
  const parsed = tryParse(argv);
  if (!parsed.ok) return parsed;
  const { values } = parsed.value;

  if (values.help) return Ok({ kind: 'help' });

  const controlPort = parsePort('control port', values['control-port'] ?? env.CONTROL_PORT ?? DEFAULTS.CONTROL_PORT, false);
  if (!controlPort.ok) return controlPort;
  const dataPort = parsePort('data port', values['data-port'] ?? env.DATA_PORT ?? DEFAULTS.DATA_PORT, false);
  if (!dataPort.ok) return dataPort;
  const statusPort = parsePort('status port', values['status-port'] ?? env.STATUS_PORT ?? DEFAULTS.STATUS_PORT, true);
  if (!statusPort.ok) return statusPort;

  if (controlPort.value === dataPort.value) {
    return Err(`Control and data planes cannot share port ${controlPort.value}`);
  }

  const captureLatencyMs = parseDuration(
    'capture latency',
    env.SIM_CAPTURE_LATENCY_MS ?? DEFAULTS.SIM_CAPTURE_LATENCY_MS
  );
  if (!captureLatencyMs.ok) return captureLatencyMs;
  const pollIntervalMs = parseDuration('poll interval', env.POLL_INTERVAL ?? DEFAULTS.POLL_INTERVAL);
  if (!pollIntervalMs.ok) return pollIntervalMs;

  let logLevel: LogLevel;
  if (values.debug) logLevel = 'debug';
  else if (values.verbose) logLevel = 'verbose';
  else if (values.quiet) logLevel = 'warn';
  else {
    const fromEnv = (env.LOG_LEVEL ?? DEFAULTS.LOG_LEVEL).toLowerCase();
    if (!isLogLevel(fromEnv)) return Err(`Invalid log level: "${fromEnv}"`);
    logLevel = fromEnv;
  }

  return Ok({
    kind: 'run',
    config: {
      controlPort: controlPort.value,
      dataPort: dataPort.value,
      statusPort: statusPort.value,
      model: (values.model ?? env.SIM_MODEL ?? DEFAULTS.SIM_MODEL).toUpperCase(),
      captureLatencyMs: captureLatencyMs.value,
      pollIntervalMs: pollIntervalMs.value,
      logLevel,
    },
  });
}

function tryParse(argv: string[]) {
  try {
    return Ok(
      parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
          'control-port': { type: 'string' },
          'data-port': { type: 'string' },
          'status-port': { type: 'string' },
          model: { type: 'string' },
          quiet: { type: 'boolean' },
          verbose: { type: 'boolean' },
          debug: { type: 'boolean' },
          help: { type: 'boolean', short: 'h' },
        },
      })
    );
  } catch (err) {
    return Err(err instanceof Error ? err.message : String(err));
  }
}
