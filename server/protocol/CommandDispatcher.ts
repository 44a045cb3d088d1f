/**
 * Command Dispatcher
 *
 * Routes one control line to the acquisition controller. Commands never
 * reply; queries reply with exactly one line. Malformed or unrecognised
 * lines are logged and dropped, and the session carries on.
 *
 * Only a fatal device error ends the session: the outcome then carries the
 * error and close = true.
 */

import { COUPLINGS, WAVEFORM_SHAPES } from '../../shared/types.js';
import type { Coupling, WaveformShape } from '../../shared/types.js';
import type { AcquisitionController, CommandResult } from '../acquisition/AcquisitionController.js';
import { encodeTriggerSource, type ChannelLayout } from '../acquisition/trigger-source.js';
import type { DeviceError } from '../devices/types.js';
import { createLogger } from '../logger.js';
import { ScpiParser, type ParsedLine } from './scpi-parser.js';
import { parseDirection, resolveSubject, resolveTriggerSource, type ChannelRef } from './subjects.js';

const log = createLogger('Dispatch');

export interface DispatchOutcome {
  reply?: string;
  /** End the control session after this line */
  close: boolean;
  error?: DeviceError;
}

export interface CommandDispatcher {
  handleLine(line: string): Promise<DispatchOutcome>;
}

const COUPLING_MAP: Record<string, Coupling> = Object.fromEntries(COUPLINGS.map(c => [c, c]));
const SHAPE_MAP: Record<string, WaveformShape> = Object.fromEntries(WAVEFORM_SHAPES.map(s => [s, s]));

const CONTINUE: DispatchOutcome = { close: false };

function reply(text: string | number): DispatchOutcome {
  return { reply: String(text), close: false };
}

function fromResult(result: CommandResult): DispatchOutcome {
  if (result.ok) return CONTINUE;
  return { close: true, error: result.error };
}

export function createCommandDispatcher(controller: AcquisitionController): CommandDispatcher {
  const { capabilities, info } = controller;
  const layout: ChannelLayout = {
    analogChannels: capabilities.analogChannels,
    digitalPods: capabilities.digitalPods,
  };

  function unrecognized(line: string, parsed: ParsedLine): DispatchOutcome {
    log.debug(`Unrecognized command received: ${line}`);
    log.debug(`  Subject: ${parsed.subject ?? '(none)'}  Command: ${parsed.command}  Args: ${parsed.args.join(' ')}`);
    return CONTINUE;
  }

  /** Parse a numeric argument, warning and returning null when it is bad. */
  function numberArg(parsed: ParsedLine): number | null {
    const value = ScpiParser.parseNumber(parsed.args[0]);
    if (!value.ok) {
      log.warn(`${parsed.subject ? `${parsed.subject}:` : ''}${parsed.command}: ${value.error}`);
      return null;
    }
    return value.value;
  }

  async function withNumber(parsed: ParsedLine, apply: (value: number) => Promise<CommandResult>): Promise<DispatchOutcome> {
    const value = numberArg(parsed);
    if (value === null) return CONTINUE;
    return fromResult(await apply(value));
  }

  // ============ Instrument-wide ============

  async function handleGlobal(line: string, parsed: ParsedLine): Promise<DispatchOutcome> {
    const { command, isQuery } = parsed;

    if (isQuery) {
      switch (command) {
        case '*IDN':
          return reply(`${info.make},${info.model},${info.serial},${info.firmware}`);
        case 'CHANS':
          return reply(capabilities.analogChannels);
        case 'DEPTHS':
          return reply(ScpiParser.formatList(await controller.getMemoryDepths()));
        case 'RATES':
          return reply(ScpiParser.formatList(await controller.getSampleRates()));
        default:
          return unrecognized(line, parsed);
      }
    }

    switch (command) {
      case 'EXIT':
        return { close: true };
      case 'START':
        return fromResult(await controller.start());
      case 'SINGLE':
        return fromResult(await controller.single());
      case 'STOP':
        return fromResult(await controller.stop());
      case 'FORCE':
        return fromResult(await controller.forceTrigger());
      case 'BITS':
        return withNumber(parsed, bits => controller.setResolution(Math.round(bits)));
      case 'DEPTH':
        return withNumber(parsed, depth => controller.setMemoryDepth(Math.round(depth)));
      case 'RATE':
        return withNumber(parsed, rate => controller.setSampleRate(rate));
      default:
        return unrecognized(line, parsed);
    }
  }

  // ============ Trigger ============

  async function handleTrigger(line: string, parsed: ParsedLine): Promise<DispatchOutcome> {
    const { command, isQuery, args } = parsed;

    if (isQuery) {
      if (command === 'SOU') {
        return reply(encodeTriggerSource(controller.describe().trigger.source, layout));
      }
      return unrecognized(line, parsed);
    }

    switch (command) {
      case 'SOU': {
        const source = args[0] === undefined ? null : resolveTriggerSource(args[0], layout);
        if (source === null) {
          log.warn(`Unknown trigger source "${args[0] ?? ''}"`);
          return CONTINUE;
        }
        return fromResult(await controller.setTriggerSource(source));
      }
      case 'LEV':
        return withNumber(parsed, volts => controller.setTriggerLevel(volts));
      case 'DELAY':
        return withNumber(parsed, fs => controller.setTriggerDelay(fs));
      case 'EDGE:DIR': {
        const direction = parseDirection(args[0]);
        if (direction === null) {
          log.warn(`Unknown trigger direction "${args[0] ?? ''}"`);
          return CONTINUE;
        }
        return fromResult(await controller.setTriggerDirection(direction));
      }
      case 'MODE':
        if ((args[0] ?? '').toUpperCase() !== 'EDGE') {
          log.warn(`Trigger mode ${args[0] ?? '(none)'} not supported, only EDGE`);
        }
        return CONTINUE;
      default:
        return unrecognized(line, parsed);
    }
  }

  // ============ Function generator ============

  async function handleGenerator(line: string, parsed: ParsedLine): Promise<DispatchOutcome> {
    if (parsed.isQuery) return unrecognized(line, parsed);

    switch (parsed.command) {
      case 'START':
        return fromResult(await controller.setGeneratorEnabled(true));
      case 'STOP':
        return fromResult(await controller.setGeneratorEnabled(false));
      case 'FREQ':
        return withNumber(parsed, hz => controller.setGeneratorFrequency(hz));
      case 'DUTY':
        return withNumber(parsed, duty => controller.setGeneratorDutyCycle(duty));
      case 'OFFS':
        return withNumber(parsed, volts => controller.setGeneratorOffset(volts));
      case 'RANGE':
        return withNumber(parsed, vpp => controller.setGeneratorRange(vpp));
      case 'SHAPE': {
        const shape = ScpiParser.parseEnum(parsed.args[0], SHAPE_MAP);
        if (!shape.ok) {
          log.warn(`AWG:SHAPE: ${shape.error}`);
          return CONTINUE;
        }
        if (shape.value === 'ARBITRARY') {
          log.warn('Arbitrary waveforms are not supported, ignoring');
          return CONTINUE;
        }
        return fromResult(await controller.setGeneratorShape(shape.value));
      }
      default:
        return unrecognized(line, parsed);
    }
  }

  // ============ Channels and pods ============

  async function handleAnalog(line: string, parsed: ParsedLine, channel: number): Promise<DispatchOutcome> {
    const { command, isQuery } = parsed;

    if (isQuery) {
      switch (command) {
        case 'BWLIM':
          return reply(controller.getBandwidthLimit(channel));
        case 'PRESENT':
          return reply('1');
        default:
          return unrecognized(line, parsed);
      }
    }

    switch (command) {
      case 'ON':
        return fromResult(await controller.setChannelEnabled(channel, true));
      case 'OFF':
        return fromResult(await controller.setChannelEnabled(channel, false));
      case 'COUP': {
        const coupling = ScpiParser.parseEnum(parsed.args[0], COUPLING_MAP);
        if (!coupling.ok) {
          log.warn(`COUP: ${coupling.error}`);
          return CONTINUE;
        }
        return fromResult(await controller.setCoupling(channel, coupling.value));
      }
      case 'RANGE':
        return withNumber(parsed, volts => controller.setRange(channel, volts));
      case 'OFFS':
        return withNumber(parsed, volts => controller.setOffset(channel, volts));
      case 'BWLIM':
        return withNumber(parsed, mhz => controller.setBandwidthLimit(channel, mhz));
      default:
        return unrecognized(line, parsed);
    }
  }

  async function handleDigital(
    line: string,
    parsed: ParsedLine,
    pod: number,
    lane: number | null
  ): Promise<DispatchOutcome> {
    const { command, isQuery } = parsed;

    if (isQuery) {
      switch (command) {
        case 'PRESENT':
          return reply(ScpiParser.formatBool(await controller.isPodPresent(pod)));
        case 'BWLIM':
          return reply('0');
        default:
          return unrecognized(line, parsed);
      }
    }

    switch (command) {
      case 'ON':
        return fromResult(await controller.setPodEnabled(pod, true));
      case 'OFF':
        return fromResult(await controller.setPodEnabled(pod, false));
      case 'THRESH':
        return withNumber(parsed, mv => controller.setPodThreshold(pod, lane, mv / 1000));
      case 'HYS':
        return withNumber(parsed, mv => controller.setPodHysteresis(pod, mv));
      case 'RANGE':
        // sent for lanes sharing a view with analog channels; nothing to do
        return CONTINUE;
      default:
        return unrecognized(line, parsed);
    }
  }

  function handleChannel(line: string, parsed: ParsedLine, ref: ChannelRef): Promise<DispatchOutcome> {
    switch (ref.kind) {
      case 'analog':
        return handleAnalog(line, parsed, ref.channel);
      case 'digital':
        return handleDigital(line, parsed, ref.pod, ref.lane);
      case 'aux':
        if (parsed.isQuery && parsed.command === 'PRESENT') return Promise.resolve(reply('1'));
        return Promise.resolve(unrecognized(line, parsed));
    }
  }

  return {
    async handleLine(line) {
      const parsed = ScpiParser.parseLine(line);
      if (parsed === null) return CONTINUE;

      log.debug(`> ${line.trim()}`);

      const { subject } = parsed;
      if (subject === null) return handleGlobal(line, parsed);
      if (subject === 'TRIG') return handleTrigger(line, parsed);
      if (subject === 'AWG') return handleGenerator(line, parsed);

      const ref = resolveSubject(subject, layout);
      if (ref === null) return unrecognized(line, parsed);
      return handleChannel(line, parsed, ref);
    },
  };
}
