/**
 * Control-Plane Line Parser
 *
 * Utilities for parsing the SCPI-style control protocol. A line is
 *
 *   [SUBJECT:]COMMAND[?] [ARGS...]
 *
 * where the subject is whatever precedes the first colon and the command
 * may itself contain colons (TRIG:EDGE:DIR). Parsing never fails: anything
 * the dispatcher does not recognise is dropped there.
 */

import { Result, Ok, Err } from '../../shared/types.js';

export interface ParsedLine {
  /** Uppercased text before the first ':', null when the line has none */
  subject: string | null;
  /** Uppercased, without the trailing '?' */
  command: string;
  /** Whitespace-separated arguments, case preserved */
  args: string[];
  isQuery: boolean;
}

export const ScpiParser = {
  /**
   * Split a control line into subject, command, arguments and query flag.
   * Returns null for blank lines.
   */
  parseLine(line: string): ParsedLine | null {
    const trimmed = line.trim();
    if (trimmed === '') return null;

    const [head, ...args] = trimmed.split(/\s+/);
    let isQuery = false;
    let body = head.toUpperCase();
    if (body.endsWith('?')) {
      isQuery = true;
      body = body.slice(0, -1);
    }

    const colon = body.indexOf(':');
    if (colon < 0) {
      return { subject: null, command: body, args, isQuery };
    }
    return {
      subject: body.slice(0, colon),
      command: body.slice(colon + 1),
      args,
      isQuery,
    };
  },

  /**
   * Parse a numeric argument.
   *
   * Accepts plain and exponent notation ("1e9", "-5.67E-3"). Trailing
   * text after the number is not allowed.
   */
  parseNumber(text: string | undefined): Result<number, string> {
    if (text === undefined) {
      return Err('missing argument');
    }
    const trimmed = text.trim();
    if (trimmed === '') {
      return Err('empty argument');
    }

    const value = Number(trimmed);
    if (Number.isNaN(value)) {
      return Err(`non-numeric argument: "${trimmed}"`);
    }
    if (!Number.isFinite(value)) {
      return Err(`argument out of range: "${trimmed}"`);
    }
    return Ok(value);
  },

  /**
   * Parse an argument using an enum mapping. Matching is case-insensitive.
   */
  parseEnum<T>(text: string | undefined, map: Record<string, T>): Result<T, string> {
    if (text === undefined) {
      return Err('missing argument');
    }
    const key = text.trim().toUpperCase();
    if (Object.prototype.hasOwnProperty.call(map, key)) {
      return Ok(map[key]);
    }
    const validKeys = Object.keys(map).join(', ');
    return Err(`unknown value "${key}", expected one of: ${validKeys}`);
  },

  /** Query replies for lists are comma separated with no spaces. */
  formatList(values: readonly number[]): string {
    return values.map(v => String(v)).join(',');
  },

  formatBool(value: boolean): string {
    return value ? '1' : '0';
  },
};
