/**
 * Port selection parsing and normalization
 */

import { InvalidPortRangeError } from './errors.js';
import { COMMON_PORTS } from './services.js';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

const RANGE_PATTERN = /^(\d+)\s*-\s*(\d+)$/;
const PORT_PATTERN = /^\d+$/;

/**
 * Check that a value is a usable TCP port
 */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 * Validate, de-duplicate and sort a list of ports
 * @throws InvalidPortRangeError on an empty list or any port outside 1-65535
 */
export function normalizePorts(ports: Iterable<number>): number[] {
  const unique = new Set<number>();

  for (const port of ports) {
    if (!isValidPort(port)) {
      throw new InvalidPortRangeError(`Port ${port} is outside ${MIN_PORT}-${MAX_PORT}`);
    }
    unique.add(port);
  }

  if (unique.size === 0) {
    throw new InvalidPortRangeError('No ports selected');
  }

  return Array.from(unique).sort((a, b) => a - b);
}

/**
 * Expand an inclusive range into its ports
 */
export function expandRange(start: number, end: number): number[] {
  if (!isValidPort(start) || !isValidPort(end)) {
    throw new InvalidPortRangeError(
      `Range ${start}-${end} must lie within ${MIN_PORT}-${MAX_PORT}`
    );
  }
  if (start > end) {
    throw new InvalidPortRangeError(`Range start ${start} is greater than end ${end}`);
  }

  const ports: number[] = [];
  for (let port = start; port <= end; port++) {
    ports.push(port);
  }
  return ports;
}

/**
 * Parse a port selection.
 *
 * Accepts `common`, a single range (`1-1024`) or a comma list mixing ports and ranges
 * (`22,80,8000-8010`). The result is de-duplicated and ascending.
 */
export function parsePortSelection(input: string): number[] {
  const selection = input.trim().toLowerCase();

  if (selection === '') {
    throw new InvalidPortRangeError('No ports selected');
  }
  if (selection === 'common') {
    return normalizePorts(COMMON_PORTS);
  }

  const ports: number[] = [];
  for (const rawToken of selection.split(',')) {
    const token = rawToken.trim();
    if (token === '') continue;

    const range = RANGE_PATTERN.exec(token);
    if (range) {
      ports.push(...expandRange(Number(range[1]), Number(range[2])));
    } else if (PORT_PATTERN.test(token)) {
      ports.push(Number(token));
    } else {
      throw new InvalidPortRangeError(`Invalid port token: "${token}"`);
    }
  }

  return normalizePorts(ports);
}
