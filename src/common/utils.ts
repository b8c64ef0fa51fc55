/**
 * Common Utility Functions
 *
 * Provides small helpers shared by configuration, logging and the user domain.
 */

import * as crypto from 'crypto';

/** Maximum number of stack frames inspected by resolveCallerModule */
export const CALLER_FRAME_LIMIT = 10;

/** Receivers that never identify an application component */
const ANONYMOUS_RECEIVERS = new Set([
  'Object',
  'Function',
  'Promise',
  'Array',
  'Module',
  'Generator',
  'Timeout',
  'Immediate',
  'Layer',
  'Route',
  'EventEmitter',
]);

const FRAME_RECEIVER_PATTERN = /^at (?:async )?(?:new )?([A-Z][\w$]*)\./;

/**
 * Parses a boolean environment variable
 *
 * @param value - The string value to parse
 * @param defaultValue - Default value if parsing fails
 * @returns The parsed boolean value
 */
export function parseBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Rounds a millisecond duration to two decimals and clamps it at zero
 *
 * @param durationMs - Measured duration in milliseconds
 * @returns Non-negative duration with at most two decimals
 */
export function roundMs(durationMs: number): number {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return 0;
  }
  return Math.round(durationMs * 100) / 100;
}

/**
 * Extracts a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Generates a string of cryptographically random decimal digits
 *
 * @param length - Number of digits to generate
 * @returns Digit string of exactly `length` characters
 */
export function randomDigits(length: number): string {
  let digits = '';
  for (let i = 0; i < length; i++) {
    digits += crypto.randomInt(0, 10).toString();
  }
  return digits;
}

/**
 * Finds the class that issued the current call by walking the stack
 *
 * Only the first CALLER_FRAME_LIMIT frames are inspected. Frames whose
 * receiver is listed in `skip` (typically the logger itself and the logging
 * middlewares) are ignored.
 *
 * @param skip - Class names that must not be reported as the caller
 * @returns The first matching class name, or 'unknown'
 */
export function resolveCallerModule(skip: readonly string[] = []): string {
  const stack = new Error().stack;
  if (!stack) {
    return 'unknown';
  }

  const frames = stack.split('\n').slice(1, CALLER_FRAME_LIMIT + 1);

  for (const frame of frames) {
    const match = FRAME_RECEIVER_PATTERN.exec(frame.trim());
    if (!match) {
      continue;
    }

    const receiver = match[1];
    if (ANONYMOUS_RECEIVERS.has(receiver) || skip.includes(receiver)) {
      continue;
    }

    return receiver;
  }

  return 'unknown';
}

/**
 * Summary of a thrown value used by error logs and debug payloads
 */
export interface ErrorDescription {
  exception: string;
  message: string;
  file?: string;
  line?: number;
}

const STACK_LOCATION_PATTERN = /\(?([^()\s]+):(\d+):\d+\)?$/;

/**
 * Describes a thrown value: its class name, message and the source
 * location of the first stack frame, when one can be parsed
 *
 * @param error - Anything that was thrown
 */
export function describeError(error: unknown): ErrorDescription {
  if (!(error instanceof Error)) {
    return { exception: typeof error, message: String(error) };
  }

  const description: ErrorDescription = {
    exception: error.constructor.name,
    message: error.message,
  };

  const frame = (error.stack ?? '')
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.startsWith('at '));
  const location = frame ? STACK_LOCATION_PATTERN.exec(frame) : null;

  if (location) {
    description.file = location[1];
    description.line = parseInt(location[2], 10);
  }

  return description;
}
