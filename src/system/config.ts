/*
 * Process-wide settings, read once from the environment and adjustable at run
 * time.
 */

import {checkInt} from '../sudoku/ints';

/** How much the default event sink writes to the console. */
export type LogLevel = 'all' | 'errors' | 'none';

let logLevel: LogLevel = 'errors';
{
  const stored = process.env['SUDOKU_LOG_LEVEL'];
  switch (stored) {
    case 'all':
    case 'errors':
    case 'none':
      logLevel = stored;
      break;
  }
}

export function getLogLevel(): LogLevel {
  return logLevel;
}

export function setLogLevel(level: LogLevel) {
  logLevel = level;
}

let maxSteps = Infinity;
{
  const stored = Number(process.env['SUDOKU_MAX_STEPS']);
  if (Number.isInteger(stored) && stored > 0) {
    maxSteps = stored;
  }
}

/**
 * Returns the most search nodes a solve may visit by default; Infinity means
 * no limit.
 */
export function getMaxSteps(): number {
  return maxSteps;
}

/**
 * Sets the default search budget.
 *
 * @throws Error if `steps` is neither a positive integer nor Infinity.
 */
export function setMaxSteps(steps: number) {
  if (steps !== Infinity && checkInt(steps) < 1) {
    throw new Error(`Search budget must be positive, got ${steps}`);
  }
  maxSteps = steps;
}
