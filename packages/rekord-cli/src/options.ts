/**
 * Command line options and their environment-variable defaults
 */

import { InvalidArgumentError } from 'commander';

export interface CliOptions {
  eval?: string;
  debug?: boolean;
  maxSteps?: number;
}

export function parseMaxSteps(value: string): number {
  const steps = Number(value);
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return steps;
}

/**
 * DEBUG=1 or DEBUG=true turns tracing on, matching --debug
 */
export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = (env.DEBUG ?? '').toUpperCase();
  return value === '1' || value === 'TRUE';
}

export function maxStepsFromEnv(env: NodeJS.ProcessEnv = process.env): number | undefined {
  const value = env.REKORD_MAX_STEPS;
  return value ? parseMaxSteps(value) : undefined;
}
