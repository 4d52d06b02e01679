/**
 * Continuum session for CLI commands
 *
 * Each command opens a Continuum for the configured project, runs, and
 * closes it. Tests swap the factory to point commands at a scratch
 * directory.
 */

import { ConfigLoader, ConfigValidationException, Continuum } from '@continuum/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

export interface SessionOptions {
  /** Database path overriding the configured one */
  db?: string;
}

export type ContinuumFactory = (options: SessionOptions) => Promise<Continuum>;

const defaultFactory: ContinuumFactory = async (options) => {
  const config = await new ConfigLoader().getConfig();
  return Continuum.create({ config: options.db ? { ...config, dbPath: options.db } : config });
};

let factory: ContinuumFactory = defaultFactory;

export function setContinuumFactory(next: ContinuumFactory): void {
  factory = next;
}

export function resetContinuumFactory(): void {
  factory = defaultFactory;
}

/**
 * Open a Continuum, run `fn` against it and close it again
 */
export async function withContinuum<T>(options: SessionOptions, fn: (continuum: Continuum) => Promise<T>): Promise<T> {
  const continuum = await factory(options);
  try {
    return await fn(continuum);
  } finally {
    await continuum.close();
  }
}

/**
 * Print a command failure to stderr and mark the process as failed
 */
export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(chalk.red(`Error: ${message}\n`));
  if (err instanceof ConfigValidationException) {
    process.stderr.write(`${err.formatErrors()}\n`);
  }
  process.exitCode = 1;
}

/**
 * Commander argument parser for counts
 */
export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return count;
}
