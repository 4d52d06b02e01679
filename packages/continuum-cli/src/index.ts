/**
 * continuum command line
 */

import { Command } from 'commander';

import { registerCompressCommand } from './commands/compress.js';
import { registerInitCommand } from './commands/init.js';
import { registerKernelsCommand } from './commands/kernels.js';
import { registerQueryCommand } from './commands/query.js';
import { registerResearchCommand } from './commands/research.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('continuum')
    .description('Semantic compression ring over a durable continuum store')
    .version(VERSION);

  registerInitCommand(program);
  registerCompressCommand(program);
  registerKernelsCommand(program);
  registerResearchCommand(program);
  registerQueryCommand(program);

  return program;
}

export { setContinuumFactory, resetContinuumFactory, withContinuum } from './session.js';
export type { ContinuumFactory, SessionOptions } from './session.js';
export { formatOutput, formatTable, formatJson, type OutputFormat } from './output/index.js';
