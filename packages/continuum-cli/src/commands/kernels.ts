/**
 * continuum kernels: unique-kernel re-attempt passes and listings.
 */

import { isKernelStatus, type KernelStatus, type UniqueKernel } from '@continuum/core';
import { InvalidArgumentError, type Command } from 'commander';

import { formatOutput, parseOutputFormat, type OutputFormat } from '../output/index.js';
import { parseCount, reportError, withContinuum } from '../session.js';
import { withSpinner } from '../ui/spinner.js';

function parseKernelStatus(value: string): KernelStatus {
  if (!isKernelStatus(value)) {
    throw new InvalidArgumentError('Expected one of: pending, compressed, flagged_research');
  }
  return value;
}

function kernelRow(kernel: UniqueKernel): Record<string, unknown> {
  return {
    id: kernel.id,
    chunkId: kernel.chunkId,
    compressor: kernel.sourceCompressor,
    status: kernel.status,
    attempts: kernel.attemptCount,
    residual: kernel.residualMetric,
    mergedInto: kernel.mergedInto,
    updatedAt: kernel.updatedAt,
  };
}

export function registerKernelsCommand(program: Command): void {
  const kernels = program.command('kernels').description('Unique kernels that resisted compression');

  kernels
    .command('pass')
    .description('Re-attempt the oldest pending kernels once each')
    .option('--limit <n>', 'Kernels per pass (default: configured batch size)', parseCount)
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (opts: { limit?: number; db?: string; format: OutputFormat }) => {
      try {
        const summary = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
          withSpinner(
            'Re-attempting pending kernels...',
            () => continuum.runUniqueKernelPass(opts.limit ? { kernelPass: { batchSize: opts.limit } } : undefined),
            {
              successText: (s) => `Examined ${s.examined} kernels`,
              enabled: opts.format === 'table' ? undefined : false,
            }
          )
        );
        process.stdout.write(formatOutput(summary, opts.format));
      } catch (err) {
        reportError(err);
      }
    });

  kernels
    .command('list')
    .description('List unique kernels, newest first')
    .option('--status <status>', 'Filter by status: pending, compressed, flagged_research', parseKernelStatus)
    .option('--limit <n>', 'Max results', parseCount, 50)
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (opts: { status?: KernelStatus; limit: number; db?: string; format: OutputFormat }) => {
      try {
        const rows = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
          continuum.store.listKernels({
            ...(opts.status ? { status: opts.status } : {}),
            limit: opts.limit,
            order: 'newest',
          })
        );
        process.stdout.write(formatOutput(opts.format === 'json' ? rows : rows.map(kernelRow), opts.format));
      } catch (err) {
        reportError(err);
      }
    });
}
