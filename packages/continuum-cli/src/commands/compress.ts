/**
 * continuum compress: run one media file through the ring.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { parseMediaKind, type MediaItem, type RingRunResult } from '@continuum/core';
import type { Command } from 'commander';

import { formatOutput, parseOutputFormat, type OutputFormat } from '../output/index.js';
import { reportError, withContinuum } from '../session.js';
import { withSpinner } from '../ui/spinner.js';

interface CompressOptions {
  type: string;
  db?: string;
  mediaId?: string;
  format: OutputFormat;
}

export function summarizeRun(result: RingRunResult): Record<string, unknown> {
  const root = result.chunks[0];
  return {
    runId: result.runId,
    rootChunkId: result.rootChunkId,
    mediaKind: root?.mediaKind ?? null,
    description: root?.descriptionText ?? null,
    stub: root?.descriptionStub ?? null,
    residualMetric: result.trace.residual.metric,
    chunkCount: result.chunks.length,
    kernelCount: result.kernels.length,
    droppedDelegations: result.trace.droppedDelegations.length,
    outputHash: result.outputHash,
  };
}

export function registerCompressCommand(program: Command): void {
  program
    .command('compress <media>')
    .description('Compress a media file and store its chunk tree')
    .requiredOption('-t, --type <kind>', 'Media kind: video, audio, library, image, data')
    .option('--db <path>', 'Database path')
    .option('--media-id <id>', 'Media identifier (default: file:<absolute path>)')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (media: string, opts: CompressOptions) => {
      try {
        const kind = parseMediaKind(opts.type);
        const absolute = path.resolve(media);
        const item: MediaItem = {
          mediaId: opts.mediaId ?? `file:${absolute}`,
          name: path.basename(absolute),
          bytes: await fs.readFile(absolute),
        };

        const result = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
          withSpinner(`Compressing ${item.name} as ${kind}...`, () => continuum.runRing(item, kind), {
            successText: (run) => `Stored ${run.chunks.length} chunks, ${run.kernels.length} unique kernels`,
            enabled: opts.format === 'table' ? undefined : false,
          })
        );
        process.stdout.write(formatOutput(summarizeRun(result), opts.format));
      } catch (err) {
        reportError(err);
      }
    });
}
