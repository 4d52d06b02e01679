/**
 * continuum query: dump the rows of one store table.
 */

import type { Continuum } from '@continuum/core';
import { InvalidArgumentError, type Command } from 'commander';

import { formatOutput, parseOutputFormat, type OutputFormat } from '../output/index.js';
import { parseCount, reportError, withContinuum } from '../session.js';

export const QUERY_TABLES = ['chunks', 'kernels', 'runs', 'suggestions', 'meta', 'counts'] as const;

export type QueryTable = (typeof QUERY_TABLES)[number];

function parseTable(value: string): QueryTable {
  const table = QUERY_TABLES.find((t) => t === value);
  if (!table) {
    throw new InvalidArgumentError(`Unknown table '${value}'. Use one of: ${QUERY_TABLES.join(', ')}`);
  }
  return table;
}

export async function queryTable(continuum: Continuum, table: QueryTable, limit: number): Promise<unknown> {
  const { store } = continuum;
  switch (table) {
    case 'chunks':
      return store.listChunks({ limit });
    case 'kernels':
      return store.listKernels({ limit, order: 'newest' });
    case 'runs':
      return store.listRuns({ limit });
    case 'suggestions':
      return store.listSuggestions({ limit });
    case 'meta':
      return store.listMeta();
    case 'counts':
      return store.countRows();
  }
}

export function registerQueryCommand(program: Command): void {
  program
    .command('query <table>')
    .description(`Show stored rows: ${QUERY_TABLES.join(', ')}`)
    .option('--limit <n>', 'Max rows', parseCount, 20)
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (table: string, opts: { limit: number; db?: string; format: OutputFormat }) => {
      try {
        const target = parseTable(table);
        const rows = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
          queryTable(continuum, target, opts.limit)
        );
        process.stdout.write(formatOutput(rows, opts.format));
      } catch (err) {
        reportError(err);
      }
    });
}
