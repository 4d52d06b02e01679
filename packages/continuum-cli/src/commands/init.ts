/**
 * continuum init: create the data directory, database and config file.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { SCHEMA_VERSION_KEY } from '@continuum/core';
import type { Command } from 'commander';

import { formatOutput, parseOutputFormat, type OutputFormat } from '../output/index.js';
import { reportError, withContinuum } from '../session.js';
import { status } from '../ui/spinner.js';

const CONFIG_FILE = 'config.json';

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize the continuum store and write a default config')
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (opts: { db?: string; format: OutputFormat }) => {
      try {
        const result = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, async (continuum) => {
          const { config } = continuum;
          const configPath = path.join(config.dataDir, CONFIG_FILE);
          const created = !(await exists(configPath));
          if (created) {
            await fs.mkdir(config.dataDir, { recursive: true });
            await fs.writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');
          }
          return {
            dataDir: config.dataDir,
            dbPath: config.dbPath,
            configPath,
            configCreated: created,
            schemaVersion: await continuum.store.getMeta(SCHEMA_VERSION_KEY),
          };
        });
        if (opts.format === 'table') {
          status.success(`Continuum store ready at ${result.dbPath}`);
        }
        process.stdout.write(formatOutput(result, opts.format));
      } catch (err) {
        reportError(err);
      }
    });
}
