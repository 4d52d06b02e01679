/**
 * continuum research: context bundles and improvement suggestions.
 */

import * as fs from 'node:fs/promises';

import { isSuggestionSource, type SuggestionSource } from '@continuum/core';
import { InvalidArgumentError, type Command } from 'commander';

import { formatOutput, parseOutputFormat, type OutputFormat } from '../output/index.js';
import { reportError, withContinuum } from '../session.js';
import { status } from '../ui/spinner.js';

function parseSource(value: string): SuggestionSource {
  if (!isSuggestionSource(value)) {
    throw new InvalidArgumentError('Expected one of: cursor, manual');
  }
  return value;
}

export function registerResearchCommand(program: Command): void {
  const research = program.command('research').description('Research feed for flagged kernels');

  research
    .command('context')
    .description('Export the improvement context bundle as JSON')
    .option('-o, --output <path>', 'Output file (default: <dataDir>/research-context.json)')
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(async (opts: { output?: string; db?: string; format: OutputFormat }) => {
      try {
        const exported = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
          continuum.research.exportContext(opts.output)
        );
        const result = {
          path: exported.path,
          kernels: exported.context.kernels.length,
          recentRuns: exported.context.recentRuns.length,
        };
        if (opts.format === 'table') {
          status.success(`Context written to ${exported.path}`);
        }
        process.stdout.write(formatOutput(result, opts.format));
      } catch (err) {
        reportError(err);
      }
    });

  research
    .command('suggest <text>')
    .description('Record an improvement suggestion')
    .option('--source <source>', 'Suggestion source: cursor, manual', parseSource, 'manual')
    .option('--context-file <path>', 'Context bundle the suggestion answers')
    .option('--db <path>', 'Database path')
    .option('-f, --format <format>', 'Output format: table, json', parseOutputFormat, 'table')
    .action(
      async (
        text: string,
        opts: { source: SuggestionSource; contextFile?: string; db?: string; format: OutputFormat }
      ) => {
        try {
          if (text.trim().length === 0) {
            throw new InvalidArgumentError('Suggestion text must not be empty');
          }
          const contextJson = opts.contextFile ? await fs.readFile(opts.contextFile, 'utf-8') : null;
          const suggestion = await withContinuum({ ...(opts.db ? { db: opts.db } : {}) }, (continuum) =>
            continuum.persistSuggestion({ source: opts.source, recommendationText: text, contextJson })
          );
          process.stdout.write(formatOutput(suggestion, opts.format));
        } catch (err) {
          reportError(err);
        }
      }
    );
}
