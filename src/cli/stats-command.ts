import type { Command } from 'commander';
import { JsonFormatter } from '../output/json-formatter';
import { printFileHeader, printStats } from '../output/reporter';
import { addChunkingOptions, buildRunContext, exitWithError, readInputs } from './run-context';
import { chunkDocuments } from './chunk-runner';
import { OutputFormat } from './types';

/*
 * Registers the 'stats' command: chunks every input and prints size statistics.
 */
export function registerStatsCommand(program: Command): void {
  addChunkingOptions(
    program
      .command('stats')
      .description('Show chunk size statistics for files (or standard input)')
      .argument('[paths...]', 'files, directories or globs to analyse (reads stdin when omitted)')
  ).action(async (paths: string[], rawOptions: unknown) => {
    let context;
    try {
      context = buildRunContext(rawOptions);
    } catch (e: unknown) {
      exitWithError(e, 'Preparing chunking run');
    }

    let documents;
    try {
      documents = await readInputs(paths);
    } catch (e: unknown) {
      exitWithError(e, 'Reading input');
    }

    const outcomes = await chunkDocuments(documents, context);
    let failures = 0;
    const formatter = new JsonFormatter();

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        console.error(`Error: ${outcome.name}: ${outcome.error.message}`);
        formatter.addFailure();
        failures++;
        continue;
      }
      if (context.outputFormat === OutputFormat.Json) {
        // Statistics only; the chunks themselves are left out
        formatter.addFile(outcome.name, {
          language: outcome.language,
          strategy: outcome.strategy,
          chunks: [],
          stats: outcome.stats,
        });
      } else {
        printFileHeader(outcome.name);
        console.log(`  ${outcome.language}, ${outcome.strategy ?? 'empty'}`);
        printStats(outcome.stats);
        console.log('');
      }
    }

    if (context.outputFormat === OutputFormat.Json) {
      console.log(formatter.toJson());
    }
    if (failures > 0) process.exit(1);
  });
}
