import type { Command } from 'commander';
import { JsonFormatter } from '../output/json-formatter';
import { printChunkRow, printFileHeader, printGlobalSummary } from '../output/reporter';
import { addChunkingOptions, buildRunContext, exitWithError, readInputs } from './run-context';
import { chunkDocuments } from './chunk-runner';
import { OutputFormat } from './types';

/*
 * Registers the 'chunk' command: prints the chunks of every input document.
 */
export function registerChunkCommand(program: Command): void {
  addChunkingOptions(
    program
      .command('chunk')
      .description('Split files (or standard input) into chunks')
      .argument('[paths...]', 'files, directories or globs to chunk (reads stdin when omitted)')
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
    let totalChunks = 0;

    if (context.outputFormat === OutputFormat.Json) {
      const formatter = new JsonFormatter();
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          console.error(`Error: ${outcome.name}: ${outcome.error.message}`);
          formatter.addFailure();
          failures++;
          continue;
        }
        formatter.addFile(outcome.name, {
          language: outcome.language,
          strategy: outcome.strategy,
          chunks: outcome.chunks,
        });
      }
      console.log(formatter.toJson());
    } else {
      for (const outcome of outcomes) {
        printFileHeader(outcome.name);
        if (!outcome.ok) {
          console.error(`  Error: ${outcome.error.message}`);
          failures++;
          continue;
        }
        for (const chunk of outcome.chunks) printChunkRow(chunk);
        totalChunks += outcome.chunks.length;
        console.log('');
      }
      printGlobalSummary(outcomes.length - failures, totalChunks, failures);
    }

    if (failures > 0) process.exit(1);
  });
}
