import type { Command } from 'commander';
import { getLanguageRegistry } from '../languages/registry';
import { printDetectedLanguage } from '../output/reporter';
import { exitWithError, readInputs } from './run-context';

interface DetectOptions {
  output?: string;
}

/*
 * Registers the 'detect' command: prints the detected language of each input.
 */
export function registerDetectCommand(program: Command): void {
  program
    .command('detect')
    .description('Detect the language of files (or standard input)')
    .argument('[paths...]', 'files, directories or globs (reads stdin when omitted)')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .action(async (paths: string[], opts: DetectOptions) => {
      let documents;
      try {
        documents = await readInputs(paths);
      } catch (e: unknown) {
        exitWithError(e, 'Reading input');
      }

      const registry = getLanguageRegistry();
      const detected = documents.map((doc) => {
        const profile = registry.detectProfile(doc.text);
        return { file: doc.name, language: profile.languageCode, name: profile.languageName };
      });

      if (opts.output?.toLowerCase() === 'json') {
        console.log(JSON.stringify(detected, null, 2));
        return;
      }
      for (const entry of detected) {
        printDetectedLanguage(entry.file, entry.language, entry.name);
      }
    });
}
