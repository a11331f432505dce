import type { Command } from 'commander';
import { loadConfig } from '../boundaries/config-loader';
import { PresetLoader } from '../config/preset-loader';
import { printPresetRow } from '../output/reporter';
import { exitWithError } from './run-context';

interface PresetsOptions {
  config?: string;
}

/*
 * Registers the 'presets' command: lists built-in presets and those declared in
 * the presets file named by the config.
 */
export function registerPresetsCommand(program: Command): void {
  program
    .command('presets')
    .description('List available chunking presets')
    .option('--config <path>', 'Path to a custom chunkline.ini config file')
    .action((opts: PresetsOptions) => {
      let loader: PresetLoader;
      let names: string[];
      try {
        const config = loadConfig(process.cwd(), opts.config);
        loader = new PresetLoader(config.presetsPath);
        names = loader.getAvailablePresets();
      } catch (e: unknown) {
        exitWithError(e, 'Loading presets');
      }

      const width = Math.max(...names.map((n) => n.length));
      console.log('Available presets:');
      for (const name of names) {
        const preset = loader.getPreset(name);
        printPresetRow(name, preset?.description ?? '', width);
      }
    });
}
