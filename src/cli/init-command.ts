import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG_FILENAME, DEFAULT_PRESETS_FILENAME } from '../config/constants';

// Template for chunkline.ini configuration file
const CONFIG_TEMPLATE = `# chunkline configuration
# Global settings
Concurrency=4
PresetsPath=${DEFAULT_PRESETS_FILENAME}

# Defaults for every chunking run; CLI flags and presets override them
[chunking]
Strategy=auto
TargetChunkSize=512
MinChunkSize=100
MaxChunkSize=1024
OverlapSize=50
EnableChunkBalancing=false
`;

// Template for the YAML presets file
const PRESETS_TEMPLATE = `# Named chunking presets, used with --preset <name>
presets:
  notes:
    description: Short paragraph chunks for note collections
    options:
      strategy: paragraph
      targetChunkSize: 256
      minChunkSize: 50
      maxChunkSize: 512
      overlapSize: 0
`;

// Template for .env.chunkline environment file
const ENV_TEMPLATE = `# chunkline environment configuration
# Only needed for the semantic strategy.
#
# SETUP INSTRUCTIONS:
# 1. Rename this file to .env, OR
# 2. Copy its contents into your existing .env file

# OPENAI_API_KEY=your-api-key-here
# OPENAI_EMBEDDING_MODEL=text-embedding-3-small
# OPENAI_BASE_URL=https://api.openai.com/v1
`;

export const ENV_FILENAME = '.env.chunkline';

interface InitOptions {
    force?: boolean;
}

/**
 * Registers the 'init' command with Commander.
 * Writes a starter chunkline.ini, presets file and env file to the current directory.
 */
export function registerInitCommand(program: Command): void {
    program
        .command('init')
        .description('Initialize chunkline configuration files')
        .option('--force', 'Overwrite existing configuration files')
        .action((opts: InitOptions) => {
            const cwd = process.cwd();
            const targets: Array<[string, string]> = [
                [DEFAULT_CONFIG_FILENAME, CONFIG_TEMPLATE],
                [DEFAULT_PRESETS_FILENAME, PRESETS_TEMPLATE],
                [ENV_FILENAME, ENV_TEMPLATE],
            ];

            // Check for existing files without --force
            if (!opts.force) {
                const existingFiles = targets
                    .map(([name]) => name)
                    .filter((name) => existsSync(path.join(cwd, name)));

                if (existingFiles.length > 0) {
                    console.error(`Error: The following files already exist:`);
                    for (const file of existingFiles) {
                        console.error(`  • ${file}`);
                    }
                    console.error(`\nUse --force to overwrite existing files.`);
                    process.exit(1);
                }
            }

            // Write configuration files
            try {
                for (const [name, content] of targets) {
                    writeFileSync(path.join(cwd, name), content, 'utf-8');
                }
            } catch (e: unknown) {
                const err = e instanceof Error ? e : new Error(String(e));
                console.error(`Error: Failed to write configuration files: ${err.message}`);
                process.exit(1);
            }

            // Print success message with next steps
            console.log(`✓ Configuration files created successfully!\n`);
            console.log(`Next steps:`);
            console.log(`  1. Adjust the [chunking] defaults in ${DEFAULT_CONFIG_FILENAME}`);
            console.log(`  2. Add your own presets to ${DEFAULT_PRESETS_FILENAME}`);
            console.log(`  3. For semantic chunking, rename ${ENV_FILENAME} to .env and set OPENAI_API_KEY`);
            console.log(`  4. Run 'chunkline chunk <files>' to chunk your content`);
        });
}
