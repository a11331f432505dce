import { readFileSync, existsSync } from 'fs';
import * as YAML from 'yaml';
import { z } from 'zod';
import { PRESET_FILE_SCHEMA } from '../schemas/chunk-options-schemas';
import { formatZodIssues } from '../boundaries/options-parser';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { BUILT_IN_PRESETS, type ChunkPreset } from './presets';

/*
 * Resolves preset names against the built-in presets and, when configured, a
 * YAML presets file. File presets shadow built-ins of the same name.
 */
export class PresetLoader {
    private filePresets: Record<string, ChunkPreset> | null = null;
    private readonly presetsPath: string | undefined;

    constructor(presetsPath?: string) {
        this.presetsPath = presetsPath;
    }

    /**
     * Loads and validates the presets file once.
     */
    loadPresets(): void {
        if (this.filePresets) return;
        if (!this.presetsPath) {
            this.filePresets = {};
            return;
        }
        if (!existsSync(this.presetsPath)) {
            throw new ConfigError(`Presets file not found: ${this.presetsPath}`);
        }

        let raw: unknown;
        try {
            raw = YAML.parse(readFileSync(this.presetsPath, 'utf-8')) ?? { presets: {} };
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Reading presets file');
            throw new ConfigError(`Failed to parse presets file: ${err.message}`);
        }

        try {
            const parsed = PRESET_FILE_SCHEMA.parse(raw);
            const presets: Record<string, ChunkPreset> = {};
            for (const [name, entry] of Object.entries(parsed.presets)) {
                presets[name] = {
                    description: entry.description ?? '',
                    options: entry.options,
                };
            }
            this.filePresets = presets;
        } catch (e: unknown) {
            if (e instanceof z.ZodError) {
                throw new ValidationError(`Invalid presets file: ${formatZodIssues(e)}`);
            }
            throw e;
        }
    }

    getPreset(name: string): ChunkPreset | null {
        this.loadPresets();
        return this.filePresets?.[name] ?? BUILT_IN_PRESETS[name] ?? null;
    }

    /**
     * Returns every preset name, built-in ones first.
     */
    getAvailablePresets(): string[] {
        this.loadPresets();
        const names = new Set([...Object.keys(BUILT_IN_PRESETS), ...Object.keys(this.filePresets ?? {})]);
        return Array.from(names);
    }
}
