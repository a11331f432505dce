import type { ChunkOptions } from "../chunking/types";
import type { ChunkingEngine } from "../engine/chunking-engine";
import type { Config } from "../schemas/config-schemas";

export enum OutputFormat {
  Line = "line",
  Json = "json",
}

/*
 * Everything a command needs after flags, config file, preset and environment
 * have been merged.
 */
export interface RunContext {
  engine: ChunkingEngine;
  options: ChunkOptions;
  config: Config;
  concurrency: number;
  outputFormat: OutputFormat;
  verbose: boolean;
}

export interface InputDocument {
  name: string;
  text: string;
}
