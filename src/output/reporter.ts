import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import type { Chunk, ChunkBalanceStats } from '../chunking/types';

const PREVIEW_WIDTH = 60;

export function printFileHeader(fileRelPath: string) {
  const cwd = process.cwd();
  const absPath = path.resolve(cwd, fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

// Single-line preview of chunk content, cut at `width` characters
export function previewContent(content: string, width: number = PREVIEW_WIDTH): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  return flat.length > width ? `${flat.slice(0, width - 1)}…` : flat;
}

export function formatLineRange(chunk: Chunk): string {
  const { startLine, endLine } = chunk.location;
  return startLine === endLine ? `${startLine}` : `${startLine}-${endLine}`;
}

export function printChunkRow(chunk: Chunk, opts: { locWidth?: number; tokenWidth?: number } = {}) {
  const locWidth = opts.locWidth ?? 9;
  const tokenWidth = opts.tokenWidth ?? 8;

  const indexCell = chalk.dim(`#${chunk.index + 1}`.padStart(5, ' '));
  const locCell = formatLineRange(chunk).padEnd(locWidth, ' ');
  const tokens = chalk.cyan(`${chunk.metadata.estimatedTokenCount}t`);
  const pad = Math.max(0, tokenWidth - stripAnsi(tokens).length);
  const termCols = process.stdout.columns || 100;
  const prefix = `${indexCell} ${locCell} ${tokens}${' '.repeat(pad)}  `;
  const previewWidth = Math.max(20, Math.min(PREVIEW_WIDTH, termCols - stripAnsi(prefix).length - 2));

  console.log(`${prefix}${previewContent(chunk.content, previewWidth)}`);
  if (chunk.location.sectionPath) {
    console.log(`${' '.repeat(stripAnsi(prefix).length)}${chalk.dim(chunk.location.sectionPath)}`);
  }
}

export function printStats(stats: ChunkBalanceStats) {
  const mark = stats.isBalanced ? chalk.green('✓ balanced') : chalk.yellow('✖ unbalanced');
  console.log(`  ${mark}`);
  console.log(`    chunks:    ${stats.chunkCount}`);
  console.log(`    tokens:    min ${stats.minTokenCount}, max ${stats.maxTokenCount}, avg ${stats.averageTokenCount.toFixed(1)}, sd ${stats.standardDeviation.toFixed(1)}`);
  console.log(`    ratio:     ${stats.varianceRatio.toFixed(2)}`);
  const under = stats.undersizedChunkCount > 0 ? chalk.yellow(String(stats.undersizedChunkCount)) : '0';
  const over = stats.oversizedChunkCount > 0 ? chalk.red(String(stats.oversizedChunkCount)) : '0';
  console.log(`    undersized: ${under}, oversized: ${over}`);
}

export function printDetectedLanguage(fileRelPath: string, code: string, name: string) {
  console.log(`${fileRelPath}  ${chalk.cyan(code)} ${chalk.dim(`(${name})`)}`);
}

export function printPresetRow(name: string, description: string, nameWidth: number) {
  console.log(`  ${chalk.cyan(name.padEnd(nameWidth, ' '))}  ${description}`);
}

export function printGlobalSummary(files: number, chunks: number, failures: number = 0) {
  const okMark = failures === 0 ? chalk.green('✓') : chalk.red('✖');
  const chunkTxt = chunks === 1 ? '1 chunk' : `${chunks} chunks`;
  const fileTxt = files === 1 ? '1 file' : `${files} files`;

  // "X chunks from Y files."
  console.log(`${okMark} ${chunkTxt} from ${fileTxt}.`);

  if (failures > 0) {
    const failTxt = failures === 1 ? '1 file failed' : `${failures} files failed`;
    console.log(chalk.red(`✖ ${failTxt}`));
  }
}
