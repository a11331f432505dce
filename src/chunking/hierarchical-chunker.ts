import type { LanguageProfile } from "../languages/profile";
import type { SectionHeader } from "../languages/types";
import { throwIfCancelled } from "../errors/index";
import { BaseChunker } from "./chunker";
import { draftId } from "./finalize";
import { chunkSpanBySentences } from "./sentence-chunker";
import { ChunkingStrategy, type ChunkContext, type ChunkDraft, type ChunkOptions } from "./types";
import { isBlank } from "./utils";

/*
 * One section of the document. Nodes live in an arena in document order and
 * refer to each other by index; node 0 is the root holding the preamble.
 */
export interface SectionNode {
  index: number;
  parent: number | null;
  children: number[];
  level: number;
  title: string;
  path: string;
  start: number;
  end: number;
}

export function buildSectionTree(text: string, headers: readonly SectionHeader[]): SectionNode[] {
  const nodes: SectionNode[] = [
    {
      index: 0,
      parent: null,
      children: [],
      level: 0,
      title: "",
      path: "",
      start: 0,
      end: headers[0]?.start ?? text.length,
    },
  ];
  const ancestors: number[] = [0];

  headers.forEach((header, i) => {
    while (ancestors.length > 1) {
      const top = nodes[ancestors[ancestors.length - 1] ?? 0];
      if (!top || top.level < header.level) break;
      ancestors.pop();
    }
    const parentIndex = ancestors[ancestors.length - 1] ?? 0;
    const parent = nodes[parentIndex];
    const node: SectionNode = {
      index: nodes.length,
      parent: parentIndex,
      children: [],
      level: header.level,
      title: header.headerText,
      path: parent && parent.path ? `${parent.path}/${header.headerText}` : header.headerText,
      start: header.start,
      end: headers[i + 1]?.start ?? text.length,
    };
    nodes.push(node);
    parent?.children.push(node.index);
    ancestors.push(node.index);
  });

  return nodes;
}

/*
 * Follows the document's heading structure. Each section becomes at least one
 * chunk carrying its heading path, depth and the id of its parent section's
 * first chunk.
 */
export class HierarchicalChunker extends BaseChunker {
  readonly strategy = ChunkingStrategy.Hierarchical;

  protected async *generate({ text, options, profile, signal }: ChunkContext): AsyncGenerator<ChunkDraft> {
    const nodes = buildSectionTree(text, profile.findSectionHeaders(text));
    throwIfCancelled(signal);

    const firstIds = new Map<number, string>();
    const splitOptions: Readonly<ChunkOptions> = { ...options, preserveSectionHeaders: false };

    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      if (!node || isBlank(text.slice(node.start, node.end))) continue;

      let end = node.end;
      while (isLeaf(node) && profile.estimateSpanTokens(text, node.start, end) < options.minChunkSize) {
        const next = nodes[i + 1];
        if (!next || !isLeaf(next) || next.parent !== node.parent || next.level !== node.level) break;
        if (profile.estimateSpanTokens(text, node.start, next.end) > options.maxChunkSize) break;
        end = next.end;
        i++;
      }

      const parentId = this.parentIdOf(node, nodes, firstIds);
      const tag = (draft: ChunkDraft): ChunkDraft => ({
        ...draft,
        sectionPath: node.path,
        hierarchyLevel: node.level,
        ...(parentId !== undefined ? { parentId } : {}),
      });

      if (profile.estimateSpanTokens(text, node.start, end) > options.maxChunkSize) {
        throwIfCancelled(signal);
        for (const fragment of this.split(text, splitOptions, profile, node.start, end, signal)) {
          const draft = tag(fragment);
          if (!firstIds.has(node.index)) firstIds.set(node.index, draftId(text, draft));
          yield draft;
        }
        continue;
      }

      const draft = tag({ start: node.start, end, strategy: this.strategy });
      firstIds.set(node.index, draftId(text, draft));
      yield draft;
    }
  }

  private split(
    text: string,
    options: Readonly<ChunkOptions>,
    profile: LanguageProfile,
    start: number,
    end: number,
    signal?: AbortSignal
  ): Generator<ChunkDraft> {
    return chunkSpanBySentences(text, options, profile, this.strategy, start, end, signal);
  }

  // Level-1 sections and the preamble have no parent chunk
  private parentIdOf(node: SectionNode, nodes: SectionNode[], firstIds: Map<number, string>): string | undefined {
    if (node.parent === null) return undefined;
    const parent = nodes[node.parent];
    if (!parent || parent.parent === null) return undefined;
    return firstIds.get(parent.index);
  }
}

function isLeaf(node: SectionNode): boolean {
  return node.children.length === 0 && node.parent !== null;
}
