/**
 * Code Chunker
 *
 * Splits a file into overlapping windows of lines. Windows advance by
 * `chunkSize - overlap` lines; the last window ends at the last line.
 *
 * @module
 */

import * as path from "node:path";
import type { ChunkMetadata, VectorMatch } from "../interfaces/IVectorStore.js";
import type { ChunkingConfig } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("code-chunker");

export const PREVIEW_LENGTH = 500;

export interface CodeChunk {
  /** `<repoId>#<filePath>#<n>`, n from 1 */
  chunkId: string;
  repoId: string;
  filePath: string;
  fileName: string;
  /** 1-indexed, inclusive */
  startLine: number;
  /** 1-indexed, inclusive */
  endLine: number;
  content: string;
  language: string;
}

/**
 * A chunk as shown to a reader: where it lives and how relevant it scored.
 */
export interface Citation {
  type: "code_chunk";
  file: string;
  fileName: string;
  /** "start-end" */
  lines: string;
  language: string;
  preview: string;
  relevance: number;
  chunkId: string;
}

/**
 * First `maxChars` characters of the content, with "..." appended when cut.
 */
export function previewOf(content: string, maxChars = PREVIEW_LENGTH): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

export function chunkMetadata(chunk: CodeChunk): ChunkMetadata {
  return {
    repoId: chunk.repoId,
    filePath: chunk.filePath,
    fileName: chunk.fileName,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    language: chunk.language,
    contentPreview: previewOf(chunk.content),
    chunkSizeLines: chunk.endLine - chunk.startLine + 1,
  };
}

export function toCitation(match: VectorMatch): Citation {
  return {
    type: "code_chunk",
    file: match.filePath,
    fileName: match.metadata.fileName,
    lines: match.lineRange,
    language: match.metadata.language,
    preview: match.contentPreview,
    relevance: match.score,
    chunkId: match.chunkId,
  };
}

export class CodeChunker {
  private readonly chunkSize: number;
  private readonly overlap: number;

  constructor(config: ChunkingConfig = { chunkSize: 650, overlap: 50 }) {
    this.chunkSize = config.chunkSize;
    this.overlap = config.overlap;
  }

  chunkFile(filePath: string, content: string, repoId: string, language = "python"): CodeChunk[] {
    const lines = content.split("\n");
    const step = this.chunkSize - this.overlap;
    const fileName = path.posix.basename(filePath);
    const chunks: CodeChunk[] = [];

    for (let start = 0; start < lines.length; start += step) {
      const end = Math.min(start + this.chunkSize, lines.length);
      chunks.push({
        chunkId: `${repoId}#${filePath}#${chunks.length + 1}`,
        repoId,
        filePath,
        fileName,
        startLine: start + 1,
        endLine: end,
        content: lines.slice(start, end).join("\n"),
        language,
      });
      if (end >= lines.length) break;
    }

    logger.debug({ file: filePath, lines: lines.length, chunks: chunks.length }, "File chunked");
    return chunks;
  }

  chunkFiles(files: ReadonlyArray<{ filePath: string; content: string }>, repoId: string): CodeChunk[] {
    const chunks = files.flatMap((file) => this.chunkFile(file.filePath, file.content, repoId));
    logger.info({ files: files.length, chunks: chunks.length }, "Files chunked");
    return chunks;
  }
}
