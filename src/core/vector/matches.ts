import type { ChunkMetadata, VectorMatch } from "../interfaces/IVectorStore.js";
import type { GraphRecord } from "../interfaces/IGraphStore.js";
import { readNumber, readString } from "../graph/records.js";

export function toVectorMatch(chunkId: string, metadata: ChunkMetadata, score: number): VectorMatch {
  return {
    chunkId,
    filePath: metadata.filePath,
    lineRange: `${metadata.startLine}-${metadata.endLine}`,
    contentPreview: metadata.contentPreview,
    score,
    metadata,
  };
}

/**
 * Reads a `:CodeChunk` row (`chunkId, repoId, filePath, ..., score`). Rows
 * missing an identifying column are dropped.
 */
export function vectorMatchFromRecord(record: GraphRecord): VectorMatch | null {
  const chunkId = readString(record, "chunkId");
  const repoId = readString(record, "repoId");
  const filePath = readString(record, "filePath");
  const startLine = readNumber(record, "startLine");
  const endLine = readNumber(record, "endLine");
  const score = readNumber(record, "score");
  if (chunkId === null || repoId === null || filePath === null || startLine === null || endLine === null || score === null) {
    return null;
  }

  return toVectorMatch(
    chunkId,
    {
      repoId,
      filePath,
      fileName: readString(record, "fileName") ?? filePath,
      startLine,
      endLine,
      language: readString(record, "language") ?? "python",
      contentPreview: readString(record, "contentPreview") ?? "",
      chunkSizeLines: readNumber(record, "chunkSizeLines") ?? endLine - startLine + 1,
    },
    score
  );
}
