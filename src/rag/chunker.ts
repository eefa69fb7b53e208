import { createHash } from "crypto";
import { ValidationError } from "../errors/index.js";
import { ChunkOptionsSchema, type ChunkOptions, type DocumentChunk } from "./types.js";

export interface ChunkDocumentOptions extends ChunkOptions {
  readonly documentId: string;
  readonly source: string;
}

/**
 * Stable document id from the upload name and content
 * @remarks Uploading the same text under the same name yields the same id
 * @example documentIdFor("notes.md", "hello") // "notes.md-2cf24dba5fb0"
 */
export function documentIdFor(source: string, text: string): string {
  const name = source.trim().replace(/[^\w.-]+/g, "_") || "document";
  const digest = createHash("sha256").update(text).digest("hex").slice(0, 12);
  return `${name}-${digest}`;
}

/** True when position splits a UTF-16 surrogate pair */
function splitsSurrogatePair(text: string, position: number): boolean {
  if (position <= 0 || position >= text.length) return false;
  const before = text.charCodeAt(position - 1);
  const after = text.charCodeAt(position);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Split text into overlapping fixed-size windows
 *
 * Boundaries are length-based (UTF-16 units); sentences and words may be cut.
 * A boundary that would fall inside a surrogate pair moves one unit back, so
 * no chunk holds half of an astral character (unless chunkSize is 1).
 * The window advances by chunkSize - chunkOverlap and stops after the chunk
 * that reaches the end of the text, so a text of length L > overlap without
 * astral characters gives ceil((L - overlap) / (size - overlap)) chunks.
 *
 * @returns A lazy iterable; each iteration starts from the beginning
 * @throws ValidationError if chunkOverlap >= chunkSize or either is not an integer
 */
export function chunkDocument(
  text: string,
  options: ChunkDocumentOptions
): Iterable<DocumentChunk> {
  const parsed = ChunkOptionsSchema.safeParse({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid chunk options: ${issue?.message ?? "unknown"}`,
      issue?.path.join(".") || "chunkOptions",
      "❌ Invalid chunking configuration."
    );
  }

  const { chunkSize, chunkOverlap } = parsed.data;
  const { documentId, source } = options;

  return {
    *[Symbol.iterator](): Iterator<DocumentChunk> {
      for (let start = 0, index = 0; start < text.length; index++) {
        let end = Math.min(start + chunkSize, text.length);
        if (splitsSurrogatePair(text, end) && end - 1 > start) end--;

        yield {
          id: `${documentId}:${start}`,
          documentId,
          source,
          text: text.slice(start, end),
          start,
          end,
          index,
        };
        if (end === text.length) return;

        // Never past this chunk's end, always past its start
        let next = Math.max(end - chunkOverlap, start + 1);
        if (splitsSurrogatePair(text, next) && next - 1 > start) next--;
        start = next;
      }
    },
  };
}

/**
 * Rebuild the original text from consecutive chunks by dropping overlaps
 */
export function reconstructText(chunks: Iterable<DocumentChunk>): string {
  let text = "";
  for (const chunk of chunks) {
    const overlap = Math.max(0, text.length - chunk.start);
    text += chunk.text.slice(overlap);
  }
  return text;
}
