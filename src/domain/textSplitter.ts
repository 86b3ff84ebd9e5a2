export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

/**
 * Splits lesson text into chunks of at most chunkSize characters, preferring
 * paragraph breaks, then line breaks, then spaces. Consecutive chunks share up
 * to chunkOverlap characters of trailing context.
 */
export class TextSplitter {
  private chunkSize: number;
  private chunkOverlap: number;
  private separators: string[];

  constructor(options: TextSplitterOptions) {
    if (options.chunkSize <= 0) {
      throw new Error("chunkSize must be positive");
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error("chunkOverlap must be between 0 and chunkSize");
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): string[] {
    return this.splitRecursive(text, this.separators);
  }

  private splitRecursive(text: string, separators: string[]): string[] {
    const index = separators.findIndex((sep) => sep === "" || text.includes(sep));
    const separator = index === -1 ? "" : separators[index];
    const remaining = index === -1 ? [] : separators.slice(index + 1);

    const pieces = separator === "" ? Array.from(text) : text.split(separator);
    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending, separator));
        pending = [];
      }

      if (remaining.length === 0) {
        chunks.push(piece);
      } else {
        chunks.push(...this.splitRecursive(piece, remaining));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending, separator));
    }
    return chunks;
  }

  private merge(pieces: string[], separator: string): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    const joinedLength = (extra: number) =>
      total + extra + (current.length > 0 ? separator.length : 0);

    for (const piece of pieces) {
      if (joinedLength(piece.length) > this.chunkSize && current.length > 0) {
        pushChunk(chunks, current.join(separator));

        // Drop from the front until what is left fits as overlap
        while (
          total > this.chunkOverlap ||
          (joinedLength(piece.length) > this.chunkSize && total > 0)
        ) {
          const removed = current.shift() ?? "";
          total -= removed.length + (current.length > 0 ? separator.length : 0);
        }
      }

      current.push(piece);
      total += piece.length + (current.length > 1 ? separator.length : 0);
    }

    pushChunk(chunks, current.join(separator));
    return chunks;
  }
}

function pushChunk(chunks: string[], text: string): void {
  const trimmed = text.trim();
  if (trimmed) {
    chunks.push(trimmed);
  }
}
