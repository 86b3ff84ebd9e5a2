import fs from "fs";
import path from "path";
import { z } from "zod";
import { LessonChunk } from "../domain/lesson";

const DEFAULT_INDEX_PATH = path.join(__dirname, "../../data/index/lessons.json");

const lessonChunkSchema = z.object({
  lessonId: z.number().int().positive(),
  lessonTitle: z.string(),
  text: z.string(),
  embedding: z.array(z.number()),
  section: z.string().optional(),
  fileName: z.string().optional(),
  chunkIndex: z.number().int().optional(),
});

const lessonIndexSchema = z.object({
  version: z.literal(1),
  createdAt: z.string(),
  chunks: z.array(lessonChunkSchema),
});

export interface ScoredChunk {
  chunk: LessonChunk;
  score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * LessonStore holds the embedded lesson corpus and answers similarity queries.
 *
 * Chunks live in memory and are persisted as a single JSON index file, which
 * is read once when the store is created. Ingestion replaces or extends the
 * corpus; the teaching workflow only reads it.
 */
export class LessonStore {
  private chunks: LessonChunk[] = [];
  private indexPath: string;

  constructor(indexPath: string = DEFAULT_INDEX_PATH) {
    this.indexPath = indexPath;
    this.load();
  }

  get size(): number {
    return this.chunks.length;
  }

  /**
   * Whether an index file exists on disk
   */
  exists(): boolean {
    return fs.existsSync(this.indexPath);
  }

  /**
   * Replace the whole corpus and persist it
   */
  replaceAll(chunks: LessonChunk[]): void {
    this.chunks = chunks.map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] }));
    this.persist();
  }

  hasLesson(lessonId: number): boolean {
    return this.chunks.some((chunk) => chunk.lessonId === lessonId);
  }

  getByLesson(lessonId: number): LessonChunk[] {
    return this.chunks.filter((chunk) => chunk.lessonId === lessonId);
  }

  lessonIds(): number[] {
    return Array.from(new Set(this.chunks.map((chunk) => chunk.lessonId))).sort((a, b) => a - b);
  }

  /**
   * Top-k chunks by cosine similarity to the query embedding, highest first.
   * Restricted to one lesson when lessonId is given; ties keep ingestion order.
   */
  similaritySearch(queryEmbedding: number[], k: number, lessonId?: number): ScoredChunk[] {
    if (k <= 0) {
      return [];
    }

    const candidates =
      lessonId === undefined ? this.chunks : this.chunks.filter((chunk) => chunk.lessonId === lessonId);

    return candidates
      .map((chunk, position) => ({ chunk, position, score: cosineSimilarity(queryEmbedding, chunk.embedding) }))
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk, score }));
  }

  private load(): void {
    if (!fs.existsSync(this.indexPath)) {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.indexPath, "utf-8"));
    } catch (error) {
      console.error(`[LessonStore] Could not read index at ${this.indexPath}:`, error);
      return;
    }

    const parsed = lessonIndexSchema.safeParse(data);
    if (!parsed.success) {
      console.error(`[LessonStore] Ignoring invalid index at ${this.indexPath}: ${parsed.error.message}`);
      return;
    }

    this.chunks = parsed.data.chunks;
    console.log(`[LessonStore] Loaded ${this.chunks.length} chunks from ${this.indexPath}`);
  }

  private persist(): void {
    fs.mkdirSync(path.dirname(this.indexPath), { recursive: true });

    const index: z.infer<typeof lessonIndexSchema> = {
      version: 1,
      createdAt: new Date().toISOString(),
      chunks: this.chunks,
    };
    const tempPath = `${this.indexPath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(index));
    fs.renameSync(tempPath, this.indexPath);
  }
}
