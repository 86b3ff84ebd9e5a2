import { ChunkRetriever, LessonChunk } from "../domain/lesson";
import { EmbeddingModel } from "../domain/languageModel";
import { GenerationFailedError, LessonNotIngestedError, describeError } from "../domain/errors";
import { LessonStore } from "../stores/lessonStore";

/**
 * Retriever - fetches the lesson chunks most relevant to a query.
 *
 * Results are restricted to one lesson and ranked by cosine similarity
 * between the query embedding and each stored chunk embedding. A lesson with
 * no chunks yields an empty list without calling the embedding model.
 */
export class Retriever implements ChunkRetriever {
  constructor(
    private lessonStore: LessonStore,
    private embeddings: EmbeddingModel,
    private defaultK: number = 3
  ) {}

  async retrieve(lessonId: number, query: string, k: number = this.defaultK): Promise<LessonChunk[]> {
    if (!this.lessonStore.hasLesson(lessonId)) {
      console.warn(`[Retriever] Lesson ${lessonId} has no ingested chunks`);
      return [];
    }

    let queryEmbedding: number[];
    try {
      const [embedding] = await this.embeddings.embed([query]);
      if (!embedding) {
        throw new Error("Embedding model returned no vector");
      }
      queryEmbedding = embedding;
    } catch (error) {
      throw new GenerationFailedError(`Could not embed query: ${describeError(error)}`, error);
    }

    const results = this.lessonStore.similaritySearch(queryEmbedding, k, lessonId);
    console.log(`[Retriever] Retrieved ${results.length} chunks for lesson ${lessonId}`);
    return results.map((result) => result.chunk);
  }

  /**
   * Key points of a lesson, for the "summary" command
   */
  async summarize(lessonId: number, lessonTitle: string, k: number = this.defaultK): Promise<LessonChunk[]> {
    const chunks = await this.retrieve(lessonId, `Key points and summary of ${lessonTitle}`, k);
    if (chunks.length === 0) {
      throw new LessonNotIngestedError(lessonId);
    }
    return chunks;
  }
}
