import { LessonChunk, LessonInfo } from "../domain/lesson";
import { EmbeddingModel } from "../domain/languageModel";
import { TextSplitter } from "../domain/textSplitter";
import { getLessonMetadata, loadLessonText } from "../loaders/lessonLoader";
import { LessonStore } from "../stores/lessonStore";

export interface IngestionOptions {
  coursePath: string;
  chunkSize: number;
  chunkOverlap: number;
  forceRebuild?: boolean;
  batchSize?: number; // texts per embedding request
}

export interface IngestionSummary {
  rebuilt: boolean;
  lessons: number;
  chunks: number;
}

/**
 * Chunk one lesson's text and attach lesson metadata (embeddings come later)
 */
export function chunkLesson(lesson: LessonInfo, text: string, splitter: TextSplitter): Omit<LessonChunk, "embedding">[] {
  return splitter.split(text).map((chunkText, chunkIndex) => ({
    lessonId: lesson.lessonId,
    lessonTitle: lesson.title,
    text: chunkText,
    section: lesson.section,
    fileName: lesson.fileName,
    chunkIndex,
  }));
}

/**
 * Build the lesson index: load every lesson file, chunk it, embed the chunks
 * and store them. An existing index is reused unless forceRebuild is set.
 */
export async function ingestCourse(
  lessonStore: LessonStore,
  embeddings: EmbeddingModel,
  options: IngestionOptions
): Promise<IngestionSummary> {
  if (lessonStore.size > 0 && !options.forceRebuild) {
    console.log(`[Ingestion] Using existing index with ${lessonStore.size} chunks`);
    return { rebuilt: false, lessons: lessonStore.lessonIds().length, chunks: lessonStore.size };
  }

  const lessons = getLessonMetadata(options.coursePath);
  if (lessons.length === 0) {
    throw new Error(`No lesson files found in ${options.coursePath}`);
  }

  const splitter = new TextSplitter({ chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
  const pending = lessons.flatMap((lesson) => chunkLesson(lesson, loadLessonText(lesson), splitter));
  console.log(`[Ingestion] Split ${lessons.length} lessons into ${pending.length} chunks`);

  const batchSize = options.batchSize ?? 64;
  const chunks: LessonChunk[] = [];
  for (let start = 0; start < pending.length; start += batchSize) {
    const batch = pending.slice(start, start + batchSize);
    const vectors = await embeddings.embed(batch.map((chunk) => chunk.text));
    if (vectors.length !== batch.length) {
      throw new Error(`Expected ${batch.length} embeddings, got ${vectors.length}`);
    }
    batch.forEach((chunk, i) => chunks.push({ ...chunk, embedding: vectors[i] }));
  }

  lessonStore.replaceAll(chunks);
  console.log(`[Ingestion] Stored ${chunks.length} chunks for ${lessons.length} lessons`);
  return { rebuilt: true, lessons: lessons.length, chunks: chunks.length };
}
