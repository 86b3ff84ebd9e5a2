/**
 * A bounded span of lesson text stored with its embedding.
 * Chunks are immutable once ingested; many chunks belong to one lesson.
 */
export interface LessonChunk {
  lessonId: number;
  lessonTitle: string;
  text: string;
  embedding: number[];

  // Where the chunk came from (set during ingestion)
  section?: string;
  fileName?: string;
  chunkIndex?: number;
}

/**
 * Metadata for one lesson file in the course directory.
 * Lessons are numbered 1..N in section order, then file order.
 */
export interface LessonInfo {
  lessonId: number;
  title: string;
  section: string;
  fileName: string;
  filePath: string;
  fileSize: number;
}

/**
 * Anything that can look up the chunks of a lesson relevant to a query.
 */
export interface ChunkRetriever {
  retrieve(lessonId: number, query: string, k?: number): Promise<LessonChunk[]>;
}
