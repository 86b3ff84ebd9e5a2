import "dotenv/config";
import { loadConfig } from "../config";
import { OpenAIEmbeddingModel } from "../domain/openaiModels";
import { ingestCourse } from "../services/lessonIngestion";
import { lessonIndexPath } from "../services/tutor";
import { Retriever } from "../services/retriever";
import { LessonStore } from "../stores/lessonStore";
import { describeError } from "../domain/errors";

const SAMPLE_QUERIES = ["What is a noun?", "How do I use verbs?"];

/**
 * Build the lesson index from the course directory.
 *
 * Usage: npm run ingest [-- --rebuild]
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const forceRebuild = process.argv.includes("--rebuild");

  const lessonStore = new LessonStore(lessonIndexPath(config));
  const embeddings = new OpenAIEmbeddingModel({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    timeoutMs: config.llmTimeoutMs,
  });

  console.log(`[Ingest] Course: ${config.coursePath}`);
  const summary = await ingestCourse(lessonStore, embeddings, {
    coursePath: config.coursePath,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    forceRebuild,
  });
  console.log(
    `[Ingest] ${summary.rebuilt ? "Built" : "Reused"} index: ${summary.lessons} lessons, ${summary.chunks} chunks`
  );

  // Sample retrievals against the first lesson
  const retriever = new Retriever(lessonStore, embeddings, config.retrievalK);
  const [firstLesson] = lessonStore.lessonIds();
  if (firstLesson === undefined) {
    return;
  }
  for (const query of SAMPLE_QUERIES) {
    const chunks = await retriever.retrieve(firstLesson, query);
    console.log(`\nQuery: ${query}`);
    chunks.forEach((chunk, i) => {
      console.log(`  ${i + 1}. [lesson ${chunk.lessonId}: ${chunk.lessonTitle}] ${chunk.text.slice(0, 120)}...`);
    });
  }
}

main().catch((error) => {
  console.error(`[Ingest] Failed: ${describeError(error)}`);
  process.exitCode = 1;
});
