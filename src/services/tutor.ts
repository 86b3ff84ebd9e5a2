import path from "path";
import { TutorConfig } from "../config";
import { LessonInfo } from "../domain/lesson";
import { EmbeddingModel, LanguageModel } from "../domain/languageModel";
import { OpenAIChatModel, OpenAIEmbeddingModel } from "../domain/openaiModels";
import { QuizGenerator } from "../domain/quizGenerator";
import { QuizEvaluator } from "../domain/quizEvaluator";
import { getLessonMetadata } from "../loaders/lessonLoader";
import { LessonStore } from "../stores/lessonStore";
import { ProgressStore } from "../stores/progressStore";
import { QuizSessionStore } from "../stores/quizSessionStore";
import { Retriever } from "./retriever";
import { TeachingWorkflow } from "./teachingWorkflow";

/**
 * Everything a transport (HTTP API or terminal) needs to run the tutor
 */
export interface Tutor {
  config: TutorConfig;
  lessonStore: LessonStore;
  progressStore: ProgressStore;
  retriever: Retriever;
  embeddings: EmbeddingModel;
  workflow: TeachingWorkflow;
  listLessons: () => LessonInfo[];
  reloadLessons: () => LessonInfo[];
}

export interface TutorModels {
  chat?: LanguageModel;
  embeddings?: EmbeddingModel;
}

export function lessonIndexPath(config: TutorConfig): string {
  return path.join(config.dataDir, "index", "lessons.json");
}

/**
 * Wire the stores, models and workflow from configuration. Models default to
 * OpenAI; tests pass their own.
 */
export function createTutor(config: TutorConfig, models: TutorModels = {}): Tutor {
  const modelOptions = {
    apiKey: config.openaiApiKey,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.llmTimeoutMs,
  };
  const chat = models.chat ?? new OpenAIChatModel({ ...modelOptions, model: config.model });
  const embeddings = models.embeddings ?? new OpenAIEmbeddingModel({ ...modelOptions, model: config.embeddingModel });

  const lessonStore = new LessonStore(lessonIndexPath(config));
  const progressStore = new ProgressStore({
    dataDir: path.join(config.dataDir, "progress"),
    historyLimit: config.historyLimit,
  });
  const retriever = new Retriever(lessonStore, embeddings, config.retrievalK);

  // Lesson files only change on re-ingest, which calls reloadLessons
  let lessons: LessonInfo[] | null = null;
  const reloadLessons = (): LessonInfo[] => {
    lessons = getLessonMetadata(config.coursePath);
    console.log(`[Tutor] Found ${lessons.length} lessons in ${config.coursePath}`);
    return lessons;
  };
  const listLessons = (): LessonInfo[] => lessons ?? reloadLessons();

  const workflow = new TeachingWorkflow(
    {
      progressStore,
      quizSessions: new QuizSessionStore(),
      retriever,
      quizGenerator: new QuizGenerator(retriever, chat),
      quizEvaluator: new QuizEvaluator(chat),
      model: chat,
      listLessons,
    },
    { passingScore: config.passingScore, retrievalK: config.retrievalK }
  );

  return { config, lessonStore, progressStore, retriever, embeddings, workflow, listLessons, reloadLessons };
}
