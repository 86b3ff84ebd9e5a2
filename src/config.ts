import path from "path";

/**
 * Runtime settings for the tutor, read from the environment.
 * Entry points load `.env` through dotenv before calling loadConfig().
 */
export interface TutorConfig {
  openaiApiKey?: string;
  model: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
  llmTimeoutMs: number;

  passingScore: number; // 0-1, applied by the workflow
  retrievalK: number;
  chunkSize: number;
  chunkOverlap: number;
  historyLimit: number;

  dataDir: string;
  coursePath: string;
  apiPort: number;
}

const DEFAULT_DATA_DIR = path.join(__dirname, "../data");

interface NumberRange {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number, range: NumberRange = {}): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    console.warn(`[Config] Ignoring non-numeric ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  const { min = -Infinity, max = Infinity, integer = false } = range;
  if (value < min || value > max || (integer && !Number.isInteger(value))) {
    console.warn(`[Config] Ignoring out-of-range ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

const COUNT: NumberRange = { min: 1, integer: true };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
  const dataDir = env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR;
  const courseName = env.COURSE_NAME || "english-grammar";

  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    model: env.OPENAI_MODEL || "gpt-4o-mini",
    embeddingModel: env.EMBEDDING_MODEL || "text-embedding-3-small",
    temperature: readNumber(env, "TEMPERATURE", 0.7, { min: 0, max: 2 }),
    maxTokens: readNumber(env, "MAX_TOKENS", 500, COUNT),
    llmTimeoutMs: readNumber(env, "LLM_TIMEOUT_MS", 30000, COUNT),

    passingScore: readNumber(env, "PASSING_SCORE", 0.7, { min: 0, max: 1 }),
    retrievalK: readNumber(env, "RETRIEVAL_K", 3, COUNT),
    chunkSize: readNumber(env, "CHUNK_SIZE", 1000, COUNT),
    chunkOverlap: readNumber(env, "CHUNK_OVERLAP", 200, { min: 0, integer: true }),
    historyLimit: readNumber(env, "HISTORY_LIMIT", 100, COUNT),

    dataDir,
    coursePath: env.COURSE_PATH
      ? path.resolve(env.COURSE_PATH)
      : path.join(dataDir, "course", courseName),
    apiPort: readNumber(env, "API_PORT", 3001, { min: 0, max: 65535, integer: true }),
  };
}
