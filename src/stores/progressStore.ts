import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  HistoryEntry,
  HistorySender,
  PhaseMarker,
  UserProgressRecord,
  toProgressRecord,
} from "../domain/progress";
import { PersistenceFailedError, describeError } from "../domain/errors";
import { KeyedLock } from "../utils/keyedLock";

const DEFAULT_DATA_DIR = path.join(__dirname, "../../data/progress");

export const DEFAULT_HISTORY_LIMIT = 100;

const historyEntrySchema = z.object({
  sender: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.string(),
});

// Older records predate the history and phase fields; both default to empty
const storedProgressSchema = z.object({
  user_id: z.string(),
  current_lesson_id: z.number().int().min(1),
  completed_lessons: z.array(z.number().int()).default([]),
  lesson_scores: z.record(z.number()).default({}),
  phase: z.enum(["teaching", "quiz"]).default("teaching"),
  conversation_history: z.array(historyEntrySchema).default([]),
  last_accessed: z.string(),
  created_at: z.string(),
});

type StoredProgress = z.infer<typeof storedProgressSchema>;

export interface ProgressStoreOptions {
  dataDir?: string;
  historyLimit?: number;
  now?: () => Date;
}

export interface NewHistoryEntry {
  sender: HistorySender;
  text: string;
}

export interface ScoreUpdate {
  lessonId: number;
  value: number; // 0-1
  advanced: boolean;
}

export interface TurnRecord {
  entries: NewHistoryEntry[];
  phase?: PhaseMarker;
  score?: ScoreUpdate;
}

/**
 * ProgressStore keeps one JSON file per learner: {userId}.json
 *
 * The file holds the lesson pointer, completed lessons, quiz scores, the
 * persisted phase marker and a history capped at historyLimit entries
 * (oldest dropped first). Every read-modify-write runs under a per-user lock,
 * so two quick messages from one learner cannot lose an update while other
 * learners are never blocked.
 */
export class ProgressStore {
  private dataDir: string;
  private historyLimit: number;
  private now: () => Date;
  private locks = new KeyedLock();

  constructor(options: ProgressStoreOptions = {}) {
    this.dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.now = options.now ?? (() => new Date());

    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }
  }

  /**
   * Load a learner's progress, creating a fresh record at lesson 1 on first contact
   */
  async getOrCreate(userId: string): Promise<UserProgressRecord> {
    return this.locks.run(userId, async () => {
      const existing = this.read(userId);
      if (existing) {
        return toProgressRecord(existing);
      }

      console.log(`[ProgressStore] Creating new user: ${userId}`);
      const created = this.initialRecord(userId);
      this.write(created);
      return toProgressRecord(created);
    });
  }

  /**
   * Record a quiz score for a lesson. When advanced, the lesson is marked
   * completed and the learner moves past it; the lesson pointer never moves back.
   */
  async updateProgress(
    userId: string,
    lessonId: number,
    score: number,
    advanced: boolean
  ): Promise<UserProgressRecord> {
    return this.recordTurn(userId, { entries: [], score: { lessonId, value: score, advanced } });
  }

  /**
   * Append one message to the learner's history
   */
  async appendHistory(userId: string, sender: HistorySender, text: string): Promise<HistoryEntry> {
    const [entry] = await this.appendHistoryEntries(userId, [{ sender, text }]);
    return entry;
  }

  /**
   * Append several messages in one write, so a turn's question and reply are
   * stored together or not at all.
   */
  async appendHistoryEntries(userId: string, entries: NewHistoryEntry[]): Promise<HistoryEntry[]> {
    if (entries.length === 0) {
      return [];
    }

    let added: HistoryEntry[] = [];
    await this.mutate(userId, (data, timestamp) => {
      added = this.pushHistory(data, entries, timestamp);
    });
    return added;
  }

  /**
   * Commit everything a turn changes in one locked write: the optional quiz
   * score, the new history entries and the phase marker. Nothing is stored
   * when the write fails.
   */
  async recordTurn(userId: string, turn: TurnRecord): Promise<UserProgressRecord> {
    const { score } = turn;
    if (score) {
      if (!Number.isInteger(score.lessonId) || score.lessonId < 1) {
        throw new RangeError(`Invalid lesson id: ${score.lessonId}`);
      }
      if (!(score.value >= 0 && score.value <= 1)) {
        throw new RangeError(`Score must be between 0 and 1, got ${score.value}`);
      }
    }

    const updated = await this.mutate(userId, (data, timestamp) => {
      if (score) {
        applyScore(data, score);
      }
      this.pushHistory(data, turn.entries, timestamp);
      if (turn.phase) {
        data.phase = turn.phase;
      }
    });

    if (score) {
      console.log(
        `[ProgressStore] Updated progress for ${userId}: lesson ${score.lessonId}, score ${score.value.toFixed(2)}, advanced: ${score.advanced}`
      );
    }
    return toProgressRecord(updated);
  }

  async getHistory(userId: string): Promise<HistoryEntry[]> {
    return this.locks.run(userId, async () => {
      const data = this.read(userId);
      return data ? data.conversation_history.map((entry) => ({ ...entry })) : [];
    });
  }

  /**
   * Touch lastAccessed and, when given, store the phase marker
   */
  async markAccessed(userId: string, phase?: PhaseMarker): Promise<UserProgressRecord> {
    return this.recordTurn(userId, { entries: [], phase });
  }

  private async mutate(
    userId: string,
    change: (data: StoredProgress, timestamp: string) => void
  ): Promise<StoredProgress> {
    return this.locks.run(userId, async () => {
      const data = this.read(userId) ?? this.initialRecord(userId);
      const timestamp = this.now().toISOString();
      change(data, timestamp);
      data.last_accessed = timestamp;
      this.write(data);
      return data;
    });
  }

  private pushHistory(data: StoredProgress, entries: NewHistoryEntry[], timestamp: string): HistoryEntry[] {
    const added: HistoryEntry[] = entries.map((entry) => ({ ...entry, timestamp }));
    data.conversation_history.push(...added);
    const overflow = data.conversation_history.length - this.historyLimit;
    if (overflow > 0) {
      data.conversation_history.splice(0, overflow);
    }
    return added;
  }

  private initialRecord(userId: string): StoredProgress {
    const now = this.now().toISOString();
    return {
      user_id: userId,
      current_lesson_id: 1,
      completed_lessons: [],
      lesson_scores: {},
      phase: "teaching",
      conversation_history: [],
      last_accessed: now,
      created_at: now,
    };
  }

  private filePath(userId: string): string {
    if (!userId) {
      throw new Error("userId is required");
    }
    return path.join(this.dataDir, `${encodeURIComponent(userId)}.json`);
  }

  private read(userId: string): StoredProgress | null {
    const filePath = this.filePath(userId);

    let raw: string;
    try {
      if (!fs.existsSync(filePath)) {
        return null;
      }
      raw = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new PersistenceFailedError(`Could not read progress for ${userId}: ${describeError(error)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceFailedError(`Progress file for ${userId} is not valid JSON`, error);
    }

    const parsed = storedProgressSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceFailedError(`Progress file for ${userId} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private write(data: StoredProgress): void {
    const filePath = this.filePath(data.user_id);
    const tempPath = `${filePath}.tmp`;
    try {
      fs.writeFileSync(tempPath, JSON.stringify(data, null, 2));
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      throw new PersistenceFailedError(`Could not save progress for ${data.user_id}: ${describeError(error)}`, error);
    }
  }
}

function applyScore(data: StoredProgress, score: ScoreUpdate): void {
  data.lesson_scores[String(score.lessonId)] = score.value;

  if (score.advanced) {
    if (!data.completed_lessons.includes(score.lessonId)) {
      data.completed_lessons.push(score.lessonId);
    }
    data.current_lesson_id = Math.max(data.current_lesson_id, score.lessonId + 1);
  }
}
