/**
 * Persisted phase marker. Only whether the user is mid-quiz survives
 * between turns; the quiz questions themselves are never written to disk.
 */
export type PhaseMarker = "teaching" | "quiz";

export type HistorySender = "user" | "assistant";

export interface HistoryEntry {
  sender: HistorySender;
  text: string;
  timestamp: string; // ISO 8601
}

export interface UserProgressRecord {
  userId: string;
  currentLessonId: number;
  completedLessons: number[];
  lessonScores: Record<string, number>; // lessonId -> 0-1, latest attempt
  phase: PhaseMarker;
  createdAt: string;
  lastAccessed: string;
}

/**
 * On-disk shape of a user's progress file.
 */
export interface PersistedProgress {
  user_id: string;
  current_lesson_id: number;
  completed_lessons: number[];
  lesson_scores: Record<string, number>;
  phase?: PhaseMarker;
  conversation_history?: HistoryEntry[]; // absent on legacy records
  last_accessed: string;
  created_at: string;
}

export function toProgressRecord(data: PersistedProgress): UserProgressRecord {
  return {
    userId: data.user_id,
    currentLessonId: data.current_lesson_id,
    completedLessons: [...data.completed_lessons],
    lessonScores: { ...data.lesson_scores },
    phase: data.phase ?? "teaching",
    createdAt: data.created_at,
    lastAccessed: data.last_accessed,
  };
}
