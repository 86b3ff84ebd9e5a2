import { QuizQuestion } from "./quiz";

export type Phase = "teaching" | "awaiting_quiz_answers" | "grading";

export const REQUEST_SOURCES = ["ui", "cli", "voice"] as const;

export type RequestSource = (typeof REQUEST_SOURCES)[number];

export interface ConversationMessage {
  role: "user" | "assistant" | "system";
  text: string;
}

/**
 * Working state for a single workflow turn.
 *
 * Rebuilt at the start of every turn from the user's progress record,
 * history and active quiz; only parts of it are written back.
 * While phase is "awaiting_quiz_answers", quizQuestions is non-empty and
 * quizAnswers never outgrows it.
 */
export interface ConversationState {
  userId: string;
  currentLessonId: number;
  lessonTitle: string;
  messages: ConversationMessage[];
  phase: Phase;
  quizQuestions: QuizQuestion[];
  quizAnswers: string[];
  quizScore?: number;
  source: RequestSource;
}
