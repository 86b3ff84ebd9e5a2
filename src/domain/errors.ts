/**
 * Error kinds a tutoring turn can fail with.
 *
 * Everything except PersistenceFailed is recovered at the turn boundary and
 * turned into a short apology for the learner.
 */
export type TutorErrorKind =
  | "LessonNotIngested"
  | "GenerationFailed"
  | "QuizGenerationFailed"
  | "QuizEvaluationFailed"
  | "PersistenceFailed";

export class TutorError extends Error {
  readonly kind: TutorErrorKind;
  readonly retryable: boolean;

  constructor(kind: TutorErrorKind, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "TutorError";
    this.kind = kind;
    this.retryable = options.retryable ?? true;
  }
}

export class LessonNotIngestedError extends TutorError {
  readonly lessonId: number;

  constructor(lessonId: number) {
    super("LessonNotIngested", `Lesson ${lessonId} has no ingested content`, { retryable: false });
    this.name = "LessonNotIngestedError";
    this.lessonId = lessonId;
  }
}

export class GenerationFailedError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super("GenerationFailed", message, { cause });
    this.name = "GenerationFailedError";
  }
}

export class QuizGenerationFailedError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super("QuizGenerationFailed", message, { cause });
    this.name = "QuizGenerationFailedError";
  }
}

export class QuizEvaluationFailedError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super("QuizEvaluationFailed", message, { cause });
    this.name = "QuizEvaluationFailedError";
  }
}

export class PersistenceFailedError extends TutorError {
  constructor(message: string, cause?: unknown) {
    super("PersistenceFailed", message, { cause, retryable: false });
    this.name = "PersistenceFailedError";
  }
}

export function isTutorError(error: unknown): error is TutorError {
  return error instanceof TutorError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
