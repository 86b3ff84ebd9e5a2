/**
 * Teaching Workflow
 *
 * The turn-by-turn state machine behind the tutor. Each call to step():
 * - rebuilds the conversation state from the learner's progress record,
 *   history and active quiz
 * - routes the utterance: teach, start a quiz, collect an answer or grade
 * - commits the score (advancing the lesson on a pass), the exchange and the
 *   phase marker to the progress store in a single write
 *
 * Turns for the same learner run one at a time; different learners never wait
 * on each other.
 */

import { ChatMessage, LanguageModel } from "../domain/languageModel";
import { ChunkRetriever, LessonChunk, LessonInfo } from "../domain/lesson";
import { CHOICE_LABELS, QuizEvaluation, QuizQuestion } from "../domain/quiz";
import { ConversationState, Phase, RequestSource } from "../domain/conversation";
import { PhaseMarker, UserProgressRecord } from "../domain/progress";
import {
  GenerationFailedError,
  QuizGenerationFailedError,
  TutorError,
  TutorErrorKind,
  describeError,
  isTutorError,
} from "../domain/errors";
import { detectCancelQuiz, detectQuizIntent } from "../domain/quizIntent";
import { QuizGenerator } from "../domain/quizGenerator";
import { QuizEvaluator } from "../domain/quizEvaluator";
import { ProgressStore, ScoreUpdate } from "../stores/progressStore";
import { ActiveQuiz, QuizSessionStore } from "../stores/quizSessionStore";
import { KeyedLock } from "../utils/keyedLock";

export type TurnKind = "teaching" | "quiz_started" | "quiz_question" | "graded" | "quiz_cancelled" | "error";

export interface TurnResult {
  reply: string;
  phase: Phase;
  kind: TurnKind;
  lessonId: number;
  lessonTitle: string;
  score?: number;
  passed?: boolean;
  error?: { kind: TutorErrorKind; retryable: boolean };
}

export interface TeachingWorkflowDeps {
  progressStore: ProgressStore;
  quizSessions: QuizSessionStore;
  retriever: ChunkRetriever;
  quizGenerator: Pick<QuizGenerator, "generate">;
  quizEvaluator: Pick<QuizEvaluator, "evaluate">;
  model: LanguageModel;
  listLessons: () => LessonInfo[];
}

export interface TeachingWorkflowOptions {
  passingScore?: number; // 0-1
  retrievalK?: number;
  historyWindow?: number; // prior messages sent with each teaching prompt
}

// ============================================
// Fixed replies
// ============================================

const COURSE_COMPLETE_TITLE = "Course complete";

const COURSE_COMPLETE_REPLY =
  "Congratulations, you've completed every lesson in this course! You can still ask me questions about anything we covered.";

const QUIZ_EXPIRED_NOTICE =
  'Your previous quiz has expired, so we\'re back to the lesson. Say "quiz me" whenever you want a new one.';

const GENERIC_LESSON_CONTENT =
  "(No lesson material is available. Teach this topic from general knowledge, keeping it accurate and simple.)";

const ERROR_REPLIES: Record<TutorErrorKind, string> = {
  GenerationFailed: "Sorry, I'm having trouble answering right now. Please try again in a moment.",
  QuizGenerationFailed:
    "Sorry, I couldn't put together a quiz right now. Let's keep going with the lesson, and ask me for the quiz again in a moment.",
  QuizEvaluationFailed: "Sorry, I couldn't grade your quiz just now. Please send your last answer again.",
  LessonNotIngested: "Sorry, the material for this lesson isn't available yet.",
  PersistenceFailed: "Sorry, I couldn't save your progress. Please try again later.",
};

const MARKDOWN_INSTRUCTION = `

FORMATTING:
- Use markdown in your responses
- Use **bold** for key terms and *italics* for emphasis
- Use bullet points for lists and numbered lists for steps
- Keep paragraphs separated with blank lines`;

// ============================================
// Prompt and reply builders
// ============================================

export function buildTeachingPrompt(lessonTitle: string, chunks: LessonChunk[], source: RequestSource): string {
  const lessonContent = chunks.length > 0 ? chunks.map((chunk) => chunk.text).join("\n\n") : GENERIC_LESSON_CONTENT;

  return `You are an expert teacher teaching the lesson "${lessonTitle}".

TEACHING GUIDELINES:
- Be conversational, friendly and encouraging
- Use the lesson content below to teach accurately
- When introducing the lesson, explain the main ideas clearly with examples
- Break hard ideas into small parts and use everyday examples
- Keep responses to 2-4 short paragraphs
- Ask if the student has questions, and offer a quiz once they seem ready${source === "ui" ? MARKDOWN_INSTRUCTION : ""}

LESSON CONTENT:
${lessonContent}`;
}

export function formatQuestion(question: QuizQuestion, total: number): string {
  const lines = [`Question ${question.id} of ${total}: ${question.prompt}`];

  if (question.kind === "multiple_choice" && question.choices) {
    question.choices.forEach((choice, index) => {
      lines.push(`${CHOICE_LABELS[index]}) ${choice}`);
    });
  } else if (question.kind === "fill_blank") {
    lines.push("(Fill in the blank.)");
  } else {
    lines.push("(Answer in a sentence or two.)");
  }

  return lines.join("\n");
}

export function formatGradingReply(
  evaluation: QuizEvaluation,
  passed: boolean,
  passingScore: number,
  lessonTitle: string,
  nextLesson: LessonInfo | null
): string {
  const percent = Math.round(evaluation.score * 100);
  const verdict = passed
    ? "You passed!"
    : `You need ${Math.round(passingScore * 100)}% to pass, so let's review "${lessonTitle}" and try again.`;

  const parts = [
    `You scored ${percent}% (${evaluation.correctCount}/${evaluation.total}). ${verdict}`,
    evaluation.perQuestionFeedback.join("\n"),
  ];

  if (passed) {
    parts.push(
      nextLesson
        ? `Next up: Lesson ${nextLesson.lessonId}, "${nextLesson.title}". Say hi when you're ready to begin.`
        : COURSE_COMPLETE_REPLY
    );
  }

  return parts.join("\n\n");
}

function welcomeFallback(lessonTitle: string): string {
  return `Welcome! Today we're learning "${lessonTitle}". Ask me anything about it, or say "quiz me" when you're ready to test yourself.`;
}

// ============================================
// Workflow
// ============================================

interface TurnContext {
  state: ConversationState;
  progress: UserProgressRecord;
  lessons: LessonInfo[];
  lesson: LessonInfo | null; // null once the course is complete
  quizStartedAt: string | null;
  quizExpired: boolean;
}

interface RouteOutcome {
  result: TurnResult;
  quizUpdate?: ActiveQuiz | null; // undefined leaves the active quiz as it is
  score?: ScoreUpdate; // committed together with the turn's history
}

export class TeachingWorkflow {
  private turns = new KeyedLock();
  private passingScore: number;
  private retrievalK: number;
  private historyWindow: number;

  constructor(
    private deps: TeachingWorkflowDeps,
    options: TeachingWorkflowOptions = {}
  ) {
    this.passingScore = options.passingScore ?? 0.7;
    this.retrievalK = options.retrievalK ?? 3;
    this.historyWindow = options.historyWindow ?? 6;
  }

  /**
   * Handle one learner utterance. Recoverable failures come back as an
   * apology with kind "error"; PersistenceFailed is thrown.
   */
  async step(userId: string, utterance: string, source: RequestSource = "ui"): Promise<TurnResult> {
    return this.turns.run(userId, () => this.runTurn(userId, utterance, source));
  }

  /**
   * Open a session: introduce the current lesson (or resume an active quiz)
   * and store the greeting in history.
   */
  async greet(userId: string, source: RequestSource = "ui"): Promise<TurnResult> {
    return this.turns.run(userId, () => this.runGreeting(userId, source));
  }

  private async runTurn(userId: string, utterance: string, source: RequestSource): Promise<TurnResult> {
    const ctx = await this.loadContext(userId, source);
    ctx.state.messages.push({ role: "user", text: utterance });
    const startPhase = ctx.state.phase;

    let outcome: RouteOutcome;
    try {
      outcome = await this.routeAfterResponse(ctx, utterance);
    } catch (error) {
      if (!isTutorError(error) || error.kind === "PersistenceFailed") {
        throw error;
      }
      console.error(`[Workflow] Turn failed for ${userId} (${error.kind}): ${error.message}`);
      const result = this.withNotice(ctx, this.errorResult(ctx, error, startPhase));
      await this.deps.progressStore.recordTurn(userId, {
        entries: [{ sender: "user", text: utterance }],
        phase: toMarker(startPhase),
      });
      this.applyQuizUpdate(userId, ctx.quizExpired ? null : undefined);
      return result;
    }

    const result = this.withNotice(ctx, outcome.result);
    await this.deps.progressStore.recordTurn(userId, {
      entries: [
        { sender: "user", text: utterance },
        { sender: "assistant", text: result.reply },
      ],
      phase: toMarker(result.phase),
      score: outcome.score,
    });
    this.applyQuizUpdate(userId, ctx.quizExpired && outcome.quizUpdate === undefined ? null : outcome.quizUpdate);

    console.log(`[Workflow] ${userId}: ${startPhase} -> ${result.phase} (${result.kind})`);
    return result;
  }

  private async runGreeting(userId: string, source: RequestSource): Promise<TurnResult> {
    const ctx = await this.loadContext(userId, source);
    const { state } = ctx;
    let result: TurnResult;

    if (!ctx.lesson) {
      result = this.courseCompleteResult(ctx);
    } else if (state.phase === "awaiting_quiz_answers") {
      const next = state.quizQuestions[state.quizAnswers.length];
      result = {
        reply: `Welcome back! Let's finish your quiz on "${ctx.lesson.title}".\n\n${formatQuestion(next, state.quizQuestions.length)}`,
        phase: "awaiting_quiz_answers",
        kind: "quiz_question",
        lessonId: ctx.lesson.lessonId,
        lessonTitle: ctx.lesson.title,
      };
    } else {
      const lesson = ctx.lesson;
      state.messages.push({ role: "user", text: "Please introduce today's lesson to me." });
      let reply: string;
      try {
        reply = await this.teach(ctx, lesson, `Introduction and overview of ${lesson.title}`);
      } catch (error) {
        if (!isTutorError(error) || error.kind === "PersistenceFailed") {
          throw error;
        }
        console.warn(`[Workflow] Greeting fell back for ${userId}: ${error.message}`);
        reply = welcomeFallback(lesson.title);
      }
      result = {
        reply,
        phase: "teaching",
        kind: "teaching",
        lessonId: lesson.lessonId,
        lessonTitle: lesson.title,
      };
    }

    result = this.withNotice(ctx, result);
    await this.deps.progressStore.recordTurn(userId, {
      entries: [{ sender: "assistant", text: result.reply }],
      phase: toMarker(result.phase),
    });
    if (ctx.quizExpired) {
      this.applyQuizUpdate(userId, null);
    }
    return result;
  }

  // ============================================
  // State
  // ============================================

  private async loadContext(userId: string, source: RequestSource): Promise<TurnContext> {
    const progress = await this.deps.progressStore.getOrCreate(userId);
    const history = await this.deps.progressStore.getHistory(userId);
    const lessons = this.deps.listLessons();
    const lesson = lessons.find((l) => l.lessonId === progress.currentLessonId) ?? null;

    // Lesson list unavailable: teach the current lesson id from the generic prompt
    const resolvedLesson: LessonInfo | null =
      lesson ?? (lessons.length === 0 ? placeholderLesson(progress.currentLessonId) : null);

    const storedQuiz = this.deps.quizSessions.get(userId);
    const activeQuiz =
      progress.phase === "quiz" &&
      storedQuiz &&
      storedQuiz.lessonId === progress.currentLessonId &&
      storedQuiz.answers.length < storedQuiz.questions.length
        ? storedQuiz
        : null;
    const quizExpired = (progress.phase === "quiz" && !activeQuiz) || (storedQuiz !== null && !activeQuiz);
    if (quizExpired) {
      console.warn(`[Workflow] Discarding expired quiz state for ${userId}`);
    }

    const state: ConversationState = {
      userId,
      currentLessonId: progress.currentLessonId,
      lessonTitle: resolvedLesson ? resolvedLesson.title : COURSE_COMPLETE_TITLE,
      messages: history.map((entry) => ({ role: entry.sender, text: entry.text })),
      phase: activeQuiz ? "awaiting_quiz_answers" : "teaching",
      quizQuestions: activeQuiz ? activeQuiz.questions : [],
      quizAnswers: activeQuiz ? activeQuiz.answers : [],
      source,
    };

    return {
      state,
      progress,
      lessons,
      lesson: resolvedLesson,
      quizStartedAt: activeQuiz ? activeQuiz.startedAt : null,
      quizExpired,
    };
  }

  private withNotice(ctx: TurnContext, result: TurnResult): TurnResult {
    // Only a learner who was really mid-quiz needs to hear it expired
    if (!ctx.quizExpired || ctx.progress.phase !== "quiz") {
      return result;
    }
    return { ...result, reply: `${QUIZ_EXPIRED_NOTICE}\n\n${result.reply}` };
  }

  private applyQuizUpdate(userId: string, update: ActiveQuiz | null | undefined): void {
    if (update === null) {
      this.deps.quizSessions.delete(userId);
    } else if (update) {
      this.deps.quizSessions.save(update);
    }
  }

  // ============================================
  // Routing
  // ============================================

  private async routeAfterResponse(ctx: TurnContext, utterance: string): Promise<RouteOutcome> {
    if (!ctx.lesson) {
      return { result: this.courseCompleteResult(ctx) };
    }

    if (ctx.state.phase === "awaiting_quiz_answers") {
      return this.collectAnswer(ctx, ctx.lesson, utterance);
    }

    const lastAssistant = [...ctx.state.messages].reverse().find((message) => message.role === "assistant");
    if (detectQuizIntent(utterance, lastAssistant?.text)) {
      return this.startQuiz(ctx, ctx.lesson);
    }

    const reply = await this.teach(ctx, ctx.lesson, utterance);
    return {
      result: {
        reply,
        phase: "teaching",
        kind: "teaching",
        lessonId: ctx.lesson.lessonId,
        lessonTitle: ctx.lesson.title,
      },
    };
  }

  private async collectAnswer(ctx: TurnContext, lesson: LessonInfo, utterance: string): Promise<RouteOutcome> {
    const { state } = ctx;
    if (detectCancelQuiz(utterance)) {
      console.log(`[Workflow] ${state.userId} cancelled the quiz for lesson ${lesson.lessonId}`);
      return {
        result: {
          reply: `No problem, the quiz is cancelled. Let's keep working on "${lesson.title}". Say "quiz me" whenever you're ready to try again.`,
          phase: "teaching",
          kind: "quiz_cancelled",
          lessonId: lesson.lessonId,
          lessonTitle: lesson.title,
        },
        quizUpdate: null,
      };
    }

    state.quizAnswers = [...state.quizAnswers, utterance.trim()];

    if (state.quizAnswers.length < state.quizQuestions.length) {
      const next = state.quizQuestions[state.quizAnswers.length];
      return {
        result: {
          reply: formatQuestion(next, state.quizQuestions.length),
          phase: "awaiting_quiz_answers",
          kind: "quiz_question",
          lessonId: lesson.lessonId,
          lessonTitle: lesson.title,
        },
        quizUpdate: {
          userId: state.userId,
          lessonId: lesson.lessonId,
          questions: state.quizQuestions,
          answers: state.quizAnswers,
          startedAt: ctx.quizStartedAt ?? new Date().toISOString(),
        },
      };
    }

    state.phase = "grading";
    return this.routeAfterProgress(ctx, lesson);
  }

  /**
   * Grade the quiz and pick the lesson the learner continues with. The score
   * is committed by runTurn together with the turn's history.
   */
  private async routeAfterProgress(ctx: TurnContext, lesson: LessonInfo): Promise<RouteOutcome> {
    const { state } = ctx;
    const evaluation = await this.deps.quizEvaluator.evaluate(state.quizQuestions, state.quizAnswers);
    state.quizScore = evaluation.score;
    const passed = state.quizScore >= this.passingScore;
    console.log(
      `[Workflow] ${state.userId} scored ${state.quizScore.toFixed(2)} on lesson ${lesson.lessonId} (passed: ${passed})`
    );

    const nextLessonId = passed
      ? Math.max(ctx.progress.currentLessonId, lesson.lessonId + 1)
      : ctx.progress.currentLessonId;
    const nextLesson =
      ctx.lessons.length === 0
        ? placeholderLesson(nextLessonId)
        : ctx.lessons.find((l) => l.lessonId === nextLessonId) ?? null;
    const current = passed ? nextLesson : lesson;

    return {
      result: {
        reply: formatGradingReply(evaluation, passed, this.passingScore, lesson.title, nextLesson),
        phase: "teaching",
        kind: "graded",
        lessonId: nextLessonId,
        lessonTitle: current ? current.title : COURSE_COMPLETE_TITLE,
        score: state.quizScore,
        passed,
      },
      quizUpdate: null,
      score: { lessonId: lesson.lessonId, value: state.quizScore, advanced: passed },
    };
  }

  private async startQuiz(ctx: TurnContext, lesson: LessonInfo): Promise<RouteOutcome> {
    const questions = await this.generateQuiz(lesson);
    const quiz: ActiveQuiz = {
      userId: ctx.state.userId,
      lessonId: lesson.lessonId,
      questions,
      answers: [],
      startedAt: new Date().toISOString(),
    };
    ctx.state.phase = "awaiting_quiz_answers";
    ctx.state.quizQuestions = questions;

    return {
      result: {
        reply: `Great, let's see what you've learned about "${lesson.title}"! Answer each question in turn, or say "cancel quiz" to go back to the lesson.\n\n${formatQuestion(questions[0], questions.length)}`,
        phase: "awaiting_quiz_answers",
        kind: "quiz_started",
        lessonId: lesson.lessonId,
        lessonTitle: lesson.title,
      },
      quizUpdate: quiz,
    };
  }

  private async generateQuiz(lesson: LessonInfo): Promise<QuizQuestion[]> {
    try {
      return await this.deps.quizGenerator.generate(lesson.lessonId, lesson.title);
    } catch (error) {
      if (!(error instanceof QuizGenerationFailedError)) {
        throw error;
      }
      console.warn(`[Workflow] Quiz for lesson ${lesson.lessonId} was malformed, retrying: ${error.message}`);
      return this.deps.quizGenerator.generate(lesson.lessonId, lesson.title);
    }
  }

  /**
   * Answer the last message in state.messages, sending the messages before it
   * (up to historyWindow) as context.
   */
  private async teach(ctx: TurnContext, lesson: LessonInfo, query: string): Promise<string> {
    const chunks = await this.deps.retriever.retrieve(lesson.lessonId, query, this.retrievalK);
    if (chunks.length === 0) {
      console.warn(`[Workflow] No content for lesson ${lesson.lessonId}, using the generic teaching prompt`);
    }

    const messages: ChatMessage[] = [
      { role: "system", content: buildTeachingPrompt(lesson.title, chunks, ctx.state.source) },
      ...ctx.state.messages
        .slice(-(this.historyWindow + 1))
        .map((message): ChatMessage => ({ role: message.role, content: message.text })),
    ];

    try {
      return await this.deps.model.complete(messages);
    } catch (error) {
      throw new GenerationFailedError(`Teaching reply failed: ${describeError(error)}`, error);
    }
  }

  // ============================================
  // Results
  // ============================================

  private courseCompleteResult(ctx: TurnContext): TurnResult {
    return {
      reply: COURSE_COMPLETE_REPLY,
      phase: "teaching",
      kind: "teaching",
      lessonId: ctx.progress.currentLessonId,
      lessonTitle: COURSE_COMPLETE_TITLE,
    };
  }

  private errorResult(ctx: TurnContext, error: TutorError, phase: Phase): TurnResult {
    return {
      reply: ERROR_REPLIES[error.kind],
      phase,
      kind: "error",
      lessonId: ctx.progress.currentLessonId,
      lessonTitle: ctx.state.lessonTitle,
      error: { kind: error.kind, retryable: error.retryable },
    };
  }
}

function toMarker(phase: Phase): PhaseMarker {
  return phase === "awaiting_quiz_answers" ? "quiz" : "teaching";
}

function placeholderLesson(lessonId: number): LessonInfo {
  return { lessonId, title: `Lesson ${lessonId}`, section: "", fileName: "", filePath: "", fileSize: 0 };
}
