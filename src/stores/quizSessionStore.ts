import { QuizQuestion } from "../domain/quiz";

/**
 * An in-progress quiz for one learner.
 */
export interface ActiveQuiz {
  userId: string;
  lessonId: number;
  questions: QuizQuestion[];
  answers: string[];
  startedAt: string;
}

/**
 * QuizSessionStore keeps active quizzes in memory only.
 *
 * Questions carry their correct answers, so they are never written to the
 * progress file; the progress record keeps just the "quiz" phase marker. A
 * quiz therefore does not survive a process restart.
 */
export class QuizSessionStore {
  private quizzes = new Map<string, ActiveQuiz>();

  get(userId: string): ActiveQuiz | null {
    const quiz = this.quizzes.get(userId);
    return quiz ? { ...quiz, questions: [...quiz.questions], answers: [...quiz.answers] } : null;
  }

  save(quiz: ActiveQuiz): void {
    this.quizzes.set(quiz.userId, { ...quiz, questions: [...quiz.questions], answers: [...quiz.answers] });
  }

  delete(userId: string): boolean {
    return this.quizzes.delete(userId);
  }
}
