export type QuizQuestionKind = "multiple_choice" | "fill_blank" | "short_answer";

/**
 * Fixed quiz shape: three multiple choice, one fill-in-the-blank, one short answer.
 */
export const QUIZ_SHAPE: readonly QuizQuestionKind[] = [
  "multiple_choice",
  "multiple_choice",
  "multiple_choice",
  "fill_blank",
  "short_answer",
];

export const CHOICE_LABELS = ["A", "B", "C", "D"] as const;

export interface QuizQuestion {
  id: number;
  kind: QuizQuestionKind;
  prompt: string;
  choices?: string[]; // multiple_choice only, labelled A-D in order
  correctAnswer: string; // choice letter for multiple_choice
}

export interface QuestionResult {
  questionId: number;
  kind: QuizQuestionKind;
  answer: string;
  correctAnswer: string;
  isCorrect: boolean;
  feedback: string;
}

export interface QuizEvaluation {
  score: number; // 0-1
  correctCount: number;
  total: number;
  perQuestionFeedback: string[];
  results: QuestionResult[];
}
