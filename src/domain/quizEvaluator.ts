import { z } from "zod";
import { LanguageModel } from "./languageModel";
import { CHOICE_LABELS, QuestionResult, QuizEvaluation, QuizQuestion } from "./quiz";
import { QuizEvaluationFailedError, describeError } from "./errors";

const shortAnswerJudgementSchema = z.object({
  correct: z.boolean(),
  feedback: z.string().optional(),
});

const SHORT_ANSWER_PROMPT = `You are grading one short answer on a lesson quiz.

Decide whether the student's answer shows they understood the point of the model answer.
Wording does not need to match; the idea does.

Return JSON:
{
  "correct": true or false,
  "feedback": "<one short, encouraging sentence for the student>"
}`;

/**
 * Lowercase, trim and collapse inner whitespace
 */
export function normalizeAnswer(answer: string): string {
  return answer.trim().replace(/\s+/g, " ").toLowerCase();
}

function choiceText(question: QuizQuestion, letter: string): string | undefined {
  const index = CHOICE_LABELS.findIndex((label) => label === letter);
  return index === -1 ? undefined : question.choices?.[index];
}

/**
 * A multiple choice answer counts when it is the right letter ("b", "B)",
 * "option b"), the text of the right choice, or both as the tutor shows them
 * ("B) run").
 */
function isChoiceCorrect(question: QuizQuestion, answer: string): boolean {
  const normalized = normalizeAnswer(answer);
  const letterMatch = normalized.match(/^(?:option\s+)?([a-d])\s*[).:]?$/);
  if (letterMatch) {
    return letterMatch[1].toUpperCase() === question.correctAnswer;
  }

  const text = choiceText(question, question.correctAnswer);
  if (text === undefined) {
    return false;
  }
  const correctText = normalizeAnswer(text);
  if (correctText === normalized) {
    return true;
  }

  const labelled = normalized.match(/^(?:option\s+)?([a-d])\s*[).:-]\s*(.+)$/);
  return labelled !== null && labelled[1].toUpperCase() === question.correctAnswer && labelled[2] === correctText;
}

function describeCorrectAnswer(question: QuizQuestion): string {
  if (question.kind !== "multiple_choice") {
    return question.correctAnswer;
  }
  const text = choiceText(question, question.correctAnswer);
  return text ? `${question.correctAnswer}) ${text}` : question.correctAnswer;
}

/**
 * QuizEvaluator grades a submitted quiz.
 *
 * Multiple choice and fill-in-the-blank answers are matched exactly after
 * normalization. Short answers are judged by the language model; if that call
 * fails the whole evaluation fails so the learner can resubmit.
 */
export class QuizEvaluator {
  constructor(private model: LanguageModel) {}

  async evaluate(questions: QuizQuestion[], answers: string[]): Promise<QuizEvaluation> {
    if (questions.length === 0) {
      throw new QuizEvaluationFailedError("Cannot evaluate an empty quiz");
    }
    if (answers.length !== questions.length) {
      throw new QuizEvaluationFailedError(
        `Expected ${questions.length} answers, got ${answers.length}`
      );
    }

    const results: QuestionResult[] = [];
    for (let i = 0; i < questions.length; i++) {
      results.push(await this.evaluateQuestion(questions[i], answers[i]));
    }

    const correctCount = results.filter((result) => result.isCorrect).length;
    return {
      score: correctCount / questions.length,
      correctCount,
      total: questions.length,
      perQuestionFeedback: results.map((result) => `Question ${result.questionId}: ${result.feedback}`),
      results,
    };
  }

  private async evaluateQuestion(question: QuizQuestion, answer: string): Promise<QuestionResult> {
    const correctAnswer = describeCorrectAnswer(question);
    const base = { questionId: question.id, kind: question.kind, answer, correctAnswer };

    if (question.kind === "short_answer") {
      const judgement = await this.judgeShortAnswer(question, answer);
      const fallback = judgement.correct ? "Correct!" : `A good answer: ${correctAnswer}`;
      return { ...base, isCorrect: judgement.correct, feedback: judgement.feedback || fallback };
    }

    const isCorrect =
      question.kind === "multiple_choice"
        ? isChoiceCorrect(question, answer)
        : normalizeAnswer(answer) === normalizeAnswer(question.correctAnswer);

    return {
      ...base,
      isCorrect,
      feedback: isCorrect ? "Correct!" : `Not quite. The answer is ${correctAnswer}.`,
    };
  }

  private async judgeShortAnswer(
    question: QuizQuestion,
    answer: string
  ): Promise<{ correct: boolean; feedback?: string }> {
    if (!answer.trim()) {
      return { correct: false };
    }

    const userPrompt = `QUESTION:
${question.prompt}

MODEL ANSWER:
${question.correctAnswer}

STUDENT'S ANSWER:
${answer}

Grade and return JSON:`;

    let content: string;
    try {
      content = await this.model.complete(
        [
          { role: "system", content: SHORT_ANSWER_PROMPT },
          { role: "user", content: userPrompt },
        ],
        { json: true, temperature: 0.3, maxTokens: 200 }
      );
    } catch (error) {
      throw new QuizEvaluationFailedError(`Short answer grading failed: ${describeError(error)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new QuizEvaluationFailedError("Short answer judgement is not valid JSON", error);
    }

    const parsed = shortAnswerJudgementSchema.safeParse(data);
    if (!parsed.success) {
      throw new QuizEvaluationFailedError(`Short answer judgement is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
