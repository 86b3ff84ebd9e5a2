import { z } from "zod";
import { LanguageModel } from "./languageModel";
import { CHOICE_LABELS, QUIZ_SHAPE, QuizQuestion, QuizQuestionKind } from "./quiz";
import { GenerationFailedError, QuizGenerationFailedError, describeError } from "./errors";
import { ChunkRetriever } from "./lesson";

const QUIZ_CONTEXT_CHUNKS = 5;

const rawQuestionSchema = z.object({
  type: z.enum(["multiple_choice", "fill_blank", "short_answer"]),
  question: z.string().trim().min(1),
  options: z.array(z.string().trim().min(1)).optional(),
  correct_answer: z.string().trim().min(1),
});

const rawQuizSchema = z.object({
  questions: z.array(rawQuestionSchema),
});

type RawQuestion = z.infer<typeof rawQuestionSchema>;

const SYSTEM_PROMPT = `You are an expert teacher writing a short quiz about a lesson.

You MUST respond with valid JSON matching this exact structure:
{
  "questions": [
    {
      "type": "multiple_choice",
      "question": "Question text",
      "options": ["first option", "second option", "third option", "fourth option"],
      "correct_answer": "B"
    },
    {
      "type": "fill_blank",
      "question": "A sentence with a ___ for the missing word",
      "correct_answer": "missing word"
    },
    {
      "type": "short_answer",
      "question": "A question answered in one or two sentences",
      "correct_answer": "A model answer"
    }
  ]
}

Important:
- Write exactly 5 questions: 3 "multiple_choice", then 1 "fill_blank", then 1 "short_answer"
- Multiple choice questions have exactly 4 options (without letters); "correct_answer" is the letter A, B, C or D
- Fill-in-the-blank answers are a single word or short phrase
- Only ask about what the lesson content teaches`;

function buildUserPrompt(lessonTitle: string, lessonContent: string): string {
  return `Write the quiz for the lesson "${lessonTitle}".

LESSON CONTENT:
${lessonContent || "(No lesson text is available; base the questions on the lesson title.)"}

Mix easy, medium and hard questions. Return JSON:`;
}

function stripChoiceLabel(option: string): string {
  return option.replace(/^[A-Da-d]\s*[).:-]\s+/, "").trim();
}

/**
 * Resolve a multiple choice answer key to its letter. Models sometimes
 * answer with "b)", "Option B" or the option text instead of the bare letter.
 */
function resolveChoiceLetter(correctAnswer: string, options: string[]): string | null {
  const letterMatch = correctAnswer.trim().match(/^(?:option\s+)?([A-Da-d])\s*[).:]?$/i);
  if (letterMatch) {
    const letter = letterMatch[1].toUpperCase();
    const index = CHOICE_LABELS.findIndex((label) => label === letter);
    return index < options.length ? letter : null;
  }

  const wanted = stripChoiceLabel(correctAnswer).toLowerCase();
  const index = options.findIndex((option) => option.toLowerCase() === wanted);
  return index === -1 ? null : CHOICE_LABELS[index];
}

function toQuestion(raw: RawQuestion, id: number): QuizQuestion {
  if (raw.type !== "multiple_choice") {
    return { id, kind: raw.type, prompt: raw.question, correctAnswer: raw.correct_answer };
  }

  const choices = (raw.options ?? []).map(stripChoiceLabel);
  if (choices.length !== CHOICE_LABELS.length) {
    throw new QuizGenerationFailedError(`Multiple choice question has ${choices.length} options, expected 4`);
  }

  const letter = resolveChoiceLetter(raw.correct_answer, choices);
  if (!letter) {
    throw new QuizGenerationFailedError(`Multiple choice answer "${raw.correct_answer}" matches no option`);
  }
  return { id, kind: "multiple_choice", prompt: raw.question, choices, correctAnswer: letter };
}

/**
 * Parse and validate the model's quiz JSON.
 *
 * The quiz must contain exactly 3 multiple choice, 1 fill-in-the-blank and
 * 1 short answer question. Questions are returned in that order with ids 1-5.
 */
export function parseQuiz(content: string): QuizQuestion[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new QuizGenerationFailedError("Quiz response is not valid JSON", error);
  }

  const parsed = rawQuizSchema.safeParse(data);
  if (!parsed.success) {
    throw new QuizGenerationFailedError(`Quiz response has the wrong structure: ${parsed.error.message}`);
  }

  const raw = parsed.data.questions;
  const byKind = (kind: QuizQuestionKind) => raw.filter((question) => question.type === kind);
  const ordered = [...byKind("multiple_choice"), ...byKind("fill_blank"), ...byKind("short_answer")];

  const kinds = ordered.map((question) => question.type);
  if (kinds.length !== QUIZ_SHAPE.length || kinds.some((kind, i) => kind !== QUIZ_SHAPE[i])) {
    throw new QuizGenerationFailedError(
      `Quiz must have 3 multiple choice, 1 fill_blank and 1 short_answer questions, got [${raw
        .map((question) => question.type)
        .join(", ")}]`
    );
  }

  return ordered.map((question, index) => toQuestion(question, index + 1));
}

/**
 * QuizGenerator writes a five-question quiz for a lesson from its retrieved
 * content. Malformed output raises QuizGenerationFailed; the caller decides
 * whether to retry.
 */
export class QuizGenerator {
  constructor(
    private retriever: ChunkRetriever,
    private model: LanguageModel
  ) {}

  async generate(lessonId: number, lessonTitle: string): Promise<QuizQuestion[]> {
    const chunks = await this.retriever.retrieve(lessonId, `Complete overview of ${lessonTitle}`, QUIZ_CONTEXT_CHUNKS);
    const lessonContent = chunks.map((chunk) => chunk.text).join("\n\n");

    let content: string;
    try {
      content = await this.model.complete(
        [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildUserPrompt(lessonTitle, lessonContent) },
        ],
        { json: true, temperature: 0.3, maxTokens: 1500 }
      );
    } catch (error) {
      throw new GenerationFailedError(`Quiz generation request failed: ${describeError(error)}`, error);
    }

    const questions = parseQuiz(content);
    console.log(`[QuizGenerator] Generated ${questions.length} questions for lesson ${lessonId}`);
    return questions;
  }
}
