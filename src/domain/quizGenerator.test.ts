import { QuizGenerator, parseQuiz } from "./quizGenerator";
import { ChunkRetriever, LessonChunk } from "./lesson";
import { ChatMessage, CompletionOptions, LanguageModel } from "./languageModel";
import { GenerationFailedError, QuizGenerationFailedError } from "./errors";

interface RawQuestionInput {
  type: string;
  question: string;
  options?: string[];
  correct_answer: string;
}

const multipleChoice = (question: string, correct = "B"): RawQuestionInput => ({
  type: "multiple_choice",
  question,
  options: ["cat", "run", "blue", "quickly"],
  correct_answer: correct,
});

const validQuestions = (): RawQuestionInput[] => [
  multipleChoice("Which word is a noun?", "A"),
  multipleChoice("Which word is a verb?", "B"),
  multipleChoice("Which word is an adjective?", "C"),
  { type: "fill_blank", question: "The ___ barked loudly.", correct_answer: "dog" },
  { type: "short_answer", question: "What does a noun do?", correct_answer: "It names a person, place or thing." },
];

const quizJson = (questions: RawQuestionInput[] = validQuestions()) => JSON.stringify({ questions });

describe("parseQuiz", () => {
  it("returns five questions in canonical order with ids", () => {
    const questions = parseQuiz(quizJson());

    expect(questions.map((q) => [q.id, q.kind])).toEqual([
      [1, "multiple_choice"],
      [2, "multiple_choice"],
      [3, "multiple_choice"],
      [4, "fill_blank"],
      [5, "short_answer"],
    ]);
    expect(questions[0]).toEqual({
      id: 1,
      kind: "multiple_choice",
      prompt: "Which word is a noun?",
      choices: ["cat", "run", "blue", "quickly"],
      correctAnswer: "A",
    });
    expect(questions[3]).toEqual({ id: 4, kind: "fill_blank", prompt: "The ___ barked loudly.", correctAnswer: "dog" });
  });

  it("reorders questions that arrive out of order", () => {
    const [mc1, mc2, mc3, fill, short] = validQuestions();

    const questions = parseQuiz(quizJson([short, mc1, fill, mc2, mc3]));

    expect(questions.map((q) => q.prompt)).toEqual([
      "Which word is a noun?",
      "Which word is a verb?",
      "Which word is an adjective?",
      "The ___ barked loudly.",
      "What does a noun do?",
    ]);
  });

  it("normalizes answer keys given as labelled letters or option text", () => {
    const questions = validQuestions();
    questions[0] = multipleChoice("Which word is a noun?", "a)");
    questions[1] = multipleChoice("Which word is a verb?", "Option D");
    questions[2] = { ...multipleChoice("Which word is an adjective?"), correct_answer: "Blue" };

    const parsed = parseQuiz(quizJson(questions));

    expect(parsed.slice(0, 3).map((q) => q.correctAnswer)).toEqual(["A", "D", "C"]);
  });

  it("strips letter prefixes from options", () => {
    const questions = validQuestions();
    questions[0] = {
      type: "multiple_choice",
      question: "Pick the noun",
      options: ["A) cat", "B) run", "C) blue", "D) quickly"],
      correct_answer: "A",
    };

    expect(parseQuiz(quizJson(questions))[0].choices).toEqual(["cat", "run", "blue", "quickly"]);
  });

  it("rejects a quiz with fewer than five questions", () => {
    expect(() => parseQuiz(quizJson(validQuestions().slice(0, 4)))).toThrow(QuizGenerationFailedError);
  });

  it("rejects the wrong mix of question types", () => {
    const questions = validQuestions();
    questions[4] = { type: "fill_blank", question: "A ___ names a thing.", correct_answer: "noun" };

    expect(() => parseQuiz(quizJson(questions))).toThrow(
      "Quiz must have 3 multiple choice, 1 fill_blank and 1 short_answer questions"
    );
  });

  it("rejects multiple choice questions without four options", () => {
    const questions = validQuestions();
    questions[0] = { ...multipleChoice("Pick one"), options: ["cat", "dog"] };

    expect(() => parseQuiz(quizJson(questions))).toThrow("has 2 options, expected 4");
  });

  it("rejects an answer key that matches no option", () => {
    const questions = validQuestions();
    questions[0] = multipleChoice("Pick one", "E");

    expect(() => parseQuiz(quizJson(questions))).toThrow('answer "E" matches no option');
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseQuiz("Q1: What is a noun?")).toThrow("Quiz response is not valid JSON");
  });

  it("rejects JSON with the wrong structure", () => {
    expect(() => parseQuiz(JSON.stringify({ quiz: [] }))).toThrow(QuizGenerationFailedError);
  });
});

describe("QuizGenerator", () => {
  let retrieve: jest.Mock<Promise<LessonChunk[]>, [number, string, number?]>;
  let complete: jest.Mock<Promise<string>, [ChatMessage[], CompletionOptions?]>;
  let generator: QuizGenerator;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    retrieve = jest.fn<Promise<LessonChunk[]>, [number, string, number?]>().mockResolvedValue([
      { lessonId: 1, lessonTitle: "Nouns", text: "A noun names a person, place or thing.", embedding: [1] },
    ]);
    complete = jest.fn<Promise<string>, [ChatMessage[], CompletionOptions?]>().mockResolvedValue(quizJson());
    const retriever: ChunkRetriever = { retrieve };
    const model: LanguageModel = { complete };
    generator = new QuizGenerator(retriever, model);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("builds the quiz from retrieved lesson content", async () => {
    const questions = await generator.generate(1, "Nouns");

    expect(questions).toHaveLength(5);
    expect(retrieve).toHaveBeenCalledWith(1, "Complete overview of Nouns", 5);

    const [messages, options] = complete.mock.calls[0];
    expect(messages[1].content).toContain("A noun names a person, place or thing.");
    expect(options).toEqual({ json: true, temperature: 0.3, maxTokens: 1500 });
  });

  it("falls back to the title when the lesson has no content", async () => {
    retrieve.mockResolvedValue([]);

    await generator.generate(1, "Nouns");

    expect(complete.mock.calls[0][0][1].content).toContain("base the questions on the lesson title");
  });

  it("reports provider failures as GenerationFailed", async () => {
    complete.mockRejectedValue(new Error("rate limited"));

    await expect(generator.generate(1, "Nouns")).rejects.toBeInstanceOf(GenerationFailedError);
  });

  it("reports malformed output as QuizGenerationFailed", async () => {
    complete.mockResolvedValue(JSON.stringify({ questions: [] }));

    await expect(generator.generate(1, "Nouns")).rejects.toBeInstanceOf(QuizGenerationFailedError);
  });
});
