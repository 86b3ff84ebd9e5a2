import { QuizEvaluator, normalizeAnswer } from "./quizEvaluator";
import { ChatMessage, CompletionOptions, LanguageModel } from "./languageModel";
import { QuizQuestion } from "./quiz";
import { QuizEvaluationFailedError } from "./errors";

const questions: QuizQuestion[] = [
  { id: 1, kind: "multiple_choice", prompt: "Pick the noun", choices: ["cat", "run", "blue", "quickly"], correctAnswer: "A" },
  { id: 2, kind: "multiple_choice", prompt: "Pick the verb", choices: ["cat", "run", "blue", "quickly"], correctAnswer: "B" },
  { id: 3, kind: "multiple_choice", prompt: "Pick the adjective", choices: ["cat", "run", "blue", "quickly"], correctAnswer: "C" },
  { id: 4, kind: "fill_blank", prompt: "The ___ barked.", correctAnswer: "dog" },
  { id: 5, kind: "short_answer", prompt: "What does a noun do?", correctAnswer: "It names a person, place or thing." },
];

describe("normalizeAnswer", () => {
  it("trims, collapses whitespace and lowercases", () => {
    expect(normalizeAnswer("  The   Big\tDog ")).toBe("the big dog");
  });
});

describe("QuizEvaluator", () => {
  let complete: jest.Mock<Promise<string>, [ChatMessage[], CompletionOptions?]>;
  let evaluator: QuizEvaluator;

  beforeEach(() => {
    complete = jest
      .fn<Promise<string>, [ChatMessage[], CompletionOptions?]>()
      .mockResolvedValue(JSON.stringify({ correct: true, feedback: "Nice explanation!" }));
    const model: LanguageModel = { complete };
    evaluator = new QuizEvaluator(model);
  });

  it("scores a perfect quiz as 1", async () => {
    const result = await evaluator.evaluate(questions, ["A", "B", "C", "dog", "It names things"]);

    expect(result.score).toBe(1);
    expect(result.correctCount).toBe(5);
    expect(result.total).toBe(5);
  });

  it("scores 4 of 5 as 0.8", async () => {
    const result = await evaluator.evaluate(questions, ["A", "B", "D", "dog", "It names things"]);

    expect(result.score).toBe(0.8);
    expect(result.results.map((r) => r.isCorrect)).toEqual([true, true, false, true, true]);
    expect(result.perQuestionFeedback[2]).toBe("Question 3: Not quite. The answer is C) blue.");
  });

  it("accepts letters in any case and with punctuation", async () => {
    const result = await evaluator.evaluate(questions, ["a", "b)", "Option C", "dog", "x"]);

    expect(result.results.slice(0, 3).every((r) => r.isCorrect)).toBe(true);
  });

  it("accepts the full choice text for multiple choice", async () => {
    const result = await evaluator.evaluate(questions, [" CAT ", "run", "quickly", "dog", "x"]);

    expect(result.results.slice(0, 3).map((r) => r.isCorrect)).toEqual([true, true, false]);
  });

  it("accepts an answer typed the way the choice is shown", async () => {
    const result = await evaluator.evaluate(questions, ["A) cat", "b. Run", "B) run", "dog", "x"]);

    expect(result.results.slice(0, 3).map((r) => r.isCorrect)).toEqual([true, true, false]);
  });

  it("matches fill-in-the-blank answers after normalization", async () => {
    const correct = await evaluator.evaluate(questions, ["A", "B", "C", "  DOG ", "x"]);
    const wrong = await evaluator.evaluate(questions, ["A", "B", "C", "dogs", "x"]);

    expect(correct.results[3].isCorrect).toBe(true);
    expect(wrong.results[3].isCorrect).toBe(false);
    expect(wrong.results[3].feedback).toBe("Not quite. The answer is dog.");
  });

  it("asks the model to judge short answers", async () => {
    complete.mockResolvedValue(JSON.stringify({ correct: false }));

    const result = await evaluator.evaluate(questions, ["A", "B", "C", "dog", "It is a verb"]);

    expect(complete).toHaveBeenCalledTimes(1);
    const [messages, options] = complete.mock.calls[0];
    expect(messages[1].content).toContain("It is a verb");
    expect(options).toEqual({ json: true, temperature: 0.3, maxTokens: 200 });
    expect(result.results[4].isCorrect).toBe(false);
    expect(result.perQuestionFeedback[4]).toBe("Question 5: A good answer: It names a person, place or thing.");
    expect(result.score).toBe(0.8);
  });

  it("marks an empty short answer wrong without calling the model", async () => {
    const result = await evaluator.evaluate(questions, ["A", "B", "C", "dog", "   "]);

    expect(complete).not.toHaveBeenCalled();
    expect(result.results[4].isCorrect).toBe(false);
  });

  it("uses the model's feedback when it gives one", async () => {
    const result = await evaluator.evaluate(questions, ["A", "B", "C", "dog", "It names things"]);

    expect(result.perQuestionFeedback[4]).toBe("Question 5: Nice explanation!");
  });

  it("fails when the answer count does not match", async () => {
    await expect(evaluator.evaluate(questions, ["A", "B"])).rejects.toThrow("Expected 5 answers, got 2");
  });

  it("fails with QuizEvaluationFailed when the model is unavailable", async () => {
    complete.mockRejectedValue(new Error("timeout"));

    await expect(evaluator.evaluate(questions, ["A", "B", "C", "dog", "It names things"])).rejects.toBeInstanceOf(
      QuizEvaluationFailedError
    );
  });

  it("fails with QuizEvaluationFailed when the judgement is malformed", async () => {
    complete.mockResolvedValue(JSON.stringify({ verdict: "yes" }));

    await expect(evaluator.evaluate(questions, ["A", "B", "C", "dog", "It names things"])).rejects.toBeInstanceOf(
      QuizEvaluationFailedError
    );
  });
});
