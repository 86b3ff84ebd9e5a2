import { ActiveQuiz, QuizSessionStore } from "./quizSessionStore";

const quiz = (): ActiveQuiz => ({
  userId: "u1",
  lessonId: 1,
  questions: [{ id: 1, kind: "fill_blank", prompt: "The ___ barked.", correctAnswer: "dog" }],
  answers: [],
  startedAt: "2024-01-15T10:00:00.000Z",
});

describe("QuizSessionStore", () => {
  it("returns null when no quiz is active", () => {
    expect(new QuizSessionStore().get("u1")).toBeNull();
  });

  it("saves and deletes a quiz per user", () => {
    const store = new QuizSessionStore();
    store.save(quiz());

    expect(store.get("u1")?.lessonId).toBe(1);
    expect(store.get("u2")).toBeNull();
    expect(store.delete("u1")).toBe(true);
    expect(store.get("u1")).toBeNull();
  });

  it("hands out copies so callers cannot change the stored quiz", () => {
    const store = new QuizSessionStore();
    store.save(quiz());

    const copy = store.get("u1");
    copy?.answers.push("dog");

    expect(store.get("u1")?.answers).toEqual([]);
  });
});
