import { formatProgress, formatSummary, parseCommand, toUserId } from "./helpers";
import { LessonInfo } from "../domain/lesson";
import { UserProgressRecord } from "../domain/progress";

const lessons: LessonInfo[] = [
  { lessonId: 1, title: "Nouns", section: "s1", fileName: "a.txt", filePath: "/c/s1/a.txt", fileSize: 10 },
  { lessonId: 2, title: "Verbs", section: "s1", fileName: "b.txt", filePath: "/c/s1/b.txt", fileSize: 10 },
];

const progress = (overrides: Partial<UserProgressRecord> = {}): UserProgressRecord => ({
  userId: "ana",
  currentLessonId: 1,
  completedLessons: [],
  lessonScores: {},
  phase: "teaching",
  createdAt: "2024-01-15T10:00:00.000Z",
  lastAccessed: "2024-01-15T10:00:00.000Z",
  ...overrides,
});

describe("toUserId", () => {
  it("uses the trimmed name", () => {
    expect(toUserId("  Ana ")).toBe("Ana");
  });

  it("falls back to the default user", () => {
    expect(toUserId("   ")).toBe("default_user");
  });
});

describe("parseCommand", () => {
  it("recognizes commands in any case", () => {
    expect(parseCommand(" QUIT ")).toBe("quit");
    expect(parseCommand("summary")).toBe("summary");
    expect(parseCommand("progress")).toBe("progress");
  });

  it("returns null for anything else", () => {
    expect(parseCommand("quiz me")).toBeNull();
  });
});

describe("formatProgress", () => {
  it("lists the current lesson and scores in lesson order", () => {
    const text = formatProgress(
      progress({ currentLessonId: 2, completedLessons: [1], lessonScores: { "2": 0.4, "1": 0.8 } }),
      lessons
    );

    expect(text).toBe(
      ["Current lesson: 2. Verbs", "Completed: 1 of 2 lessons", "  1. Nouns: 80%", "  2. Verbs: 40%"].join("\n")
    );
  });

  it("reports a finished course", () => {
    const text = formatProgress(progress({ currentLessonId: 3, completedLessons: [1, 2] }), lessons);

    expect(text.split("\n")[0]).toBe("Current lesson: course complete");
  });
});

describe("formatSummary", () => {
  it("numbers chunks and shortens long ones", () => {
    const long = "x".repeat(250);
    const text = formatSummary([
      { lessonId: 1, lessonTitle: "Nouns", text: "Short point.", embedding: [] },
      { lessonId: 1, lessonTitle: "Nouns", text: long, embedding: [] },
    ]);

    expect(text).toBe(`1. Short point.\n\n2. ${"x".repeat(200)}...`);
  });
});
