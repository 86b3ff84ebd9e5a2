import readline from "readline";
import { LessonChunk, LessonInfo } from "../domain/lesson";
import { UserProgressRecord } from "../domain/progress";

export const DEFAULT_USER_ID = "default_user";

export type CliCommand = "quit" | "progress" | "summary";

const COMMANDS: readonly CliCommand[] = ["quit", "progress", "summary"];

const SUMMARY_PREVIEW_LENGTH = 200;

/**
 * Ask one question and resolve with the trimmed answer
 */
export async function ask(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer: string) => {
      resolve(answer.trim());
    });
  });
}

/**
 * A learner's name doubles as their id; blank names share the default user
 */
export function toUserId(name: string): string {
  return name.trim() || DEFAULT_USER_ID;
}

/**
 * Recognize a terminal command ("quit", "progress", "summary"); anything else
 * goes to the tutor.
 */
export function parseCommand(input: string): CliCommand | null {
  const lower = input.trim().toLowerCase();
  return COMMANDS.find((command) => command === lower) ?? null;
}

export function formatProgress(progress: UserProgressRecord, lessons: LessonInfo[]): string {
  const titleOf = (lessonId: number) =>
    lessons.find((lesson) => lesson.lessonId === lessonId)?.title ?? `Lesson ${lessonId}`;

  const courseComplete = lessons.length > 0 && progress.currentLessonId > lessons.length;
  const current = courseComplete
    ? "course complete"
    : `${progress.currentLessonId}. ${titleOf(progress.currentLessonId)}`;

  const lines = [
    `Current lesson: ${current}`,
    `Completed: ${progress.completedLessons.length} of ${lessons.length} lessons`,
  ];

  const scored = Object.entries(progress.lessonScores)
    .map(([lessonId, score]) => ({ lessonId: Number(lessonId), score }))
    .sort((a, b) => a.lessonId - b.lessonId);
  for (const { lessonId, score } of scored) {
    lines.push(`  ${lessonId}. ${titleOf(lessonId)}: ${Math.round(score * 100)}%`);
  }

  return lines.join("\n");
}

export function formatSummary(chunks: LessonChunk[]): string {
  return chunks
    .map((chunk, i) => {
      const preview =
        chunk.text.length > SUMMARY_PREVIEW_LENGTH ? `${chunk.text.slice(0, SUMMARY_PREVIEW_LENGTH)}...` : chunk.text;
      return `${i + 1}. ${preview}`;
    })
    .join("\n\n");
}
