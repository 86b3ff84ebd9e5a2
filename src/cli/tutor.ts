import "dotenv/config";
import readline from "readline";
import { loadConfig } from "../config";
import { createTutor, Tutor } from "../services/tutor";
import { describeError, isTutorError } from "../domain/errors";
import { ask, formatProgress, formatSummary, parseCommand, toUserId } from "./helpers";

const DIVIDER = "-".repeat(60);

async function showSummary(tutor: Tutor, userId: string): Promise<void> {
  const progress = await tutor.progressStore.getOrCreate(userId);
  const lesson = tutor.listLessons().find((l) => l.lessonId === progress.currentLessonId);
  if (!lesson) {
    console.log("\nThere is no current lesson to summarize.\n");
    return;
  }

  try {
    const chunks = await tutor.retriever.summarize(lesson.lessonId, lesson.title, tutor.config.retrievalK);
    console.log(`\nLESSON SUMMARY: ${lesson.title}\n${DIVIDER}\n${formatSummary(chunks)}\n`);
  } catch (error) {
    if (!isTutorError(error)) {
      throw error;
    }
    console.log(`\nCould not build a summary: ${error.message}\n`);
  }
}

async function chat(rl: readline.Interface, tutor: Tutor, userId: string): Promise<void> {
  const greeting = await tutor.workflow.greet(userId, "cli");
  console.log(`\nLESSON ${greeting.lessonId}: ${greeting.lessonTitle}\n${DIVIDER}`);
  console.log(`\nTeacher: ${greeting.reply}\n`);
  console.log("Commands: 'quiz me' (take the quiz) | 'summary' | 'progress' | 'quit'\n");

  let lessonId = greeting.lessonId;

  while (true) {
    const input = await ask(rl, "You: ");
    if (!input) {
      continue;
    }

    const command = parseCommand(input);
    if (command === "quit") {
      console.log("\nGoodbye! Keep practicing!\n");
      return;
    }
    if (command === "progress") {
      const progress = await tutor.progressStore.getOrCreate(userId);
      console.log(`\n${formatProgress(progress, tutor.listLessons())}\n`);
      continue;
    }
    if (command === "summary") {
      await showSummary(tutor, userId);
      continue;
    }

    const result = await tutor.workflow.step(userId, input, "cli");
    console.log(`\nTeacher: ${result.reply}\n`);

    if (result.lessonId !== lessonId) {
      lessonId = result.lessonId;
      console.log(`${DIVIDER}\nLESSON ${result.lessonId}: ${result.lessonTitle}\n${DIVIDER}\n`);
    }
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.openaiApiKey) {
    console.error("OPENAI_API_KEY is not set. Add it to .env to talk to the tutor.");
    process.exitCode = 1;
    return;
  }

  const tutor = createTutor(config);
  if (tutor.lessonStore.size === 0) {
    console.warn("The lesson index is empty. Run the ingest script first for lesson-based answers.\n");
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    console.log(`\n${"=".repeat(60)}\nWelcome to the lesson tutor!\n${"=".repeat(60)}\n`);
    const userId = toUserId(await ask(rl, "Enter your name or ID: "));
    console.log(`\nHello, ${userId}! Let's start learning.`);
    await chat(rl, tutor, userId);
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  console.error(`\nAn error occurred: ${describeError(error)}\n`);
  process.exitCode = 1;
});
