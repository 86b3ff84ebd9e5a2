import fs from "fs";
import os from "os";
import path from "path";
import { Server } from "http";
import { createApp } from "./app";
import { createTutor } from "../services/tutor";
import { loadConfig } from "../config";
import { ChatMessage, CompletionOptions } from "../domain/languageModel";

describe("API", () => {
  let dataDir: string;
  let server: Server;
  let baseUrl: string;
  let complete: jest.Mock<Promise<string>, [ChatMessage[], CompletionOptions?]>;
  let embed: jest.Mock<Promise<number[][]>, [string[]]>;

  const post = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});

    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "tutor-api-"));
    const sectionDir = path.join(dataDir, "course", "grammar", "section1");
    fs.mkdirSync(sectionDir, { recursive: true });
    fs.writeFileSync(path.join(sectionDir, "lesson_1.txt"), "# Lesson 1: Nouns\nA noun names a person, place or thing.");

    complete = jest
      .fn<Promise<string>, [ChatMessage[], CompletionOptions?]>()
      .mockResolvedValue("Nouns name things.");
    embed = jest.fn<Promise<number[][]>, [string[]]>().mockResolvedValue([]);
    const tutor = createTutor(loadConfig({ DATA_DIR: dataDir, COURSE_NAME: "grammar" }), {
      chat: { complete },
      embeddings: { embed },
    });

    await new Promise<void>((resolve) => {
      server = createApp(tutor).listen(0, "127.0.0.1", () => resolve());
    });
    const address = server.address();
    baseUrl = address && typeof address === "object" ? `http://127.0.0.1:${address.port}` : "";
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    fs.rmSync(dataDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "ok",
      lessonsLoaded: 0,
      timestamp: expect.any(String),
    });
  });

  it("lists lessons", async () => {
    const response = await fetch(`${baseUrl}/api/lessons`);

    expect(await response.json()).toEqual({ lessons: [{ id: 1, title: "Nouns", section: "section1" }] });
  });

  it("runs a tutoring turn", async () => {
    const response = await post("/api/tutor/step", { userId: "u1", utterance: "hi", source: "cli" });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      reply: "Nouns name things.",
      phase: "teaching",
      kind: "teaching",
      lessonId: 1,
      lessonTitle: "Nouns",
    });
  });

  it("rejects a turn without an utterance", async () => {
    const response = await post("/api/tutor/step", { userId: "u1" });

    expect(response.status).toBe(400);
    expect(complete).not.toHaveBeenCalled();
  });

  it("rejects an unknown source", async () => {
    const response = await post("/api/tutor/step", { userId: "u1", utterance: "hi", source: "fax" });

    expect(response.status).toBe(400);
  });

  it("greets a learner", async () => {
    const response = await post("/api/tutor/greet", { userId: "u1" });

    expect(await response.json()).toMatchObject({ reply: "Nouns name things.", kind: "teaching" });
  });

  it("returns progress and history", async () => {
    await post("/api/tutor/step", { userId: "u1", utterance: "hi" });

    const progress = await fetch(`${baseUrl}/api/users/u1`);
    expect(await progress.json()).toMatchObject({
      userId: "u1",
      currentLessonId: 1,
      completedLessons: [],
      lessonScores: {},
      phase: "teaching",
    });

    const history = await fetch(`${baseUrl}/api/users/u1/history`);
    expect(await history.json()).toEqual({
      history: [
        { sender: "user", text: "hi", timestamp: expect.any(String) },
        { sender: "assistant", text: "Nouns name things.", timestamp: expect.any(String) },
      ],
    });
  });

  it("answers 503 when progress cannot be read", async () => {
    fs.writeFileSync(path.join(dataDir, "progress", "broken.json"), "{not json");

    const response = await post("/api/tutor/step", { userId: "broken", utterance: "hi" });

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: "Progress storage is unavailable, please try again later" });
  });

  describe("admin", () => {
    it("reports an empty index before ingestion", async () => {
      const response = await fetch(`${baseUrl}/api/admin/index-stats`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ indexExists: false, totalChunks: 0, lessons: [] });
    });

    it("rebuilds the index and reports chunks per lesson", async () => {
      embed.mockImplementation(async (texts) => texts.map(() => [1, 0]));

      const rebuilt = await post("/api/admin/rebuild-index", {});

      expect(rebuilt.status).toBe(200);
      expect(await rebuilt.json()).toEqual({ rebuilt: true, lessons: 1, chunks: 1 });
      expect(embed).toHaveBeenCalledWith(["# Lesson 1: Nouns\nA noun names a person, place or thing."]);

      const stats = await fetch(`${baseUrl}/api/admin/index-stats`);
      expect(await stats.json()).toEqual({
        indexExists: true,
        totalChunks: 1,
        lessons: [{ lessonId: 1, lessonTitle: "Nouns", chunks: 1 }],
      });

      const health = await fetch(`${baseUrl}/api/health`);
      expect(await health.json()).toMatchObject({ lessonsLoaded: 1 });
    });

    it("answers 500 when the embedding call fails during a rebuild", async () => {
      embed.mockRejectedValue(new Error("offline"));

      const response = await post("/api/admin/rebuild-index", {});

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: "Failed to rebuild the lesson index" });
    });
  });
});
