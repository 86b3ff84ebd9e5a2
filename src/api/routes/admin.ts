import { Router } from "express";
import { Tutor } from "../../services/tutor";
import { ingestCourse } from "../../services/lessonIngestion";
import { describeError } from "../../domain/errors";

export function createAdminRouter(tutor: Tutor): Router {
  const router = Router();
  let rebuilding = false;

  // POST /api/admin/rebuild-index - Re-chunk and re-embed the whole course
  router.post("/rebuild-index", async (req, res) => {
    if (rebuilding) {
      return res.status(409).json({ error: "A rebuild is already running" });
    }

    rebuilding = true;
    try {
      const { config } = tutor;
      const summary = await ingestCourse(tutor.lessonStore, tutor.embeddings, {
        coursePath: config.coursePath,
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        forceRebuild: true,
      });
      tutor.reloadLessons();
      res.json(summary);
    } catch (error) {
      console.error(`[API] Index rebuild failed: ${describeError(error)}`);
      res.status(500).json({ error: "Failed to rebuild the lesson index" });
    } finally {
      rebuilding = false;
    }
  });

  // GET /api/admin/index-stats - Chunk counts per lesson
  router.get("/index-stats", (req, res) => {
    try {
      const { lessonStore } = tutor;
      const lessons = lessonStore.lessonIds().map((lessonId) => {
        const chunks = lessonStore.getByLesson(lessonId);
        return { lessonId, lessonTitle: chunks[0].lessonTitle, chunks: chunks.length };
      });
      res.json({ indexExists: lessonStore.exists(), totalChunks: lessonStore.size, lessons });
    } catch (error) {
      console.error("[API] Error fetching index stats:", error);
      res.status(500).json({ error: "Failed to fetch index stats" });
    }
  });

  return router;
}
