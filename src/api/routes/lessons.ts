import { Router } from "express";
import { LessonInfo } from "../../domain/lesson";

export function createLessonsRouter(listLessons: () => LessonInfo[]): Router {
  const router = Router();

  // GET /api/lessons - List lessons in course order
  router.get("/", (req, res) => {
    try {
      const lessons = listLessons().map((lesson) => ({
        id: lesson.lessonId,
        title: lesson.title,
        section: lesson.section,
      }));
      res.json({ lessons });
    } catch (error) {
      console.error("[API] Error fetching lessons:", error);
      res.status(500).json({ error: "Failed to fetch lessons" });
    }
  });

  return router;
}
