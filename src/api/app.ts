import express, { Express } from "express";
import cors from "cors";
import { Tutor } from "../services/tutor";
import { createTutorRouter } from "./routes/tutor";
import { createUsersRouter } from "./routes/users";
import { createLessonsRouter } from "./routes/lessons";
import { createAdminRouter } from "./routes/admin";

export interface AppOptions {
  corsOrigins?: string[];
}

export function createApp(tutor: Tutor, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.corsOrigins ?? ["http://localhost:5173", "http://localhost:3000"],
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/api/tutor", createTutorRouter(tutor.workflow));
  app.use("/api/users", createUsersRouter(tutor.progressStore));
  app.use("/api/lessons", createLessonsRouter(tutor.listLessons));
  app.use("/api/admin", createAdminRouter(tutor));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({
      status: "ok",
      lessonsLoaded: tutor.lessonStore.lessonIds().length,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
