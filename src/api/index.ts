import dotenv from "dotenv";
import { loadConfig } from "../config";
import { createTutor } from "../services/tutor";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const tutor = createTutor(config);
const app = createApp(tutor, {
  corsOrigins: process.env.CORS_ORIGINS ? process.env.CORS_ORIGINS.split(",") : undefined,
});

if (tutor.lessonStore.size === 0) {
  console.warn("[API] Lesson index is empty; run the ingest script before teaching");
}

// Start server
app.listen(config.apiPort, () => {
  console.log(`API server running on http://localhost:${config.apiPort}`);
});

export default app;
