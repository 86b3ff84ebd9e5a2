import { Router } from "express";
import { ProgressStore } from "../../stores/progressStore";
import { sendTurnError } from "./tutor";

export function createUsersRouter(progressStore: ProgressStore): Router {
  const router = Router();

  // GET /api/users/:userId - Progress record (created on first contact)
  router.get("/:userId", async (req, res) => {
    try {
      const progress = await progressStore.getOrCreate(req.params.userId);
      res.json(progress);
    } catch (error) {
      sendTurnError(res, error, "Error fetching user");
    }
  });

  // GET /api/users/:userId/history - Conversation history, oldest first
  router.get("/:userId/history", async (req, res) => {
    try {
      const history = await progressStore.getHistory(req.params.userId);
      res.json({ history });
    } catch (error) {
      sendTurnError(res, error, "Error fetching history");
    }
  });

  return router;
}
