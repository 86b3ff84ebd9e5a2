import { Router, Response } from "express";
import { z } from "zod";
import { TeachingWorkflow } from "../../services/teachingWorkflow";
import { isTutorError } from "../../domain/errors";
import { REQUEST_SOURCES } from "../../domain/conversation";

const sourceSchema = z.enum(REQUEST_SOURCES).default("ui");

const greetBodySchema = z.object({
  userId: z.string().trim().min(1),
  source: sourceSchema,
});

const stepBodySchema = z.object({
  userId: z.string().trim().min(1),
  utterance: z.string().trim().min(1),
  source: sourceSchema,
});

/**
 * Turn failures that reach the route are persistence problems (503);
 * anything else is unexpected (500).
 */
export function sendTurnError(res: Response, error: unknown, context: string): void {
  console.error(`[API] ${context}:`, error);
  if (isTutorError(error) && error.kind === "PersistenceFailed") {
    res.status(503).json({ error: "Progress storage is unavailable, please try again later" });
    return;
  }
  res.status(500).json({ error: "Something went wrong" });
}

export function createTutorRouter(workflow: TeachingWorkflow): Router {
  const router = Router();

  // POST /api/tutor/greet - Open a session with a lesson introduction
  router.post("/greet", async (req, res) => {
    const parsed = greetBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "userId is required", details: parsed.error.flatten().fieldErrors });
    }

    try {
      const result = await workflow.greet(parsed.data.userId, parsed.data.source);
      res.json(result);
    } catch (error) {
      sendTurnError(res, error, "Greeting failed");
    }
  });

  // POST /api/tutor/step - Send one learner message
  router.post("/step", async (req, res) => {
    const parsed = stepBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: "userId and utterance are required",
        details: parsed.error.flatten().fieldErrors,
      });
    }

    try {
      const { userId, utterance, source } = parsed.data;
      const result = await workflow.step(userId, utterance, source);
      res.json(result);
    } catch (error) {
      sendTurnError(res, error, "Turn failed");
    }
  });

  return router;
}
