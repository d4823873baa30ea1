import { Router, Request, Response } from "express";
import { z } from "zod";
import { AppConfig } from "../config";
import { runPipeline, PipelineDeps } from "../services/pipeline";
import { errorMessage } from "../errors";

const RunPipelineBodySchema = z.object({
  topic_keywords: z.array(z.string().trim().min(1)).min(1).optional(),
  conference_topic: z.string().trim().min(1).optional(),
  batch_limit: z.number().int().min(0).optional(),
});

/**
 * POST /pipeline/run
 * Identify → Enrich → Score → Return ranked leads
 */
export function createPipelineRouter(deps: PipelineDeps, cfg: AppConfig): Router {
  const router = Router();

  router.post("/run", async (req: Request, res: Response) => {
    const body = RunPipelineBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({
        error: "Invalid request body",
        issues: body.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
      });
    }

    try {
      const result = await runPipeline(
        deps,
        {
          topicKeywords: body.data.topic_keywords ?? cfg.topicKeywords,
          conferenceTopic: body.data.conference_topic ?? cfg.conferenceTopic,
          batchLimit: body.data.batch_limit ?? cfg.enrichmentBatchLimit,
        },
        {
          maxCitationResults: cfg.citationMaxResults,
          fromYear: cfg.citationFromYear,
          toYear: cfg.citationToYear,
          overflow: cfg.enrichmentOverflow,
          combineMode: cfg.scoreCombineMode,
        }
      );
      return res.status(200).json(result);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[pipeline] Error:`, message);
      return res.status(500).json({ error: message });
    }
  });

  return router;
}
