import { Router } from "express";
import { z } from "zod";
import type { LinkPreviewService } from "../lib/linkPreview";
import { MAX_AGE } from "../lib/previewCache";

const linkPreviewQuerySchema = z.object({ url: z.string().min(1) });

export function createLinkPreviewRouter(service: LinkPreviewService): Router {
  const router = Router();

  router.get("/link_preview", async (req, res) => {
    const parsed = linkPreviewQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ message: "Missing url query parameter" });
      return;
    }

    const outcome = await service.getPreview(parsed.data.url);
    if (outcome.ok) {
      res.set("Cache-Control", `max-age=${MAX_AGE}`).json(outcome.metadata);
      return;
    }
    // The cached error text is the whole body
    res.status(500).type("text/plain").send(outcome.error);
  });

  return router;
}
