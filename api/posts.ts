import { Router } from "express";
import { z } from "zod";
import { InputFileNotFoundError } from "../services/errors";
import { BatchOptions, generatePosts } from "../services/runBatch";

export const postsRequestSchema = z.object({
  excelPath: z.string().min(1),
  outDir: z.string().min(1)
});

interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export function createPostsHandler(options: BatchOptions = {}) {
  return async function postsHandler(req: { body?: unknown }, res: JsonResponse) {
    const parsed = postsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: "Expected { excelPath: string, outDir: string }"
      });
    }

    try {
      const summary = await generatePosts(parsed.data.excelPath, parsed.data.outDir, options);
      return res.json({ summary });
    } catch (err) {
      if (err instanceof InputFileNotFoundError) {
        return res.status(400).json({ error: err.message });
      }
      console.error("POSTS ERROR:", err);
      return res.status(500).json({
        error: err instanceof Error ? err.message : "Internal error"
      });
    }
  };
}

export const postsHandler = createPostsHandler();

export const postsRouter = Router();

postsRouter.post("/", postsHandler);
