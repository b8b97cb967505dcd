import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { asyncHandler } from "../lib/async-handler";
import { NotFoundError } from "../lib/errors";
import { authorsWithBookCount } from "../lib/library-reports";
import { isoDateSchema } from "../lib/time";

const authorInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  country: z.string().trim().min(1).max(100),
  birthDate: isoDateSchema
    .nullable()
    .optional()
    .transform((value) => value ?? null)
});

const authorParamsSchema = z.object({ authorId: z.string().min(1) });

export const createAuthorsRouter = ({ store }: AppContext): Router => {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          q: z.string().trim().min(1).optional(),
          country: z.string().trim().min(1).optional()
        })
        .parse(req.query);
      const authors = await store.listAuthors(query);
      res.status(200).json({ data: authors });
    })
  );

  router.get(
    "/with-statistics",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: authorsWithBookCount(snapshot) });
    })
  );

  router.get(
    "/:authorId",
    asyncHandler(async (req, res) => {
      const params = authorParamsSchema.parse(req.params);
      const author = await store.getAuthor(params.authorId);
      if (!author) {
        throw new NotFoundError("author not found");
      }
      res.status(200).json({ data: author });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = authorInputSchema.parse(req.body);
      const created = await store.createAuthor(payload);
      res.status(201).json({ data: created });
    })
  );

  router.patch(
    "/:authorId",
    asyncHandler(async (req, res) => {
      const params = authorParamsSchema.parse(req.params);
      const payload = authorInputSchema.partial().parse(req.body);
      const updated = await store.updateAuthor(params.authorId, payload);
      res.status(200).json({ data: updated });
    })
  );

  router.delete(
    "/:authorId",
    asyncHandler(async (req, res) => {
      const params = authorParamsSchema.parse(req.params);
      await store.deleteAuthor(params.authorId);
      res.status(204).send();
    })
  );

  return router;
};
