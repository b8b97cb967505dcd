import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { asyncHandler } from "../lib/async-handler";
import { NotFoundError } from "../lib/errors";
import { readersWithActiveLoans } from "../lib/library-reports";
import { createPresenter } from "../lib/presenters";

// registrationDate is stamped on creation and never accepted from clients.
const readerInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().toLowerCase().max(254).email()
});

const readerParamsSchema = z.object({ readerId: z.string().min(1) });

export const createReadersRouter = ({ store, clock }: AppContext): Router => {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = z.object({ q: z.string().trim().min(1).optional() }).parse(req.query);
      res.status(200).json({ data: await store.listReaders(query) });
    })
  );

  router.get(
    "/with-active-loans",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: readersWithActiveLoans(snapshot) });
    })
  );

  router.get(
    "/:readerId",
    asyncHandler(async (req, res) => {
      const params = readerParamsSchema.parse(req.params);
      const reader = await store.getReader(params.readerId);
      if (!reader) {
        throw new NotFoundError("reader not found");
      }
      res.status(200).json({ data: reader });
    })
  );

  router.get(
    "/:readerId/loans",
    asyncHandler(async (req, res) => {
      const params = readerParamsSchema.parse(req.params);
      const query = z.object({ status: z.enum(["active", "returned"]).optional() }).parse(req.query);
      const reader = await store.getReader(params.readerId);
      if (!reader) {
        throw new NotFoundError("reader not found");
      }
      const loans = await store.listLoans({ readerId: reader.id, status: query.status });
      const presenter = createPresenter(await store.readSnapshot(), clock.today());
      res.status(200).json({ data: loans.map(presenter.loan) });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = readerInputSchema.parse(req.body);
      const created = await store.createReader({ ...payload, registrationDate: clock.today() });
      res.status(201).json({ data: created });
    })
  );

  router.patch(
    "/:readerId",
    asyncHandler(async (req, res) => {
      const params = readerParamsSchema.parse(req.params);
      const payload = readerInputSchema.partial().parse(req.body);
      const updated = await store.updateReader(params.readerId, payload);
      res.status(200).json({ data: updated });
    })
  );

  router.delete(
    "/:readerId",
    asyncHandler(async (req, res) => {
      const params = readerParamsSchema.parse(req.params);
      await store.deleteReader(params.readerId);
      res.status(204).send();
    })
  );

  return router;
};
