import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { asyncHandler } from "../lib/async-handler";
import {
  bookStatistics,
  booksWithLoanStatistics,
  groupTitlesByAuthor,
  libraryReport,
  popularBooks,
  readingTime
} from "../lib/library-reports";
import { inconsistencyReporter } from "../lib/loan-lifecycle";

export const createReportsRouter = ({ store, clock, logger }: AppContext): Router => {
  const router = Router();
  const onInconsistency = inconsistencyReporter(logger);

  router.get(
    "/library-statistics",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: libraryReport(snapshot, clock.today(), { onInconsistency }) });
    })
  );

  router.get(
    "/reading-time",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          pagesPerHour: z.coerce.number().int().min(1).max(1000).default(50)
        })
        .parse(req.query);
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: readingTime(snapshot.books, query.pagesPerHour), meta: query });
    })
  );

  router.get(
    "/book-statistics",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: bookStatistics(snapshot.books) });
    })
  );

  router.get(
    "/popular-books",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          minLoans: z.coerce.number().int().min(1).default(3)
        })
        .parse(req.query);
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: popularBooks(snapshot, query.minLoans), meta: query });
    })
  );

  router.get(
    "/loan-statistics",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: booksWithLoanStatistics(snapshot, clock.today()) });
    })
  );

  router.get(
    "/titles-by-author",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      res.status(200).json({ data: groupTitlesByAuthor(snapshot) });
    })
  );

  return router;
};
