import { Router } from "express";
import type { AppContext } from "../context";
import { createAuthorsRouter } from "./authors.routes";
import { createBooksRouter } from "./books.routes";
import { createLoansRouter } from "./loans.routes";
import { createReadersRouter } from "./readers.routes";
import { createReportsRouter } from "./reports.routes";

export const createApiRouter = (context: AppContext): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.status(200).json({
      status: "ok",
      message: "Library Ledger API v1",
      docs: {
        health: "/health",
        authors: "/api/v1/authors",
        books: "/api/v1/books",
        readers: "/api/v1/readers",
        loans: "/api/v1/loans",
        reports: "/api/v1/reports"
      }
    });
  });

  router.use("/authors", createAuthorsRouter(context));
  router.use("/books", createBooksRouter(context));
  router.use("/readers", createReadersRouter(context));
  router.use("/loans", createLoansRouter(context));
  router.use("/reports", createReportsRouter(context));

  return router;
};
