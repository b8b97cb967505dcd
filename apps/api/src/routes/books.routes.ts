import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { asyncHandler } from "../lib/async-handler";
import { NotFoundError } from "../lib/errors";
import { booksWithStatus } from "../lib/library-reports";
import { inconsistencyReporter } from "../lib/loan-lifecycle";
import { createPresenter, presentBook, type BookView } from "../lib/presenters";
import { genres, type Book } from "../types/library";

const bookInputSchema = z.object({
  title: z.string().trim().min(1).max(300),
  isbn: z
    .string()
    .trim()
    .regex(/^\d{13}$/, "ISBN must be exactly 13 digits"),
  publicationYear: z.coerce.number().int().min(1450).max(2100),
  pages: z.coerce.number().int().min(1),
  genre: z.enum(genres),
  authorId: z.string().min(1)
});

const bookParamsSchema = z.object({ bookId: z.string().min(1) });

export const createBooksRouter = ({ store, clock, logger, loans }: AppContext): Router => {
  const router = Router();

  const presentAll = async (books: Book[]): Promise<BookView[]> => {
    const snapshot = await store.readSnapshot();
    const presenter = createPresenter(snapshot, clock.today());
    return books.map(presenter.book);
  };

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          q: z.string().trim().min(1).optional(),
          authorId: z.string().min(1).optional(),
          genre: z.enum(genres).optional(),
          afterYear: z.coerce.number().int().optional(),
          minPages: z.coerce.number().int().min(0).optional()
        })
        .parse(req.query);

      const books = await store.listBooks(query);
      res.status(200).json({ data: await presentAll(books) });
    })
  );

  router.get(
    "/available",
    asyncHandler(async (_req, res) => {
      res.status(200).json({ data: await presentAll(await loans.listAvailableBooks()) });
    })
  );

  router.get(
    "/on-loan",
    asyncHandler(async (_req, res) => {
      res.status(200).json({ data: await presentAll(await loans.listOnLoanBooks()) });
    })
  );

  router.get(
    "/with-status",
    asyncHandler(async (_req, res) => {
      const snapshot = await store.readSnapshot();
      const data = booksWithStatus(snapshot, clock.today(), { onInconsistency: inconsistencyReporter(logger) });
      res.status(200).json({ data });
    })
  );

  router.get(
    "/:bookId",
    asyncHandler(async (req, res) => {
      const params = bookParamsSchema.parse(req.params);
      const book = await store.getBook(params.bookId);
      if (!book) {
        throw new NotFoundError("book not found");
      }
      res.status(200).json({ data: presentBook(book, await store.getAuthor(book.authorId)) });
    })
  );

  router.get(
    "/:bookId/status",
    asyncHandler(async (req, res) => {
      const params = bookParamsSchema.parse(req.params);
      const status = await loans.getBookStatus(params.bookId);
      res.status(200).json({ data: { bookId: params.bookId, status } });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = bookInputSchema.parse(req.body);
      const created = await store.createBook(payload);
      res.status(201).json({ data: presentBook(created, await store.getAuthor(created.authorId)) });
    })
  );

  router.patch(
    "/:bookId",
    asyncHandler(async (req, res) => {
      const params = bookParamsSchema.parse(req.params);
      const payload = bookInputSchema.partial().parse(req.body);
      const updated = await store.updateBook(params.bookId, payload);
      res.status(200).json({ data: presentBook(updated, await store.getAuthor(updated.authorId)) });
    })
  );

  router.delete(
    "/:bookId",
    asyncHandler(async (req, res) => {
      const params = bookParamsSchema.parse(req.params);
      await store.deleteBook(params.bookId);
      res.status(204).send();
    })
  );

  return router;
};
