import { Router } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { asyncHandler } from "../lib/async-handler";
import { NotFoundError } from "../lib/errors";
import { createPresenter, presentLoan, type LoanView } from "../lib/presenters";
import { isoDateSchema } from "../lib/time";
import type { Loan } from "../types/library";

const issueSchema = z.object({
  bookId: z.string().min(1),
  readerId: z.string().min(1),
  plannedReturnDate: isoDateSchema
});

const returnSchema = z.object({
  actualReturnDate: isoDateSchema.optional()
});

const loanParamsSchema = z.object({ loanId: z.string().min(1) });

export const createLoansRouter = ({ store, clock, loans }: AppContext): Router => {
  const router = Router();

  const presentAll = async (records: Loan[]): Promise<LoanView[]> => {
    const presenter = createPresenter(await store.readSnapshot(), clock.today());
    return records.map(presenter.loan);
  };

  const presentOne = async (loan: Loan): Promise<LoanView> => {
    const [book, reader] = await Promise.all([store.getBook(loan.bookId), store.getReader(loan.readerId)]);
    return presentLoan(loan, book, reader, clock.today());
  };

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          status: z.enum(["active", "returned"]).optional(),
          bookId: z.string().min(1).optional(),
          readerId: z.string().min(1).optional()
        })
        .parse(req.query);
      res.status(200).json({ data: await presentAll(await store.listLoans(query)) });
    })
  );

  router.get(
    "/active",
    asyncHandler(async (_req, res) => {
      res.status(200).json({ data: await presentAll(await loans.listActiveLoans()) });
    })
  );

  router.get(
    "/overdue",
    asyncHandler(async (_req, res) => {
      res.status(200).json({ data: await presentAll(await loans.listOverdueLoans()) });
    })
  );

  router.get(
    "/due-soon",
    asyncHandler(async (req, res) => {
      const query = z
        .object({
          days: z.coerce.number().int().min(1).max(30).default(3)
        })
        .parse(req.query);
      const due = await loans.listDueSoon(query.days);
      res.status(200).json({ data: await presentAll(due), meta: { days: query.days } });
    })
  );

  router.get(
    "/:loanId",
    asyncHandler(async (req, res) => {
      const params = loanParamsSchema.parse(req.params);
      const loan = await store.getLoan(params.loanId);
      if (!loan) {
        throw new NotFoundError("loan not found");
      }
      res.status(200).json({ data: await presentOne(loan) });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = issueSchema.parse(req.body);
      const loan = await loans.issueLoan(payload);
      res.status(201).json({ data: await presentOne(loan) });
    })
  );

  router.post(
    "/:loanId/return",
    asyncHandler(async (req, res) => {
      const params = loanParamsSchema.parse(req.params);
      const payload = returnSchema.parse(req.body ?? {});
      const loan = await loans.returnLoan(params.loanId, payload.actualReturnDate);
      res.status(200).json({ data: await presentOne(loan) });
    })
  );

  return router;
};
