import type { LibraryStore } from "../db/store";
import type { Book, BookStatus, IsoDate, Loan } from "../types/library";
import {
  activeLoans,
  attachLoans,
  availableBooks,
  bookStatus,
  loanIsActive,
  onLoanBooks,
  overdueLoans,
  type AvailabilityInconsistency
} from "./availability";
import { ConflictError, NotFoundError, ValidationError } from "./errors";
import type { Logger } from "./logger";
import { addDays, type Clock } from "./time";

export const maxLoanDays = 90;

export type IssueLoanInput = {
  bookId: string;
  readerId: string;
  plannedReturnDate: IsoDate;
};

type LoanLifecycleDeps = {
  store: LibraryStore;
  clock: Clock;
  logger: Logger;
};

export const assertIssuable = (activeBookLoans: Loan[], plannedReturnDate: IsoDate, today: IsoDate): void => {
  if (activeBookLoans.some(loanIsActive)) {
    throw new ConflictError("book already on loan");
  }
  if (plannedReturnDate <= today) {
    throw new ValidationError("planned return date must be in the future");
  }
  if (plannedReturnDate > addDays(today, maxLoanDays)) {
    throw new ValidationError(`loan period exceeds ${maxLoanDays} days`);
  }
};

export const assertReturnable = (loan: Loan, actualReturnDate: IsoDate, today: IsoDate): void => {
  if (!loanIsActive(loan)) {
    throw new ConflictError("loan already returned");
  }
  if (actualReturnDate > today) {
    throw new ValidationError("return date cannot be in the future");
  }
  if (actualReturnDate < loan.issueDate) {
    throw new ValidationError("return date precedes issue date");
  }
};

export const inconsistencyReporter = (logger: Logger) => {
  return (report: AvailabilityInconsistency): void => {
    logger.warn(report, "book has more than one active loan");
  };
};

export const createLoanLifecycle = ({ store, clock, logger }: LoanLifecycleDeps) => {
  const reportInconsistency = inconsistencyReporter(logger);

  const loadBooksWithLoans = async () => {
    const snapshot = await store.readSnapshot();
    return attachLoans(snapshot.books, snapshot.loans);
  };

  const issueLoan = async (input: IssueLoanInput): Promise<Loan> => {
    const today = clock.today();
    const loan = await store.transaction(async (tx) => {
      const book = await tx.lockBook(input.bookId);
      if (!book) {
        throw new NotFoundError("book not found");
      }
      const reader = await tx.getReader(input.readerId);
      if (!reader) {
        throw new NotFoundError("reader not found");
      }

      assertIssuable(await tx.findActiveLoans(book.id), input.plannedReturnDate, today);

      return tx.insertLoan({
        bookId: book.id,
        readerId: reader.id,
        issueDate: today,
        plannedReturnDate: input.plannedReturnDate
      });
    });

    logger.info(
      { loanId: loan.id, bookId: loan.bookId, readerId: loan.readerId, plannedReturnDate: loan.plannedReturnDate },
      "loan issued"
    );
    return loan;
  };

  const returnLoan = async (loanId: string, actualReturnDate?: IsoDate): Promise<Loan> => {
    const today = clock.today();
    const returnDate = actualReturnDate ?? today;
    const loan = await store.transaction(async (tx) => {
      const current = await tx.lockLoan(loanId);
      if (!current) {
        throw new NotFoundError("loan not found");
      }

      assertReturnable(current, returnDate, today);

      return tx.markReturned(current.id, returnDate);
    });

    logger.info({ loanId: loan.id, bookId: loan.bookId, actualReturnDate: returnDate }, "loan returned");
    return loan;
  };

  const getBookStatus = async (bookId: string): Promise<BookStatus> => {
    const book = await store.getBook(bookId);
    if (!book) {
      throw new NotFoundError("book not found");
    }
    const loans = await store.listLoans({ bookId });
    return bookStatus(book, loans, clock.today(), { onInconsistency: reportInconsistency });
  };

  const listAvailableBooks = async (): Promise<Book[]> => {
    return availableBooks(await loadBooksWithLoans(), clock.today(), { onInconsistency: reportInconsistency });
  };

  const listOnLoanBooks = async (): Promise<Book[]> => {
    return onLoanBooks(await loadBooksWithLoans(), clock.today(), { onInconsistency: reportInconsistency });
  };

  const listActiveLoans = async (): Promise<Loan[]> => {
    return activeLoans(await store.listLoans({ status: "active" }));
  };

  const listOverdueLoans = async (): Promise<Loan[]> => {
    return overdueLoans(await store.listLoans({ status: "active" }), clock.today());
  };

  /** Active loans due between today and `days` from now, soonest first. */
  const listDueSoon = async (days: number): Promise<Loan[]> => {
    const today = clock.today();
    const dueBefore = addDays(today, days);
    const loans = await store.listLoans({ status: "active" });
    return loans
      .filter((loan) => loan.plannedReturnDate >= today && loan.plannedReturnDate <= dueBefore)
      .sort((a, b) => a.plannedReturnDate.localeCompare(b.plannedReturnDate) || a.issueDate.localeCompare(b.issueDate));
  };

  return {
    issueLoan,
    returnLoan,
    getBookStatus,
    listAvailableBooks,
    listOnLoanBooks,
    listActiveLoans,
    listOverdueLoans,
    listDueSoon
  };
};

export type LoanLifecycle = ReturnType<typeof createLoanLifecycle>;
