import type { Book, BookStatus, BookWithLoans, IsoDate, Loan } from "../types/library";

export type AvailabilityInconsistency = {
  bookId: string;
  activeLoanIds: string[];
  chosenLoanId: string;
};

type BookStatusOptions = {
  onInconsistency?: (report: AvailabilityInconsistency) => void;
};

export const loanIsActive = (loan: Loan): boolean => loan.actualReturnDate === null;

export const loanIsOverdue = (loan: Loan, today: IsoDate): boolean => {
  if (!loanIsActive(loan)) {
    return false;
  }
  return today > loan.plannedReturnDate;
};

const byIssueDateThenId = (a: Loan, b: Loan): number => {
  if (a.issueDate !== b.issueDate) {
    return a.issueDate < b.issueDate ? -1 : 1;
  }
  return a.id.localeCompare(b.id);
};

/**
 * Returns the active loan of a book, or null when it is on the shelf.
 *
 * Only one loan per book can be active. If stored data breaks that rule, the
 * earliest issued loan (then the smallest id) is treated as authoritative and
 * the clash is passed to `onInconsistency`.
 */
export const findActiveLoan = (book: Book, loans: Loan[], options: BookStatusOptions = {}): Loan | null => {
  const active = loans.filter((loan) => loan.bookId === book.id && loanIsActive(loan));
  if (active.length === 0) {
    return null;
  }

  const [chosen] = [...active].sort(byIssueDateThenId);
  if (active.length > 1) {
    options.onInconsistency?.({
      bookId: book.id,
      activeLoanIds: active.map((loan) => loan.id),
      chosenLoanId: chosen.id
    });
  }
  return chosen;
};

export const bookStatus = (
  book: Book,
  loans: Loan[],
  today: IsoDate,
  options: BookStatusOptions = {}
): BookStatus => {
  const activeLoan = findActiveLoan(book, loans, options);
  if (!activeLoan) {
    return "available";
  }
  return loanIsOverdue(activeLoan, today) ? "overdue" : "on_loan";
};

export const availableBooks = (books: BookWithLoans[], today: IsoDate, options: BookStatusOptions = {}): Book[] => {
  return books
    .filter((book) => bookStatus(book, book.loans, today, options) === "available")
    .map(({ loans: _loans, ...book }) => book);
};

export const onLoanBooks = (books: BookWithLoans[], today: IsoDate, options: BookStatusOptions = {}): Book[] => {
  return books
    .filter((book) => bookStatus(book, book.loans, today, options) !== "available")
    .map(({ loans: _loans, ...book }) => book);
};

export const activeLoans = (loans: Loan[]): Loan[] => loans.filter(loanIsActive);

export const overdueLoans = (loans: Loan[], today: IsoDate): Loan[] => {
  return loans.filter((loan) => loanIsOverdue(loan, today));
};

export const attachLoans = (books: Book[], loans: Loan[]): BookWithLoans[] => {
  const byBook = new Map<string, Loan[]>();
  loans.forEach((loan) => {
    const list = byBook.get(loan.bookId) ?? [];
    list.push(loan);
    byBook.set(loan.bookId, list);
  });
  return books.map((book) => ({ ...book, loans: byBook.get(book.id) ?? [] }));
};
