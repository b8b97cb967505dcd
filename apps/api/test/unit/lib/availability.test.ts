import { describe, expect, it, vi } from "vitest";
import {
  activeLoans,
  attachLoans,
  availableBooks,
  bookStatus,
  loanIsActive,
  loanIsOverdue,
  onLoanBooks,
  overdueLoans
} from "../../../src/lib/availability";
import type { Book, Loan } from "../../../src/types/library";

const today = "2024-03-10";

const makeBook = (id: string): Book => ({
  id,
  title: `Title ${id}`,
  isbn: "9780000000011",
  publicationYear: 2015,
  pages: 200,
  genre: "fiction",
  authorId: "author-1"
});

const makeLoan = (overrides: Partial<Loan> & Pick<Loan, "id">): Loan => ({
  bookId: "book-1",
  readerId: "reader-1",
  issueDate: "2024-03-01",
  plannedReturnDate: "2024-03-15",
  actualReturnDate: null,
  ...overrides
});

const book = makeBook("book-1");

describe("loanIsActive / loanIsOverdue", () => {
  it("treats a loan without a return date as active", () => {
    expect(loanIsActive(makeLoan({ id: "l1" }))).toBe(true);
    expect(loanIsActive(makeLoan({ id: "l1", actualReturnDate: "2024-03-05" }))).toBe(false);
  });

  it("is overdue only strictly after the planned return date", () => {
    expect(loanIsOverdue(makeLoan({ id: "l1", plannedReturnDate: "2024-03-10" }), today)).toBe(false);
    expect(loanIsOverdue(makeLoan({ id: "l1", plannedReturnDate: "2024-03-09" }), today)).toBe(true);
  });

  it("never reports a returned loan as overdue, however late it came back", () => {
    const lateReturn = makeLoan({
      id: "l1",
      issueDate: "2023-01-01",
      plannedReturnDate: "2023-01-15",
      actualReturnDate: "2023-12-31"
    });
    expect(loanIsOverdue(lateReturn, today)).toBe(false);
  });
});

describe("bookStatus", () => {
  it("is available when the book has no loans", () => {
    expect(bookStatus(book, [], today)).toBe("available");
  });

  it("is available when every loan has been returned", () => {
    const loans = [
      makeLoan({ id: "l1", actualReturnDate: "2024-03-05" }),
      makeLoan({ id: "l2", issueDate: "2024-01-01", plannedReturnDate: "2024-01-10", actualReturnDate: "2024-02-01" })
    ];
    expect(bookStatus(book, loans, today)).toBe("available");
  });

  it("is on_loan while the active loan is within its term", () => {
    expect(bookStatus(book, [makeLoan({ id: "l1", plannedReturnDate: "2024-03-24" })], today)).toBe("on_loan");
  });

  it("is on_loan on the planned return date itself", () => {
    expect(bookStatus(book, [makeLoan({ id: "l1", plannedReturnDate: today })], today)).toBe("on_loan");
  });

  it("is overdue once the planned return date has passed", () => {
    expect(bookStatus(book, [makeLoan({ id: "l1", plannedReturnDate: "2024-03-05" })], today)).toBe("overdue");
  });

  it("ignores loans that belong to other books", () => {
    const otherBookLoan = makeLoan({ id: "l9", bookId: "book-2" });
    expect(bookStatus(book, [otherBookLoan], today)).toBe("available");
  });

  it("picks the earliest issued loan when several are active and reports the clash", () => {
    const onInconsistency = vi.fn();
    const loans = [
      makeLoan({ id: "l-b", issueDate: "2024-03-01", plannedReturnDate: "2024-03-20" }),
      makeLoan({ id: "l-a", issueDate: "2024-02-01", plannedReturnDate: "2024-03-01" })
    ];

    expect(bookStatus(book, loans, today, { onInconsistency })).toBe("overdue");
    expect(onInconsistency).toHaveBeenCalledTimes(1);
    expect(onInconsistency).toHaveBeenCalledWith({
      bookId: "book-1",
      activeLoanIds: ["l-b", "l-a"],
      chosenLoanId: "l-a"
    });
  });

  it("breaks issue-date ties by loan id", () => {
    const loans = [
      makeLoan({ id: "l-2", plannedReturnDate: "2024-03-05" }),
      makeLoan({ id: "l-1", plannedReturnDate: "2024-03-20" })
    ];
    expect(bookStatus(book, loans, today)).toBe("on_loan");
  });

  it("assigns exactly one status for every loan state", () => {
    const cases: Loan[][] = [
      [],
      [makeLoan({ id: "l1", actualReturnDate: "2024-03-02" })],
      [makeLoan({ id: "l1" })],
      [makeLoan({ id: "l1", plannedReturnDate: "2024-03-01" })]
    ];
    const statuses = cases.map((loans) => bookStatus(book, loans, today));
    expect(statuses).toEqual(["available", "available", "on_loan", "overdue"]);
  });
});

describe("availableBooks / onLoanBooks", () => {
  const books = [makeBook("b1"), makeBook("b2"), makeBook("b3"), makeBook("b4")];
  const loans = [
    makeLoan({ id: "l2", bookId: "b2", plannedReturnDate: "2024-03-20" }),
    makeLoan({ id: "l3", bookId: "b3", plannedReturnDate: "2024-03-02" }),
    makeLoan({ id: "l4", bookId: "b4", actualReturnDate: "2024-03-04" })
  ];
  const withLoans = attachLoans(books, loans);

  it("lists books with no active loan", () => {
    const result = availableBooks(withLoans, today);
    expect(result.map((entry) => entry.id)).toEqual(["b1", "b4"]);
    expect(result[0]).not.toHaveProperty("loans");
  });

  it("lists books with an active loan, overdue or not", () => {
    expect(onLoanBooks(withLoans, today).map((entry) => entry.id)).toEqual(["b2", "b3"]);
  });

  it("filters active and overdue loans", () => {
    expect(activeLoans(loans).map((loan) => loan.id)).toEqual(["l2", "l3"]);
    expect(overdueLoans(loans, today).map((loan) => loan.id)).toEqual(["l3"]);
  });
});
