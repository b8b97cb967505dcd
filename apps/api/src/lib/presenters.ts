import { genreLabels } from "../types/library";
import type { Author, Book, IsoDate, LibrarySnapshot, Loan, Reader } from "../types/library";
import { loanIsActive, loanIsOverdue } from "./availability";

export type BookView = Book & {
  authorName: string | null;
  genreDisplay: string;
};

export type LoanView = Loan & {
  bookTitle: string | null;
  bookIsbn: string | null;
  readerName: string | null;
  readerEmail: string | null;
  isActive: boolean;
  isOverdue: boolean;
};

export const presentBook = (book: Book, author: Author | null | undefined): BookView => ({
  ...book,
  authorName: author?.name ?? null,
  genreDisplay: genreLabels[book.genre]
});

export const presentLoan = (
  loan: Loan,
  book: Book | null | undefined,
  reader: Reader | null | undefined,
  today: IsoDate
): LoanView => ({
  ...loan,
  bookTitle: book?.title ?? null,
  bookIsbn: book?.isbn ?? null,
  readerName: reader?.name ?? null,
  readerEmail: reader?.email ?? null,
  isActive: loanIsActive(loan),
  isOverdue: loanIsOverdue(loan, today)
});

const indexById = <T extends { id: string }>(items: T[]): Map<string, T> => {
  return new Map(items.map((item): [string, T] => [item.id, item]));
};

/** Presents many records at once, joining through one snapshot. */
export const createPresenter = (snapshot: Pick<LibrarySnapshot, "authors" | "books" | "readers">, today: IsoDate) => {
  const authors = indexById(snapshot.authors);
  const books = indexById(snapshot.books);
  const readers = indexById(snapshot.readers);

  return {
    book: (book: Book): BookView => presentBook(book, authors.get(book.authorId)),
    loan: (loan: Loan): LoanView => presentLoan(loan, books.get(loan.bookId), readers.get(loan.readerId), today)
  };
};
