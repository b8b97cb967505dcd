import {
  attachLoans,
  bookStatus,
  loanIsActive,
  loanIsOverdue,
  type AvailabilityInconsistency
} from "./availability";
import type { Author, Book, BookStatus, IsoDate, LibrarySnapshot, Reader } from "../types/library";

export type AuthorWithBookCount = Author & { booksCount: number };
export type AuthorWithTotalPages = Author & { totalPages: number };
export type ReaderWithActiveLoans = Reader & { activeLoansCount: number };
export type BookWithLoanCount = Book & { loanCount: number };

export type BookWithStatus = {
  id: string;
  title: string;
  authorName: string | null;
  status: BookStatus;
};

export type BookLoanStatistics = Book & {
  totalLoans: number;
  activeLoans: number;
  overdueLoans: number;
};

export type ReadingTime = {
  title: string;
  hours: number;
};

export type BookStatistics = {
  totalBooks: number;
  totalPages: number;
  averagePages: number;
  genres: string[];
};

export type LibraryReport = {
  recentThickBooks: {
    count: number;
    books: Array<{ title: string; author: string | null; year: number; pages: number }>;
  };
  authorsStatistics: Array<{ name: string; country: string; booksCount: number }>;
  topAuthors: Array<{ name: string; totalPages: number }>;
  overdueReaders: Array<{ name: string; email: string }>;
  booksAvailability: Record<BookStatus, number>;
};

type ReportOptions = {
  onInconsistency?: (report: AvailabilityInconsistency) => void;
};

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

const authorNames = (snapshot: LibrarySnapshot): Map<string, string> => {
  return new Map(snapshot.authors.map((author): [string, string] => [author.id, author.name]));
};

const countBy = <T>(items: T[], key: (item: T) => string): Map<string, number> => {
  const counts = new Map<string, number>();
  items.forEach((item) => {
    const value = key(item);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  });
  return counts;
};

export const booksPublishedAfterWithManyPages = (snapshot: LibrarySnapshot, year = 2010, minPages = 300): Book[] => {
  return snapshot.books.filter((book) => book.publicationYear > year && book.pages > minPages);
};

export const authorsWithBookCount = (snapshot: LibrarySnapshot): AuthorWithBookCount[] => {
  const counts = countBy(snapshot.books, (book) => book.authorId);
  return snapshot.authors
    .map((author) => ({ ...author, booksCount: counts.get(author.id) ?? 0 }))
    .sort((a, b) => b.booksCount - a.booksCount || a.name.localeCompare(b.name));
};

export const topAuthorsByTotalPages = (snapshot: LibrarySnapshot, limit = 5): AuthorWithTotalPages[] => {
  const totals = new Map<string, number>();
  snapshot.books.forEach((book) => {
    totals.set(book.authorId, (totals.get(book.authorId) ?? 0) + book.pages);
  });
  return snapshot.authors
    .map((author) => ({ ...author, totalPages: totals.get(author.id) ?? 0 }))
    .sort((a, b) => b.totalPages - a.totalPages || a.name.localeCompare(b.name))
    .slice(0, limit);
};

export const readersWithOverdueLoans = (snapshot: LibrarySnapshot, today: IsoDate): Reader[] => {
  const overdueReaderIds = new Set(
    snapshot.loans.filter((loan) => loanIsOverdue(loan, today)).map((loan) => loan.readerId)
  );
  return snapshot.readers.filter((reader) => overdueReaderIds.has(reader.id));
};

export const readersWithActiveLoans = (snapshot: LibrarySnapshot): ReaderWithActiveLoans[] => {
  const counts = countBy(snapshot.loans.filter(loanIsActive), (loan) => loan.readerId);
  return snapshot.readers
    .map((reader) => ({ ...reader, activeLoansCount: counts.get(reader.id) ?? 0 }))
    .filter((reader) => reader.activeLoansCount > 0)
    .sort((a, b) => b.activeLoansCount - a.activeLoansCount || a.name.localeCompare(b.name));
};

export const booksWithStatus = (
  snapshot: LibrarySnapshot,
  today: IsoDate,
  options: ReportOptions = {}
): BookWithStatus[] => {
  const names = authorNames(snapshot);
  return attachLoans(snapshot.books, snapshot.loans).map((book) => ({
    id: book.id,
    title: book.title,
    authorName: names.get(book.authorId) ?? null,
    status: bookStatus(book, book.loans, today, options)
  }));
};

export const booksWithLoanStatistics = (snapshot: LibrarySnapshot, today: IsoDate): BookLoanStatistics[] => {
  return attachLoans(snapshot.books, snapshot.loans).map(({ loans, ...book }) => ({
    ...book,
    totalLoans: loans.length,
    activeLoans: loans.filter(loanIsActive).length,
    overdueLoans: loans.filter((loan) => loanIsOverdue(loan, today)).length
  }));
};

export const popularBooks = (snapshot: LibrarySnapshot, minLoans = 3): BookWithLoanCount[] => {
  const counts = countBy(snapshot.loans, (loan) => loan.bookId);
  return snapshot.books
    .map((book) => ({ ...book, loanCount: counts.get(book.id) ?? 0 }))
    .filter((book) => book.loanCount >= minLoans)
    .sort((a, b) => b.loanCount - a.loanCount || a.title.localeCompare(b.title));
};

export const readingTime = (books: Book[], pagesPerHour = 50): ReadingTime[] => {
  return books.map((book) => ({ title: book.title, hours: roundTo2(book.pages / pagesPerHour) }));
};

export const bookStatistics = (books: Book[]): BookStatistics => {
  if (books.length === 0) {
    return { totalBooks: 0, totalPages: 0, averagePages: 0, genres: [] };
  }
  const totalPages = books.reduce((total, book) => total + book.pages, 0);
  return {
    totalBooks: books.length,
    totalPages,
    averagePages: roundTo2(totalPages / books.length),
    genres: [...new Set(books.map((book) => book.genre))]
  };
};

export const groupTitlesByAuthor = (snapshot: LibrarySnapshot): Record<string, string[]> => {
  const names = authorNames(snapshot);
  const grouped = new Map<string, string[]>();
  snapshot.books.forEach((book) => {
    const name = names.get(book.authorId);
    if (name === undefined) {
      return;
    }
    grouped.set(name, [...(grouped.get(name) ?? []), book.title]);
  });
  // Author names become keys, so "constructor" or "__proto__" must not hit Object.prototype.
  return Object.fromEntries(grouped);
};

export const libraryReport = (snapshot: LibrarySnapshot, today: IsoDate, options: ReportOptions = {}): LibraryReport => {
  const names = authorNames(snapshot);
  const recent = booksPublishedAfterWithManyPages(snapshot);
  const statuses = booksWithStatus(snapshot, today, options);

  const booksAvailability: Record<BookStatus, number> = { available: 0, on_loan: 0, overdue: 0 };
  statuses.forEach((book) => {
    booksAvailability[book.status] += 1;
  });

  return {
    recentThickBooks: {
      count: recent.length,
      books: recent.map((book) => ({
        title: book.title,
        author: names.get(book.authorId) ?? null,
        year: book.publicationYear,
        pages: book.pages
      }))
    },
    authorsStatistics: authorsWithBookCount(snapshot).map((author) => ({
      name: author.name,
      country: author.country,
      booksCount: author.booksCount
    })),
    topAuthors: topAuthorsByTotalPages(snapshot).map((author) => ({
      name: author.name,
      totalPages: author.totalPages
    })),
    overdueReaders: readersWithOverdueLoans(snapshot, today).map((reader) => ({
      name: reader.name,
      email: reader.email
    })),
    booksAvailability
  };
};
