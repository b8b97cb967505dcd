import type {
  Author,
  AuthorInput,
  Book,
  BookInput,
  Genre,
  IsoDate,
  LibrarySnapshot,
  Loan,
  NewLoan,
  NewReader,
  Reader,
  ReaderInput
} from "../types/library";

export type AuthorFilter = {
  q?: string;
  country?: string;
};

export type BookFilter = {
  q?: string;
  authorId?: string;
  genre?: Genre;
  afterYear?: number;
  minPages?: number;
};

export type ReaderFilter = {
  q?: string;
};

export type LoanFilter = {
  status?: "active" | "returned";
  bookId?: string;
  readerId?: string;
};

/**
 * Reads and writes made while Issue or Return holds its transaction.
 * `lockBook` and `lockLoan` must keep concurrent transactions on the same
 * record waiting until this one finishes.
 */
export type LoanTransaction = {
  lockBook: (bookId: string) => Promise<Book | null>;
  lockLoan: (loanId: string) => Promise<Loan | null>;
  getReader: (readerId: string) => Promise<Reader | null>;
  findActiveLoans: (bookId: string) => Promise<Loan[]>;
  insertLoan: (input: NewLoan) => Promise<Loan>;
  markReturned: (loanId: string, actualReturnDate: IsoDate) => Promise<Loan>;
};

export type LibraryStore = {
  listAuthors: (filter?: AuthorFilter) => Promise<Author[]>;
  getAuthor: (id: string) => Promise<Author | null>;
  createAuthor: (input: AuthorInput) => Promise<Author>;
  updateAuthor: (id: string, patch: Partial<AuthorInput>) => Promise<Author>;
  deleteAuthor: (id: string) => Promise<void>;

  listBooks: (filter?: BookFilter) => Promise<Book[]>;
  getBook: (id: string) => Promise<Book | null>;
  createBook: (input: BookInput) => Promise<Book>;
  updateBook: (id: string, patch: Partial<BookInput>) => Promise<Book>;
  deleteBook: (id: string) => Promise<void>;

  listReaders: (filter?: ReaderFilter) => Promise<Reader[]>;
  getReader: (id: string) => Promise<Reader | null>;
  createReader: (input: NewReader) => Promise<Reader>;
  updateReader: (id: string, patch: Partial<ReaderInput>) => Promise<Reader>;
  deleteReader: (id: string) => Promise<void>;

  listLoans: (filter?: LoanFilter) => Promise<Loan[]>;
  getLoan: (id: string) => Promise<Loan | null>;

  /** One consistent view of every record, for status derivation and reports. */
  readSnapshot: () => Promise<LibrarySnapshot>;
  transaction: <T>(work: (tx: LoanTransaction) => Promise<T>) => Promise<T>;
  close: () => Promise<void>;
};
