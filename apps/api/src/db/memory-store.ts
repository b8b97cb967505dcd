import crypto from "node:crypto";
import { ConflictError, NotFoundError } from "../lib/errors";
import type {
  Author,
  AuthorInput,
  Book,
  BookInput,
  IsoDate,
  LibrarySnapshot,
  Loan,
  NewLoan,
  NewReader,
  Reader,
  ReaderInput
} from "../types/library";
import type {
  AuthorFilter,
  BookFilter,
  LibraryStore,
  LoanFilter,
  LoanTransaction,
  ReaderFilter
} from "./store";

const containsInsensitive = (value: string, query: string): boolean => {
  return value.toLowerCase().includes(query.toLowerCase());
};

const byName = (a: { name: string }, b: { name: string }): number => a.name.localeCompare(b.name);

const byYearDescThenTitle = (a: Book, b: Book): number => {
  if (a.publicationYear !== b.publicationYear) {
    return b.publicationYear - a.publicationYear;
  }
  return a.title.localeCompare(b.title);
};

const byIssueDateDesc = (a: Loan, b: Loan): number => {
  if (a.issueDate === b.issueDate) {
    return 0;
  }
  return a.issueDate < b.issueDate ? 1 : -1;
};

/**
 * In-process store with the same integrity rules as the PostgreSQL schema:
 * unique ISBN and e-mail, foreign keys, cascade deletes and at most one
 * active loan per book. Transactions run one at a time.
 */
export class MemoryLibraryStore implements LibraryStore {
  private authors = new Map<string, Author>();
  private books = new Map<string, Book>();
  private readers = new Map<string, Reader>();
  private loans = new Map<string, Loan>();
  private queue: Promise<void> = Promise.resolve();

  async listAuthors(filter: AuthorFilter = {}): Promise<Author[]> {
    return [...this.authors.values()]
      .filter((author) => !filter.q || containsInsensitive(author.name, filter.q))
      .filter((author) => !filter.country || containsInsensitive(author.country, filter.country))
      .sort(byName)
      .map((author) => ({ ...author }));
  }

  async getAuthor(id: string): Promise<Author | null> {
    const author = this.authors.get(id);
    return author ? { ...author } : null;
  }

  async createAuthor(input: AuthorInput): Promise<Author> {
    const author: Author = { ...input, id: crypto.randomUUID() };
    this.authors.set(author.id, author);
    return { ...author };
  }

  async updateAuthor(id: string, patch: Partial<AuthorInput>): Promise<Author> {
    const current = this.authors.get(id);
    if (!current) {
      throw new NotFoundError("author not found");
    }
    const updated: Author = { ...current, ...patch, id };
    this.authors.set(id, updated);
    return { ...updated };
  }

  async deleteAuthor(id: string): Promise<void> {
    if (!this.authors.delete(id)) {
      throw new NotFoundError("author not found");
    }
    [...this.books.values()]
      .filter((book) => book.authorId === id)
      .forEach((book) => this.removeBook(book.id));
  }

  async listBooks(filter: BookFilter = {}): Promise<Book[]> {
    return [...this.books.values()]
      .filter((book) => !filter.q || this.matchesBookQuery(book, filter.q))
      .filter((book) => !filter.authorId || book.authorId === filter.authorId)
      .filter((book) => !filter.genre || book.genre === filter.genre)
      .filter((book) => filter.afterYear === undefined || book.publicationYear > filter.afterYear)
      .filter((book) => filter.minPages === undefined || book.pages > filter.minPages)
      .sort(byYearDescThenTitle)
      .map((book) => ({ ...book }));
  }

  async getBook(id: string): Promise<Book | null> {
    const book = this.books.get(id);
    return book ? { ...book } : null;
  }

  async createBook(input: BookInput): Promise<Book> {
    this.assertBookReferences(input);
    const book: Book = { ...input, id: crypto.randomUUID() };
    this.books.set(book.id, book);
    return { ...book };
  }

  async updateBook(id: string, patch: Partial<BookInput>): Promise<Book> {
    const current = this.books.get(id);
    if (!current) {
      throw new NotFoundError("book not found");
    }
    const updated: Book = { ...current, ...patch, id };
    this.assertBookReferences(updated, id);
    this.books.set(id, updated);
    return { ...updated };
  }

  async deleteBook(id: string): Promise<void> {
    if (!this.books.has(id)) {
      throw new NotFoundError("book not found");
    }
    this.removeBook(id);
  }

  async listReaders(filter: ReaderFilter = {}): Promise<Reader[]> {
    return [...this.readers.values()]
      .filter(
        (reader) => !filter.q || containsInsensitive(reader.name, filter.q) || containsInsensitive(reader.email, filter.q)
      )
      .sort(byName)
      .map((reader) => ({ ...reader }));
  }

  async getReader(id: string): Promise<Reader | null> {
    const reader = this.readers.get(id);
    return reader ? { ...reader } : null;
  }

  async createReader(input: NewReader): Promise<Reader> {
    this.assertUniqueEmail(input.email);
    const reader: Reader = { ...input, id: crypto.randomUUID() };
    this.readers.set(reader.id, reader);
    return { ...reader };
  }

  async updateReader(id: string, patch: Partial<ReaderInput>): Promise<Reader> {
    const current = this.readers.get(id);
    if (!current) {
      throw new NotFoundError("reader not found");
    }
    if (patch.email !== undefined) {
      this.assertUniqueEmail(patch.email, id);
    }
    const updated: Reader = {
      ...current,
      name: patch.name ?? current.name,
      email: patch.email ?? current.email
    };
    this.readers.set(id, updated);
    return { ...updated };
  }

  async deleteReader(id: string): Promise<void> {
    if (!this.readers.delete(id)) {
      throw new NotFoundError("reader not found");
    }
    [...this.loans.values()]
      .filter((loan) => loan.readerId === id)
      .forEach((loan) => this.loans.delete(loan.id));
  }

  async listLoans(filter: LoanFilter = {}): Promise<Loan[]> {
    return [...this.loans.values()]
      .filter((loan) => filter.status !== "active" || loan.actualReturnDate === null)
      .filter((loan) => filter.status !== "returned" || loan.actualReturnDate !== null)
      .filter((loan) => !filter.bookId || loan.bookId === filter.bookId)
      .filter((loan) => !filter.readerId || loan.readerId === filter.readerId)
      .sort(byIssueDateDesc)
      .map((loan) => ({ ...loan }));
  }

  async getLoan(id: string): Promise<Loan | null> {
    const loan = this.loans.get(id);
    return loan ? { ...loan } : null;
  }

  async readSnapshot(): Promise<LibrarySnapshot> {
    return {
      authors: await this.listAuthors(),
      books: await this.listBooks(),
      readers: await this.listReaders(),
      loans: await this.listLoans()
    };
  }

  transaction<T>(work: (tx: LoanTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => work(this.createTransaction()));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    this.authors.clear();
    this.books.clear();
    this.readers.clear();
    this.loans.clear();
  }

  private createTransaction(): LoanTransaction {
    return {
      lockBook: (bookId) => this.getBook(bookId),
      lockLoan: (loanId) => this.getLoan(loanId),
      getReader: (readerId) => this.getReader(readerId),
      findActiveLoans: (bookId) => this.listLoans({ bookId, status: "active" }),
      insertLoan: async (input) => this.insertLoan(input),
      markReturned: async (loanId, actualReturnDate) => this.markReturned(loanId, actualReturnDate)
    };
  }

  private insertLoan(input: NewLoan): Loan {
    if (!this.books.has(input.bookId)) {
      throw new NotFoundError("book not found");
    }
    if (!this.readers.has(input.readerId)) {
      throw new NotFoundError("reader not found");
    }
    const clash = [...this.loans.values()].some(
      (loan) => loan.bookId === input.bookId && loan.actualReturnDate === null
    );
    if (clash) {
      throw new ConflictError("book already on loan");
    }
    const loan: Loan = { ...input, id: crypto.randomUUID(), actualReturnDate: null };
    this.loans.set(loan.id, loan);
    return { ...loan };
  }

  private markReturned(loanId: string, actualReturnDate: IsoDate): Loan {
    const current = this.loans.get(loanId);
    if (!current) {
      throw new NotFoundError("loan not found");
    }
    if (current.actualReturnDate !== null) {
      throw new ConflictError("loan already returned");
    }
    const returned: Loan = { ...current, actualReturnDate };
    this.loans.set(loanId, returned);
    return { ...returned };
  }

  private removeBook(id: string): void {
    this.books.delete(id);
    [...this.loans.values()]
      .filter((loan) => loan.bookId === id)
      .forEach((loan) => this.loans.delete(loan.id));
  }

  private matchesBookQuery(book: Book, query: string): boolean {
    const authorName = this.authors.get(book.authorId)?.name ?? "";
    return (
      containsInsensitive(book.title, query) ||
      containsInsensitive(book.isbn, query) ||
      containsInsensitive(authorName, query)
    );
  }

  private assertBookReferences(book: BookInput, ownId?: string): void {
    if (!this.authors.has(book.authorId)) {
      throw new NotFoundError("author not found");
    }
    const duplicate = [...this.books.values()].some((other) => other.isbn === book.isbn && other.id !== ownId);
    if (duplicate) {
      throw new ConflictError("a book with this ISBN already exists");
    }
  }

  private assertUniqueEmail(email: string, ownId?: string): void {
    const duplicate = [...this.readers.values()].some((other) => other.email === email && other.id !== ownId);
    if (duplicate) {
      throw new ConflictError("a reader with this email already exists");
    }
  }
}
