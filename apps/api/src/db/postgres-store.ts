import crypto from "node:crypto";
import type { Pool, PoolClient } from "pg";
import { ConflictError, NotFoundError } from "../lib/errors";
import { genres } from "../types/library";
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
import { translatePgError, withTransaction } from "./postgres";
import type {
  AuthorFilter,
  BookFilter,
  LibraryStore,
  LoanFilter,
  LoanTransaction,
  ReaderFilter
} from "./store";

type AuthorRow = {
  id: string;
  name: string;
  country: string;
  birth_date: string | null;
};

type BookRow = {
  id: string;
  title: string;
  isbn: string;
  publication_year: number;
  pages: number;
  genre: string;
  author_id: string;
};

type ReaderRow = {
  id: string;
  name: string;
  email: string;
  registration_date: string;
};

type LoanRow = {
  id: string;
  book_id: string;
  reader_id: string;
  issue_date: string;
  planned_return_date: string;
  actual_return_date: string | null;
};

const authorColumns = "id, name, country, birth_date";
const bookColumns = "id, title, isbn, publication_year, pages, genre, author_id";
const readerColumns = "id, name, email, registration_date";
const loanColumns = "id, book_id, reader_id, issue_date, planned_return_date, actual_return_date";

const parseGenre = (value: string): Genre => {
  const genre = genres.find((candidate) => candidate === value);
  if (!genre) {
    throw new Error(`Unknown genre stored: ${value}`);
  }
  return genre;
};

const toAuthor = (row: AuthorRow): Author => ({
  id: row.id,
  name: row.name,
  country: row.country,
  birthDate: row.birth_date
});

const toBook = (row: BookRow): Book => ({
  id: row.id,
  title: row.title,
  isbn: row.isbn,
  publicationYear: row.publication_year,
  pages: row.pages,
  genre: parseGenre(row.genre),
  authorId: row.author_id
});

const toReader = (row: ReaderRow): Reader => ({
  id: row.id,
  name: row.name,
  email: row.email,
  registrationDate: row.registration_date
});

const toLoan = (row: LoanRow): Loan => ({
  id: row.id,
  bookId: row.book_id,
  readerId: row.reader_id,
  issueDate: row.issue_date,
  plannedReturnDate: row.planned_return_date,
  actualReturnDate: row.actual_return_date
});

const buildAssignments = <T extends object>(
  columns: Array<[keyof T, string]>,
  patch: Partial<T>,
  values: unknown[]
): string[] => {
  const assignments: string[] = [];
  columns.forEach(([key, column]) => {
    const value = patch[key];
    if (value !== undefined) {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }
  });
  return assignments;
};

const authorPatchColumns: Array<[keyof AuthorInput, string]> = [
  ["name", "name"],
  ["country", "country"],
  ["birthDate", "birth_date"]
];

const bookPatchColumns: Array<[keyof BookInput, string]> = [
  ["title", "title"],
  ["isbn", "isbn"],
  ["publicationYear", "publication_year"],
  ["pages", "pages"],
  ["genre", "genre"],
  ["authorId", "author_id"]
];

const readerPatchColumns: Array<[keyof ReaderInput, string]> = [
  ["name", "name"],
  ["email", "email"]
];

const readerByIdSql = (lock: "" | "FOR SHARE"): string => `SELECT ${readerColumns} FROM readers WHERE id = $1 ${lock}`;

const loanByIdSql = (lock: "" | "FOR UPDATE"): string => `SELECT ${loanColumns} FROM loans WHERE id = $1 ${lock}`;

const loansQuery = (filter: LoanFilter): { text: string; values: unknown[] } => {
  const values: unknown[] = [];
  const where: string[] = [];
  if (filter.status === "active") {
    where.push("actual_return_date IS NULL");
  }
  if (filter.status === "returned") {
    where.push("actual_return_date IS NOT NULL");
  }
  if (filter.bookId) {
    values.push(filter.bookId);
    where.push(`book_id = $${values.length}`);
  }
  if (filter.readerId) {
    values.push(filter.readerId);
    where.push(`reader_id = $${values.length}`);
  }
  return {
    text: `SELECT ${loanColumns} FROM loans ${where.length ? `WHERE ${where.join(" AND ")}` : ""} ORDER BY issue_date DESC, id`,
    values
  };
};

const rethrowTranslated = (error: unknown): never => {
  throw translatePgError(error);
};

export class PostgresLibraryStore implements LibraryStore {
  constructor(private readonly pool: Pool) {}

  async listAuthors(filter: AuthorFilter = {}): Promise<Author[]> {
    const values: unknown[] = [];
    const where: string[] = [];
    if (filter.q) {
      values.push(`%${filter.q}%`);
      where.push(`name ILIKE $${values.length}`);
    }
    if (filter.country) {
      values.push(`%${filter.country}%`);
      where.push(`country ILIKE $${values.length}`);
    }
    const result = await this.pool.query<AuthorRow>(
      `SELECT ${authorColumns} FROM authors ${where.length ? `WHERE ${where.join(" AND ")}` : ""} ORDER BY name, id`,
      values
    );
    return result.rows.map(toAuthor);
  }

  async getAuthor(id: string): Promise<Author | null> {
    const result = await this.pool.query<AuthorRow>(`SELECT ${authorColumns} FROM authors WHERE id = $1`, [id]);
    return result.rows[0] ? toAuthor(result.rows[0]) : null;
  }

  async createAuthor(input: AuthorInput): Promise<Author> {
    const result = await this.pool.query<AuthorRow>(
      `INSERT INTO authors (${authorColumns}) VALUES ($1, $2, $3, $4) RETURNING ${authorColumns}`,
      [crypto.randomUUID(), input.name, input.country, input.birthDate]
    );
    return toAuthor(result.rows[0]);
  }

  async updateAuthor(id: string, patch: Partial<AuthorInput>): Promise<Author> {
    const values: unknown[] = [];
    const assignments = buildAssignments(authorPatchColumns, patch, values);
    if (assignments.length === 0) {
      return this.requireAuthor(id);
    }
    values.push(id);
    const result = await this.pool.query<AuthorRow>(
      `UPDATE authors SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${authorColumns}`,
      values
    );
    if (!result.rows[0]) {
      throw new NotFoundError("author not found");
    }
    return toAuthor(result.rows[0]);
  }

  async deleteAuthor(id: string): Promise<void> {
    const result = await this.pool.query("DELETE FROM authors WHERE id = $1", [id]);
    if (!result.rowCount) {
      throw new NotFoundError("author not found");
    }
  }

  async listBooks(filter: BookFilter = {}): Promise<Book[]> {
    const values: unknown[] = [];
    const where: string[] = [];
    if (filter.q) {
      values.push(`%${filter.q}%`);
      where.push(`(b.title ILIKE $${values.length} OR b.isbn ILIKE $${values.length} OR a.name ILIKE $${values.length})`);
    }
    if (filter.authorId) {
      values.push(filter.authorId);
      where.push(`b.author_id = $${values.length}`);
    }
    if (filter.genre) {
      values.push(filter.genre);
      where.push(`b.genre = $${values.length}`);
    }
    if (filter.afterYear !== undefined) {
      values.push(filter.afterYear);
      where.push(`b.publication_year > $${values.length}`);
    }
    if (filter.minPages !== undefined) {
      values.push(filter.minPages);
      where.push(`b.pages > $${values.length}`);
    }
    const result = await this.pool.query<BookRow>(
      `
      SELECT b.id, b.title, b.isbn, b.publication_year, b.pages, b.genre, b.author_id
      FROM books b
      JOIN authors a ON a.id = b.author_id
      ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY b.publication_year DESC, b.title, b.id
      `,
      values
    );
    return result.rows.map(toBook);
  }

  async getBook(id: string): Promise<Book | null> {
    const result = await this.pool.query<BookRow>(`SELECT ${bookColumns} FROM books WHERE id = $1`, [id]);
    return result.rows[0] ? toBook(result.rows[0]) : null;
  }

  async createBook(input: BookInput): Promise<Book> {
    const result = await this.pool
      .query<BookRow>(
        `INSERT INTO books (${bookColumns}) VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING ${bookColumns}`,
        [crypto.randomUUID(), input.title, input.isbn, input.publicationYear, input.pages, input.genre, input.authorId]
      )
      .catch(rethrowTranslated);
    return toBook(result.rows[0]);
  }

  async updateBook(id: string, patch: Partial<BookInput>): Promise<Book> {
    const values: unknown[] = [];
    const assignments = buildAssignments(bookPatchColumns, patch, values);
    if (assignments.length === 0) {
      const book = await this.getBook(id);
      if (!book) {
        throw new NotFoundError("book not found");
      }
      return book;
    }
    values.push(id);
    const result = await this.pool
      .query<BookRow>(
        `UPDATE books SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${bookColumns}`,
        values
      )
      .catch(rethrowTranslated);
    if (!result.rows[0]) {
      throw new NotFoundError("book not found");
    }
    return toBook(result.rows[0]);
  }

  async deleteBook(id: string): Promise<void> {
    const result = await this.pool.query("DELETE FROM books WHERE id = $1", [id]);
    if (!result.rowCount) {
      throw new NotFoundError("book not found");
    }
  }

  async listReaders(filter: ReaderFilter = {}): Promise<Reader[]> {
    const values: unknown[] = [];
    let where = "";
    if (filter.q) {
      values.push(`%${filter.q}%`);
      where = "WHERE name ILIKE $1 OR email ILIKE $1";
    }
    const result = await this.pool.query<ReaderRow>(
      `SELECT ${readerColumns} FROM readers ${where} ORDER BY name, id`,
      values
    );
    return result.rows.map(toReader);
  }

  async getReader(id: string): Promise<Reader | null> {
    const result = await this.pool.query<ReaderRow>(readerByIdSql(""), [id]);
    return result.rows[0] ? toReader(result.rows[0]) : null;
  }

  async createReader(input: NewReader): Promise<Reader> {
    const result = await this.pool
      .query<ReaderRow>(
        `INSERT INTO readers (${readerColumns}) VALUES ($1, $2, $3, $4) RETURNING ${readerColumns}`,
        [crypto.randomUUID(), input.name, input.email, input.registrationDate]
      )
      .catch(rethrowTranslated);
    return toReader(result.rows[0]);
  }

  async updateReader(id: string, patch: Partial<ReaderInput>): Promise<Reader> {
    const values: unknown[] = [];
    const assignments = buildAssignments(readerPatchColumns, patch, values);
    if (assignments.length === 0) {
      const reader = await this.getReader(id);
      if (!reader) {
        throw new NotFoundError("reader not found");
      }
      return reader;
    }
    values.push(id);
    const result = await this.pool
      .query<ReaderRow>(
        `UPDATE readers SET ${assignments.join(", ")} WHERE id = $${values.length} RETURNING ${readerColumns}`,
        values
      )
      .catch(rethrowTranslated);
    if (!result.rows[0]) {
      throw new NotFoundError("reader not found");
    }
    return toReader(result.rows[0]);
  }

  async deleteReader(id: string): Promise<void> {
    const result = await this.pool.query("DELETE FROM readers WHERE id = $1", [id]);
    if (!result.rowCount) {
      throw new NotFoundError("reader not found");
    }
  }

  async listLoans(filter: LoanFilter = {}): Promise<Loan[]> {
    const { text, values } = loansQuery(filter);
    const result = await this.pool.query<LoanRow>(text, values);
    return result.rows.map(toLoan);
  }

  async getLoan(id: string): Promise<Loan | null> {
    const result = await this.pool.query<LoanRow>(loanByIdSql(""), [id]);
    return result.rows[0] ? toLoan(result.rows[0]) : null;
  }

  async readSnapshot(): Promise<LibrarySnapshot> {
    return withTransaction(this.pool, "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY", async (client) => {
      const authors = await client.query<AuthorRow>(`SELECT ${authorColumns} FROM authors ORDER BY name, id`);
      const books = await client.query<BookRow>(
        `SELECT ${bookColumns} FROM books ORDER BY publication_year DESC, title, id`
      );
      const readers = await client.query<ReaderRow>(`SELECT ${readerColumns} FROM readers ORDER BY name, id`);
      const loans = await client.query<LoanRow>(`SELECT ${loanColumns} FROM loans ORDER BY issue_date DESC, id`);
      return {
        authors: authors.rows.map(toAuthor),
        books: books.rows.map(toBook),
        readers: readers.rows.map(toReader),
        loans: loans.rows.map(toLoan)
      };
    });
  }

  transaction<T>(work: (tx: LoanTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, "BEGIN", (client) => work(this.createTransaction(client)));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private createTransaction(client: PoolClient): LoanTransaction {
    return {
      lockBook: async (bookId) => {
        const result = await client.query<BookRow>(`SELECT ${bookColumns} FROM books WHERE id = $1 FOR UPDATE`, [
          bookId
        ]);
        return result.rows[0] ? toBook(result.rows[0]) : null;
      },
      lockLoan: async (loanId) => {
        const result = await client.query<LoanRow>(loanByIdSql("FOR UPDATE"), [loanId]);
        return result.rows[0] ? toLoan(result.rows[0]) : null;
      },
      getReader: async (readerId) => {
        const result = await client.query<ReaderRow>(readerByIdSql("FOR SHARE"), [readerId]);
        return result.rows[0] ? toReader(result.rows[0]) : null;
      },
      findActiveLoans: async (bookId) => {
        const { text, values } = loansQuery({ bookId, status: "active" });
        const result = await client.query<LoanRow>(text, values);
        return result.rows.map(toLoan);
      },
      insertLoan: async (input: NewLoan) => {
        const result = await client
          .query<LoanRow>(
            `
            INSERT INTO loans (${loanColumns})
            VALUES ($1, $2, $3, $4, $5, NULL)
            RETURNING ${loanColumns}
            `,
            [crypto.randomUUID(), input.bookId, input.readerId, input.issueDate, input.plannedReturnDate]
          )
          .catch(rethrowTranslated);
        return toLoan(result.rows[0]);
      },
      markReturned: async (loanId: string, actualReturnDate: IsoDate) => {
        const result = await client.query<LoanRow>(
          `
          UPDATE loans SET actual_return_date = $2
          WHERE id = $1 AND actual_return_date IS NULL
          RETURNING ${loanColumns}
          `,
          [loanId, actualReturnDate]
        );
        if (!result.rows[0]) {
          throw new ConflictError("loan already returned");
        }
        return toLoan(result.rows[0]);
      }
    };
  }

  private async requireAuthor(id: string): Promise<Author> {
    const author = await this.getAuthor(id);
    if (!author) {
      throw new NotFoundError("author not found");
    }
    return author;
  }
}
