import pg from "pg";
import type { Pool, PoolClient } from "pg";
import { ConflictError, NotFoundError } from "../lib/errors";
import type { Logger } from "../lib/logger";

const dateOid = 1082;

// DATE columns stay as YYYY-MM-DD strings instead of local-midnight Date objects.
pg.types.setTypeParser(dateOid, (value: string) => value);

type PoolOptions = {
  connectionString: string;
  max: number;
};

export const createPgPool = (options: PoolOptions, logger: Logger): Pool => {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.max
  });
  pool.on("error", (error) => {
    logger.error({ err: error }, "postgres pool background error");
  });
  return pool;
};

type AbortableClient = Pick<PoolClient, "release"> & {
  query: (text: string) => Promise<unknown>;
};

/** Rolls back and releases; a client whose rollback fails is destroyed rather than pooled again. */
export const abortTransaction = async (client: AbortableClient): Promise<void> => {
  try {
    await client.query("ROLLBACK");
  } catch (rollbackError) {
    client.release(rollbackError instanceof Error ? rollbackError : true);
    return;
  }
  client.release();
};

export const withTransaction = async <T>(
  pool: Pool,
  begin: string,
  work: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect();
  let result: T;
  try {
    await client.query(begin);
    result = await work(client);
    await client.query("COMMIT");
  } catch (error) {
    await abortTransaction(client);
    throw error;
  }
  client.release();
  return result;
};

const conflictMessages: Record<string, string> = {
  books_isbn_key: "a book with this ISBN already exists",
  readers_email_key: "a reader with this email already exists",
  loans_one_active_per_book: "book already on loan"
};

const missingReferenceMessages: Record<string, string> = {
  books_author_id_fkey: "author not found",
  loans_book_id_fkey: "book not found",
  loans_reader_id_fkey: "reader not found"
};

const readField = (error: unknown, field: "code" | "constraint"): string | null => {
  if (typeof error !== "object" || error === null || !(field in error)) {
    return null;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : null;
};

/** Turns constraint violations into the matching domain errors; anything else is returned as is. */
export const translatePgError = (error: unknown): unknown => {
  const code = readField(error, "code");
  const constraint = readField(error, "constraint") ?? "";
  if (code === "23505") {
    return new ConflictError(conflictMessages[constraint] ?? "record already exists", { constraint });
  }
  if (code === "23503") {
    return new NotFoundError(missingReferenceMessages[constraint] ?? "referenced record not found", { constraint });
  }
  return error;
};
