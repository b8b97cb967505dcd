import { createApp } from "../src/app";
import { MemoryLibraryStore } from "../src/db/memory-store";
import { createLogger } from "../src/lib/logger";
import { createManualClock } from "../src/lib/time";
import type { Author, Book, Reader } from "../src/types/library";

export const testToday = "2024-03-10";

export const silentLogger = () => createLogger({ level: "silent" });

export const buildTestApp = (today = testToday) => {
  const store = new MemoryLibraryStore();
  const clock = createManualClock(today);
  const logger = silentLogger();
  const app = createApp({ store, clock, logger });
  return { app, store, clock, logger };
};

export type SeededCatalog = {
  author: Author;
  book: Book;
  secondBook: Book;
  reader: Reader;
  secondReader: Reader;
};

export const seedCatalog = async (store: MemoryLibraryStore): Promise<SeededCatalog> => {
  const author = await store.createAuthor({ name: "Ada North", country: "Norway", birthDate: "1961-05-04" });
  const book = await store.createBook({
    title: "Harbor Lights",
    isbn: "9780000000011",
    publicationYear: 2015,
    pages: 420,
    genre: "fiction",
    authorId: author.id
  });
  const secondBook = await store.createBook({
    title: "Quiet Hills",
    isbn: "9780000000028",
    publicationYear: 2008,
    pages: 350,
    genre: "history",
    authorId: author.id
  });
  const reader = await store.createReader({
    name: "Mia Park",
    email: "mia@example.test",
    registrationDate: "2024-01-02"
  });
  const secondReader = await store.createReader({
    name: "Leo Grant",
    email: "leo@example.test",
    registrationDate: "2024-01-03"
  });
  return { author, book, secondBook, reader, secondReader };
};
