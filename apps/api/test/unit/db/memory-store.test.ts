import { beforeEach, describe, expect, it } from "vitest";
import { MemoryLibraryStore } from "../../../src/db/memory-store";
import { ConflictError, NotFoundError } from "../../../src/lib/errors";
import { seedCatalog, type SeededCatalog } from "../../helpers";

describe("MemoryLibraryStore", () => {
  let store: MemoryLibraryStore;
  let catalog: SeededCatalog;

  beforeEach(async () => {
    store = new MemoryLibraryStore();
    catalog = await seedCatalog(store);
  });

  it("rejects duplicate ISBNs and e-mails", async () => {
    await expect(
      store.createBook({ ...catalog.secondBook, title: "Copy", isbn: catalog.book.isbn })
    ).rejects.toThrow(new ConflictError("a book with this ISBN already exists"));
    await expect(
      store.createReader({ name: "Twin", email: catalog.reader.email, registrationDate: "2024-02-01" })
    ).rejects.toThrow(new ConflictError("a reader with this email already exists"));
  });

  it("lets a record keep its own ISBN and e-mail on update", async () => {
    const book = await store.updateBook(catalog.book.id, { isbn: catalog.book.isbn, pages: 430 });
    const reader = await store.updateReader(catalog.reader.id, { email: catalog.reader.email });
    expect(book.pages).toBe(430);
    expect(reader.email).toBe("mia@example.test");
  });

  it("requires books to reference an existing author", async () => {
    await expect(store.createBook({ ...catalog.secondBook, isbn: "9780000000099", authorId: "ghost" })).rejects.toThrow(
      new NotFoundError("author not found")
    );
  });

  it("throws NotFoundError when updating or deleting missing records", async () => {
    await expect(store.updateAuthor("missing", { name: "X" })).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.deleteBook("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.deleteReader("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("cascades author deletion to books and their loans", async () => {
    await store.transaction((tx) =>
      tx.insertLoan({
        bookId: catalog.book.id,
        readerId: catalog.reader.id,
        issueDate: "2024-03-01",
        plannedReturnDate: "2024-03-15"
      })
    );

    await store.deleteAuthor(catalog.author.id);

    expect(await store.listBooks()).toEqual([]);
    expect(await store.listLoans()).toEqual([]);
    expect(await store.listReaders()).toHaveLength(2);
  });

  it("cascades reader deletion to their loans", async () => {
    await store.transaction((tx) =>
      tx.insertLoan({
        bookId: catalog.book.id,
        readerId: catalog.reader.id,
        issueDate: "2024-03-01",
        plannedReturnDate: "2024-03-15"
      })
    );

    await store.deleteReader(catalog.reader.id);

    expect(await store.listLoans()).toEqual([]);
    expect(await store.getBook(catalog.book.id)).not.toBeNull();
  });

  it("refuses a second active loan for the same book at insert time", async () => {
    const insert = (readerId: string) =>
      store.transaction((tx) =>
        tx.insertLoan({ bookId: catalog.book.id, readerId, issueDate: "2024-03-01", plannedReturnDate: "2024-03-15" })
      );

    await insert(catalog.reader.id);
    await expect(insert(catalog.secondReader.id)).rejects.toThrow(new ConflictError("book already on loan"));
  });

  it("marks a loan returned only once", async () => {
    const loan = await store.transaction((tx) =>
      tx.insertLoan({
        bookId: catalog.book.id,
        readerId: catalog.reader.id,
        issueDate: "2024-03-01",
        plannedReturnDate: "2024-03-15"
      })
    );

    const returned = await store.transaction((tx) => tx.markReturned(loan.id, "2024-03-05"));
    expect(returned.actualReturnDate).toBe("2024-03-05");
    await expect(store.transaction((tx) => tx.markReturned(loan.id, "2024-03-06"))).rejects.toThrow(
      new ConflictError("loan already returned")
    );
  });

  it("runs transactions one after another, even when one fails", async () => {
    const order: string[] = [];
    const first = store.transaction(async () => {
      order.push("first:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("first:end");
      throw new Error("boom");
    });
    const second = store.transaction(async () => {
      order.push("second");
      return "done";
    });

    await expect(first).rejects.toThrow("boom");
    await expect(second).resolves.toBe("done");
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("returns copies that do not alias stored records", async () => {
    const book = await store.getBook(catalog.book.id);
    if (!book) {
      throw new Error("seeded book missing");
    }
    book.title = "Changed";

    expect((await store.getBook(catalog.book.id))?.title).toBe("Harbor Lights");
  });

  it("filters and sorts books", async () => {
    expect((await store.listBooks()).map((book) => book.title)).toEqual(["Harbor Lights", "Quiet Hills"]);
    expect((await store.listBooks({ q: "north" })).map((book) => book.title)).toEqual([
      "Harbor Lights",
      "Quiet Hills"
    ]);
    expect((await store.listBooks({ q: "hills" })).map((book) => book.title)).toEqual(["Quiet Hills"]);
    expect((await store.listBooks({ genre: "history" })).map((book) => book.title)).toEqual(["Quiet Hills"]);
    expect((await store.listBooks({ afterYear: 2010, minPages: 400 })).map((book) => book.title)).toEqual([
      "Harbor Lights"
    ]);
  });

  it("filters readers and authors", async () => {
    expect((await store.listReaders()).map((reader) => reader.name)).toEqual(["Leo Grant", "Mia Park"]);
    expect((await store.listReaders({ q: "mia@" })).map((reader) => reader.name)).toEqual(["Mia Park"]);
    expect(await store.listAuthors({ country: "nor" })).toHaveLength(1);
    expect(await store.listAuthors({ q: "zzz" })).toEqual([]);
  });

  it("filters loans by status", async () => {
    const loan = await store.transaction((tx) =>
      tx.insertLoan({
        bookId: catalog.book.id,
        readerId: catalog.reader.id,
        issueDate: "2024-03-01",
        plannedReturnDate: "2024-03-15"
      })
    );
    await store.transaction((tx) => tx.markReturned(loan.id, "2024-03-04"));
    await store.transaction((tx) =>
      tx.insertLoan({
        bookId: catalog.secondBook.id,
        readerId: catalog.reader.id,
        issueDate: "2024-03-05",
        plannedReturnDate: "2024-03-19"
      })
    );

    expect((await store.listLoans({ status: "returned" })).map((entry) => entry.id)).toEqual([loan.id]);
    expect((await store.listLoans({ status: "active" })).map((entry) => entry.bookId)).toEqual([catalog.secondBook.id]);
    expect((await store.listLoans({ readerId: catalog.reader.id })).map((entry) => entry.issueDate)).toEqual([
      "2024-03-05",
      "2024-03-01"
    ]);
  });
});
