export type IsoDate = string;

export const genres = [
  "fiction",
  "non_fiction",
  "fantasy",
  "sci_fi",
  "mystery",
  "romance",
  "thriller",
  "biography",
  "history",
  "other"
] as const;

export type Genre = (typeof genres)[number];

export const genreLabels: Record<Genre, string> = {
  fiction: "Fiction",
  non_fiction: "Non-fiction",
  fantasy: "Fantasy",
  sci_fi: "Science fiction",
  mystery: "Mystery",
  romance: "Romance",
  thriller: "Thriller",
  biography: "Biography",
  history: "History",
  other: "Other"
};

export type Author = {
  id: string;
  name: string;
  country: string;
  birthDate: IsoDate | null;
};

export type Book = {
  id: string;
  title: string;
  isbn: string;
  publicationYear: number;
  pages: number;
  genre: Genre;
  authorId: string;
};

export type Reader = {
  id: string;
  name: string;
  email: string;
  registrationDate: IsoDate;
};

export type Loan = {
  id: string;
  bookId: string;
  readerId: string;
  issueDate: IsoDate;
  plannedReturnDate: IsoDate;
  actualReturnDate: IsoDate | null;
};

export type BookStatus = "available" | "on_loan" | "overdue";

export type BookWithLoans = Book & { loans: Loan[] };

export type AuthorInput = Omit<Author, "id">;
export type BookInput = Omit<Book, "id">;
export type ReaderInput = Pick<Reader, "name" | "email">;
export type NewReader = Omit<Reader, "id">;
export type NewLoan = Omit<Loan, "id" | "actualReturnDate">;

export type LibrarySnapshot = {
  authors: Author[];
  books: Book[];
  readers: Reader[];
  loans: Loan[];
};
