export enum Language {
  EN = 'EN',
  FR = 'FR',
  ES = 'ES',
  DE = 'DE',
  ZH = 'ZH',
  JA = 'JA',
  AR = 'AR',
}

export const ISBN_PATTERN = /^\d{13}$/;
export const LONG_BOOK_PAGE_COUNT = 500;

export interface Author {
  id: string;
  name: string;
  biography: string | null;
  birthDate: string | null;
}

export type AuthorData = Omit<Author, 'id' | 'biography' | 'birthDate'> &
  Partial<Pick<Author, 'biography' | 'birthDate'>>;

export interface Publisher {
  id: string;
  name: string;
  website: string | null;
  address: string | null;
}

export type PublisherData = Omit<Publisher, 'id' | 'website' | 'address'> &
  Partial<Pick<Publisher, 'website' | 'address'>>;

export interface Book {
  id: string;
  title: string;
  author: string;
  publishedDate: string;
  isbn: string;
  genre: string;
  summary: string | null;
  publisherId: string | null;
  pageCount: number | null;
  language: Language;
  price: number | null;
  coverImage: string | null;
  rating: number | null;
  isBestseller: boolean;
}

export interface BookData {
  title: string;
  author: string;
  publishedDate: string;
  isbn: string;
  genre: string;
  summary?: string | null;
  publisherId?: string | null;
  pageCount?: number | null;
  language?: Language;
  price?: number | null;
  coverImage?: string | null;
  rating?: number | null;
  isBestseller?: boolean;
}

export interface BookCategory {
  id: string;
  bookId: string;
  categoryId: string;
  addedDate: Date;
  primary: boolean;
  relevanceScore: number;
}

export interface BookCategoryData {
  bookId: string;
  categoryId: string;
  primary?: boolean;
  relevanceScore?: number;
}

export const DEFAULT_RELEVANCE_SCORE = 5;

export interface Review {
  id: string;
  bookId: string;
  reviewerName: string;
  content: string;
  rating: number;
  createdAt: Date;
}

export type ReviewData = Omit<Review, 'id' | 'createdAt'>;

// ==========================================
// Read-time projections
// ==========================================

export const isLongBook = (book: Pick<Book, 'pageCount'>): boolean =>
  book.pageCount !== null && book.pageCount > LONG_BOOK_PAGE_COUNT;

export const authorsDisplay = (authors: Pick<Author, 'name'>[]): string =>
  authors.map((author) => author.name).join(', ');

/** Mean review rating, or null for a book nobody has reviewed. */
export const averageRating = (reviews: Pick<Review, 'rating'>[]): number | null => {
  if (reviews.length === 0) {
    return null;
  }
  return reviews.reduce((sum, review) => sum + review.rating, 0) / reviews.length;
};

export const compareBookCategories = (a: BookCategory, b: BookCategory): number =>
  Number(b.primary) - Number(a.primary) || b.relevanceScore - a.relevanceScore;
