import { Category, CategoryData, CategoryPatch } from '../entities/Category';
import {
  Author,
  AuthorData,
  Book,
  BookCategory,
  BookCategoryData,
  BookData,
  Language,
  Publisher,
  PublisherData,
  Review,
  ReviewData
} from '../entities/Book';

// ==========================================
// Read contracts consumed by the validators
// ==========================================

export interface CategoryHierarchyReader {
  /** Parent id of a category: null for a root, undefined when the id is unknown. */
  findParentId(id: string): Promise<string | null | undefined>;
  count(): Promise<number>;
  countActiveChildren(id: string): Promise<number>;
}

export interface CategoryTreeReader extends CategoryHierarchyReader {
  findById(id: string): Promise<Category | null>;
  /** Direct children in display order. */
  findChildren(parentId: string): Promise<Category[]>;
}

export interface PrimaryAssociationReader {
  countPrimaryForBook(bookId: string, excludeId?: string): Promise<number>;
}

// ==========================================
// Repositories
// ==========================================

export interface CategoryFilter {
  /** null selects root categories. */
  parentId?: string | null;
  isActive?: boolean;
}

export interface CategoryRepository extends CategoryTreeReader {
  findBySlug(slug: string): Promise<Category | null>;
  findAll(filter?: CategoryFilter): Promise<Category[]>;
  countChildren(id: string): Promise<number>;
  create(data: CategoryData): Promise<Category>;
  update(id: string, patch: CategoryPatch): Promise<Category>;
  /** Removes the category; its children become roots. */
  delete(id: string): Promise<void>;
  /**
   * Serializes hierarchy writers for the rest of the current transaction.
   * Readers are not blocked.
   */
  lockHierarchy(): Promise<void>;
}

export interface BookQuery {
  page: number;
  limit: number;
  genre?: string;
  language?: Language;
  isBestseller?: boolean;
  publisherId?: string;
  search?: string;
}

export interface BookPage {
  items: Book[];
  total: number;
}

export interface BookRepository {
  findById(id: string): Promise<Book | null>;
  findByIsbn(isbn: string): Promise<Book | null>;
  findByTitleAndAuthor(title: string, author: string): Promise<Book | null>;
  findPage(query: BookQuery): Promise<BookPage>;
  findAuthors(bookId: string): Promise<Author[]>;
  create(data: BookData, authorIds: string[]): Promise<Book>;
  /** authorIds replaces the author set when given. */
  update(id: string, patch: Partial<BookData>, authorIds?: string[]): Promise<Book>;
  delete(id: string): Promise<void>;
  /** Locks the book row until the current transaction ends. */
  lockForUpdate(id: string): Promise<Book | null>;
}

export interface AuthorRepository {
  findById(id: string): Promise<Author | null>;
  findByIds(ids: string[]): Promise<Author[]>;
  findAll(): Promise<Author[]>;
  create(data: AuthorData): Promise<Author>;
  update(id: string, patch: Partial<AuthorData>): Promise<Author>;
  delete(id: string): Promise<void>;
}

export interface PublisherRepository {
  findById(id: string): Promise<Publisher | null>;
  findAll(): Promise<Publisher[]>;
  create(data: PublisherData): Promise<Publisher>;
  update(id: string, patch: Partial<PublisherData>): Promise<Publisher>;
  /** Books published by it keep existing with no publisher. */
  delete(id: string): Promise<void>;
}

export interface BookCategoryFilter {
  bookId?: string;
  categoryId?: string;
}

export interface BookCategoryRepository extends PrimaryAssociationReader {
  findById(id: string): Promise<BookCategory | null>;
  findAll(filter?: BookCategoryFilter): Promise<BookCategory[]>;
  findByBookAndCategory(bookId: string, categoryId: string): Promise<BookCategory | null>;
  create(data: BookCategoryData): Promise<BookCategory>;
  update(id: string, patch: Partial<Pick<BookCategory, 'primary' | 'relevanceScore'>>): Promise<BookCategory>;
  delete(id: string): Promise<void>;
}

export interface ReviewRepository {
  findById(id: string): Promise<Review | null>;
  findAll(filter?: { bookId?: string }): Promise<Review[]>;
  create(data: ReviewData): Promise<Review>;
  update(id: string, patch: Partial<Omit<ReviewData, 'bookId'>>): Promise<Review>;
  delete(id: string): Promise<void>;
}

export interface CatalogRepositories {
  categories: CategoryRepository;
  books: BookRepository;
  authors: AuthorRepository;
  publishers: PublisherRepository;
  bookCategories: BookCategoryRepository;
  reviews: ReviewRepository;
}

/**
 * Entry point to persisted catalog state. The repositories on the store
 * itself read outside any transaction; `transaction` hands out repositories
 * bound to one atomic unit of work that commits when the callback resolves
 * and rolls back when it throws.
 */
export interface CatalogStore extends CatalogRepositories {
  transaction<T>(work: (repositories: CatalogRepositories) => Promise<T>): Promise<T>;
  checkHealth(): Promise<boolean>;
}
