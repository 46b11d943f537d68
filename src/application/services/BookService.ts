import logger from '../../utils/logger';
import {
  Book,
  authorsDisplay,
  averageRating,
  isLongBook
} from '../../domain/entities/Book';
import { CatalogRepositories, CatalogStore } from '../../domain/repositories/CatalogStore';
import { ConflictError, NotFoundError } from '../../domain/errors';
import {
  BookCategorySummaryDTO,
  BookDetailResponseDTO,
  BookListResponseDTO,
  BookQueryDTO,
  BookResponseDTO,
  CreateBookDTO,
  UpdateBookDTO
} from '../dto/CatalogDTO';

export const DEFAULT_PAGE_SIZE = 10;

export class BookService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  // ==========================================
  // Writes
  // ==========================================

  async createBook(data: CreateBookDTO): Promise<BookResponseDTO> {
    const { authorIds = [], ...bookData } = data;

    const book = await this.store.transaction(async (repos) => {
      await this.assertIsbnAvailable(repos, bookData.isbn);
      await this.assertTitleAuthorAvailable(repos, bookData.title, bookData.author);
      if (bookData.publisherId) {
        await this.requirePublisher(repos, bookData.publisherId);
      }
      const uniqueAuthorIds = await this.requireAuthors(repos, authorIds);

      return repos.books.create(bookData, uniqueAuthorIds);
    });

    this.logger.info(`Book created: ${book.isbn}`, { bookId: book.id });

    return this.toResponse(book);
  }

  async updateBook(id: string, data: UpdateBookDTO): Promise<BookResponseDTO> {
    const { authorIds, ...patch } = data;

    const book = await this.store.transaction(async (repos) => {
      const existing = await repos.books.lockForUpdate(id);
      if (!existing) {
        throw new NotFoundError('Book', id);
      }

      if (patch.isbn !== undefined && patch.isbn !== existing.isbn) {
        await this.assertIsbnAvailable(repos, patch.isbn);
      }

      const title = patch.title ?? existing.title;
      const author = patch.author ?? existing.author;
      if (title !== existing.title || author !== existing.author) {
        await this.assertTitleAuthorAvailable(repos, title, author);
      }

      if (patch.publisherId) {
        await this.requirePublisher(repos, patch.publisherId);
      }

      const nextAuthorIds = authorIds === undefined ? undefined : await this.requireAuthors(repos, authorIds);

      return repos.books.update(id, patch, nextAuthorIds);
    });

    this.logger.info(`Book updated: ${book.isbn}`, { bookId: book.id });

    return this.toResponse(book);
  }

  async deleteBook(id: string): Promise<void> {
    const book = await this.store.books.findById(id);
    if (!book) {
      throw new NotFoundError('Book', id);
    }

    await this.store.books.delete(id);

    this.logger.info(`Book deleted: ${book.isbn}`, { bookId: id });
  }

  // ==========================================
  // Reads
  // ==========================================

  async getBooks(query: BookQueryDTO = {}): Promise<BookListResponseDTO> {
    const { page = 1, limit = DEFAULT_PAGE_SIZE, ...filters } = query;

    const { items, total } = await this.store.books.findPage({ page, limit, ...filters });
    const totalPages = Math.ceil(total / limit);

    return {
      books: await Promise.all(items.map((book) => this.toResponse(book))),
      pagination: {
        page,
        limit,
        total,
        totalPages,
        hasNext: page < totalPages,
        hasPrev: page > 1
      }
    };
  }

  async getBookById(id: string): Promise<BookDetailResponseDTO | null> {
    const book = await this.store.books.findById(id);
    if (!book) {
      return null;
    }

    const [summary, authors, publisher, reviews] = await Promise.all([
      this.toResponse(book),
      this.store.books.findAuthors(id),
      book.publisherId ? this.store.publishers.findById(book.publisherId) : Promise.resolve(null),
      this.store.reviews.findAll({ bookId: id })
    ]);

    return {
      ...summary,
      publisher,
      authors,
      reviews: reviews.map((review) => ({ ...review, bookTitle: book.title })),
      authorsDisplay: authorsDisplay(authors),
      isLongBook: isLongBook(book)
    };
  }

  // ==========================================
  // Helpers
  // ==========================================

  private async assertIsbnAvailable(repos: CatalogRepositories, isbn: string): Promise<void> {
    if (await repos.books.findByIsbn(isbn)) {
      throw new ConflictError(`Book with ISBN ${isbn} already exists`, { isbn });
    }
  }

  private async assertTitleAuthorAvailable(repos: CatalogRepositories, title: string, author: string): Promise<void> {
    if (await repos.books.findByTitleAndAuthor(title, author)) {
      throw new ConflictError(`Book "${title}" by ${author} already exists`, { title, author });
    }
  }

  private async requirePublisher(repos: CatalogRepositories, publisherId: string): Promise<void> {
    if (!(await repos.publishers.findById(publisherId))) {
      throw new NotFoundError('Publisher', publisherId);
    }
  }

  private async requireAuthors(repos: CatalogRepositories, authorIds: string[]): Promise<string[]> {
    const unique = [...new Set(authorIds)];
    const found = new Set((await repos.authors.findByIds(unique)).map((author) => author.id));
    const missing = unique.find((id) => !found.has(id));
    if (missing) {
      throw new NotFoundError('Author', missing);
    }
    return unique;
  }

  private async toResponse(book: Book): Promise<BookResponseDTO> {
    const [authors, publisher, reviews, associations] = await Promise.all([
      this.store.books.findAuthors(book.id),
      book.publisherId ? this.store.publishers.findById(book.publisherId) : Promise.resolve(null),
      this.store.reviews.findAll({ bookId: book.id }),
      this.store.bookCategories.findAll({ bookId: book.id })
    ]);

    const categoriesList: BookCategorySummaryDTO[] = [];
    for (const association of associations) {
      const category = await this.store.categories.findById(association.categoryId);
      if (category) {
        categoriesList.push({
          id: category.id,
          name: category.name,
          primary: association.primary,
          relevanceScore: association.relevanceScore
        });
      }
    }

    return {
      ...book,
      authorIds: authors.map((author) => author.id),
      publisherName: publisher ? publisher.name : null,
      authorNames: authors.map((author) => author.name),
      reviewCount: reviews.length,
      averageRating: averageRating(reviews),
      categoriesList
    };
  }
}

export default BookService;
