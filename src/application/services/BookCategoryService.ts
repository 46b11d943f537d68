import logger from '../../utils/logger';
import { BookCategory, DEFAULT_RELEVANCE_SCORE } from '../../domain/entities/Book';
import { BookCategoryFilter, CatalogRepositories, CatalogStore } from '../../domain/repositories/CatalogStore';
import { PrimaryCategoryEnforcer } from '../../domain/validators/PrimaryCategoryEnforcer';
import { ConflictError, NotFoundError } from '../../domain/errors';
import {
  BookCategoryResponseDTO,
  CreateBookCategoryDTO,
  UpdateBookCategoryDTO
} from '../dto/CatalogDTO';

export class BookCategoryService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  // Both writes lock the book row before looking at its associations, so two
  // concurrent "primary" assignments for one book are checked one at a time.
  async createBookCategory(data: CreateBookCategoryDTO): Promise<BookCategoryResponseDTO> {
    const association = await this.store.transaction(async (repos) => {
      const book = await repos.books.lockForUpdate(data.bookId);
      if (!book) {
        throw new NotFoundError('Book', data.bookId);
      }
      if (!(await repos.categories.findById(data.categoryId))) {
        throw new NotFoundError('Category', data.categoryId);
      }
      if (await repos.bookCategories.findByBookAndCategory(data.bookId, data.categoryId)) {
        throw new ConflictError('Book is already assigned to this category', {
          bookId: data.bookId,
          categoryId: data.categoryId
        });
      }

      const primary = data.primary ?? false;
      await new PrimaryCategoryEnforcer(repos.bookCategories).validatePrimary({ bookId: book.id, primary });

      return repos.bookCategories.create({
        bookId: data.bookId,
        categoryId: data.categoryId,
        primary,
        relevanceScore: data.relevanceScore ?? DEFAULT_RELEVANCE_SCORE
      });
    });

    this.logger.info('Book category assigned', {
      bookCategoryId: association.id,
      bookId: association.bookId,
      categoryId: association.categoryId,
      primary: association.primary
    });

    return this.toResponse(association, this.store);
  }

  async updateBookCategory(id: string, data: UpdateBookCategoryDTO): Promise<BookCategoryResponseDTO> {
    const association = await this.store.transaction(async (repos) => {
      const current = await this.requireAssociation(repos, id);
      await repos.books.lockForUpdate(current.bookId);

      // Re-read under the lock; the row may have changed while we waited.
      const existing = await this.requireAssociation(repos, id);
      await new PrimaryCategoryEnforcer(repos.bookCategories).validatePrimary({
        id: existing.id,
        bookId: existing.bookId,
        primary: data.primary ?? existing.primary
      });

      return repos.bookCategories.update(id, data);
    });

    this.logger.info('Book category updated', { bookCategoryId: id, primary: association.primary });

    return this.toResponse(association, this.store);
  }

  async deleteBookCategory(id: string): Promise<void> {
    await this.requireAssociation(this.store, id);
    await this.store.bookCategories.delete(id);

    this.logger.info('Book category removed', { bookCategoryId: id });
  }

  async getBookCategoryById(id: string): Promise<BookCategoryResponseDTO | null> {
    const association = await this.store.bookCategories.findById(id);
    if (!association) {
      return null;
    }
    return this.toResponse(association, this.store);
  }

  async getBookCategories(filter: BookCategoryFilter = {}): Promise<BookCategoryResponseDTO[]> {
    const associations = await this.store.bookCategories.findAll(filter);
    return Promise.all(associations.map((association) => this.toResponse(association, this.store)));
  }

  private async requireAssociation(repos: CatalogRepositories, id: string): Promise<BookCategory> {
    const association = await repos.bookCategories.findById(id);
    if (!association) {
      throw new NotFoundError('Book category', id);
    }
    return association;
  }

  private async toResponse(association: BookCategory, repos: CatalogRepositories): Promise<BookCategoryResponseDTO> {
    const [book, category] = await Promise.all([
      repos.books.findById(association.bookId),
      repos.categories.findById(association.categoryId)
    ]);

    return {
      ...association,
      bookTitle: book ? book.title : '',
      categoryName: category ? category.name : ''
    };
  }
}

export default BookCategoryService;
