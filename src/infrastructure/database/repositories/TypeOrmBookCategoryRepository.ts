import { EntityManager, FindOptionsWhere, Not, Repository } from 'typeorm';
import { BookCategory, BookCategoryData } from '../../../domain/entities/Book';
import { BookCategoryFilter, BookCategoryRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { BookCategoryEntity } from '../entities/BookCategoryEntity';
import { guardConstraints } from '../errors';
import { definedOnly, hasChanges } from './helpers';

const toBookCategory = (entity: BookCategoryEntity): BookCategory => ({
  id: entity.id,
  bookId: entity.bookId,
  categoryId: entity.categoryId,
  addedDate: entity.addedDate,
  primary: entity.primary,
  relevanceScore: entity.relevanceScore
});

export class TypeOrmBookCategoryRepository implements BookCategoryRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<BookCategoryEntity> {
    return this.manager.getRepository(BookCategoryEntity);
  }

  async findById(id: string): Promise<BookCategory | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toBookCategory(entity) : null;
  }

  async findAll(filter: BookCategoryFilter = {}): Promise<BookCategory[]> {
    const entities = await this.repository.find({
      where: definedOnly(filter),
      order: { primary: 'DESC', relevanceScore: 'DESC' }
    });
    return entities.map(toBookCategory);
  }

  async findByBookAndCategory(bookId: string, categoryId: string): Promise<BookCategory | null> {
    const entity = await this.repository.findOneBy({ bookId, categoryId });
    return entity ? toBookCategory(entity) : null;
  }

  async countPrimaryForBook(bookId: string, excludeId?: string): Promise<number> {
    const where: FindOptionsWhere<BookCategoryEntity> = { bookId, primary: true };
    if (excludeId) {
      where.id = Not(excludeId);
    }
    return this.repository.countBy(where);
  }

  async create(data: BookCategoryData): Promise<BookCategory> {
    const saved = await guardConstraints(() => this.repository.save(this.repository.create(definedOnly(data))));
    return this.require(saved.id);
  }

  async update(id: string, patch: Partial<Pick<BookCategory, 'primary' | 'relevanceScore'>>): Promise<BookCategory> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }
    return this.require(id);
  }

  async delete(id: string): Promise<void> {
    await guardConstraints(() => this.repository.delete(id));
  }

  private async require(id: string): Promise<BookCategory> {
    const association = await this.findById(id);
    if (!association) {
      throw new NotFoundError('Book category', id);
    }
    return association;
  }
}
