import { EntityManager, FindOptionsOrder, FindOptionsWhere, IsNull, Repository } from 'typeorm';
import { Category, CategoryData, CategoryPatch } from '../../../domain/entities/Category';
import { CategoryFilter, CategoryRepository } from '../../../domain/repositories/CatalogStore';
import { NotFoundError } from '../../../domain/errors';
import { CategoryEntity } from '../entities/CategoryEntity';
import { guardConstraints } from '../errors';
import { definedOnly, hasChanges } from './helpers';

// Key of the transaction-scoped advisory lock taken by hierarchy writers.
export const CATEGORY_HIERARCHY_LOCK_KEY = 7301;

const SIBLING_ORDER: FindOptionsOrder<CategoryEntity> = { displayOrder: 'ASC', name: 'ASC' };

export const toCategory = (entity: CategoryEntity): Category => ({
  id: entity.id,
  name: entity.name,
  description: entity.description,
  slug: entity.slug,
  isActive: entity.isActive,
  displayOrder: entity.displayOrder,
  parentId: entity.parentId,
  createdAt: entity.createdAt,
  updatedAt: entity.updatedAt
});

export class TypeOrmCategoryRepository implements CategoryRepository {
  constructor(private readonly manager: EntityManager) {}

  private get repository(): Repository<CategoryEntity> {
    return this.manager.getRepository(CategoryEntity);
  }

  async findById(id: string): Promise<Category | null> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toCategory(entity) : null;
  }

  async findBySlug(slug: string): Promise<Category | null> {
    const entity = await this.repository.findOneBy({ slug });
    return entity ? toCategory(entity) : null;
  }

  async findAll(filter: CategoryFilter = {}): Promise<Category[]> {
    const where: FindOptionsWhere<CategoryEntity> = {};
    if (filter.parentId !== undefined) {
      where.parentId = filter.parentId === null ? IsNull() : filter.parentId;
    }
    if (filter.isActive !== undefined) {
      where.isActive = filter.isActive;
    }

    const entities = await this.repository.find({ where, order: SIBLING_ORDER });
    return entities.map(toCategory);
  }

  async findChildren(parentId: string): Promise<Category[]> {
    const entities = await this.repository.find({ where: { parentId }, order: SIBLING_ORDER });
    return entities.map(toCategory);
  }

  async findParentId(id: string): Promise<string | null | undefined> {
    const row = await this.repository.findOne({
      where: { id },
      select: { id: true, parentId: true }
    });
    return row ? row.parentId : undefined;
  }

  async count(): Promise<number> {
    return this.repository.count();
  }

  async countChildren(id: string): Promise<number> {
    return this.repository.countBy({ parentId: id });
  }

  async countActiveChildren(id: string): Promise<number> {
    return this.repository.countBy({ parentId: id, isActive: true });
  }

  async create(data: CategoryData): Promise<Category> {
    const saved = await guardConstraints(() =>
      this.repository.save(this.repository.create(definedOnly(data)))
    );
    return this.require(saved.id);
  }

  async update(id: string, patch: CategoryPatch): Promise<Category> {
    const changes = definedOnly(patch);
    if (hasChanges(changes)) {
      await guardConstraints(() => this.repository.update(id, changes));
    }
    return this.require(id);
  }

  async delete(id: string): Promise<void> {
    // parent_id is ON DELETE SET NULL, so children become roots.
    await guardConstraints(() => this.repository.delete(id));
  }

  async lockHierarchy(): Promise<void> {
    await this.manager.query('SELECT pg_advisory_xact_lock($1)', [CATEGORY_HIERARCHY_LOCK_KEY]);
  }

  private async require(id: string): Promise<Category> {
    const category = await this.findById(id);
    if (!category) {
      throw new NotFoundError('Category', id);
    }
    return category;
  }
}
