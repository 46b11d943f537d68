import logger from '../../utils/logger';
import { Category } from '../../domain/entities/Category';
import { CatalogStore, CategoryRepository, CategoryTreeReader } from '../../domain/repositories/CatalogStore';
import { CategoryTreeValidator } from '../../domain/validators/CategoryTreeValidator';
import { allSubcategories, fullPath } from '../../domain/services/categoryHierarchy';
import { ConflictError, NotFoundError } from '../../domain/errors';
import {
  CategoryQueryDTO,
  CategoryResponseDTO,
  CreateCategoryDTO,
  UpdateCategoryDTO
} from '../dto/CatalogDTO';

export class CategoryService {
  private readonly logger = logger;

  constructor(private readonly store: CatalogStore) {}

  // ==========================================
  // Writes
  // ==========================================

  // Hierarchy writes hold the hierarchy lock from the first check to the
  // commit, so the ancestor chain the validator walked is the one persisted.
  async createCategory(data: CreateCategoryDTO): Promise<CategoryResponseDTO> {
    const category = await this.store.transaction(async ({ categories }) => {
      await categories.lockHierarchy();
      await this.assertSlugAvailable(categories, data.slug);

      const parentId = data.parentId ?? null;
      if (parentId) {
        await this.requireCategory(categories, parentId, 'Parent category');
      }
      await new CategoryTreeValidator(categories).validateParentAssignment({}, parentId);

      return categories.create({
        name: data.name,
        slug: data.slug,
        description: data.description ?? null,
        isActive: data.isActive ?? true,
        displayOrder: data.displayOrder ?? 0,
        parentId
      });
    });

    this.logger.info(`Category created: ${category.slug}`, { categoryId: category.id, parentId: category.parentId });

    return this.toResponse(category, this.store.categories, true);
  }

  async updateCategory(id: string, data: UpdateCategoryDTO): Promise<CategoryResponseDTO> {
    const category = await this.store.transaction(async ({ categories }) => {
      await categories.lockHierarchy();
      const existing = await this.requireCategory(categories, id, 'Category');

      if (data.slug !== undefined && data.slug !== existing.slug) {
        await this.assertSlugAvailable(categories, data.slug);
      }

      const parentId = data.parentId !== undefined ? data.parentId : existing.parentId;
      if (data.parentId) {
        await this.requireCategory(categories, data.parentId, 'Parent category');
      }

      const validator = new CategoryTreeValidator(categories);
      await validator.validateParentAssignment(existing, parentId);

      if (existing.isActive && data.isActive === false) {
        await validator.validateDeactivation(existing);
      }

      return categories.update(id, data);
    });

    this.logger.info(`Category updated: ${category.slug}`, { categoryId: category.id });

    return this.toResponse(category, this.store.categories, true);
  }

  async deleteCategory(id: string): Promise<void> {
    const category = await this.store.transaction(async ({ categories }) => {
      await categories.lockHierarchy();
      const existing = await this.requireCategory(categories, id, 'Category');
      await categories.delete(id);
      return existing;
    });

    this.logger.info(`Category deleted: ${category.slug}`, { categoryId: id });
  }

  // ==========================================
  // Reads
  // ==========================================

  async getCategoryById(id: string): Promise<CategoryResponseDTO | null> {
    const category = await this.store.categories.findById(id);
    if (!category) {
      return null;
    }
    return this.toResponse(category, this.store.categories, true);
  }

  async getCategories(query: CategoryQueryDTO = {}): Promise<CategoryResponseDTO[]> {
    const categories = await this.store.categories.findAll(query);
    return Promise.all(categories.map((category) => this.toResponse(category, this.store.categories)));
  }

  async getAllSubcategories(id: string): Promise<CategoryResponseDTO[]> {
    const category = await this.requireCategory(this.store.categories, id, 'Category');
    const descendants = await allSubcategories(category, this.store.categories);
    return Promise.all(descendants.map((descendant) => this.toResponse(descendant, this.store.categories)));
  }

  // ==========================================
  // Helpers
  // ==========================================

  private async requireCategory(categories: CategoryTreeReader, id: string, label: string): Promise<Category> {
    const category = await categories.findById(id);
    if (!category) {
      throw new NotFoundError(label, id);
    }
    return category;
  }

  private async assertSlugAvailable(categories: CategoryRepository, slug: string): Promise<void> {
    if (await categories.findBySlug(slug)) {
      throw new ConflictError(`Category with slug ${slug} already exists`, { slug });
    }
  }

  private async toResponse(
    category: Category,
    categories: CategoryRepository,
    withPath = false
  ): Promise<CategoryResponseDTO> {
    const [parent, subcategoryCount] = await Promise.all([
      category.parentId ? categories.findById(category.parentId) : Promise.resolve(null),
      categories.countChildren(category.id)
    ]);

    const response: CategoryResponseDTO = {
      ...category,
      parentName: parent ? parent.name : null,
      subcategoryCount
    };

    if (withPath) {
      response.fullPath = await fullPath(category, categories);
    }

    return response;
  }
}

export default CategoryService;
