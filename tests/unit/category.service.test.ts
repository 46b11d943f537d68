import { CatalogServices } from '../../src/application/services';
import {
  ActiveChildrenExistError,
  ConflictError,
  CyclicReferenceError,
  NotFoundError,
  SelfParentError
} from '../../src/domain/errors';
import { InMemoryCatalogStore } from '../support/InMemoryCatalogStore';
import { createBook, createCategory, setupCatalog } from '../support/fixtures';

describe('CategoryService', () => {
  let store: InMemoryCatalogStore;
  let services: CatalogServices;

  beforeEach(() => {
    ({ store, services } = setupCatalog());
  });

  describe('createCategory', () => {
    it('should create a root category with defaults', async () => {
      const result = await services.categories.createCategory({ name: 'Fiction', slug: 'fiction' });

      expect(result).toMatchObject({
        name: 'Fiction',
        slug: 'fiction',
        description: null,
        isActive: true,
        displayOrder: 0,
        parentId: null,
        parentName: null,
        subcategoryCount: 0,
        fullPath: 'Fiction'
      });
    });

    it('should create a subcategory under an existing parent', async () => {
      const fiction = await createCategory(services, 'Fiction');

      const mystery = await createCategory(services, 'Mystery', fiction.id);

      expect(mystery).toMatchObject({ parentId: fiction.id, parentName: 'Fiction', fullPath: 'Fiction > Mystery' });
      expect((await services.categories.getCategoryById(fiction.id))?.subcategoryCount).toBe(1);
    });

    it('should reject a duplicate slug', async () => {
      await createCategory(services, 'Fiction');

      await expect(services.categories.createCategory({ name: 'Fiction Two', slug: 'fiction' }))
        .rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject an unknown parent', async () => {
      const missingId = '00000000-0000-4000-8000-000000000000';

      await expect(services.categories.createCategory({ name: 'Orphan', slug: 'orphan', parentId: missingId }))
        .rejects.toMatchObject({ code: 'PARENT_CATEGORY_NOT_FOUND', statusCode: 404 });
    });
  });

  describe('updateCategory', () => {
    it('should reject making a root the child of its own subcategory', async () => {
      const fiction = await createCategory(services, 'Fiction');
      const mystery = await createCategory(services, 'Mystery', fiction.id);

      await expect(services.categories.updateCategory(fiction.id, { parentId: mystery.id }))
        .rejects.toBeInstanceOf(CyclicReferenceError);
      expect((await store.categories.findById(fiction.id))?.parentId).toBeNull();
    });

    it('should reject a transitive cycle', async () => {
      const a = await createCategory(services, 'A');
      const b = await createCategory(services, 'B', a.id);
      const c = await createCategory(services, 'C', b.id);

      await expect(services.categories.updateCategory(a.id, { parentId: c.id }))
        .rejects.toBeInstanceOf(CyclicReferenceError);
    });

    it('should reject a category as its own parent', async () => {
      const fiction = await createCategory(services, 'Fiction');

      await expect(services.categories.updateCategory(fiction.id, { parentId: fiction.id }))
        .rejects.toBeInstanceOf(SelfParentError);
    });

    it('should accept an update that leaves a valid tree unchanged', async () => {
      const fiction = await createCategory(services, 'Fiction');
      const mystery = await createCategory(services, 'Mystery', fiction.id);

      const result = await services.categories.updateCategory(mystery.id, { description: 'Whodunits' });

      expect(result).toMatchObject({ description: 'Whodunits', parentId: fiction.id, fullPath: 'Fiction > Mystery' });
    });

    it('should move a category to the root', async () => {
      const fiction = await createCategory(services, 'Fiction');
      const mystery = await createCategory(services, 'Mystery', fiction.id);

      const result = await services.categories.updateCategory(mystery.id, { parentId: null });

      expect(result).toMatchObject({ parentId: null, parentName: null, fullPath: 'Mystery' });
    });

    it('should block deactivation until active children are deactivated', async () => {
      const electronics = await createCategory(services, 'Electronics');
      const laptops = await createCategory(services, 'Laptops', electronics.id);

      await expect(services.categories.updateCategory(electronics.id, { isActive: false }))
        .rejects.toBeInstanceOf(ActiveChildrenExistError);

      await services.categories.updateCategory(laptops.id, { isActive: false });
      const result = await services.categories.updateCategory(electronics.id, { isActive: false });

      expect(result.isActive).toBe(false);
    });

    it('should not re-check children when the category is already inactive', async () => {
      const electronics = await createCategory(services, 'Electronics');
      const laptops = await createCategory(services, 'Laptops', electronics.id);
      await services.categories.updateCategory(laptops.id, { isActive: false });
      await services.categories.updateCategory(electronics.id, { isActive: false });
      await services.categories.updateCategory(laptops.id, { isActive: true });

      await expect(services.categories.updateCategory(electronics.id, { isActive: false, name: 'Devices' }))
        .resolves.toMatchObject({ name: 'Devices', isActive: false });
    });

    it('should let only one of two opposite moves through when they race', async () => {
      const alpha = await createCategory(services, 'Alpha');
      const beta = await createCategory(services, 'Beta');

      const results = await Promise.allSettled([
        services.categories.updateCategory(alpha.id, { parentId: beta.id }),
        services.categories.updateCategory(beta.id, { parentId: alpha.id })
      ]);

      const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(rejected[0].reason).toBeInstanceOf(CyclicReferenceError);
      expect((await store.categories.findById(alpha.id))?.parentId).toBe(beta.id);
      expect((await store.categories.findById(beta.id))?.parentId).toBeNull();
    });

    it('should reject an unknown category', async () => {
      await expect(services.categories.updateCategory('00000000-0000-4000-8000-000000000000', { name: 'Nope' }))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteCategory', () => {
    it('should turn children into roots and drop book associations', async () => {
      const fiction = await createCategory(services, 'Fiction');
      const mystery = await createCategory(services, 'Mystery', fiction.id);
      const book = await createBook(services, 'The Quiet Harbor');
      await services.bookCategories.createBookCategory({ bookId: book.id, categoryId: fiction.id, primary: true });

      await services.categories.deleteCategory(fiction.id);

      expect(await services.categories.getCategoryById(fiction.id)).toBeNull();
      expect((await store.categories.findById(mystery.id))?.parentId).toBeNull();
      expect(await services.bookCategories.getBookCategories({ bookId: book.id })).toEqual([]);
    });
  });

  describe('reads', () => {
    it('should filter by parent and active flag', async () => {
      const fiction = await createCategory(services, 'Fiction', null, 1);
      const history = await createCategory(services, 'History', null, 0);
      await createCategory(services, 'Mystery', fiction.id);
      await services.categories.updateCategory(history.id, { isActive: false });

      const roots = await services.categories.getCategories({ parentId: null });
      const activeRoots = await services.categories.getCategories({ parentId: null, isActive: true });
      const children = await services.categories.getCategories({ parentId: fiction.id });

      expect(roots.map((category) => category.name)).toEqual(['History', 'Fiction']);
      expect(activeRoots.map((category) => category.name)).toEqual(['Fiction']);
      expect(children.map((category) => category.name)).toEqual(['Mystery']);
      expect(roots[1].subcategoryCount).toBe(1);
    });

    it('should list every subcategory in pre-order', async () => {
      const fiction = await createCategory(services, 'Fiction');
      const mystery = await createCategory(services, 'Mystery', fiction.id, 0);
      await createCategory(services, 'Noir', mystery.id);
      await createCategory(services, 'Thriller', fiction.id, 1);

      const result = await services.categories.getAllSubcategories(fiction.id);

      expect(result.map((category) => category.name)).toEqual(['Mystery', 'Noir', 'Thriller']);
      expect(result[1].parentName).toBe('Mystery');
    });

    it('should return null for an unknown category', async () => {
      expect(await services.categories.getCategoryById('00000000-0000-4000-8000-000000000000')).toBeNull();
    });
  });
});
