import { CategoryHierarchyReader } from '../repositories/CatalogStore';
import { ActiveChildrenExistError, CyclicReferenceError, SelfParentError } from '../errors';

/**
 * Keeps categories a forest: no category may reach itself by following
 * parent links, and a category with active children stays active.
 *
 * The validator holds no state of its own. Give it a reader bound to the
 * same transaction as the write it guards, otherwise the ancestor chain can
 * change between the check and the commit.
 */
export class CategoryTreeValidator {
  constructor(private readonly reader: CategoryHierarchyReader) {}

  /**
   * @param category - the category being saved; `id` is absent until it is persisted
   * @param candidateParentId - parent to assign, null or undefined for a root
   */
  async validateParentAssignment(
    category: { id?: string | null },
    candidateParentId: string | null | undefined
  ): Promise<void> {
    if (!candidateParentId) {
      return;
    }

    const categoryId = category.id ?? null;

    if (categoryId !== null && candidateParentId === categoryId) {
      throw new SelfParentError(categoryId);
    }

    // Any acyclic chain has fewer links than there are categories. An
    // unknown id ends the walk like a root, before the bound is consulted.
    const maxSteps = await this.reader.count();
    let currentId: string = candidateParentId;
    let steps = 0;

    for (;;) {
      if (categoryId !== null && currentId === categoryId) {
        throw new CyclicReferenceError(categoryId, candidateParentId);
      }

      const parentId = await this.reader.findParentId(currentId);
      if (parentId === null || parentId === undefined) {
        return;
      }
      if (parentId === candidateParentId) {
        throw new CyclicReferenceError(categoryId, candidateParentId);
      }

      steps += 1;
      if (steps >= maxSteps) {
        throw new CyclicReferenceError(categoryId, candidateParentId);
      }
      currentId = parentId;
    }
  }

  // Direct children only; grandchildren are not inspected.
  async validateDeactivation(category: { id: string }): Promise<void> {
    const activeChildren = await this.reader.countActiveChildren(category.id);
    if (activeChildren > 0) {
      throw new ActiveChildrenExistError(category.id, activeChildren);
    }
  }
}
