import { Category, CATEGORY_PATH_SEPARATOR } from '../entities/Category';
import { CategoryTreeReader } from '../repositories/CatalogStore';
import { CyclicReferenceError } from '../errors';

/**
 * Names from the root down to `category`, joined with " > ".
 * Walks parent links iteratively; a chain longer than the category count
 * can only come from corrupted data and is reported as a cycle.
 */
export const fullPath = async (category: Category, reader: CategoryTreeReader): Promise<string> => {
  const names = [category.name];
  const maxSteps = await reader.count();
  let parentId = category.parentId;
  let steps = 0;

  while (parentId) {
    if (steps >= maxSteps || parentId === category.id) {
      throw new CyclicReferenceError(category.id, parentId);
    }
    const parent = await reader.findById(parentId);
    if (!parent) {
      break;
    }
    names.push(parent.name);
    parentId = parent.parentId;
    steps += 1;
  }

  return names.reverse().join(CATEGORY_PATH_SEPARATOR);
};

/**
 * Every descendant of `category` in pre-order: each child is followed by its
 * own subtree before the next sibling.
 */
export const allSubcategories = async (category: Category, reader: CategoryTreeReader): Promise<Category[]> => {
  const result: Category[] = [];
  const visited = new Set<string>([category.id]);
  const stack: Category[] = (await reader.findChildren(category.id)).reverse();

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    if (visited.has(current.id)) {
      throw new CyclicReferenceError(category.id, current.id);
    }
    visited.add(current.id);
    result.push(current);

    const children = await reader.findChildren(current.id);
    for (let i = children.length - 1; i >= 0; i -= 1) {
      stack.push(children[i]);
    }
  }

  return result;
};
