import { Category, CategoryUpdate } from "../types/db";
import { CategoryFilter, ShopStore } from "../types/store";
import { ConflictError, NotFoundError } from "../utils/errors";
import {
  CategoryCreateRequest,
  CategoryUpdateRequest,
} from "../validations/category";
import { deleteProductsWithin } from "./products";

/** Parent key -> child keys. Root categories live under `null`. */
export type CategoryIndex = Map<number | null, number[]>;

export interface CategoryNode extends Category {
  children: CategoryNode[];
}

export function buildCategoryIndex(categories: Category[]): CategoryIndex {
  const index: CategoryIndex = new Map();
  for (const category of categories) {
    const siblings = index.get(category.parent_id) ?? [];
    siblings.push(category.id);
    index.set(category.parent_id, siblings);
  }
  return index;
}

/** The root and every category below it, breadth first. */
export function collectSubtree(index: CategoryIndex, rootId: number) {
  const ids: number[] = [];
  const seen = new Set<number>();
  const queue = [rootId];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    ids.push(id);
    queue.push(...(index.get(id) ?? []));
  }
  return ids;
}

export function buildCategoryTree(categories: Category[]): CategoryNode[] {
  const index = buildCategoryIndex(categories);
  const byId = new Map(categories.map((category) => [category.id, category]));

  const toNode = (id: number): CategoryNode[] => {
    const category = byId.get(id);
    if (!category) return [];
    return [
      {
        ...category,
        children: (index.get(id) ?? []).flatMap(toNode),
      },
    ];
  };

  return (index.get(null) ?? []).flatMap(toNode);
}

export async function createCategory(
  store: ShopStore,
  request: CategoryCreateRequest
) {
  if (request.parentId !== null) {
    const parent = await store.categories.findById(request.parentId);
    if (!parent) {
      throw new NotFoundError("Category", request.parentId);
    }
  }

  return store.categories.insert({
    name: request.name,
    description: request.description,
    parent_id: request.parentId,
  });
}

export async function getCategory(store: ShopStore, categoryId: number) {
  const category = await store.categories.findById(categoryId);
  if (!category) {
    throw new NotFoundError("Category", categoryId);
  }
  return category;
}

export async function listCategories(
  store: ShopStore,
  filter: CategoryFilter = {}
) {
  return store.categories.list(filter);
}

export async function listChildren(store: ShopStore, categoryId: number) {
  await getCategory(store, categoryId);
  const categories = await store.categories.list();
  return categories.filter((category) => category.parent_id === categoryId);
}

export async function getCategoryTree(store: ShopStore) {
  return buildCategoryTree(await store.categories.list());
}

export async function updateCategory(
  store: ShopStore,
  categoryId: number,
  request: CategoryUpdateRequest
) {
  return store.transaction(async (trx) => {
    const current = await trx.categories.findById(categoryId);
    if (!current) {
      throw new NotFoundError("Category", categoryId);
    }

    const values: CategoryUpdate = {};
    if (request.name !== undefined) values.name = request.name;
    if (request.description !== undefined) {
      values.description = request.description;
    }

    if (request.parentId !== undefined) {
      if (request.parentId !== null) {
        const parent = await trx.categories.findById(request.parentId);
        if (!parent) {
          throw new NotFoundError("Category", request.parentId);
        }
        const subtree = collectSubtree(
          buildCategoryIndex(await trx.categories.list()),
          categoryId
        );
        if (subtree.includes(request.parentId)) {
          throw new ConflictError(
            `Category ${request.parentId} is ${categoryId} or one of its descendants`
          );
        }
      }
      values.parent_id = request.parentId;
    }

    const category = await trx.categories.update(categoryId, values);
    if (!category) {
      throw new NotFoundError("Category", categoryId);
    }
    return category;
  });
}

/**
 * Deletes a category with its whole subtree and every product filed under
 * it. Orders that referenced those products are re-totalled.
 */
export async function deleteCategory(store: ShopStore, categoryId: number) {
  return store.transaction(async (trx) => {
    const category = await trx.categories.findById(categoryId);
    if (!category) {
      throw new NotFoundError("Category", categoryId);
    }

    const subtree = collectSubtree(
      buildCategoryIndex(await trx.categories.list()),
      categoryId
    );
    const productIds = await trx.products.listIdsByCategories(subtree);
    const removed = await deleteProductsWithin(trx, productIds);
    const categories = await trx.categories.deleteByIds(subtree);

    console.log(
      `Deleted category ${categoryId}: ${categories} categories, ${removed.products} products, ${removed.affectedOrders.length} orders re-totalled`
    );
    return {
      categories,
      products: removed.products,
      affectedOrders: removed.affectedOrders,
    };
  });
}
