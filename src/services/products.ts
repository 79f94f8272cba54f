import path from "node:path";
import { ProductUpdate } from "../types/db";
import { ProductFilter, ShopRepositories, ShopStore } from "../types/store";
import { ConflictError, NotFoundError } from "../utils/errors";
import {
  ProductCreateRequest,
  ProductUpdateRequest,
} from "../validations/product";
import { recomputeTotalsWithin } from "./orderTotal";

/** Storage path of a product image, relative to the media root. */
export function productImagePath(productId: number, filename: string) {
  return path.posix.join(
    "products",
    "updated_at",
    `product_${productId}_${filename}`
  );
}

async function ensureCategory(trx: ShopRepositories, categoryId: number) {
  const category = await trx.categories.findById(categoryId);
  if (!category) {
    throw new NotFoundError("Category", categoryId);
  }
  return category;
}

async function ensureUniqueName(
  trx: ShopRepositories,
  name: string,
  categoryId: number,
  productId?: number
) {
  const existing = await trx.products.findByNameInCategory(name, categoryId);
  if (existing && existing.id !== productId) {
    throw new ConflictError(
      `Product "${name}" already exists in category ${categoryId}`
    );
  }
}

export async function createProduct(
  store: ShopStore,
  request: ProductCreateRequest
) {
  return store.transaction(async (trx) => {
    await ensureCategory(trx, request.categoryId);
    await ensureUniqueName(trx, request.name, request.categoryId);

    const product = await trx.products.insert({
      name: request.name,
      description: request.description,
      price: request.price,
      stock_quantity: request.stockQuantity,
      category_id: request.categoryId,
      image: null,
    });

    console.log(`Created product ${product.id} - ${product.name} (${product.price})`);

    if (!request.imageFilename) {
      return product;
    }
    // the path embeds the id, which only exists after the insert
    const withImage = await trx.products.update(product.id, {
      image: productImagePath(product.id, request.imageFilename),
    });
    return withImage ?? product;
  });
}

export async function getProduct(store: ShopStore, productId: number) {
  const product = await store.products.findById(productId);
  if (!product) {
    throw new NotFoundError("Product", productId);
  }
  return product;
}

export async function getAllProducts(
  store: ShopStore,
  filter: ProductFilter = {}
) {
  const products = await store.products.list(filter);
  return { isSuccess: true, data: products };
}

export async function updateProduct(
  store: ShopStore,
  productId: number,
  request: ProductUpdateRequest
) {
  return store.transaction(async (trx) => {
    const current = await trx.products.findById(productId);
    if (!current) {
      throw new NotFoundError("Product", productId);
    }

    const values: ProductUpdate = {};
    if (request.categoryId !== undefined) {
      await ensureCategory(trx, request.categoryId);
      values.category_id = request.categoryId;
    }
    if (request.name !== undefined) values.name = request.name;
    if (request.description !== undefined) {
      values.description = request.description;
    }
    if (request.price !== undefined) values.price = request.price;
    if (request.stockQuantity !== undefined) {
      values.stock_quantity = request.stockQuantity;
    }
    if (request.imageFilename !== undefined) {
      values.image =
        request.imageFilename === null
          ? null
          : productImagePath(productId, request.imageFilename);
    }

    if (values.name !== undefined || values.category_id !== undefined) {
      await ensureUniqueName(
        trx,
        values.name ?? current.name,
        values.category_id ?? current.category_id,
        productId
      );
    }

    const product = await trx.products.update(productId, values);
    if (!product) {
      throw new NotFoundError("Product", productId);
    }
    return product;
  });
}

/**
 * Deletes products with their reviews and the order items referencing
 * them, then re-totals every order that lost an item.
 */
export async function deleteProductsWithin(
  trx: ShopRepositories,
  productIds: number[]
) {
  // taken before reading the affected orders: an item insert against a
  // locked product waits, so no order can gain a line after the listing
  await trx.products.lockByIds(productIds);
  const affectedOrders = await trx.orderItems.listOrderIdsByProducts(productIds);
  const reviews = await trx.reviews.deleteByProducts(productIds);
  const orderItems = await trx.orderItems.deleteByProducts(productIds);
  const products = await trx.products.deleteByIds(productIds);

  await recomputeTotalsWithin(trx, affectedOrders);

  return { products, reviews, orderItems, affectedOrders };
}

export async function deleteProduct(store: ShopStore, productId: number) {
  return store.transaction(async (trx) => {
    const product = await trx.products.findById(productId);
    if (!product) {
      throw new NotFoundError("Product", productId);
    }

    const result = await deleteProductsWithin(trx, [productId]);
    console.log(
      `Deleted product ${productId} with ${result.reviews} reviews and ${result.orderItems} order items`
    );
    return result;
  });
}
