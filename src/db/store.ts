import { Kysely } from "kysely";
import { DB } from "../types/db";
import {
  CategoryRepository,
  OrderItemRepository,
  OrderRepository,
  PersonRepository,
  ProductRepository,
  ReviewRepository,
  ShopRepositories,
  ShopStore,
} from "../types/store";

// `Transaction<DB>` extends `Kysely<DB>`, so every repository below works
// the same inside and outside a transaction.
type Executor = Kysely<DB>;

const deletedCount = (result: { numDeletedRows: bigint }) =>
  Number(result.numDeletedRows);

/** Escapes `\`, `%` and `_` so a search term matches literally under LIKE. */
export const escapeLikePattern = (value: string) =>
  value.replace(/[\\%_]/g, (char) => `\\${char}`);

function categoryRepository(db: Executor): CategoryRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("categories")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    list: (filter = {}) => {
      let query = db.selectFrom("categories").selectAll();
      if (filter.name !== undefined) {
        query = query.where("name", "=", filter.name);
      }
      return query.orderBy("name").orderBy("id").execute();
    },

    insert: (values) =>
      db
        .insertInto("categories")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    update: async (id, values) => {
      if (Object.keys(values).length === 0) {
        return categoryRepository(db).findById(id);
      }
      return db
        .updateTable("categories")
        .set(values)
        .where("id", "=", id)
        .returningAll()
        .executeTakeFirst();
    },

    deleteByIds: async (ids) => {
      if (ids.length === 0) return 0;
      const result = await db
        .deleteFrom("categories")
        .where("id", "in", ids)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function productRepository(db: Executor): ProductRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("products")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    findByNameInCategory: (name, categoryId) =>
      db
        .selectFrom("products")
        .selectAll()
        .where("name", "=", name)
        .where("category_id", "=", categoryId)
        .executeTakeFirst(),

    list: (filter = {}) => {
      let query = db
        .selectFrom("products")
        .innerJoin("categories", "categories.id", "products.category_id")
        .selectAll("products");

      if (filter.categoryId !== undefined) {
        query = query.where("products.category_id", "=", filter.categoryId);
      }
      if (filter.name !== undefined) {
        query = query.where("products.name", "=", filter.name);
      }
      if (filter.search !== undefined) {
        const pattern = `%${escapeLikePattern(filter.search)}%`;
        query = query.where((eb) =>
          eb.or([
            eb("products.name", "ilike", pattern),
            eb("categories.name", "ilike", pattern),
          ])
        );
      }

      return query
        .orderBy("products.created_at", "desc")
        .orderBy("products.id", "desc")
        .execute();
    },

    listIdsByCategories: async (categoryIds) => {
      if (categoryIds.length === 0) return [];
      const rows = await db
        .selectFrom("products")
        .select("id")
        .where("category_id", "in", categoryIds)
        .execute();
      return rows.map((row) => row.id);
    },

    lockByIds: async (ids) => {
      if (ids.length === 0) return [];
      const rows = await db
        .selectFrom("products")
        .select("id")
        .where("id", "in", ids)
        .orderBy("id")
        .forUpdate()
        .execute();
      return rows.map((row) => row.id);
    },

    insert: (values) =>
      db
        .insertInto("products")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    update: async (id, values) => {
      if (Object.keys(values).length === 0) {
        return productRepository(db).findById(id);
      }
      return db
        .updateTable("products")
        .set(values)
        .where("id", "=", id)
        .returningAll()
        .executeTakeFirst();
    },

    deleteByIds: async (ids) => {
      if (ids.length === 0) return 0;
      const result = await db
        .deleteFrom("products")
        .where("id", "in", ids)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function personRepository(db: Executor): PersonRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("persons")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    findByEmail: (email) =>
      db
        .selectFrom("persons")
        .selectAll()
        .where("email", "=", email)
        .executeTakeFirst(),

    findBySlug: (slug) =>
      db
        .selectFrom("persons")
        .selectAll()
        .where("slug", "=", slug)
        .executeTakeFirst(),

    list: (filter = {}) => {
      let query = db.selectFrom("persons").selectAll();
      if (filter.email !== undefined) {
        query = query.where("email", "=", filter.email);
      }
      if (filter.createdAfter !== undefined) {
        query = query.where("created_at", ">=", filter.createdAfter);
      }
      return query.orderBy("full_name", "desc").orderBy("id").execute();
    },

    insert: (values) =>
      db
        .insertInto("persons")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    update: async (id, values) => {
      if (Object.keys(values).length === 0) {
        return personRepository(db).findById(id);
      }
      return db
        .updateTable("persons")
        .set(values)
        .where("id", "=", id)
        .returningAll()
        .executeTakeFirst();
    },

    deleteById: async (id) => {
      const result = await db
        .deleteFrom("persons")
        .where("id", "=", id)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function orderRepository(db: Executor): OrderRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("orders")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    lockById: (id) =>
      db
        .selectFrom("orders")
        .selectAll()
        .where("id", "=", id)
        .forUpdate() // Row-level lock
        .executeTakeFirst(),

    list: (filter = {}) => {
      let query = db.selectFrom("orders").selectAll();
      if (filter.ownerId !== undefined) {
        query = query.where("owner_id", "=", filter.ownerId);
      }
      if (filter.status !== undefined) {
        query = query.where("status", "=", filter.status);
      }
      return query
        .orderBy("created_at", "desc")
        .orderBy("id", "desc")
        .execute();
    },

    listIdsByOwner: async (ownerId) => {
      const rows = await db
        .selectFrom("orders")
        .select("id")
        .where("owner_id", "=", ownerId)
        .execute();
      return rows.map((row) => row.id);
    },

    insert: (values) =>
      db
        .insertInto("orders")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    update: async (id, values) => {
      if (Object.keys(values).length === 0) {
        return orderRepository(db).findById(id);
      }
      return db
        .updateTable("orders")
        .set(values)
        .where("id", "=", id)
        .returningAll()
        .executeTakeFirst();
    },

    deleteByIds: async (ids) => {
      if (ids.length === 0) return 0;
      const result = await db
        .deleteFrom("orders")
        .where("id", "in", ids)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function orderItemRepository(db: Executor): OrderItemRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("order_items")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    listByOrder: (orderId) =>
      db
        .selectFrom("order_items as oi")
        .innerJoin("products as p", "p.id", "oi.product_id")
        .select([
          "oi.id",
          "oi.order_id",
          "oi.product_id",
          "p.name as product_name",
          "oi.quantity",
          "p.price as unit_price",
        ])
        .where("oi.order_id", "=", orderId)
        .orderBy("oi.id")
        .execute(),

    listOrderIdsByProducts: async (productIds) => {
      if (productIds.length === 0) return [];
      const rows = await db
        .selectFrom("order_items")
        .select("order_id")
        .distinct()
        .where("product_id", "in", productIds)
        .execute();
      return rows.map((row) => row.order_id);
    },

    insert: (values) =>
      db
        .insertInto("order_items")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    updateQuantity: (id, quantity) =>
      db
        .updateTable("order_items")
        .set({ quantity })
        .where("id", "=", id)
        .returningAll()
        .executeTakeFirst(),

    deleteById: async (id) => {
      const result = await db
        .deleteFrom("order_items")
        .where("id", "=", id)
        .executeTakeFirst();
      return deletedCount(result);
    },

    deleteByOrders: async (orderIds) => {
      if (orderIds.length === 0) return 0;
      const result = await db
        .deleteFrom("order_items")
        .where("order_id", "in", orderIds)
        .executeTakeFirst();
      return deletedCount(result);
    },

    deleteByProducts: async (productIds) => {
      if (productIds.length === 0) return 0;
      const result = await db
        .deleteFrom("order_items")
        .where("product_id", "in", productIds)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function reviewRepository(db: Executor): ReviewRepository {
  return {
    findById: (id) =>
      db
        .selectFrom("reviews")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst(),

    list: (filter = {}) => {
      let query = db.selectFrom("reviews").selectAll();
      if (filter.productId !== undefined) {
        query = query.where("product_id", "=", filter.productId);
      }
      if (filter.personId !== undefined) {
        query = query.where("person_id", "=", filter.personId);
      }
      return query
        .orderBy("created_at", "desc")
        .orderBy("id", "desc")
        .execute();
    },

    insert: (values) =>
      db
        .insertInto("reviews")
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow(),

    deleteById: async (id) => {
      const result = await db
        .deleteFrom("reviews")
        .where("id", "=", id)
        .executeTakeFirst();
      return deletedCount(result);
    },

    deleteByProducts: async (productIds) => {
      if (productIds.length === 0) return 0;
      const result = await db
        .deleteFrom("reviews")
        .where("product_id", "in", productIds)
        .executeTakeFirst();
      return deletedCount(result);
    },

    deleteByPersons: async (personIds) => {
      if (personIds.length === 0) return 0;
      const result = await db
        .deleteFrom("reviews")
        .where("person_id", "in", personIds)
        .executeTakeFirst();
      return deletedCount(result);
    },
  };
}

function buildRepositories(db: Executor): ShopRepositories {
  return {
    categories: categoryRepository(db),
    products: productRepository(db),
    persons: personRepository(db),
    orders: orderRepository(db),
    orderItems: orderItemRepository(db),
    reviews: reviewRepository(db),
  };
}

export function createKyselyStore(db: Kysely<DB>): ShopStore {
  return {
    ...buildRepositories(db),
    transaction: (work) =>
      db.transaction().execute((trx) => work(buildRepositories(trx))),
  };
}
