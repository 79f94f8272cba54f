import { Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("categories")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("name", "varchar(50)", (col) => col.notNull())
    .addColumn("description", "text", (col) => col.notNull())
    .addColumn("parent_id", "integer", (col) =>
      col.references("categories.id").onDelete("cascade")
    )
    .execute();

  await db.schema
    .createIndex("categories_parent_id_idx")
    .on("categories")
    .column("parent_id")
    .execute();

  await db.schema
    .createTable("products")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("name", "varchar(100)", (col) => col.notNull())
    .addColumn("description", "text", (col) => col.notNull())
    .addColumn("price", "numeric(10, 2)", (col) => col.notNull())
    .addColumn("stock_quantity", "integer", (col) =>
      col.notNull().defaultTo(1).check(sql`stock_quantity >= 0`)
    )
    .addColumn("image", "varchar(255)")
    .addColumn("category_id", "integer", (col) =>
      col.notNull().references("categories.id").onDelete("cascade")
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint("products_name_category_unique", [
      "name",
      "category_id",
    ])
    .execute();

  await db.schema
    .createTable("persons")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("password_hash", "varchar(128)", (col) => col.notNull())
    .addColumn("full_name", "varchar(150)", (col) => col.notNull())
    .addColumn("birth_date", "date")
    .addColumn("email", "varchar(50)", (col) => col.notNull().unique())
    .addColumn("slug", "varchar(50)", (col) => col.notNull().unique())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable("orders")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("owner_id", "integer", (col) =>
      col.notNull().references("persons.id").onDelete("cascade")
    )
    .addColumn("status", "varchar(20)", (col) =>
      col
        .notNull()
        .defaultTo("processing")
        .check(sql`status in ('processing', 'shipping', 'delivered')`)
    )
    .addColumn("total", "numeric(10, 2)", (col) =>
      col.notNull().defaultTo("0.00")
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable("order_items")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("order_id", "integer", (col) =>
      col.notNull().references("orders.id").onDelete("cascade")
    )
    .addColumn("product_id", "integer", (col) =>
      col.notNull().references("products.id").onDelete("cascade")
    )
    .addColumn("quantity", "integer", (col) =>
      col.notNull().defaultTo(1).check(sql`quantity > 0`)
    )
    .execute();

  await db.schema
    .createIndex("order_items_order_id_idx")
    .on("order_items")
    .column("order_id")
    .execute();

  await db.schema
    .createTable("reviews")
    .addColumn("id", "serial", (col) => col.primaryKey())
    .addColumn("product_id", "integer", (col) =>
      col.notNull().references("products.id").onDelete("cascade")
    )
    .addColumn("person_id", "integer", (col) =>
      col.notNull().references("persons.id").onDelete("cascade")
    )
    .addColumn("rating", "smallint", (col) =>
      col.notNull().defaultTo(5).check(sql`rating between 1 and 5`)
    )
    .addColumn("review", "text", (col) => col.notNull())
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("reviews").execute();
  await db.schema.dropTable("order_items").execute();
  await db.schema.dropTable("orders").execute();
  await db.schema.dropTable("persons").execute();
  await db.schema.dropTable("products").execute();
  await db.schema.dropTable("categories").execute();
}
