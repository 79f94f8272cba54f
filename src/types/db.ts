import {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
  Updateable,
} from "kysely";

// numeric(10,2) columns come back from pg as strings ("19.99")
export type Decimal = ColumnType<string, string, string>;

export type OrderStatus = "processing" | "shipping" | "delivered";

export const ORDER_STATUSES: readonly OrderStatus[] = [
  "processing",
  "shipping",
  "delivered",
];

export interface CategoryTable {
  id: Generated<number>;
  name: string;
  description: string;
  parent_id: number | null;
}

export interface ProductTable {
  id: Generated<number>;
  name: string;
  description: string;
  price: Decimal;
  stock_quantity: Generated<number>;
  image: string | null;
  category_id: number;
  created_at: Generated<Date>;
}

export interface PersonTable {
  id: Generated<number>;
  password_hash: string;
  full_name: string;
  birth_date: string | null; // YYYY-MM-DD
  email: string;
  slug: string;
  created_at: Generated<Date>;
}

export interface OrderTable {
  id: Generated<number>;
  owner_id: number;
  status: Generated<OrderStatus>;
  total: ColumnType<string, string | undefined, string>;
  created_at: Generated<Date>;
}

export interface OrderItemTable {
  id: Generated<number>;
  order_id: number;
  product_id: number;
  quantity: Generated<number>;
}

export interface ReviewTable {
  id: Generated<number>;
  product_id: number;
  person_id: number;
  rating: Generated<number>;
  review: string;
  created_at: Generated<Date>;
}

export interface DB {
  categories: CategoryTable;
  products: ProductTable;
  persons: PersonTable;
  orders: OrderTable;
  order_items: OrderItemTable;
  reviews: ReviewTable;
}

export type Category = Selectable<CategoryTable>;
export type NewCategory = Insertable<CategoryTable>;
export type CategoryUpdate = Updateable<CategoryTable>;

export type Product = Selectable<ProductTable>;
export type NewProduct = Insertable<ProductTable>;
export type ProductUpdate = Updateable<ProductTable>;

export type Person = Selectable<PersonTable>;
export type NewPerson = Insertable<PersonTable>;
export type PersonUpdate = Updateable<PersonTable>;

export type Order = Selectable<OrderTable>;
export type NewOrder = Insertable<OrderTable>;
export type OrderUpdate = Updateable<OrderTable>;

export type OrderItem = Selectable<OrderItemTable>;
export type NewOrderItem = Insertable<OrderItemTable>;

export type Review = Selectable<ReviewTable>;
export type NewReview = Insertable<ReviewTable>;
