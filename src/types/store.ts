import {
  Category,
  CategoryUpdate,
  NewCategory,
  NewOrder,
  NewOrderItem,
  NewPerson,
  NewProduct,
  NewReview,
  Order,
  OrderItem,
  OrderStatus,
  OrderUpdate,
  Person,
  PersonUpdate,
  Product,
  ProductUpdate,
  Review,
} from "./db";

/** A line item joined with the current price of its product. */
export interface PricedOrderItem {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  quantity: number;
  unit_price: string;
}

export interface CategoryFilter {
  name?: string;
}

export interface ProductFilter {
  categoryId?: number;
  name?: string;
  /** Matches product name or category name. */
  search?: string;
}

export interface PersonFilter {
  email?: string;
  createdAfter?: Date;
}

export interface OrderFilter {
  ownerId?: number;
  status?: OrderStatus;
}

export interface ReviewFilter {
  productId?: number;
  personId?: number;
}

export interface CategoryRepository {
  findById(id: number): Promise<Category | undefined>;
  list(filter?: CategoryFilter): Promise<Category[]>;
  insert(values: NewCategory): Promise<Category>;
  update(id: number, values: CategoryUpdate): Promise<Category | undefined>;
  deleteByIds(ids: number[]): Promise<number>;
}

export interface ProductRepository {
  findById(id: number): Promise<Product | undefined>;
  findByNameInCategory(
    name: string,
    categoryId: number
  ): Promise<Product | undefined>;
  list(filter?: ProductFilter): Promise<Product[]>;
  listIdsByCategories(categoryIds: number[]): Promise<number[]>;
  /** Locks the existing rows among `ids`; returns their ids, ascending. */
  lockByIds(ids: number[]): Promise<number[]>;
  insert(values: NewProduct): Promise<Product>;
  update(id: number, values: ProductUpdate): Promise<Product | undefined>;
  deleteByIds(ids: number[]): Promise<number>;
}

export interface PersonRepository {
  findById(id: number): Promise<Person | undefined>;
  findByEmail(email: string): Promise<Person | undefined>;
  findBySlug(slug: string): Promise<Person | undefined>;
  list(filter?: PersonFilter): Promise<Person[]>;
  insert(values: NewPerson): Promise<Person>;
  update(id: number, values: PersonUpdate): Promise<Person | undefined>;
  deleteById(id: number): Promise<number>;
}

export interface OrderRepository {
  findById(id: number): Promise<Order | undefined>;
  /** Reads the order row and holds it until the transaction ends. */
  lockById(id: number): Promise<Order | undefined>;
  list(filter?: OrderFilter): Promise<Order[]>;
  listIdsByOwner(ownerId: number): Promise<number[]>;
  insert(values: NewOrder): Promise<Order>;
  update(id: number, values: OrderUpdate): Promise<Order | undefined>;
  deleteByIds(ids: number[]): Promise<number>;
}

export interface OrderItemRepository {
  findById(id: number): Promise<OrderItem | undefined>;
  listByOrder(orderId: number): Promise<PricedOrderItem[]>;
  listOrderIdsByProducts(productIds: number[]): Promise<number[]>;
  insert(values: NewOrderItem): Promise<OrderItem>;
  updateQuantity(id: number, quantity: number): Promise<OrderItem | undefined>;
  deleteById(id: number): Promise<number>;
  deleteByOrders(orderIds: number[]): Promise<number>;
  deleteByProducts(productIds: number[]): Promise<number>;
}

export interface ReviewRepository {
  findById(id: number): Promise<Review | undefined>;
  list(filter?: ReviewFilter): Promise<Review[]>;
  insert(values: NewReview): Promise<Review>;
  deleteById(id: number): Promise<number>;
  deleteByProducts(productIds: number[]): Promise<number>;
  deleteByPersons(personIds: number[]): Promise<number>;
}

export interface ShopRepositories {
  categories: CategoryRepository;
  products: ProductRepository;
  persons: PersonRepository;
  orders: OrderRepository;
  orderItems: OrderItemRepository;
  reviews: ReviewRepository;
}

export interface ShopStore extends ShopRepositories {
  /**
   * Runs `work` atomically. Either every write inside it commits or none
   * does; errors are rethrown after rollback.
   */
  transaction<T>(work: (trx: ShopRepositories) => Promise<T>): Promise<T>;
}
