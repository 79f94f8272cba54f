import { OrderTotalPolicy } from "../config/env";
import { Order, OrderItem, OrderUpdate } from "../types/db";
import {
  OrderFilter,
  PricedOrderItem,
  ShopRepositories,
  ShopStore,
} from "../types/store";
import { NotFoundError, ValidationError } from "../utils/errors";
import { formatCents, MAX_AMOUNT_CENTS, toCents } from "../utils/money";
import {
  OrderCreateRequest,
  OrderItemRequest,
  OrderUpdateRequest,
} from "../validations/order";
import {
  computeOrderTotal,
  itemPrice,
  recomputeTotalWithin,
} from "./orderTotal";

export interface OrderLine extends PricedOrderItem {
  item_price: string;
}

export interface OrderDetail extends Order {
  items: OrderLine[];
}

export interface OrderItemResult {
  item: OrderItem;
  /** The order's stored total after the mutation. */
  orderTotal: string;
}

const toLines = (items: PricedOrderItem[]): OrderLine[] =>
  items.map((item) => ({ ...item, item_price: itemPrice(item) }));

async function lockOrder(trx: ShopRepositories, orderId: number) {
  const order = await trx.orders.lockById(orderId);
  if (!order) {
    throw new NotFoundError("Order", orderId);
  }
  return order;
}

async function ensurePerson(trx: ShopRepositories, personId: number) {
  const person = await trx.persons.findById(personId);
  if (!person) {
    throw new NotFoundError("Person", personId);
  }
  return person;
}

export async function createOrder(store: ShopStore, request: OrderCreateRequest) {
  return store.transaction(async (trx) => {
    await ensurePerson(trx, request.ownerId);

    // A new order has no items yet, so its total is the empty sum.
    const order = await trx.orders.insert({
      owner_id: request.ownerId,
      status: request.status,
      total: computeOrderTotal([]),
    });

    console.log(`Created order ${order.id} for person ${order.owner_id}`);
    return order;
  });
}

/**
 * Saves order fields and re-totals the order in one read-modify-write:
 * lock the row, read the items, write fields and total with one update.
 */
export async function saveOrder(
  store: ShopStore,
  orderId: number,
  request: OrderUpdateRequest
): Promise<OrderDetail> {
  return store.transaction(async (trx) => {
    await lockOrder(trx, orderId);

    const values: OrderUpdate = {};
    if (request.ownerId !== undefined) {
      await ensurePerson(trx, request.ownerId);
      values.owner_id = request.ownerId;
    }
    if (request.status !== undefined) {
      values.status = request.status;
    }

    const items = await trx.orderItems.listByOrder(orderId);
    values.total = computeOrderTotal(items);

    const saved = await trx.orders.update(orderId, values);
    if (!saved) {
      throw new NotFoundError("Order", orderId);
    }

    console.log(`Saved order ${orderId} (status ${saved.status}, total ${saved.total})`);
    return { ...saved, items: toLines(items) };
  });
}

export async function getOrder(
  store: ShopStore,
  orderId: number
): Promise<OrderDetail> {
  const order = await store.orders.findById(orderId);
  if (!order) {
    throw new NotFoundError("Order", orderId);
  }
  const items = await store.orderItems.listByOrder(orderId);
  return { ...order, items: toLines(items) };
}

export async function listOrders(store: ShopStore, filter: OrderFilter = {}) {
  return store.orders.list(filter);
}

/** Deletes orders and every item they own, in the caller's transaction. */
export async function deleteOrdersWithin(
  trx: ShopRepositories,
  orderIds: number[]
) {
  const items = await trx.orderItems.deleteByOrders(orderIds);
  const orders = await trx.orders.deleteByIds(orderIds);
  return { orders, items };
}

export async function deleteOrder(store: ShopStore, orderId: number) {
  return store.transaction(async (trx) => {
    await lockOrder(trx, orderId);
    const { items } = await deleteOrdersWithin(trx, [orderId]);
    console.log(`Deleted order ${orderId} with ${items} items`);
  });
}

const MAX_AMOUNT = formatCents(MAX_AMOUNT_CENTS);

/**
 * Rejects a line whose price, or the order total it leads to, would not fit
 * a numeric(10,2) column. `replacing` is the id of the line being changed.
 */
async function ensureTotalFits(
  trx: ShopRepositories,
  orderId: number,
  unitPrice: string,
  quantity: number,
  replacing?: number
) {
  const lineCents = toCents(unitPrice) * quantity;
  if (lineCents > MAX_AMOUNT_CENTS) {
    throw new ValidationError(`Line price exceeds ${MAX_AMOUNT}`);
  }

  const others = (await trx.orderItems.listByOrder(orderId)).filter(
    (line) => line.id !== replacing
  );
  const totalCents = others.reduce(
    (sum, line) => sum + toCents(line.unit_price) * line.quantity,
    lineCents
  );
  if (totalCents > MAX_AMOUNT_CENTS) {
    throw new ValidationError(`Order total would exceed ${MAX_AMOUNT}`);
  }
}

async function finishItemMutation(
  trx: ShopRepositories,
  order: Order,
  policy: OrderTotalPolicy
) {
  if (policy === "auto") {
    return recomputeTotalWithin(trx, order.id);
  }
  return order.total;
}

export async function addOrderItem(
  store: ShopStore,
  orderId: number,
  request: OrderItemRequest,
  policy: OrderTotalPolicy = "manual"
): Promise<OrderItemResult> {
  return store.transaction(async (trx) => {
    const order = await lockOrder(trx, orderId);

    const product = await trx.products.findById(request.productId);
    if (!product) {
      throw new NotFoundError("Product", request.productId);
    }
    await ensureTotalFits(trx, orderId, product.price, request.quantity);

    const item = await trx.orderItems.insert({
      order_id: orderId,
      product_id: product.id,
      quantity: request.quantity,
    });

    console.log(
      `Added ${item.quantity}x ${product.name} at ${product.price} to order ${orderId}`
    );
    return { item, orderTotal: await finishItemMutation(trx, order, policy) };
  });
}

async function findOrderItem(
  trx: ShopRepositories,
  orderId: number,
  itemId: number
) {
  const item = await trx.orderItems.findById(itemId);
  if (!item || item.order_id !== orderId) {
    throw new NotFoundError("Order item", itemId);
  }
  return item;
}

export async function updateOrderItem(
  store: ShopStore,
  orderId: number,
  itemId: number,
  quantity: number,
  policy: OrderTotalPolicy = "manual"
): Promise<OrderItemResult> {
  return store.transaction(async (trx) => {
    const order = await lockOrder(trx, orderId);
    const current = await findOrderItem(trx, orderId, itemId);
    const product = await trx.products.findById(current.product_id);
    if (!product) {
      throw new NotFoundError("Product", current.product_id);
    }
    await ensureTotalFits(trx, orderId, product.price, quantity, itemId);

    const item = await trx.orderItems.updateQuantity(itemId, quantity);
    if (!item) {
      throw new NotFoundError("Order item", itemId);
    }

    console.log(`Order ${orderId} item ${itemId} quantity set to ${quantity}`);
    return { item, orderTotal: await finishItemMutation(trx, order, policy) };
  });
}

export async function removeOrderItem(
  store: ShopStore,
  orderId: number,
  itemId: number,
  policy: OrderTotalPolicy = "manual"
) {
  return store.transaction(async (trx) => {
    const order = await lockOrder(trx, orderId);
    await findOrderItem(trx, orderId, itemId);
    await trx.orderItems.deleteById(itemId);

    console.log(`Removed item ${itemId} from order ${orderId}`);
    return { orderTotal: await finishItemMutation(trx, order, policy) };
  });
}
