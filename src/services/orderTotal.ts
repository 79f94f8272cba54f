import { ShopRepositories, ShopStore } from "../types/store";
import { NotFoundError } from "../utils/errors";
import { formatCents, toCents } from "../utils/money";

export interface PricedLine {
  unit_price: string;
  quantity: number;
}

/** `unit_price * quantity` of one line item, at two decimals. */
export function itemPrice(line: PricedLine) {
  return formatCents(toCents(line.unit_price) * line.quantity);
}

/**
 * Sum of `unit_price * quantity` over the lines. Summed in integer cents,
 * so the result does not depend on line order. No lines gives "0.00".
 */
export function computeOrderTotal(lines: PricedLine[]) {
  const cents = lines.reduce(
    (sum, line) => sum + toCents(line.unit_price) * line.quantity,
    0
  );
  return formatCents(cents);
}

/**
 * Recomputes an order's total from its currently persisted items and writes
 * it back to `orders.total`. Must run inside a transaction: the order row is
 * locked first so concurrent recomputations of the same order serialize.
 */
export async function recomputeTotalWithin(
  trx: ShopRepositories,
  orderId: number
) {
  const order = await trx.orders.lockById(orderId);
  if (!order) {
    throw new NotFoundError("Order", orderId);
  }

  const items = await trx.orderItems.listByOrder(orderId);
  const total = computeOrderTotal(items);

  await trx.orders.update(orderId, { total });

  console.log(
    `Order ${orderId} totalled at ${total} (${items.length} items, was ${order.total})`
  );
  return total;
}

export async function recomputeTotal(store: ShopStore, orderId: number) {
  return store.transaction((trx) => recomputeTotalWithin(trx, orderId));
}

/** Re-totals several orders in the caller's transaction. */
export async function recomputeTotalsWithin(
  trx: ShopRepositories,
  orderIds: number[]
) {
  // ascending, so row locks are always taken in the same order
  const unique = [...new Set(orderIds)].sort((a, b) => a - b);
  for (const orderId of unique) {
    await recomputeTotalWithin(trx, orderId);
  }
}
