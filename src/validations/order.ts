import { z } from "zod";
import { ZId } from "./common";

// order_items.quantity is a Postgres integer
const MAX_QUANTITY = 2147483647;

const ZQuantity = z.number().int().positive().max(MAX_QUANTITY);

export const ZOrderStatus = z.enum(["processing", "shipping", "delivered"]);

export const ZOrderCreate = z.object({
  ownerId: z.number().int().positive(),
  status: ZOrderStatus.default("processing"),
});

export const ZOrderUpdate = z.object({
  ownerId: z.number().int().positive().optional(),
  status: ZOrderStatus.optional(),
});

export const ZOrderItemCreate = z.object({
  productId: z.number().int().positive(),
  quantity: ZQuantity.default(1),
});

export const ZOrderItemUpdate = z.object({
  quantity: ZQuantity,
});

export const ZOrderQuery = z.object({
  ownerId: ZId.optional(),
  status: ZOrderStatus.optional(),
});

export const ZOrderItemParams = z.object({
  id: ZId,
  itemId: ZId,
});

export type OrderCreateRequest = z.infer<typeof ZOrderCreate>;
export type OrderUpdateRequest = z.infer<typeof ZOrderUpdate>;
export type OrderItemRequest = z.infer<typeof ZOrderItemCreate>;
