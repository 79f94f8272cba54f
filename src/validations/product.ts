import { z } from "zod";
import { ZAmount, ZId } from "./common";

const ZImageFilename = z
  .string()
  .trim()
  .min(1)
  .max(100)
  .regex(/^[^/\\]+$/, "Must be a bare file name");

export const ZProductCreate = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().default(""),
  price: ZAmount,
  stockQuantity: z.number().int().nonnegative().default(1),
  categoryId: z.number().int().positive(),
  imageFilename: ZImageFilename.optional(),
});

export const ZProductUpdate = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  description: z.string().optional(),
  price: ZAmount.optional(),
  stockQuantity: z.number().int().nonnegative().optional(),
  categoryId: z.number().int().positive().optional(),
  imageFilename: ZImageFilename.nullable().optional(),
});

export const ZProductQuery = z.object({
  categoryId: ZId.optional(),
  name: z.string().optional(),
  search: z.string().trim().min(1).optional(),
});

export type ProductCreateRequest = z.infer<typeof ZProductCreate>;
export type ProductUpdateRequest = z.infer<typeof ZProductUpdate>;
export type ProductQuery = z.infer<typeof ZProductQuery>;
