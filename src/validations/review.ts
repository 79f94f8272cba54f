import { z } from "zod";
import { ZId } from "./common";

export const ZReviewCreate = z.object({
  productId: z.number().int().positive(),
  personId: z.number().int().positive(),
  rating: z
    .number()
    .int()
    .min(1, "Rating must be between 1 and 5")
    .max(5, "Rating must be between 1 and 5")
    .default(5),
  review: z.string().trim().min(1),
});

export const ZReviewQuery = z.object({
  productId: ZId.optional(),
  personId: ZId.optional(),
});

export type ReviewCreateRequest = z.infer<typeof ZReviewCreate>;
