import { z } from "zod";
import {
  isAmount,
  MAX_AMOUNT_CENTS,
  normalizeAmount,
  toCents,
} from "../utils/money";

export const ZId = z.coerce.number().int().positive();

// numeric(10,2)
export const ZAmount = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .refine((value) => isAmount(value) && !value.startsWith("-"), {
    message: "Must be a non-negative amount with at most 2 decimals",
  })
  .refine((value) => !isAmount(value) || toCents(value) <= MAX_AMOUNT_CENTS, {
    message: "Must be at most 99999999.99",
  })
  .transform(normalizeAmount);

export const ZIdParams = z.object({ id: ZId });
