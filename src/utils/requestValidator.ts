import { NextFunction, Request, Response } from "express";
import { z, ZodTypeAny } from "zod";
import { ValidationError } from "./errors";

export const requestValidator =
  (schema: ZodTypeAny) => (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({ error: result.error.flatten() });
      return;
    }
    // downstream handlers see defaults and coerced values
    req.body = result.data;
    next();
  };

/** Parses route params or query strings; throws a 400 on failure. */
export function parseRequest<T extends ZodTypeAny>(
  schema: T,
  value: unknown
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError("Invalid request", result.error.flatten());
  }
  return result.data;
}

/** A request whose body already passed `requestValidator(schema)`. */
export type ValidatedRequest<T extends ZodTypeAny> = Request<
  Record<string, string>,
  unknown,
  z.infer<T>
>;
