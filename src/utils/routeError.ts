import { Response } from "express";
import { HttpError, isUniqueViolation } from "./errors";

export function sendRouteError(res: Response, err: unknown, fallback: string) {
  if (err instanceof HttpError) {
    const body: { error: string; details?: unknown } = { error: err.message };
    if (err.details !== undefined) body.details = err.details;
    res.status(err.status).json(body);
    return;
  }

  if (isUniqueViolation(err)) {
    res.status(409).json({ error: "Record already exists" });
    return;
  }

  console.error(`${fallback}:`, err);
  res.status(500).json({
    error: fallback,
    details: err instanceof Error ? err.message : undefined,
  });
}
