import { Request, Response, NextFunction } from "express";

const MASKED_FIELDS = new Set(["password"]);

export const maskBody = (body: object): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(body).map(([key, value]) => [
      key,
      MASKED_FIELDS.has(key) ? "***" : value,
    ])
  );

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const { method, url } = req;
  const body: unknown = req.body;
  const timestamp = new Date().toISOString();

  const logParts = [`[${timestamp}]`, method, url];

  if (
    ["POST", "PUT", "PATCH"].includes(method.toUpperCase()) &&
    typeof body === "object" &&
    body !== null &&
    Object.keys(body).length
  ) {
    logParts.push(`Body: ${JSON.stringify(maskBody(body))}`);
  }

  console.log(logParts.join(" | "));
  next();
};
