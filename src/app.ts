import express, { Request, Response } from "express";
import categoryRouter from "./routes/categories";
import orderRouter from "./routes/order";
import personRouter from "./routes/persons";
import productRouter from "./routes/products";
import reviewRouter from "./routes/reviews";
import { AppDeps } from "./types/app";
import { requestLogger } from "./utils/requestLogger";

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok" });
  });

  app.use("/categories", categoryRouter(deps));
  app.use("/products", productRouter(deps));
  app.use("/persons", personRouter(deps));
  app.use("/orders", orderRouter(deps));
  app.use("/reviews", reviewRouter(deps));

  return app;
}
