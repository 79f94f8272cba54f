import express, { Request, Response } from "express";
import {
  createProduct,
  deleteProduct,
  getAllProducts,
  getProduct,
  updateProduct,
} from "../services/products";
import { AppDeps } from "../types/app";
import { sendRouteError } from "../utils/routeError";
import {
  parseRequest,
  requestValidator,
  ValidatedRequest,
} from "../utils/requestValidator";
import { ZIdParams } from "../validations/common";
import {
  ZProductCreate,
  ZProductQuery,
  ZProductUpdate,
} from "../validations/product";

export default function productRouter({ store }: AppDeps) {
  const router = express.Router();

  router.get("/", async (req: Request, res: Response) => {
    try {
      const filter = parseRequest(ZProductQuery, req.query);
      const result = await getAllProducts(store, filter);
      res.status(200).json(result);
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch products");
    }
  });

  router.post(
    "/",
    requestValidator(ZProductCreate),
    async (req: ValidatedRequest<typeof ZProductCreate>, res: Response) => {
      try {
        res.status(201).json(await createProduct(store, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to create product");
      }
    }
  );

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      res.status(200).json(await getProduct(store, id));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch product");
    }
  });

  router.patch(
    "/:id",
    requestValidator(ZProductUpdate),
    async (req: ValidatedRequest<typeof ZProductUpdate>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        res.status(200).json(await updateProduct(store, id, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to update product");
      }
    }
  );

  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      await deleteProduct(store, id);
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete product");
    }
  });

  return router;
}
