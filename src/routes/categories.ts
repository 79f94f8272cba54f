import express, { Request, Response } from "express";
import {
  createCategory,
  deleteCategory,
  getCategory,
  getCategoryTree,
  listCategories,
  listChildren,
  updateCategory,
} from "../services/categories";
import { AppDeps } from "../types/app";
import { sendRouteError } from "../utils/routeError";
import {
  parseRequest,
  requestValidator,
  ValidatedRequest,
} from "../utils/requestValidator";
import {
  ZCategoryCreate,
  ZCategoryQuery,
  ZCategoryUpdate,
} from "../validations/category";
import { ZIdParams } from "../validations/common";

export default function categoryRouter({ store }: AppDeps) {
  const router = express.Router();

  router.get("/", async (req: Request, res: Response) => {
    try {
      const filter = parseRequest(ZCategoryQuery, req.query);
      res.status(200).json(await listCategories(store, filter));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch categories");
    }
  });

  router.get("/tree", async (_req: Request, res: Response) => {
    try {
      res.status(200).json(await getCategoryTree(store));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch category tree");
    }
  });

  router.post(
    "/",
    requestValidator(ZCategoryCreate),
    async (req: ValidatedRequest<typeof ZCategoryCreate>, res: Response) => {
      try {
        res.status(201).json(await createCategory(store, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to create category");
      }
    }
  );

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      res.status(200).json(await getCategory(store, id));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch category");
    }
  });

  router.get("/:id/children", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      res.status(200).json(await listChildren(store, id));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch child categories");
    }
  });

  router.patch(
    "/:id",
    requestValidator(ZCategoryUpdate),
    async (req: ValidatedRequest<typeof ZCategoryUpdate>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        res.status(200).json(await updateCategory(store, id, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to update category");
      }
    }
  );

  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      await deleteCategory(store, id);
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete category");
    }
  });

  return router;
}
