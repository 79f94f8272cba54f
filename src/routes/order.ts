import express, { Request, Response } from "express";
import {
  addOrderItem,
  createOrder,
  deleteOrder,
  getOrder,
  listOrders,
  removeOrderItem,
  saveOrder,
  updateOrderItem,
} from "../services/order";
import { recomputeTotal } from "../services/orderTotal";
import { AppDeps } from "../types/app";
import { sendRouteError } from "../utils/routeError";
import {
  parseRequest,
  requestValidator,
  ValidatedRequest,
} from "../utils/requestValidator";
import { ZIdParams } from "../validations/common";
import {
  ZOrderCreate,
  ZOrderItemCreate,
  ZOrderItemParams,
  ZOrderItemUpdate,
  ZOrderQuery,
  ZOrderUpdate,
} from "../validations/order";

export default function orderRouter({ store, config }: AppDeps) {
  const router = express.Router();
  const policy = config.orderTotalPolicy;

  router.get("/", async (req: Request, res: Response) => {
    try {
      const filter = parseRequest(ZOrderQuery, req.query);
      res.status(200).json(await listOrders(store, filter));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch orders");
    }
  });

  router.post(
    "/",
    requestValidator(ZOrderCreate),
    async (req: ValidatedRequest<typeof ZOrderCreate>, res: Response) => {
      try {
        const order = await createOrder(store, req.body);
        res.status(201).json(order);
      } catch (err) {
        sendRouteError(res, err, "Order failed");
      }
    }
  );

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      res.status(200).json(await getOrder(store, id));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch order");
    }
  });

  router.patch(
    "/:id",
    requestValidator(ZOrderUpdate),
    async (req: ValidatedRequest<typeof ZOrderUpdate>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        const order = await saveOrder(store, id, req.body);
        res.status(200).json(order);
      } catch (err) {
        sendRouteError(res, err, "Failed to save order");
      }
    }
  );

  router.post("/:id/recompute", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      const total = await recomputeTotal(store, id);
      res.status(200).json({ id, total });
    } catch (err) {
      sendRouteError(res, err, "Failed to recompute order total");
    }
  });

  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      await deleteOrder(store, id);
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete order");
    }
  });

  router.post(
    "/:id/items",
    requestValidator(ZOrderItemCreate),
    async (req: ValidatedRequest<typeof ZOrderItemCreate>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        const result = await addOrderItem(
          store,
          id,
          req.body,
          policy
        );
        res.status(201).json(result);
      } catch (err) {
        sendRouteError(res, err, "Failed to add order item");
      }
    }
  );

  router.patch(
    "/:id/items/:itemId",
    requestValidator(ZOrderItemUpdate),
    async (req: ValidatedRequest<typeof ZOrderItemUpdate>, res: Response) => {
      try {
        const { id, itemId } = parseRequest(ZOrderItemParams, req.params);
        const { quantity } = req.body;
        const result = await updateOrderItem(store, id, itemId, quantity, policy);
        res.status(200).json(result);
      } catch (err) {
        sendRouteError(res, err, "Failed to update order item");
      }
    }
  );

  router.delete("/:id/items/:itemId", async (req: Request, res: Response) => {
    try {
      const { id, itemId } = parseRequest(ZOrderItemParams, req.params);
      const result = await removeOrderItem(store, id, itemId, policy);
      res.status(200).json(result);
    } catch (err) {
      sendRouteError(res, err, "Failed to remove order item");
    }
  });

  return router;
}
