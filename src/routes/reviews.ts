import express, { Request, Response } from "express";
import { createReview, deleteReview, listReviews } from "../services/reviews";
import { AppDeps } from "../types/app";
import { sendRouteError } from "../utils/routeError";
import {
  parseRequest,
  requestValidator,
  ValidatedRequest,
} from "../utils/requestValidator";
import { ZIdParams } from "../validations/common";
import { ZReviewCreate, ZReviewQuery } from "../validations/review";

export default function reviewRouter({ store }: AppDeps) {
  const router = express.Router();

  router.get("/", async (req: Request, res: Response) => {
    try {
      const filter = parseRequest(ZReviewQuery, req.query);
      res.status(200).json(await listReviews(store, filter));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch reviews");
    }
  });

  router.post(
    "/",
    requestValidator(ZReviewCreate),
    async (req: ValidatedRequest<typeof ZReviewCreate>, res: Response) => {
      try {
        res.status(201).json(await createReview(store, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to create review");
      }
    }
  );

  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      await deleteReview(store, id);
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete review");
    }
  });

  return router;
}
