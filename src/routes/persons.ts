import express, { Request, Response } from "express";
import {
  checkPassword,
  deletePerson,
  getPerson,
  getPersonBySlug,
  listPersons,
  registerPerson,
  setPassword,
  updatePerson,
} from "../services/persons";
import { AppDeps } from "../types/app";
import { sendRouteError } from "../utils/routeError";
import {
  parseRequest,
  requestValidator,
  ValidatedRequest,
} from "../utils/requestValidator";
import { ZIdParams } from "../validations/common";
import {
  ZPasswordBody,
  ZPersonQuery,
  ZPersonRegister,
  ZPersonUpdate,
} from "../validations/person";

export default function personRouter({ store, config }: AppDeps) {
  const router = express.Router();
  const passwordOptions = { bcryptRounds: config.bcryptRounds };

  router.get("/", async (req: Request, res: Response) => {
    try {
      const filter = parseRequest(ZPersonQuery, req.query);
      res.status(200).json(await listPersons(store, filter));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch persons");
    }
  });

  router.post(
    "/",
    requestValidator(ZPersonRegister),
    async (req: ValidatedRequest<typeof ZPersonRegister>, res: Response) => {
      try {
        const person = await registerPerson(store, req.body, passwordOptions);
        res.status(201).json(person);
      } catch (err) {
        sendRouteError(res, err, "Registration failed");
      }
    }
  );

  router.get("/by-slug/:slug", async (req: Request, res: Response) => {
    try {
      res.status(200).json(await getPersonBySlug(store, req.params.slug));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch person");
    }
  });

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      res.status(200).json(await getPerson(store, id));
    } catch (err) {
      sendRouteError(res, err, "Failed to fetch person");
    }
  });

  router.patch(
    "/:id",
    requestValidator(ZPersonUpdate),
    async (req: ValidatedRequest<typeof ZPersonUpdate>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        res.status(200).json(await updatePerson(store, id, req.body));
      } catch (err) {
        sendRouteError(res, err, "Failed to update person");
      }
    }
  );

  router.put(
    "/:id/password",
    requestValidator(ZPasswordBody),
    async (req: ValidatedRequest<typeof ZPasswordBody>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        await setPassword(store, id, req.body.password, passwordOptions);
        res.status(204).end();
      } catch (err) {
        sendRouteError(res, err, "Failed to set password");
      }
    }
  );

  router.post(
    "/:id/password/check",
    requestValidator(ZPasswordBody),
    async (req: ValidatedRequest<typeof ZPasswordBody>, res: Response) => {
      try {
        const { id } = parseRequest(ZIdParams, req.params);
        const valid = await checkPassword(store, id, req.body.password);
        res.status(200).json({ valid });
      } catch (err) {
        sendRouteError(res, err, "Failed to check password");
      }
    }
  );

  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(ZIdParams, req.params);
      await deletePerson(store, id);
      res.status(204).end();
    } catch (err) {
      sendRouteError(res, err, "Failed to delete person");
    }
  });

  return router;
}
