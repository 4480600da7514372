import { Router, Request, Response } from "express";
import type { ConnectionManager } from "../weaviate";

export function createHealthRoutes(connections: Pick<ConnectionManager, "isReady">): Router {
  const router = Router();

  router.get("/", async (_req: Request, res: Response) => {
    const backendReady = await connections.isReady();
    res.json({ status: "ok", backendReady });
  });

  return router;
}
