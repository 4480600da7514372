import express, { Router } from "express";
import type { SearchController } from "../controllers/search";

export function createSearchRoutes(controller: SearchController, uploadLimit: string): Router {
  const router = Router();

  router.post("/text", controller.searchByText);
  router.post("/image", express.raw({ type: "image/*", limit: uploadLimit }), controller.searchByImage);

  return router;
}
