import { Router } from "express";
import {
  createLookupController,
  LookupBackend,
} from "../controllers/lookup-controller";

export function createLookupRoutes(backend: LookupBackend): Router {
  const router = Router();
  const controller = createLookupController(backend);

  // GET /lookup and /lookup/ resolve the caller's own address
  router.get("/", controller.lookup);

  // GET /lookup/66.69.242.177 or /lookup/2001:db8::1
  router.get("/:ip", controller.lookup);

  return router;
}
