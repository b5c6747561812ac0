import { Router } from "express";
import { container } from "../../../di/Container";
import { SystemController } from "../controllers/SystemController";

export function createSystemRouter(): Router {
  const router = Router();
  const controller = container.resolve(SystemController);

  router.get("/health", (req, res) => controller.health(req, res));
  router.get("/config-status", (req, res) =>
    controller.configStatus(req, res),
  );

  return router;
}
