import { Router } from "express";
import { container } from "../../../di/Container";
import { TYPES } from "../../../di/types";
import { IConfig } from "../../../shared/config/IConfig";
import { ComparisonsController } from "../controllers/ComparisonsController";
import { compareLimiter } from "../middleware/rateLimit";

export function createComparisonsRouter(): Router {
  const router = Router();
  const controller = container.resolve(ComparisonsController);
  const config = container.resolve<IConfig>(TYPES.Config);

  // POST /compare - Ask the model twice and store both answers
  if (config.enableRateLimiting) {
    router.post("/compare", compareLimiter, (req, res, next) =>
      controller.compare(req, res, next),
    );
  } else {
    router.post("/compare", (req, res, next) =>
      controller.compare(req, res, next),
    );
  }

  // POST /feedback - Rate a stored comparison
  router.post("/feedback", (req, res, next) =>
    controller.feedback(req, res, next),
  );

  // GET /logs/:id - Fetch a stored comparison
  router.get("/logs/:id", (req, res, next) =>
    controller.getLog(req, res, next),
  );

  return router;
}
