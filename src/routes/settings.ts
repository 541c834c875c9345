import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import type { HeatPumpHub } from "../core/heatPumpHub";
import { ConfigurationError } from "../errors";

export function createSettingsRouter(hub: HeatPumpHub, logger: Logger) {
  const router = Router();

  router.get("/connection", (_request: Request, response: Response) => {
    const settings = hub.currentSettings();
    if (!settings) {
      response.status(404).json({ detail: "Connection not configured" });
      return;
    }
    response.json(settings);
  });

  router.post("/connection", async (request: Request, response: Response, next: NextFunction) => {
    try {
      const outcome = await hub.configure(request.body);
      logger.info({ outcome }, "Connection settings updated via API");
      response.status(204).end();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.warn({ issues: error.issues }, "Rejected connection settings");
        response.status(400).json({ detail: error.message, issues: error.issues });
        return;
      }
      next(error);
    }
  });

  return router;
}
