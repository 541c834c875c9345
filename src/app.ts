import cors from "cors";
import express from "express";
import type { Express } from "express";
import type { Logger } from "pino";
import type { HeatPumpHub } from "./core/heatPumpHub";
import { createErrorHandler } from "./middleware/errorHandler";
import { createRequestLogger } from "./middleware/requestLogger";
import { createModbusRouter } from "./routes/modbus";
import { createSettingsRouter } from "./routes/settings";
import { createSnapshotRouter } from "./routes/snapshot";
import type { TcpProbe } from "./utils/probeTcp";

export interface AppOptions {
  corsOrigins: string[];
  probe?: TcpProbe;
}

export function createApp(hub: HeatPumpHub, logger: Logger, options: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: options.corsOrigins.includes("*") ? true : options.corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );
  app.use(express.json());
  app.use(createRequestLogger(logger));

  app.use("/api", createSnapshotRouter(hub));
  app.use("/api/settings", createSettingsRouter(hub, logger));
  app.use("/api/modbus", createModbusRouter(hub, logger, options.probe));

  app.use(createErrorHandler(logger));
  return app;
}
