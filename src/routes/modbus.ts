import { Router } from "express";
import type { Request, Response } from "express";
import type { Logger } from "pino";
import { DEFAULT_PORT } from "../core/connectionSettings";
import type { HeatPumpHub } from "../core/heatPumpHub";
import { probeTcp, type TcpProbe } from "../utils/probeTcp";

function queryString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function createModbusRouter(hub: HeatPumpHub, logger: Logger, probe: TcpProbe = probeTcp) {
  const router = Router();

  router.get("/status", async (request: Request, response: Response) => {
    const saved = hub.currentSettings();
    const host = queryString(request.query.host) || saved?.host || "localhost";
    const parsedPort = Number.parseInt(queryString(request.query.port), 10);
    const port = Number.isFinite(parsedPort) ? parsedPort : (saved?.port ?? DEFAULT_PORT);

    try {
      await probe(host, port);
      response.json({ reachable: true });
    } catch (err) {
      logger.warn({ host, port, err }, "Modbus TCP probe failed");
      response.json({ reachable: false, error: err instanceof Error ? err.message : String(err) });
    }
  });

  return router;
}
