import { Router } from "express";
import type { Request, Response } from "express";
import type { HeatPumpHub } from "../core/heatPumpHub";

export function createSnapshotRouter(hub: HeatPumpHub) {
  const router = Router();

  router.get("/snapshot", (_request: Request, response: Response) => {
    response.json(hub.currentSnapshot());
  });

  router.get("/snapshot/:key", (request: Request, response: Response) => {
    const key = request.params.key ?? "";
    if (!hub.registerMap.describe(key)) {
      response.status(404).json({ detail: `Unknown register: ${key}` });
      return;
    }
    const snapshot = hub.currentSnapshot();
    const value = snapshot.values[key];
    if (!value) {
      response.status(404).json({ detail: `No value read yet for ${key}`, failure: snapshot.failures[key] ?? null });
      return;
    }
    response.json(value);
  });

  router.get("/registers", (_request: Request, response: Response) => {
    response.json({
      version: hub.registerMap.version,
      device: hub.registerMap.device,
      registers: hub.registerMap.all().map((descriptor) => ({
        key: descriptor.key,
        name: descriptor.name,
        address: descriptor.address,
        words: descriptor.wordCount,
        rule: descriptor.rule,
        kind: descriptor.kind,
        scale: descriptor.scale.toString(),
        unit: descriptor.unit,
        group: descriptor.group,
        refresh: descriptor.refresh,
        enabled: descriptor.enabledByDefault,
        statusLabels: descriptor.statusLabels ? Object.fromEntries(descriptor.statusLabels) : null,
      })),
    });
  });

  router.get("/status", (_request: Request, response: Response) => {
    response.json(hub.status());
  });

  return router;
}
