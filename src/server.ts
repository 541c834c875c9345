import "dotenv/config";

import { createServer } from "http";
import WebSocket, { WebSocketServer } from "ws";

import { createApp } from "./app";
import { loadConfig, getConfig } from "./config/options";
import { HeatPumpHub } from "./core/heatPumpHub";
import { loadStoredConnectionSettings, storeConnectionSettings } from "./core/storedSettings";
import { parseConnectionSettings, type ConnectionSettings } from "./core/connectionSettings";
import { createLogger } from "./logger";
import { loadBundledRegisterMap, loadRegisterMapFile } from "./registers/definitions";
import { closeDatabase, setupDatabase } from "./services/database";
import { ModbusTcpClient } from "./services/modbus/ModbusTcpClient";
import { MqttService } from "./services/mqttService";
import type { Snapshot } from "./services/snapshotStore";

loadConfig();
const config = getConfig();
const logger = createLogger(config.logLevel);

setupDatabase(config.databasePath);

const registerMapOptions = { maxRegistersPerRequest: config.modbus.maxRegistersPerRequest };
const registerMap = config.registerMapPath
  ? loadRegisterMapFile(config.registerMapPath, registerMapOptions)
  : loadBundledRegisterMap(registerMapOptions);
logger.info(
  { version: registerMap.version, registers: registerMap.all().length, enabled: registerMap.describeEnabled().length },
  "Register map loaded",
);

function initialSettings(): ConnectionSettings | null {
  const stored = loadStoredConnectionSettings(logger);
  if (stored) {
    return stored;
  }
  if (!config.modbus.host) {
    return null;
  }
  return parseConnectionSettings({
    host: config.modbus.host,
    port: config.modbus.port,
    unitId: config.modbus.unitId,
    intervalSeconds: config.modbus.scanIntervalSeconds,
  });
}

const session = new ModbusTcpClient(
  {
    timeoutMs: config.modbus.timeoutMs,
    reconnectBaseMs: config.modbus.reconnectBaseMs,
    reconnectMaxMs: config.modbus.reconnectMaxMs,
  },
  logger,
);

const hub = new HeatPumpHub({
  session,
  registerMap,
  logger,
  initialSettings: initialSettings(),
  scheduler: {
    interRequestDelayMs: config.modbus.interRequestDelayMs,
    maxGap: config.modbus.maxGap,
  },
  persist: storeConnectionSettings,
});

const mqttService = new MqttService(config.mqtt, logger);

const app = createApp(hub, logger, { corsOrigins: config.corsOrigins });
const httpServer = createServer(app);

const wss = new WebSocketServer({
  server: httpServer,
  path: "/ws/snapshot",
});

const clients = new Set<WebSocket>();

function broadcast(message: unknown): void {
  const data = JSON.stringify(message);
  for (const client of Array.from(clients)) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    } else {
      clients.delete(client);
    }
  }
}

wss.on("connection", (socket) => {
  clients.add(socket);
  logger.info({ clientCount: clients.size }, "WebSocket client connected");

  socket.on("close", () => {
    clients.delete(socket);
    logger.info({ clientCount: clients.size }, "WebSocket client disconnected");
  });

  socket.on("error", (error) => {
    logger.warn({ error }, "WebSocket client error");
  });

  socket.send(JSON.stringify({ type: "snapshot", payload: hub.currentSnapshot() }));
  socket.send(JSON.stringify({ type: "status", payload: hub.status() }));
});

hub.subscribe((snapshot: Snapshot) => {
  broadcast({ type: "snapshot", payload: snapshot });
  void mqttService.publishState(snapshot);
});

hub.onCycleComplete((summary) => {
  broadcast({ type: "cycle", payload: summary });
});

const port = config.webPort;
const host = "0.0.0.0";

async function start() {
  await mqttService.connect();
  await mqttService.publishDiscovery(registerMap);

  await hub.start();

  httpServer.listen(port, host, () => {
    logger.info({ port }, "Heat pump bridge listening");
  });
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down heat pump bridge");

  wss.close();

  await hub.stop();
  await mqttService.disconnect();

  await new Promise<void>((resolve) => {
    httpServer.close(() => resolve());
  });

  closeDatabase();
  process.exit(0);
}

function handleSignal(signal: NodeJS.Signals) {
  shutdown(signal).catch((error: unknown) => {
    logger.error({ error }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

start().catch((error: unknown) => {
  logger.fatal({ error }, "Failed to start heat pump bridge");
  process.exit(1);
});
