import type { Logger } from "pino";
import { getAppSetting, setAppSetting } from "../services/database";
import { parseConnectionSettings, type ConnectionSettings } from "./connectionSettings";

export const CONNECTION_SETTINGS_KEY = "connection.settings";

/** Returns the persisted descriptor, or null when none is stored or it no longer validates. */
export function loadStoredConnectionSettings(logger: Logger): ConnectionSettings | null {
  const raw = getAppSetting(CONNECTION_SETTINGS_KEY);
  if (!raw) {
    return null;
  }
  try {
    return parseConnectionSettings(JSON.parse(raw));
  } catch (error) {
    logger.warn({ error }, "Ignoring invalid stored connection settings");
    return null;
  }
}

export function storeConnectionSettings(settings: ConnectionSettings): void {
  setAppSetting(CONNECTION_SETTINGS_KEY, JSON.stringify(settings));
}
