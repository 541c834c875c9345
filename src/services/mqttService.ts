import mqtt from "mqtt";
import type { Logger } from "pino";
import type { AppConfig } from "../config/options";
import type { RegisterDescriptor, RegisterMap } from "../registers/definitions";
import type { Snapshot } from "./snapshotStore";

const CLIENT_ID = "heatpump-modbus-bridge";
const DEVICE_ID = "ovum_heatpump";

export type MqttConfig = AppConfig["mqtt"];

/** Home Assistant discovery payload for one register. */
export function buildDiscoveryPayload(
  descriptor: RegisterDescriptor,
  registerMap: RegisterMap,
  baseTopic: string,
): Record<string, unknown> {
  const group = registerMap.group(descriptor.group);
  const payload: Record<string, unknown> = {
    name: descriptor.name,
    unique_id: `${DEVICE_ID}_${descriptor.key}`,
    state_topic: `${baseTopic}/state`,
    availability_topic: `${baseTopic}/availability`,
    value_template: `{{ value_json.${descriptor.key} }}`,
    enabled_by_default: descriptor.enabledByDefault,
    device: {
      identifiers: [DEVICE_ID],
      name: `${registerMap.device.manufacturer} ${registerMap.device.model}`,
      manufacturer: registerMap.device.manufacturer,
      model: registerMap.device.model,
      sw_version: registerMap.version,
    },
  };
  if (descriptor.unit) payload.unit_of_measurement = descriptor.unit;
  if (group?.deviceClass) payload.device_class = group.deviceClass;
  if (group?.stateClass) payload.state_class = group.stateClass;
  if (group?.icon) payload.icon = group.icon;
  if (group?.forceUpdate) payload.force_update = true;
  return payload;
}

/** Flattens a snapshot into `{ key: value }`; stale values are published as they were last read. */
export function buildStatePayload(snapshot: Snapshot): Record<string, number | string> {
  const state: Record<string, number | string> = {};
  for (const [key, entry] of Object.entries(snapshot.values)) {
    state[key] = entry.value;
  }
  return state;
}

export class MqttService {
  private client: mqtt.MqttClient | null = null;
  private connected = false;

  constructor(
    private readonly config: MqttConfig,
    private readonly logger: Logger,
  ) {}

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    if (!this.config.host) {
      this.logger.info("MQTT host not configured, skipping MQTT service");
      return;
    }

    const brokerUrl = `mqtt://${this.config.host}:${this.config.port}`;
    this.logger.info({ brokerUrl }, "Connecting to MQTT broker");

    try {
      this.client = await mqtt.connectAsync(brokerUrl, {
        username: this.config.user ?? undefined,
        password: this.config.password ?? undefined,
        clientId: CLIENT_ID,
        clean: true,
        will: {
          topic: `${this.config.baseTopic}/availability`,
          payload: Buffer.from("offline"),
          qos: 0,
          retain: true,
        },
      });

      this.connected = true;
      this.logger.info("MQTT connected");

      this.client.on("error", (err) => {
        this.logger.error({ err }, "MQTT error");
      });

      this.client.on("close", () => {
        if (this.connected) {
          this.logger.warn("MQTT connection closed");
          this.connected = false;
        }
      });

      this.client.on("connect", () => {
        this.connected = true;
        this.logger.info("MQTT reconnected");
      });
    } catch (err) {
      // connectAsync rejects when the first attempt fails; polling runs without MQTT
      this.logger.error({ err }, "Failed to connect to MQTT broker");
    }
  }

  async publishDiscovery(registerMap: RegisterMap): Promise<void> {
    if (!this.client || !this.connected) return;

    for (const descriptor of registerMap.describeEnabled()) {
      await this.publishConfig(descriptor.key, buildDiscoveryPayload(descriptor, registerMap, this.config.baseTopic));
    }
    await this.publishAvailability(true);
  }

  async publishState(snapshot: Snapshot): Promise<void> {
    if (!this.client || !this.connected) {
      this.logger.debug("MQTT: publishState called but not connected");
      return;
    }

    try {
      const topic = `${this.config.baseTopic}/state`;
      const payload = JSON.stringify(buildStatePayload(snapshot));
      this.logger.debug({ topic, cycle: snapshot.cycle }, "MQTT: Publishing state");
      await this.client.publishAsync(topic, payload, { retain: false });
    } catch (err) {
      this.logger.error({ err }, "Failed to publish MQTT state");
    }
  }

  async publishAvailability(online: boolean): Promise<void> {
    if (!this.client || !this.connected) return;
    try {
      await this.client.publishAsync(`${this.config.baseTopic}/availability`, online ? "online" : "offline", {
        retain: true,
      });
    } catch (err) {
      this.logger.error({ err }, "Failed to publish MQTT availability");
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.logger.info("MQTT: Disconnecting...");
      await this.publishAvailability(false);
      await this.client.endAsync();
      this.client = null;
      this.connected = false;
    }
  }

  private async publishConfig(objectId: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.client) return;

    const topic = `${this.config.discoveryPrefix}/sensor/${DEVICE_ID}/${objectId}/config`;
    this.logger.debug({ topic }, "MQTT: Publishing discovery config");
    try {
      await this.client.publishAsync(topic, JSON.stringify(payload), { retain: true });
    } catch (err) {
      this.logger.error({ err, topic }, "Failed to publish discovery message");
    }
  }
}
