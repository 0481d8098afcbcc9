/**
 * MQTT Module - Service Layer
 *
 * Connects to the broker with the last will in place and exposes the
 * publish side of the client. mqtt.js reconnects on its own; every
 * reconnect is fanned out to the onConnect listeners.
 */
import { type Result, err, ok } from "neverthrow";
import { connectAsync, type MqttClient } from "mqtt";

import { createLogger } from "../logger.js";
import { type MqttError, connectionFailed, formatMqttError, publishFailed } from "./errors.js";
import type {
  ConnectListener,
  PublishOptions,
  TelemetryPublisher,
  TelemetryPublisherOptions,
} from "./schema.js";

const log = createLogger("mqtt");

const RECONNECT_PERIOD_MS = 5000;
const CONNECT_TIMEOUT_MS = 10000;
const PUBLISH_QOS = 1;

/**
 * Open the broker connection. Resolves once the first CONNACK arrives; an
 * initial failure is returned as an error instead of being retried.
 */
export async function connectTelemetryPublisher(
  options: TelemetryPublisherOptions,
): Promise<Result<TelemetryPublisher, MqttError>> {
  const url = `mqtt://${options.hostname}:${options.port}`;

  log.info({ broker: url, clientId: options.clientId }, "Connecting to MQTT broker...");

  let client: MqttClient;
  try {
    client = await connectAsync(
      url,
      {
        clientId: options.clientId,
        username: options.username,
        password: options.password,
        reconnectPeriod: RECONNECT_PERIOD_MS,
        connectTimeout: CONNECT_TIMEOUT_MS,
        will: {
          topic: options.will.topic,
          payload: options.will.payload,
          qos: PUBLISH_QOS,
          retain: options.will.retain,
        },
      },
      false,
    );
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    log.error({ broker: url, error: cause.message }, "Failed to connect to MQTT broker");
    return err(connectionFailed(cause.message, cause));
  }

  log.info({ broker: url }, "Connected to MQTT broker");

  return ok(wrapClient(client));
}

function wrapClient(client: MqttClient): TelemetryPublisher {
  const listeners: ConnectListener[] = [];

  client.on("connect", () => {
    log.info("Reconnected to MQTT broker");
    for (const listener of listeners) listener();
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });

  function publish(topic: string, payload: string, options: PublishOptions): void {
    client.publish(topic, payload, { qos: PUBLISH_QOS, retain: options.retain }, (error) => {
      if (error) {
        log.warn({ error: formatMqttError(publishFailed(error.message, topic)) }, "Publish failed");
      }
    });
    log.debug({ topic, retain: options.retain }, "Published");
  }

  function onConnect(listener: ConnectListener): void {
    listeners.push(listener);
    if (client.connected) listener();
  }

  async function close(): Promise<void> {
    log.info("Disconnecting MQTT client...");
    await client.endAsync();
  }

  return {
    publish,
    onConnect,
    isConnected: () => client.connected,
    close,
  };
}
