/**
 * Discovery Module - Service Layer
 *
 * Publishes discovery descriptors and keeps the availability topic current.
 */
import { createLogger } from "../logger.js";
import type { TelemetryPublisher } from "../mqtt/index.js";
import type { AvailabilityPayload, DiscoveryMessage } from "./schema.js";

const log = createLogger("discovery");

/**
 * The payload the broker publishes as our last will.
 */
export const OFFLINE: AvailabilityPayload = "offline";
export const ONLINE: AvailabilityPayload = "online";

/**
 * Publish every descriptor retained. Called once, before any state topic.
 */
export function publishDiscovery(
  publisher: TelemetryPublisher,
  messages: ReadonlyArray<DiscoveryMessage>,
): void {
  for (const message of messages) {
    publisher.publish(message.topic, message.payload, { retain: true });
    log.info({ topic: message.topic }, "Published discovery descriptor");
  }
}

/**
 * Publish `online` now and after every broker reconnect.
 */
export function registerAvailability(
  publisher: TelemetryPublisher,
  availabilityTopic: string,
): void {
  publisher.onConnect(() => {
    publisher.publish(availabilityTopic, ONLINE, { retain: true });
    log.info({ topic: availabilityTopic }, "Marked online");
  });
}

/**
 * A clean disconnect does not trigger the will; publish `offline` first.
 */
export function publishOffline(
  publisher: TelemetryPublisher,
  availabilityTopic: string,
): void {
  publisher.publish(availabilityTopic, OFFLINE, { retain: true });
  log.info({ topic: availabilityTopic }, "Marked offline");
}
