/**
 * MQTT Module - Types
 *
 * Shapes of the telemetry publisher and its connect options.
 */

/**
 * Message the broker publishes for us when the connection drops uncleanly.
 */
export type LastWill = Readonly<{
  topic: string;
  payload: string;
  retain: boolean;
}>;

export type TelemetryPublisherOptions = Readonly<{
  hostname: string;
  port: number;
  clientId: string;
  username?: string | undefined;
  password?: string | undefined;
  will: LastWill;
}>;

export type PublishOptions = Readonly<{
  retain: boolean;
}>;

export type ConnectListener = () => void;

/**
 * Outbound half of an MQTT client. Publishes are fire-and-forget; the
 * client library keeps the network loop running in the background.
 */
export type TelemetryPublisher = Readonly<{
  publish: (topic: string, payload: string, options: PublishOptions) => void;
  /** Called now if connected, then after every reconnect. */
  onConnect: (listener: ConnectListener) => void;
  isConnected: () => boolean;
  close: () => Promise<void>;
}>;
