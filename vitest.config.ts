import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      EMU_SERIAL_PATH: "/dev/ttyTEST0",
      MQTT_HOSTNAME: "broker.test",
      HTTP_ENABLED: "false",
    },
  },
});
