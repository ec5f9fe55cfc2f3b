import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      HUB_WEBSOCKET_URL: "ws://hub.test:8123/api/websocket",
      HUB_ACCESS_TOKEN: "test-token",
      THERMOSTAT_ENTITIES: "climate.living_room,climate.bedroom",
      TEMPERATURE_SENSOR_ENTITIES: "sensor.living_room_temperature",
      HUMIDITY_SENSOR_ENTITIES: "sensor.living_room_humidity",
    },
  },
});
