import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@ecu-sim/protocol": path.resolve(__dirname, "packages/protocol/src/index.ts"),
      "@ecu-sim/shared": path.resolve(__dirname, "packages/shared/src/index.ts"),
      "@ecu-sim/ecu-simulator": path.resolve(__dirname, "apps/ecu-simulator/src/index.ts"),
    },
  },
});
