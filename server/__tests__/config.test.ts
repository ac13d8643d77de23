import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "../config";

test("loadConfig falls back to defaults", () => {
  assert.deepEqual(loadConfig({}), {
    port: 5050,
    host: "127.0.0.1",
    fpsCap: 60,
    tileId: "Main",
    windowTitle: "Debug Window",
    defaultTabId: "Telemetry",
  });
});

test("loadConfig reads overrides and ignores unusable frame caps", () => {
  const config = loadConfig({
    PORT: "6060",
    HOST: "0.0.0.0",
    TELEMETRY_FPS: "-5",
    TELEMETRY_TILE: "Sim",
    TELEMETRY_WINDOW_TITLE: "Sim Debug",
    TELEMETRY_DEFAULT_TAB: "Stats",
  });
  assert.deepEqual(config, {
    port: 6060,
    host: "0.0.0.0",
    fpsCap: 60,
    tileId: "Sim",
    windowTitle: "Sim Debug",
    defaultTabId: "Stats",
  });
  assert.equal(loadConfig({ TELEMETRY_FPS: "30" }).fpsCap, 30);
});
