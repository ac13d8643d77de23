export const DEFAULT_SERVICE_TILE_ID = "Main";
export const DEFAULT_TELEMETRY_TAB_ID = "Telemetry";

export interface ServiceConfig {
  port: number;
  host: string;
  fpsCap: number;
  tileId: string;
  windowTitle: string;
  defaultTabId: string;
}

function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  return raw !== undefined && raw.trim() !== "" && Number.isFinite(parsed) && parsed > 0
    ? parsed
    : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parseInt(env.PORT || "5050", 10),
    host: env.HOST || "127.0.0.1",
    fpsCap: parsePositiveNumber(env.TELEMETRY_FPS, 60),
    tileId: env.TELEMETRY_TILE || DEFAULT_SERVICE_TILE_ID,
    windowTitle: env.TELEMETRY_WINDOW_TITLE || "Debug Window",
    defaultTabId: env.TELEMETRY_DEFAULT_TAB || DEFAULT_TELEMETRY_TAB_ID,
  };
}
