import { buildStructureFromObject } from "@shared/structure";
import { telemetryCommandSchema, type TelemetryCommand } from "@shared/schema";
import type { RenderService } from "./render-service";

export type ParseResult =
  | { ok: true; command: TelemetryCommand }
  | { ok: false; error: string; requestId?: string };

function extractRequestId(raw: unknown): string | undefined {
  if (raw && typeof raw === "object" && "request_id" in raw) {
    const { request_id: requestId } = raw;
    return typeof requestId === "string" ? requestId : undefined;
  }
  return undefined;
}

export function parseTelemetryCommand(raw: unknown): ParseResult {
  const parsed = telemetryCommandSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, command: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return {
    ok: false,
    error: `Invalid telemetry command: ${where}${issue?.message ?? "unknown error"}`,
    requestId: extractRequestId(raw),
  };
}

/** Posts a validated command to the service. Returns false when the service is shutting down. */
export function applyTelemetryCommand(service: RenderService, command: TelemetryCommand): boolean {
  if (service.state === "stopping") {
    return false;
  }
  switch (command.type) {
    case "value":
      service.value(command.tab ?? service.defaultTabId, command.key, command.value);
      break;
    case "graph_sample":
      service.graphSample(
        command.tab ?? service.defaultTabId,
        command.key,
        command.sample,
        command.config,
      );
      break;
    case "graph_samples":
      service.graphSamples(
        command.tab ?? service.defaultTabId,
        command.key,
        command.samples,
        command.config,
      );
      break;
    case "structure": {
      const fields = command.fields;
      service.structure(command.tab ?? service.defaultTabId, command.key, (builder) => {
        buildStructureFromObject(builder, fields);
      });
      break;
    }
    case "clear_tab":
      service.clearTab(command.tab ?? service.defaultTabId);
      break;
    case "set_window_title":
      service.setWindowTitle(command.title);
      break;
    case "show_window":
      service.showWindow(command.visible);
      break;
  }
  return true;
}
