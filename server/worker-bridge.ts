import type { MessagePort } from "node:worker_threads";
import type {
  GraphConfigInput,
  ScalarInput,
  StructureFields,
  TelemetryCommand,
} from "@shared/schema";
import { serializeScalar, toScalarValue } from "@shared/scalar";
import type { RenderService } from "./render-service";
import { applyTelemetryCommand, parseTelemetryCommand } from "./telemetry-commands";

type CommandSink = Pick<MessagePort, "postMessage">;
type CommandSource = Pick<MessagePort, "on" | "off">;

export interface TelemetryClient {
  value(key: string, value: ScalarInput, tab?: string): void;
  graphSample(key: string, sample: number, config?: GraphConfigInput, tab?: string): void;
  graphSamples(key: string, samples: number[], config?: GraphConfigInput, tab?: string): void;
  structure(key: string, fields: StructureFields, tab?: string): void;
  clearTab(tab?: string): void;
  setWindowTitle(title: string): void;
  showWindow(visible: boolean): void;
}

/**
 * Producer side for worker threads: every call becomes one structured-clone
 * message. Scalars are sent in their serialized form so 64-bit ints arrive
 * intact.
 */
export function createTelemetryClient(port: CommandSink, defaultTab?: string): TelemetryClient {
  const send = (command: TelemetryCommand) => {
    port.postMessage(command);
  };
  const tabOf = (tab: string | undefined) => tab ?? defaultTab;

  return {
    value(key, value, tab) {
      send({ type: "value", tab: tabOf(tab), key, value: serializeScalar(toScalarValue(value)) });
    },
    graphSample(key, sample, config, tab) {
      send({ type: "graph_sample", tab: tabOf(tab), key, sample, config });
    },
    graphSamples(key, samples, config, tab) {
      send({ type: "graph_samples", tab: tabOf(tab), key, samples: [...samples], config });
    },
    structure(key, fields, tab) {
      send({ type: "structure", tab: tabOf(tab), key, fields });
    },
    clearTab(tab) {
      send({ type: "clear_tab", tab: tabOf(tab) });
    },
    setWindowTitle(title) {
      send({ type: "set_window_title", title });
    },
    showWindow(visible) {
      send({ type: "show_window", visible });
    },
  };
}

/** Applies commands arriving on `port` to the service. Returns a function that detaches the listener. */
export function attachTelemetryPort(service: RenderService, port: CommandSource): () => void {
  const onMessage = (message: unknown) => {
    const result = parseTelemetryCommand(message);
    if (!result.ok) {
      console.error("[bridge]", result.error);
      return;
    }
    applyTelemetryCommand(service, result.command);
  };
  port.on("message", onMessage);
  return () => {
    port.off("message", onMessage);
  };
}
