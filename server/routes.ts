import type { Express } from "express";
import type { Server } from "http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { registerMessageSchema, type ControlResponse } from "@shared/schema";
import type { ViewerBackend } from "./backends/viewer-backend";
import { describeError } from "./log";
import type { RenderService } from "./render-service";
import { applyTelemetryCommand, parseTelemetryCommand } from "./telemetry-commands";

export interface RouteDependencies {
  service: RenderService;
  backend: ViewerBackend;
}

type ClientRole = "viewer" | "producer";

/**
 * Handles one producer message. Returns null for commands that need no
 * reply (no request_id) so high-rate producers are not flooded with acks.
 */
export function handleProducerMessage(
  service: RenderService,
  message: unknown,
): ControlResponse | null {
  const result = parseTelemetryCommand(message);
  if (!result.ok) {
    return { type: "error", error: result.error, request_id: result.requestId };
  }
  const requestId = result.command.request_id;
  if (!applyTelemetryCommand(service, result.command)) {
    return { type: "error", error: "Service is shutting down", request_id: requestId };
  }
  return requestId ? { type: "ack", request_id: requestId, payload: result.command.type } : null;
}

function parseJson(data: RawData): unknown {
  return JSON.parse(data.toString());
}

function sendResponse(ws: WebSocket, response: ControlResponse) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(response));
  }
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  { service, backend }: RouteDependencies,
): Promise<Server> {
  app.use((_req, res, next) => {
    res.setHeader("X-Telemetry-WS", "/ws/control");
    res.setHeader("X-Telemetry-Register", "{\"type\":\"register\",\"role\":\"producer\"}");
    next();
  });

  const wss = new WebSocketServer({ noServer: true });
  const roles = new Map<WebSocket, ClientRole>();

  httpServer.on("upgrade", (req, socket, head) => {
    if (!req.url?.startsWith("/ws/control")) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  httpServer.on("close", () => {
    wss.close();
  });

  wss.on("connection", (ws) => {
    backend.trackConnection(ws);
    console.log("[ws] New connection, awaiting registration");

    ws.on("message", (data) => {
      let message: unknown;
      try {
        message = parseJson(data);
      } catch (error) {
        sendResponse(ws, { type: "error", error: `Invalid message format: ${describeError(error)}` });
        return;
      }

      const registration = registerMessageSchema.safeParse(message);
      if (registration.success) {
        const role = registration.data.role;
        roles.set(ws, role);
        if (role === "viewer") {
          backend.addViewer(ws);
          console.log("[ws] Viewer registered, total viewers:", backend.viewerCount);
        } else {
          console.log("[ws] Producer registered");
        }
        sendResponse(ws, { type: "ack", payload: `registered as ${role}` });
        return;
      }

      const role = roles.get(ws);
      if (!role) {
        sendResponse(ws, {
          type: "error",
          error: "Must register first with {type:'register', role:'viewer'|'producer'}",
        });
        return;
      }

      if (role === "viewer") {
        sendResponse(ws, backend.handleViewerMessage(message));
        return;
      }

      const response = handleProducerMessage(service, message);
      if (response) {
        sendResponse(ws, response);
      }
    });

    ws.on("close", () => {
      const role = roles.get(ws);
      roles.delete(ws);
      backend.releaseConnection(ws);
      if (role === "viewer") {
        console.log("[ws] Viewer disconnected, remaining:", backend.viewerCount);
      } else if (role === "producer") {
        console.log("[ws] Producer disconnected");
      }
    });

    ws.on("error", (err) => {
      console.error("[ws] Error:", err);
    });
  });

  app.get("/api/status", (_req, res) => {
    res.json({ ...service.status(), viewers: backend.viewerCount });
  });

  app.post("/api/telemetry", (req, res) => {
    const body: unknown = req.body;
    const batch = Array.isArray(body) ? body : [body];
    const responses: ControlResponse[] = [];
    for (const message of batch) {
      const result = parseTelemetryCommand(message);
      if (!result.ok) {
        return res.status(400).json({ error: result.error });
      }
    }
    for (const message of batch) {
      const response = handleProducerMessage(service, message);
      if (response) {
        responses.push(response);
      }
    }
    if (responses.some((response) => response.type === "error")) {
      return res.status(503).json({ error: "Service is shutting down", responses });
    }
    return res.json({ success: true, count: batch.length, responses });
  });

  app.post("/api/shutdown", (_req, res) => {
    const running = service.isRunning();
    res.json({ success: true, stopping: running });
    if (running) {
      backend.requestClose();
    }
  });

  return httpServer;
}
