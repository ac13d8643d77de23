import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import { createServer, type Server } from "http";
import express from "express";
import { WebSocket } from "ws";
import { MemoryBackend } from "../backends/memory-backend";
import { listenOn, ViewerBackend } from "../backends/viewer-backend";
import { RenderService } from "../render-service";
import { registerRoutes } from "../routes";

type Harness = {
  service: RenderService;
  httpServer: Server;
  baseUrl: string;
  wsUrl: string;
};

function urlsFor(httpServer: Server) {
  const address = httpServer.address();
  if (!address || typeof address === "string") {
    throw new Error("server is not bound to a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    wsUrl: `ws://127.0.0.1:${address.port}/ws/control`,
  };
}

async function startHarness(t: TestContext): Promise<Harness> {
  t.mock.method(console, "log", () => undefined);
  const app = express();
  app.use(express.json());
  const httpServer = createServer(app);
  const backend = new ViewerBackend(listenOn(httpServer, 0, "127.0.0.1"));
  const service = new RenderService({ backend, fpsCap: 200 });
  await registerRoutes(httpServer, app, { service, backend });

  const listening = once(httpServer, "listening");
  service.start();
  await listening;
  t.after(() => service.stop());
  return { service, httpServer, ...urlsFor(httpServer) };
}

function collectMessages(ws: WebSocket) {
  const received: unknown[] = [];
  let wake: (() => void) | null = null;
  ws.on("message", (data) => {
    received.push(JSON.parse(data.toString()));
    wake?.();
  });
  return {
    async next(): Promise<unknown> {
      while (received.length === 0) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
      return received.shift();
    },
  };
}

async function connect(wsUrl: string) {
  const ws = new WebSocket(wsUrl);
  const messages = collectMessages(ws);
  await once(ws, "open");
  return { ws, messages };
}

const emptyTab = {
  id: "overview",
  title: "overview",
  scalars: [],
  graphs: [],
  structures: [],
  empty: true,
};

test("stop completes while a producer socket is connected", { timeout: 5000 }, async (t) => {
  const harness = await startHarness(t);
  const { ws, messages } = await connect(harness.wsUrl);

  ws.send(JSON.stringify({ type: "register", role: "producer" }));
  assert.deepEqual(await messages.next(), { type: "ack", payload: "registered as producer" });

  ws.send(JSON.stringify({ type: "value", key: "score", value: 5, request_id: "r1" }));
  assert.deepEqual(await messages.next(), { type: "ack", request_id: "r1", payload: "value" });

  const closed = once(ws, "close");
  await harness.service.stop();
  await closed;
  assert.equal(harness.service.state, "stopped");
  assert.equal(harness.httpServer.listening, false);
});

test("clients must register before sending commands", { timeout: 5000 }, async (t) => {
  const harness = await startHarness(t);
  const { ws, messages } = await connect(harness.wsUrl);

  ws.send(JSON.stringify({ type: "value", key: "score", value: 1 }));
  assert.deepEqual(await messages.next(), {
    type: "error",
    error: "Must register first with {type:'register', role:'viewer'|'producer'}",
  });

  ws.send("not json");
  const invalid = await messages.next();
  assert.ok(invalid && typeof invalid === "object" && "error" in invalid);
  assert.equal(typeof invalid.error, "string");
  assert.ok(String(invalid.error).startsWith("Invalid message format: "));

  await harness.service.stop();
});

test("viewers get the current frame and can hide windows", { timeout: 5000 }, async (t) => {
  const harness = await startHarness(t);
  const { ws, messages } = await connect(harness.wsUrl);

  ws.send(JSON.stringify({ type: "register", role: "viewer" }));
  assert.deepEqual(await messages.next(), {
    type: "frame",
    payload: {
      title: "Debug Window",
      windows: [
        { path: [], title: "Debug Window", flags: 0, tabs: [emptyTab] },
        { path: ["Main"], title: "Main", flags: 0, tabs: [emptyTab] },
      ],
    },
  });
  assert.deepEqual(await messages.next(), { type: "ack", payload: "registered as viewer" });

  ws.send(JSON.stringify({ type: "window_closed", path: ["Main"], request_id: "c1" }));
  assert.deepEqual(await messages.next(), { type: "ack", request_id: "c1", payload: "window_closed" });
  assert.deepEqual(await messages.next(), {
    type: "frame",
    payload: {
      title: "Debug Window",
      windows: [{ path: [], title: "Debug Window", flags: 0, tabs: [emptyTab] }],
    },
  });

  await harness.service.stop();
});

test("the HTTP API validates batches, reports status and shuts down", { timeout: 5000 }, async (t) => {
  const harness = await startHarness(t);
  const post = (path: string, body: unknown) =>
    fetch(`${harness.baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  const status = await fetch(`${harness.baseUrl}/api/status`);
  const statusBody: unknown = await status.json();
  assert.equal(status.status, 200);
  assert.ok(statusBody && typeof statusBody === "object");
  assert.deepEqual(
    { ...statusBody, frameCount: 0, startedAt: null },
    {
      state: "running",
      running: true,
      frameCount: 0,
      queueDepth: 0,
      lastError: null,
      startedAt: null,
      viewers: 0,
    },
  );

  const rejected = await post("/api/telemetry", [
    { type: "value", key: "ok", value: 1 },
    { type: "value" },
  ]);
  assert.equal(rejected.status, 400);
  assert.deepEqual(await rejected.json(), { error: "Invalid telemetry command: key: Required" });

  const accepted = await post("/api/telemetry", [
    { type: "value", key: "score", value: 3 },
    { type: "graph_sample", key: "fps", sample: 60, request_id: "g1" },
  ]);
  assert.equal(accepted.status, 200);
  assert.deepEqual(await accepted.json(), {
    success: true,
    count: 2,
    responses: [{ type: "ack", request_id: "g1", payload: "graph_sample" }],
  });

  const single = await post("/api/telemetry", { type: "show_window", visible: true });
  assert.deepEqual(await single.json(), { success: true, count: 1, responses: [] });

  const shutdown = await post("/api/shutdown", {});
  assert.deepEqual(await shutdown.json(), { success: true, stopping: true });
  await harness.service.whenStopped();
  assert.equal(harness.service.state, "stopped");
  assert.equal(harness.httpServer.listening, false);
});

test("telemetry posted while the service is stopping gets 503", { timeout: 5000 }, async (t) => {
  t.mock.method(console, "log", () => undefined);
  const app = express();
  app.use(express.json());
  const httpServer = createServer(app);
  const lifecycle = listenOn(httpServer, 0, "127.0.0.1");
  const memory = new MemoryBackend();
  const service = new RenderService({ backend: memory, fpsCap: 200 });
  await registerRoutes(httpServer, app, { service, backend: new ViewerBackend() });
  await lifecycle.listen();
  const { baseUrl } = urlsFor(httpServer);

  service.value("x", 1);
  await memory.nextFrame();
  let release: () => void = () => undefined;
  t.mock.method(memory, "shutdown", () => new Promise<void>((resolve) => {
    release = resolve;
  }));
  const stopping = service.stop();

  const response = await fetch(`${baseUrl}/api/telemetry`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ type: "value", key: "late", value: 2 }),
  });
  assert.equal(response.status, 503);
  assert.deepEqual(await response.json(), {
    error: "Service is shutting down",
    responses: [{ type: "error", error: "Service is shutting down" }],
  });

  const status = await fetch(`${baseUrl}/api/status`);
  const statusBody: unknown = await status.json();
  assert.ok(statusBody && typeof statusBody === "object" && "state" in statusBody);
  assert.equal(statusBody.state, "stopping");

  release();
  await stopping;
  await lifecycle.close();
  assert.equal(service.state, "stopped");
});
