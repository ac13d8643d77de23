import test from "node:test";
import assert from "node:assert/strict";
import { findWindowFrame } from "@shared/frame";
import { MemoryBackend } from "../backends/memory-backend";
import { RenderService } from "../render-service";
import { applyTelemetryCommand, parseTelemetryCommand } from "../telemetry-commands";
import { handleProducerMessage } from "../routes";

test("parseTelemetryCommand accepts each command shape", () => {
  const commands = [
    { type: "value", key: "score", value: 42 },
    { type: "value", tab: "Stats", key: "mode", value: { kind: "float", value: 2 } },
    { type: "graph_sample", key: "fps", sample: 60, config: { maxSamples: 10 } },
    { type: "graph_samples", key: "fps", samples: [1, 2] },
    { type: "structure", key: "player", fields: { pos: { x: 1 }, tags: ["a"] } },
    { type: "clear_tab" },
    { type: "set_window_title", title: "Stats" },
    { type: "show_window", visible: false },
  ];
  for (const command of commands) {
    const result = parseTelemetryCommand(command);
    assert.equal(result.ok, true, JSON.stringify(command));
  }
});

test("parseTelemetryCommand reports the failing field and keeps the request id", () => {
  const emptyTab = parseTelemetryCommand({ type: "clear_tab", tab: "" });
  assert.deepEqual(emptyTab, {
    ok: false,
    error: "Invalid telemetry command: tab: String must contain at least 1 character(s)",
    requestId: undefined,
  });

  const badValue = parseTelemetryCommand({ type: "value", key: "k", value: {}, request_id: "r1" });
  assert.equal(badValue.ok, false);
  if (!badValue.ok) {
    assert.equal(badValue.requestId, "r1");
    assert.ok(badValue.error.startsWith("Invalid telemetry command: value: "));
  }

  const unknown = parseTelemetryCommand({ type: "launch" });
  assert.equal(unknown.ok, false);
  if (!unknown.ok) {
    assert.ok(unknown.error.startsWith("Invalid telemetry command: type: "));
  }
});

test("applyTelemetryCommand routes commands to the service tile", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const backend = new MemoryBackend();
  const service = new RenderService({ backend, fpsCap: 200 });
  const commands = [
    { type: "value", key: "score", value: 7 },
    { type: "graph_samples", tab: "Net", key: "rtt", samples: [3, 4] },
    { type: "structure", key: "player", fields: { hp: 3, pos: { x: 1 } } },
    { type: "set_window_title", title: "Remote" },
  ];
  for (const raw of commands) {
    const result = parseTelemetryCommand(raw);
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(applyTelemetryCommand(service, result.command), true);
    }
  }

  const frame = await backend.nextFrame();
  const main = findWindowFrame(frame, ["Main"]);
  assert.equal(main?.title, "Remote");
  const telemetry = main?.tabs.find((tab) => tab.id === "Telemetry");
  assert.deepEqual(telemetry?.scalars, [{ key: "score", value: { kind: "int", value: "7" } }]);
  assert.deepEqual(telemetry?.structures, [
    {
      key: "player",
      children: [
        { label: "hp", value: { kind: "int", value: "3" }, children: [] },
        { label: "pos", children: [{ label: "x", value: { kind: "int", value: "1" }, children: [] }] },
      ],
    },
  ]);
  assert.deepEqual(main?.tabs.find((tab) => tab.id === "Net")?.graphs[0].samples, [3, 4]);
  await service.stop();
});

test("handleProducerMessage acks only requests that carry an id", async (t) => {
  t.mock.method(console, "log", () => undefined);
  const backend = new MemoryBackend();
  const service = new RenderService({ backend, fpsCap: 200 });

  assert.equal(handleProducerMessage(service, { type: "value", key: "a", value: 1 }), null);
  assert.deepEqual(
    handleProducerMessage(service, { type: "value", key: "b", value: 2, request_id: "r1" }),
    { type: "ack", request_id: "r1", payload: "value" },
  );

  const invalid = handleProducerMessage(service, { type: "value", request_id: "r2" });
  assert.equal(invalid?.type, "error");
  assert.equal(invalid?.request_id, "r2");

  await backend.nextFrame();
  const stopping = service.stop();
  const rejected = handleProducerMessage(service, { type: "show_window", visible: true, request_id: "r3" });
  assert.equal(rejected?.type, "error");
  assert.equal(rejected?.error, "Service is shutting down");
  await stopping;
});
