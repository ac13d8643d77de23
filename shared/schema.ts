import { z } from "zod";

export type ScalarValue =
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "text"; value: string };

export type ScalarKind = ScalarValue["kind"];

/** JSON-safe form of a scalar; 64-bit ints travel as decimal strings. */
export type SerializedScalar =
  | { kind: "int"; value: string }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "text"; value: string };

export const INT_PATTERN = /^-?\d+$/;

export const taggedScalarSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("int"),
    value: z.union([z.string().regex(INT_PATTERN), z.number().int()]),
  }),
  z.object({ kind: z.literal("float"), value: z.number() }),
  z.object({ kind: z.literal("bool"), value: z.boolean() }),
  z.object({ kind: z.literal("text"), value: z.string() }),
]);

export type TaggedScalar = z.infer<typeof taggedScalarSchema>;

export type ScalarInput = number | bigint | boolean | string | ScalarValue | TaggedScalar;

export interface GraphConfig {
  maxSamples: number;
  autoScale: boolean;
  manualMin: number;
  manualMax: number;
}

export type GraphConfigInput = Partial<GraphConfig>;

export const wireScalarSchema = z.union([
  z.number(),
  z.boolean(),
  z.string(),
  taggedScalarSchema,
]);

export type WireScalar = z.infer<typeof wireScalarSchema>;

export const graphConfigInputSchema = z
  .object({
    maxSamples: z.number(),
    autoScale: z.boolean(),
    manualMin: z.number(),
    manualMax: z.number(),
  })
  .partial();

export type StructureFieldValue = WireScalar | StructureFields | StructureFieldValue[];

export interface StructureFields {
  [label: string]: StructureFieldValue;
}

export const structureFieldValueSchema: z.ZodType<StructureFieldValue> = z.lazy(() =>
  z.union([
    wireScalarSchema,
    z.array(structureFieldValueSchema),
    z.record(structureFieldValueSchema),
  ]),
);

export const structureFieldsSchema: z.ZodType<StructureFields> = z.record(structureFieldValueSchema);

const commandBase = z.object({
  request_id: z.string().optional(),
});

const tabField = z.string().min(1).optional();

export const telemetryCommandSchema = z.discriminatedUnion("type", [
  commandBase.extend({
    type: z.literal("value"),
    tab: tabField,
    key: z.string(),
    value: wireScalarSchema,
  }),
  commandBase.extend({
    type: z.literal("graph_sample"),
    tab: tabField,
    key: z.string(),
    sample: z.number(),
    config: graphConfigInputSchema.optional(),
  }),
  commandBase.extend({
    type: z.literal("graph_samples"),
    tab: tabField,
    key: z.string(),
    samples: z.array(z.number()),
    config: graphConfigInputSchema.optional(),
  }),
  commandBase.extend({
    type: z.literal("structure"),
    tab: tabField,
    key: z.string(),
    fields: structureFieldsSchema,
  }),
  commandBase.extend({
    type: z.literal("clear_tab"),
    tab: tabField,
  }),
  commandBase.extend({
    type: z.literal("set_window_title"),
    title: z.string(),
  }),
  commandBase.extend({
    type: z.literal("show_window"),
    visible: z.boolean(),
  }),
]);

export type TelemetryCommand = z.infer<typeof telemetryCommandSchema>;

export type TelemetryCommandType = TelemetryCommand["type"];

export const registerMessageSchema = z.object({
  type: z.literal("register"),
  role: z.enum(["viewer", "producer"]),
});

export const viewerMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("window_closed"),
    path: z.array(z.string()),
    request_id: z.string().optional(),
  }),
  z.object({
    type: z.literal("request_close"),
    request_id: z.string().optional(),
  }),
]);

export type RegisterMessage = z.infer<typeof registerMessageSchema>;

export type ViewerMessage = z.infer<typeof viewerMessageSchema>;

export interface ControlResponse {
  type: "ack" | "error" | "frame" | "status";
  request_id?: string;
  payload?: unknown;
  error?: string;
}

export interface ServiceStatus {
  state: "stopped" | "starting" | "running" | "stopping";
  running: boolean;
  frameCount: number;
  queueDepth: number;
  lastError: string | null;
  startedAt: string | null;
}
