import type { ScalarInput, ScalarValue } from "./schema";
import { isTaggedScalar, toScalarValue } from "./scalar";

export interface StructureNode {
  label: string;
  value?: ScalarValue;
  children: StructureNode[];
}

export interface StructureEntry {
  root: StructureNode;
  hasContent: boolean;
}

export type StructureBuildFn = (builder: StructureBuilder) => void;

/**
 * Write-only view over a child list. `nested` appends a valueless group and
 * hands back a builder for that group's children.
 */
export class StructureBuilder {
  constructor(private readonly nodes: StructureNode[]) {}

  field(label: string, value: ScalarInput): this {
    this.nodes.push({ label, value: toScalarValue(value), children: [] });
    return this;
  }

  nested(label: string): StructureBuilder {
    const group: StructureNode = { label, children: [] };
    this.nodes.push(group);
    return new StructureBuilder(group.children);
  }
}

export function createStructureEntry(key: string): StructureEntry {
  return { root: { label: key, children: [] }, hasContent: false };
}

/** Replaces the entry's content wholesale; earlier children are never merged. */
export function rebuildStructure(
  entry: StructureEntry,
  key: string,
  build?: StructureBuildFn,
) {
  const children: StructureNode[] = [];
  if (build) {
    build(new StructureBuilder(children));
  }
  entry.root = { label: key, children };
  entry.hasContent = children.length > 0;
}

export function cloneStructureNode(node: StructureNode): StructureNode {
  const copy: StructureNode = {
    label: node.label,
    children: node.children.map(cloneStructureNode),
  };
  if (node.value) {
    copy.value = { ...node.value };
  }
  return copy;
}

function appendStructureValue(builder: StructureBuilder, label: string, value: unknown) {
  if (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    typeof value === "string" ||
    isTaggedScalar(value)
  ) {
    builder.field(label, value);
    return;
  }

  if (Array.isArray(value)) {
    const group = builder.nested(label);
    value.forEach((item, index) => {
      appendStructureValue(group, `[${index}]`, item);
    });
    return;
  }

  if (value && typeof value === "object") {
    appendEntries(builder.nested(label), value);
  }
}

function appendEntries(builder: StructureBuilder, source: object) {
  for (const [label, value] of Object.entries(source)) {
    appendStructureValue(builder, label, value);
  }
}

/**
 * Replays a plain object as builder calls: scalars become fields, objects and
 * arrays become groups. `null`, `undefined` and functions are skipped.
 *
 * An object shaped like a tagged scalar (`{kind: "int", value: 3}` and the
 * float, bool and text equivalents) is read as that scalar, not as a group
 * with `kind` and `value` children.
 */
export function buildStructureFromObject(
  builder: StructureBuilder,
  source: Readonly<Record<string, unknown>>,
) {
  appendEntries(builder, source);
}
