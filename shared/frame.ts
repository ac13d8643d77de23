import type { GraphConfig, SerializedScalar } from "./schema";
import { serializeScalar } from "./scalar";
import type { StructureNode } from "./structure";
import type { Tab } from "./tab";
import type { Visualizer } from "./visualizer";

export const FALLBACK_WINDOW_TITLE = "Debug Visualizer";

export interface ScalarRow {
  key: string;
  value: SerializedScalar;
}

export interface StructureFrameNode {
  label: string;
  value?: SerializedScalar;
  children: StructureFrameNode[];
}

export interface PlotBounds {
  min: number;
  max: number;
}

export interface GraphPlot {
  key: string;
  samples: number[];
  latest: number;
  bounds: PlotBounds | null;
}

export interface StructureView {
  key: string;
  children: StructureFrameNode[];
}

export interface TabFrame {
  id: string;
  title: string;
  scalars: ScalarRow[];
  graphs: GraphPlot[];
  structures: StructureView[];
  empty: boolean;
}

export interface WindowFrame {
  path: string[];
  title: string;
  flags: number;
  tabs: TabFrame[];
}

export interface RenderFrame {
  title: string;
  windows: WindowFrame[];
}

/**
 * Vertical plot range. Auto-scaled series use the buffer extremes, padded by
 * one on each side when every sample is equal.
 */
export function computePlotBounds(
  samples: readonly number[],
  config: GraphConfig,
): PlotBounds | null {
  if (samples.length === 0) {
    return null;
  }
  if (!config.autoScale) {
    return { min: config.manualMin, max: config.manualMax };
  }
  let min = samples[0];
  let max = samples[0];
  for (const sample of samples) {
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }
  if (min === max) {
    return { min: min - 1, max: max + 1 };
  }
  return { min, max };
}

function toFrameNode(node: StructureNode): StructureFrameNode {
  const frameNode: StructureFrameNode = {
    label: node.label,
    children: node.children.map(toFrameNode),
  };
  if (node.value) {
    frameNode.value = serializeScalar(node.value);
  }
  return frameNode;
}

export function buildTabFrame(tab: Tab): TabFrame {
  const scalars: ScalarRow[] = [];
  for (const key of tab.scalarKeys()) {
    const value = tab.getScalar(key);
    if (value) {
      scalars.push({ key, value: serializeScalar(value) });
    }
  }

  const graphs: GraphPlot[] = [];
  for (const key of tab.graphKeys()) {
    const graph = tab.getGraph(key);
    if (!graph) {
      continue;
    }
    const samples = graph.getSamples();
    graphs.push({
      key,
      samples,
      latest: graph.latest,
      bounds: computePlotBounds(samples, graph.getConfig()),
    });
  }

  const structures: StructureView[] = [];
  for (const key of tab.structureKeys()) {
    const entry = tab.getStructureEntry(key);
    if (!entry || !entry.hasContent) {
      continue;
    }
    structures.push({ key, children: entry.root.children.map(toFrameNode) });
  }

  return {
    id: tab.id,
    title: tab.title,
    scalars,
    graphs,
    structures,
    empty: scalars.length === 0 && graphs.length === 0 && structures.length === 0,
  };
}

export function buildWindowFrame(visualizer: Visualizer, path: string[]): WindowFrame {
  return {
    path,
    title: visualizer.windowTitle || FALLBACK_WINDOW_TITLE,
    flags: visualizer.windowFlags,
    tabs: visualizer.getTabs().map(buildTabFrame),
  };
}

/**
 * Snapshot of everything a backend draws this frame. Hidden windows are
 * skipped but their tiles are still walked.
 */
export function buildRenderFrame(root: Visualizer): RenderFrame {
  const windows: WindowFrame[] = [];
  root.visit((visualizer, path) => {
    if (visualizer.isVisible()) {
      windows.push(buildWindowFrame(visualizer, path));
    }
  });
  return {
    title: root.windowTitle || FALLBACK_WINDOW_TITLE,
    windows,
  };
}

export function findWindowFrame(
  frame: RenderFrame,
  path: readonly string[],
): WindowFrame | undefined {
  return frame.windows.find(
    (window) =>
      window.path.length === path.length &&
      window.path.every((segment, index) => segment === path[index]),
  );
}
