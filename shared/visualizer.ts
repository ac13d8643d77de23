import type { GraphConfigInput, ScalarInput, ScalarValue } from "./schema";
import type { StructureBuildFn, StructureNode } from "./structure";
import { Tab } from "./tab";

export const DEFAULT_TAB_ID = "overview";
export const DEFAULT_WINDOW_TITLE = "Debug Window";

export const WindowFlags = {
  none: 0,
  noTitleBar: 1 << 0,
  noResize: 1 << 1,
  noMove: 1 << 2,
  noScrollbar: 1 << 3,
  noCollapse: 1 << 5,
  alwaysAutoResize: 1 << 6,
} as const;

export interface VisualizerOptions {
  title?: string;
  defaultTabId?: string;
}

interface WindowTile {
  id: string;
  visualizer: Visualizer;
}

/**
 * A window: ordered tabs (the default one cannot be removed) plus nested
 * window tiles. Each instance exclusively owns its tabs and tiles, so removing
 * a tile drops its whole subtree.
 */
export class Visualizer {
  readonly defaultTabId: string;
  private title: string;
  private flags: number = WindowFlags.none;
  private visible = true;
  private readonly tabs: Tab[] = [];
  private readonly tiles: WindowTile[] = [];

  constructor(options: VisualizerOptions = {}) {
    this.title = options.title ?? DEFAULT_WINDOW_TITLE;
    this.defaultTabId = options.defaultTabId || DEFAULT_TAB_ID;
    this.ensureTab(this.defaultTabId, "");
  }

  get windowTitle(): string {
    return this.title;
  }

  get windowFlags(): number {
    return this.flags;
  }

  setWindowTitle(title: string) {
    this.title = title;
  }

  setWindowFlags(flags: number) {
    this.flags = flags;
  }

  setVisible(visible: boolean) {
    this.visible = visible;
  }

  isVisible(): boolean {
    return this.visible;
  }

  tab(id: string, title = ""): Tab {
    return this.ensureTab(id, title);
  }

  addTab(id: string, title = ""): Tab {
    return this.ensureTab(id, title);
  }

  findTab(id: string): Tab | undefined {
    return this.tabs.find((tab) => tab.id === id);
  }

  hasTab(id: string): boolean {
    return this.findTab(id) !== undefined;
  }

  removeTab(id: string): boolean {
    if (id === this.defaultTabId) {
      return false;
    }
    const index = this.tabs.findIndex((tab) => tab.id === id);
    if (index === -1) {
      return false;
    }
    this.tabs.splice(index, 1);
    return true;
  }

  tabIds(): string[] {
    return this.tabs.map((tab) => tab.id);
  }

  getTabs(): readonly Tab[] {
    return this.tabs;
  }

  defaultTab(): Tab {
    return this.ensureTab(this.defaultTabId, "");
  }

  tile(id: string, title = ""): Visualizer {
    const existing = this.findTile(id);
    if (existing) {
      if (title && existing.windowTitle !== title) {
        existing.setWindowTitle(title);
      }
      return existing;
    }
    const visualizer = new Visualizer({ title: title || id });
    this.tiles.push({ id, visualizer });
    return visualizer;
  }

  findTile(id: string): Visualizer | undefined {
    return this.tiles.find((entry) => entry.id === id)?.visualizer;
  }

  hasTile(id: string): boolean {
    return this.findTile(id) !== undefined;
  }

  /** Resolves a tile by its id path from this window; `[]` is this window. */
  findTileByPath(path: readonly string[]): Visualizer | undefined {
    let current: Visualizer | undefined = this;
    for (const id of path) {
      current = current.findTile(id);
      if (!current) {
        return undefined;
      }
    }
    return current;
  }

  removeTile(id: string): boolean {
    const index = this.tiles.findIndex((entry) => entry.id === id);
    if (index === -1) {
      return false;
    }
    this.tiles.splice(index, 1);
    return true;
  }

  tileIds(): string[] {
    return this.tiles.map((entry) => entry.id);
  }

  /** Depth-first walk over this window and every nested tile, in insertion order. */
  visit(visitor: (visualizer: Visualizer, path: string[]) => void, path: string[] = []) {
    visitor(this, path);
    for (const entry of this.tiles) {
      entry.visualizer.visit(visitor, [...path, entry.id]);
    }
  }

  clear() {
    for (const tab of this.tabs) {
      tab.clear();
    }
    for (const entry of this.tiles) {
      entry.visualizer.clear();
    }
  }

  updateValue(key: string, value: ScalarInput) {
    this.defaultTab().updateValue(key, value);
  }

  pushGraphSample(key: string, sample: number, config?: GraphConfigInput) {
    this.defaultTab().pushGraphSample(key, sample, config);
  }

  addGraphSamples(key: string, samples: readonly number[], config?: GraphConfigInput) {
    this.defaultTab().addGraphSamples(key, samples, config);
  }

  updateStructure(key: string, build?: StructureBuildFn) {
    this.defaultTab().updateStructure(key, build);
  }

  getScalar(key: string): ScalarValue | undefined {
    return this.findTab(this.defaultTabId)?.getScalar(key);
  }

  getGraphSamples(key: string): number[] | undefined {
    return this.findTab(this.defaultTabId)?.getGraphSamples(key);
  }

  getStructure(key: string): StructureNode | undefined {
    return this.findTab(this.defaultTabId)?.getStructure(key);
  }

  private ensureTab(id: string, title: string): Tab {
    const existing = this.findTab(id);
    if (existing) {
      existing.setTitle(title);
      return existing;
    }
    const tab = new Tab(id, title);
    this.tabs.push(tab);
    return tab;
  }
}
