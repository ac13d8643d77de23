import type { GraphConfigInput, ScalarInput, ScalarValue } from "./schema";
import { GraphSeries, mergeGraphConfig, sameGraphConfig } from "./graph-series";
import { toScalarValue } from "./scalar";
import {
  cloneStructureNode,
  createStructureEntry,
  rebuildStructure,
  type StructureBuildFn,
  type StructureEntry,
  type StructureNode,
} from "./structure";

function sortedKeys(map: Map<string, unknown>): string[] {
  return [...map.keys()].sort();
}

export class Tab {
  readonly id: string;
  private titleText: string;
  private readonly scalars = new Map<string, ScalarValue>();
  private readonly graphs = new Map<string, GraphSeries>();
  private readonly structures = new Map<string, StructureEntry>();

  constructor(id: string, title = "") {
    this.id = id;
    this.titleText = title || id;
  }

  get title(): string {
    return this.titleText;
  }

  /** Empty titles are ignored so a bare lookup never erases a display name. */
  setTitle(title: string) {
    if (title) {
      this.titleText = title;
    }
  }

  updateValue(key: string, value: ScalarInput): this {
    this.scalars.set(key, toScalarValue(value));
    return this;
  }

  getScalar(key: string): ScalarValue | undefined {
    const value = this.scalars.get(key);
    return value ? { ...value } : undefined;
  }

  scalarKeys(): string[] {
    return sortedKeys(this.scalars);
  }

  /** Get-or-create with default config; an existing series keeps its config. */
  graph(key: string): GraphSeries {
    return this.ensureGraph(key);
  }

  addGraph(key: string, config?: GraphConfigInput): GraphSeries {
    return this.ensureGraph(key, config);
  }

  hasGraph(key: string): boolean {
    return this.graphs.has(key);
  }

  getGraph(key: string): GraphSeries | undefined {
    return this.graphs.get(key);
  }

  graphKeys(): string[] {
    return sortedKeys(this.graphs);
  }

  pushGraphSample(key: string, sample: number, config?: GraphConfigInput): this {
    this.ensureGraph(key, config).push(sample);
    return this;
  }

  addGraphSamples(key: string, samples: readonly number[], config?: GraphConfigInput): this {
    this.ensureGraph(key, config).addSamples(samples);
    return this;
  }

  getGraphSamples(key: string): number[] | undefined {
    return this.graphs.get(key)?.getSamples();
  }

  updateStructure(key: string, build?: StructureBuildFn): this {
    let entry = this.structures.get(key);
    if (!entry) {
      entry = createStructureEntry(key);
      this.structures.set(key, entry);
    }
    rebuildStructure(entry, key, build);
    return this;
  }

  getStructureEntry(key: string): Readonly<StructureEntry> | undefined {
    return this.structures.get(key);
  }

  /** Entries whose last rebuild produced nothing read as absent. */
  getStructure(key: string): StructureNode | undefined {
    const entry = this.structures.get(key);
    if (!entry || !entry.hasContent) {
      return undefined;
    }
    return cloneStructureNode(entry.root);
  }

  structureKeys(): string[] {
    return sortedKeys(this.structures);
  }

  clear() {
    this.scalars.clear();
    this.graphs.clear();
    this.structures.clear();
  }

  private ensureGraph(key: string, config?: GraphConfigInput): GraphSeries {
    const existing = this.graphs.get(key);
    if (!existing) {
      const created = new GraphSeries(config);
      this.graphs.set(key, created);
      return created;
    }
    if (config) {
      const current = existing.getConfig();
      const next = mergeGraphConfig(current, config);
      if (!sameGraphConfig(current, next)) {
        existing.configure(next);
      }
    }
    return existing;
  }
}
