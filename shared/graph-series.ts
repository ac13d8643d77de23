import type { GraphConfig, GraphConfigInput } from "./schema";

export const DEFAULT_GRAPH_CONFIG: Readonly<GraphConfig> = Object.freeze({
  maxSamples: 240,
  autoScale: true,
  manualMin: 0,
  manualMax: 1,
});

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Merges a partial config over the defaults. Degenerate capacities collapse to
 * zero instead of being rejected, so a series can always be created.
 */
export function normalizeGraphConfig(config: GraphConfigInput = {}): GraphConfig {
  let maxSamples = DEFAULT_GRAPH_CONFIG.maxSamples;
  if (config.maxSamples !== undefined) {
    maxSamples = Number.isFinite(config.maxSamples) && config.maxSamples > 0
      ? Math.floor(config.maxSamples)
      : 0;
  }
  return {
    maxSamples,
    autoScale: config.autoScale ?? DEFAULT_GRAPH_CONFIG.autoScale,
    manualMin: finiteOr(config.manualMin, DEFAULT_GRAPH_CONFIG.manualMin),
    manualMax: finiteOr(config.manualMax, DEFAULT_GRAPH_CONFIG.manualMax),
  };
}

/** Applies only the fields `patch` sets; everything else keeps its value in `base`. */
export function mergeGraphConfig(base: GraphConfig, patch: GraphConfigInput): GraphConfig {
  return normalizeGraphConfig({
    maxSamples: patch.maxSamples ?? base.maxSamples,
    autoScale: patch.autoScale ?? base.autoScale,
    manualMin: patch.manualMin ?? base.manualMin,
    manualMax: patch.manualMax ?? base.manualMax,
  });
}

export function sameGraphConfig(a: GraphConfig, b: GraphConfig): boolean {
  return (
    a.maxSamples === b.maxSamples &&
    a.autoScale === b.autoScale &&
    a.manualMin === b.manualMin &&
    a.manualMax === b.manualMax
  );
}

export class GraphSeries {
  private config: GraphConfig;
  private samples: number[] = [];
  private latestSample = 0;

  constructor(config?: GraphConfigInput) {
    this.config = normalizeGraphConfig(config);
  }

  /** Partial configs update only the fields they name. */
  configure(config: GraphConfigInput): this {
    this.config = mergeGraphConfig(this.config, config);
    this.trimToConfig();
    return this;
  }

  getConfig(): GraphConfig {
    return { ...this.config };
  }

  push(sample: number): this {
    this.latestSample = sample;
    this.samples.push(sample);
    this.trimToConfig();
    return this;
  }

  addSamples(samples: readonly number[]): this {
    for (const sample of samples) {
      this.push(sample);
    }
    return this;
  }

  getSamples(): number[] {
    return [...this.samples];
  }

  /** Last pushed value, kept even after it has been trimmed out of history. */
  get latest(): number {
    return this.latestSample;
  }

  get length(): number {
    return this.samples.length;
  }

  private trimToConfig() {
    if (this.config.maxSamples === 0) {
      this.samples.length = 0;
      return;
    }
    if (this.samples.length > this.config.maxSamples) {
      this.samples.splice(0, this.samples.length - this.config.maxSamples);
    }
  }
}
