import { performance } from "node:perf_hooks";
import type {
  GraphConfigInput,
  ScalarInput,
  ServiceStatus,
} from "@shared/schema";
import { buildRenderFrame, type RenderFrame } from "@shared/frame";
import { toScalarValue } from "@shared/scalar";
import type { StructureBuildFn } from "@shared/structure";
import { Visualizer } from "@shared/visualizer";
import { CommandQueue, type QueuedUpdate } from "./command-queue";
import { DEFAULT_SERVICE_TILE_ID, DEFAULT_TELEMETRY_TAB_ID } from "./config";
import { describeError, log } from "./log";
import { computeNextIdleDelay, computeTickTiming, type TickTiming } from "./tick-timing";

export type ServiceState = ServiceStatus["state"];

export interface PlatformEvents {
  closeRequested: boolean;
  /** Tile paths (from the root window) the user closed since the last poll. */
  closedWindows: string[][];
  /** Frame timestamp in milliseconds; the service clock is used when absent. */
  now?: number;
}

export interface RenderBackend {
  init(): Promise<void> | void;
  pollEvents(): PlatformEvents;
  render(frame: RenderFrame): void;
  present?(): void;
  shutdown(): Promise<void> | void;
}

/** What queued updates and the frame callback see; only valid inside the render loop. */
export interface RenderContext {
  readonly root: Visualizer;
  tile(): Visualizer;
  requestClose(): void;
}

export type FrameCallback = (
  context: RenderContext,
  elapsedSeconds: number,
  deltaSeconds: number,
) => void;

export interface RenderServiceOptions {
  backend: RenderBackend;
  fpsCap?: number;
  tileId?: string;
  windowTitle?: string;
  defaultTabId?: string;
  onFrame?: FrameCallback;
  clock?: () => number;
}

type PendingWait = {
  timer: NodeJS.Timeout;
  resolve: () => void;
  dueAt: number;
};

const FALLBACK_DELTA_SECONDS = 1 / 60;

/**
 * Owns one window tree and the loop that mutates and renders it. Producers
 * only ever enqueue closures; the loop swaps the whole queue out once per
 * frame and applies it in submission order.
 *
 * States: stopped → starting → running → stopping → stopped. The first
 * enqueue on a stopped service starts it.
 */
export class RenderService {
  readonly defaultTabId: string;
  private readonly backend: RenderBackend;
  private readonly timing: TickTiming;
  private readonly tileId: string;
  private readonly windowTitle: string;
  private readonly onFrame?: FrameCallback;
  private readonly clock: () => number;
  private readonly queue = new CommandQueue<RenderContext>();

  private currentState: ServiceState = "stopped";
  private closeFlag = false;
  private loop: Promise<void> | null = null;
  private pendingWait: PendingWait | null = null;
  private idleDelayMs = 0;
  private frameCount = 0;
  private lastError: string | null = null;
  private startedAt: string | null = null;
  private loopStartedAtMs = 0;
  private lastFrameAtMs = 0;

  constructor(options: RenderServiceOptions) {
    this.backend = options.backend;
    this.timing = computeTickTiming(options.fpsCap ?? 60);
    this.tileId = options.tileId || DEFAULT_SERVICE_TILE_ID;
    this.windowTitle = options.windowTitle ?? "Debug Window";
    this.defaultTabId = options.defaultTabId || DEFAULT_TELEMETRY_TAB_ID;
    this.onFrame = options.onFrame;
    this.clock = options.clock ?? (() => performance.now());
  }

  get state(): ServiceState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.currentState === "running";
  }

  status(): ServiceStatus {
    return {
      state: this.currentState,
      running: this.isRunning(),
      frameCount: this.frameCount,
      queueDepth: this.queue.size,
      lastError: this.lastError,
      startedAt: this.startedAt,
    };
  }

  /**
   * Appends an update for the render loop and returns immediately. Updates
   * posted after shutdown has begun are dropped.
   */
  enqueue(update: QueuedUpdate<RenderContext>): boolean {
    if (this.currentState === "stopping") {
      return false;
    }
    this.queue.enqueue(update);
    if (this.currentState === "stopped") {
      this.start();
    } else {
      this.wake(this.timing.tickIntervalMs);
    }
    return true;
  }

  start() {
    if (this.currentState !== "stopped") {
      return;
    }
    this.currentState = "starting";
    this.closeFlag = false;
    this.lastError = null;
    this.frameCount = 0;
    this.idleDelayMs = 0;
    this.startedAt = new Date().toISOString();
    this.loop = this.run();
  }

  /** Requests loop exit and resolves once the backend has been torn down. */
  stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      this.queue.clear();
      return Promise.resolve();
    }
    if (this.currentState !== "stopping") {
      this.closeFlag = true;
      this.currentState = "stopping";
      this.queue.enqueue((context) => context.requestClose());
      this.wake(0);
    }
    return loop;
  }

  whenStopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  update(update: QueuedUpdate<RenderContext>) {
    this.enqueue(update);
  }

  value(key: string, value: ScalarInput): void;
  value(tabId: string, key: string, value: ScalarInput): void;
  value(
    ...args: [key: string, value: ScalarInput] | [tabId: string, key: string, value: ScalarInput]
  ): void {
    if (args.length === 3) {
      this.postValue(args[0], args[1], args[2]);
    } else {
      this.postValue(this.defaultTabId, args[0], args[1]);
    }
  }

  graphSample(key: string, sample: number, config?: GraphConfigInput): void;
  graphSample(tabId: string, key: string, sample: number, config?: GraphConfigInput): void;
  graphSample(
    first: string,
    second: string | number,
    third?: number | GraphConfigInput,
    fourth?: GraphConfigInput,
  ): void {
    if (typeof second === "number") {
      this.postGraphSamples(
        this.defaultTabId,
        first,
        [second],
        typeof third === "object" ? third : undefined,
      );
      return;
    }
    if (typeof third === "number") {
      this.postGraphSamples(first, second, [third], fourth);
    }
  }

  graphSamples(key: string, samples: number[], config?: GraphConfigInput): void;
  graphSamples(tabId: string, key: string, samples: number[], config?: GraphConfigInput): void;
  graphSamples(
    first: string,
    second: string | number[],
    third?: number[] | GraphConfigInput,
    fourth?: GraphConfigInput,
  ): void {
    if (typeof second !== "string") {
      this.postGraphSamples(
        this.defaultTabId,
        first,
        second,
        Array.isArray(third) ? undefined : third,
      );
      return;
    }
    if (Array.isArray(third)) {
      this.postGraphSamples(first, second, third, fourth);
    }
  }

  structure(key: string, build: StructureBuildFn): void;
  structure(tabId: string, key: string, build: StructureBuildFn): void;
  structure(first: string, second: string | StructureBuildFn, third?: StructureBuildFn): void {
    if (typeof second === "function") {
      this.postStructure(this.defaultTabId, first, second);
      return;
    }
    this.postStructure(first, second, third);
  }

  clearTab(tabId: string = this.defaultTabId) {
    this.enqueue((context) => {
      context.tile().tab(tabId).clear();
    });
  }

  setWindowTitle(title: string) {
    this.enqueue((context) => {
      context.tile().setWindowTitle(title);
    });
  }

  setWindowFlags(flags: number) {
    this.enqueue((context) => {
      context.tile().setWindowFlags(flags);
    });
  }

  showWindow(visible: boolean) {
    this.enqueue((context) => {
      context.tile().setVisible(visible);
    });
  }

  private postValue(tabId: string, key: string, input: ScalarInput) {
    const value = toScalarValue(input);
    this.enqueue((context) => {
      context.tile().tab(tabId).updateValue(key, value);
    });
  }

  private postGraphSamples(
    tabId: string,
    key: string,
    samples: readonly number[],
    config: GraphConfigInput | undefined,
  ) {
    const copied = [...samples];
    const configCopy = config ? { ...config } : undefined;
    this.enqueue((context) => {
      context.tile().tab(tabId).addGraphSamples(key, copied, configCopy);
    });
  }

  private postStructure(tabId: string, key: string, build: StructureBuildFn | undefined) {
    this.enqueue((context) => {
      context.tile().tab(tabId).updateStructure(key, build);
    });
  }

  private async run(): Promise<void> {
    const initialized = await this.initializeBackend();
    if (initialized) {
      if (this.currentState === "starting") {
        this.currentState = "running";
      }
      log(`render loop started (${this.timing.tickIntervalMs}ms ticks)`, "render");
      await this.runFrames();
      this.currentState = "stopping";
      await this.shutdownBackend();
    }
    this.finish();
  }

  private async initializeBackend(): Promise<boolean> {
    try {
      await this.backend.init();
      return true;
    } catch (error) {
      this.lastError = describeError(error);
      console.error("[render] Backend initialization failed:", error);
      return false;
    }
  }

  private async runFrames() {
    const root = new Visualizer({ title: this.windowTitle });
    const context: RenderContext = {
      root,
      tile: () => root.tile(this.tileId),
      requestClose: () => {
        this.closeFlag = true;
      },
    };
    this.loopStartedAtMs = this.clock();
    this.lastFrameAtMs = this.loopStartedAtMs;

    while (!this.closeFlag) {
      let didWork = false;
      try {
        didWork = this.renderFrame(root, context);
      } catch (error) {
        this.lastError = describeError(error);
        console.error("[render] Backend failure, stopping:", error);
        break;
      }
      if (this.closeFlag) {
        break;
      }
      this.idleDelayMs = didWork
        ? this.timing.tickIntervalMs
        : computeNextIdleDelay(
            this.idleDelayMs,
            this.timing.tickIntervalMs,
            this.timing.maxIdleDelayMs,
          );
      await this.sleep(this.idleDelayMs);
    }
  }

  private renderFrame(root: Visualizer, context: RenderContext): boolean {
    const events = this.backend.pollEvents();
    const now = events.now ?? this.clock();
    let deltaSeconds = (now - this.lastFrameAtMs) / 1000;
    if (deltaSeconds <= 0) {
      deltaSeconds = FALLBACK_DELTA_SECONDS;
    }
    this.lastFrameAtMs = now;
    const elapsedSeconds = (now - this.loopStartedAtMs) / 1000;

    if (events.closeRequested) {
      this.closeFlag = true;
      return false;
    }
    for (const path of events.closedWindows) {
      root.findTileByPath(path)?.setVisible(false);
    }

    context.tile().defaultTab();
    const updates = this.queue.drain();
    for (const update of updates) {
      try {
        update(context);
      } catch (error) {
        console.error("[render] Queued update failed:", error);
      }
    }

    if (this.onFrame) {
      try {
        this.onFrame(context, elapsedSeconds, deltaSeconds);
      } catch (error) {
        console.error("[render] Frame callback failed:", error);
      }
    }

    this.backend.render(buildRenderFrame(root));
    this.backend.present?.();
    this.frameCount += 1;
    return updates.length > 0 || events.closedWindows.length > 0;
  }

  private sleep(delayMs: number): Promise<void> {
    return new Promise((resolve) => {
      const wait: PendingWait = {
        timer: setTimeout(() => {
          this.pendingWait = null;
          resolve();
        }, delayMs),
        resolve,
        dueAt: this.clock() + delayMs,
      };
      this.pendingWait = wait;
    });
  }

  /** Brings the pending sleep forward so the next frame starts within `withinMs`. */
  private wake(withinMs: number) {
    const wait = this.pendingWait;
    if (!wait) {
      return;
    }
    if (withinMs <= 0) {
      clearTimeout(wait.timer);
      this.pendingWait = null;
      wait.resolve();
      return;
    }
    const dueAt = this.clock() + withinMs;
    if (wait.dueAt <= dueAt) {
      return;
    }
    clearTimeout(wait.timer);
    wait.dueAt = dueAt;
    wait.timer = setTimeout(() => {
      this.pendingWait = null;
      wait.resolve();
    }, withinMs);
  }

  private async shutdownBackend() {
    try {
      await this.backend.shutdown();
    } catch (error) {
      console.error("[render] Backend shutdown failed:", error);
    }
  }

  private finish() {
    const discarded = this.queue.clear();
    if (discarded > 0) {
      log(`discarded ${discarded} pending update(s)`, "render");
    }
    this.currentState = "stopped";
    this.closeFlag = false;
    this.loop = null;
    this.pendingWait = null;
    log(`render loop stopped after ${this.frameCount} frame(s)`, "render");
  }
}
