import type { RenderFrame } from "@shared/frame";
import type { PlatformEvents, RenderBackend } from "../render-service";

export interface MemoryBackendOptions {
  /** How many rendered frames to retain; older ones are dropped first. */
  maxFrames?: number;
  failInit?: boolean;
}

type FrameWaiter = (frame: RenderFrame) => void;

/**
 * Headless backend that keeps the most recent frames in memory. Used by
 * tests and by embedders that inspect the tree instead of drawing it.
 */
export class MemoryBackend implements RenderBackend {
  initCount = 0;
  shutdownCount = 0;
  renderCount = 0;
  private readonly maxFrames: number;
  private readonly failInit: boolean;
  private readonly frames: RenderFrame[] = [];
  private closeRequested = false;
  private closedWindows: string[][] = [];
  private waiters: FrameWaiter[] = [];

  constructor(options: MemoryBackendOptions = {}) {
    this.maxFrames = Math.max(1, options.maxFrames ?? 32);
    this.failInit = options.failInit ?? false;
  }

  init() {
    this.initCount += 1;
    if (this.failInit) {
      throw new Error("Display unavailable");
    }
    this.closeRequested = false;
  }

  pollEvents(): PlatformEvents {
    const events: PlatformEvents = {
      closeRequested: this.closeRequested,
      closedWindows: this.closedWindows,
    };
    this.closedWindows = [];
    return events;
  }

  render(frame: RenderFrame) {
    this.renderCount += 1;
    this.frames.push(frame);
    if (this.frames.length > this.maxFrames) {
      this.frames.splice(0, this.frames.length - this.maxFrames);
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(frame);
    }
  }

  shutdown() {
    this.shutdownCount += 1;
  }

  /** Simulates the user closing the main window. */
  requestClose() {
    this.closeRequested = true;
  }

  /** Simulates the user closing one window; `[]` is the root window. */
  closeWindow(path: readonly string[]) {
    this.closedWindows.push([...path]);
  }

  latestFrame(): RenderFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  getFrames(): readonly RenderFrame[] {
    return this.frames;
  }

  /** Resolves with the next frame rendered after this call. */
  nextFrame(): Promise<RenderFrame> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
