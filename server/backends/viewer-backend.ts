import type { Server } from "http";
import { WebSocket } from "ws";
import type { RenderFrame } from "@shared/frame";
import { viewerMessageSchema, type ControlResponse } from "@shared/schema";
import { log } from "../log";
import type { PlatformEvents, RenderBackend } from "../render-service";

/** The part of a `ws` socket the backend needs. */
export interface ViewerSocket {
  readonly readyState: number;
  send(data: string): void;
  close?(): void;
  terminate?(): void;
}

export interface ViewerLifecycle {
  listen(): Promise<void> | void;
  close(): Promise<void> | void;
}

/** Lifecycle that binds an HTTP server when the render loop starts and closes it on teardown. */
export function listenOn(server: Server, port: number, host: string): ViewerLifecycle {
  return {
    listen: () =>
      new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen({ port, host }, () => {
          server.off("error", reject);
          log(`serving on ${host}:${port}`);
          resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      }),
  };
}

/**
 * Streams every rendered frame to connected viewers over WebSocket and turns
 * their window-close messages into platform events.
 */
export class ViewerBackend implements RenderBackend {
  private readonly viewers = new Set<ViewerSocket>();
  private readonly connections = new Set<ViewerSocket>();
  private readonly lifecycle: ViewerLifecycle | null;
  private closeRequested = false;
  private closedWindows: string[][] = [];
  private lastPayload: string | null = null;
  private broadcastCount = 0;

  constructor(lifecycle: ViewerLifecycle | null = null) {
    this.lifecycle = lifecycle;
  }

  get viewerCount(): number {
    return this.viewers.size;
  }

  get framesBroadcast(): number {
    return this.broadcastCount;
  }

  async init() {
    this.closeRequested = false;
    this.closedWindows = [];
    this.lastPayload = null;
    await this.lifecycle?.listen();
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
    const message: ControlResponse = { type: "frame", payload: frame };
    const data = JSON.stringify(message);
    if (data === this.lastPayload) {
      return;
    }
    this.lastPayload = data;
    this.broadcastCount += 1;
    this.viewers.forEach((viewer) => {
      if (viewer.readyState === WebSocket.OPEN) {
        viewer.send(data);
      }
    });
  }

  /**
   * Drops every open socket before closing the listener; the HTTP server
   * cannot finish closing while an upgraded socket is still attached.
   */
  async shutdown() {
    const sockets = new Set([...this.connections, ...this.viewers]);
    this.connections.clear();
    this.viewers.clear();
    sockets.forEach((socket) => {
      if (socket.terminate) {
        socket.terminate();
      } else {
        socket.close?.();
      }
    });
    await this.lifecycle?.close();
  }

  requestClose() {
    this.closeRequested = true;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Registers any upgraded socket, whatever its role, so shutdown can drop it. */
  trackConnection(socket: ViewerSocket) {
    this.connections.add(socket);
  }

  releaseConnection(socket: ViewerSocket) {
    this.connections.delete(socket);
    this.viewers.delete(socket);
  }

  addViewer(viewer: ViewerSocket) {
    this.viewers.add(viewer);
    if (this.lastPayload && viewer.readyState === WebSocket.OPEN) {
      viewer.send(this.lastPayload);
    }
  }

  removeViewer(viewer: ViewerSocket): boolean {
    return this.viewers.delete(viewer);
  }

  handleViewerMessage(message: unknown): ControlResponse {
    const parsed = viewerMessageSchema.safeParse(message);
    if (!parsed.success) {
      return {
        type: "error",
        error: `Invalid viewer message: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      };
    }
    const data = parsed.data;
    switch (data.type) {
      case "window_closed":
        this.closedWindows.push([...data.path]);
        break;
      case "request_close":
        this.closeRequested = true;
        break;
    }
    return { type: "ack", request_id: data.request_id, payload: data.type };
  }
}
