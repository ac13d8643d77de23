import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { listenOn, ViewerBackend } from "./backends/viewer-backend";
import { loadConfig } from "./config";
import { log } from "./log";
import { RenderService } from "./render-service";
import { registerRoutes } from "./routes";

const config = loadConfig();
const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "1mb" }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      const duration = Date.now() - start;
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`, "express");
    }
  });

  next();
});

const backend = new ViewerBackend(listenOn(httpServer, config.port, config.host));
const service = new RenderService({
  backend,
  fpsCap: config.fpsCap,
  tileId: config.tileId,
  windowTitle: config.windowTitle,
  defaultTabId: config.defaultTabId,
});

(async () => {
  await registerRoutes(httpServer, app, { service, backend });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      err && typeof err === "object" && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";
    res.status(status).json({ message });
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, stopping`);
    service.stop().catch((error: unknown) => {
      console.error("[render] Stop failed:", error);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  service.start();
  await service.whenStopped();

  const { lastError } = service.status();
  if (lastError) {
    console.error(`[render] exited with error: ${lastError}`);
    process.exitCode = 1;
  }
})().catch((error: unknown) => {
  console.error("Fatal:", error);
  process.exitCode = 1;
});
