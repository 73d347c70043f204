import express from "express";
import { createServer, type Server } from "node:http";
import type { SessionState } from "./core/session";
import { log } from "./util/log";

export interface HealthSource {
  session: SessionState;
  voices: ReadonlySet<string>;
  players: string[];
  ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }>;
}

export const createHealthApp = (src: HealthSource) => {
  const app = express();

  app.get("/healthz", async (_req, res) => {
    const engine = await src.ready();
    const ok = engine.ok && src.session.running;
    res.status(ok ? 200 : 503).json({
      ok,
      engine,
      session: {
        id: src.session.id,
        voice: src.session.activeVoice,
        speed: src.session.speechRate,
        handled: src.session.handled,
        failed: src.session.failed,
        uptimeMs: Date.now() - src.session.createdAt,
      },
      voices: [...src.voices].sort(),
      players: src.players,
    });
  });

  return app;
};

/** Starts the health server; resolves once it is listening. Port 0 picks a free port. */
export const startHealthServer = async (src: HealthSource, port: number, host = "127.0.0.1"): Promise<Server> => {
  const server = createServer(createHealthApp(src));
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  const addr = server.address();
  const boundPort = addr && typeof addr === "object" ? addr.port : port;
  log.info("health server listening", { url: `http://${host}:${boundPort}/healthz` });
  return server;
};
