import Fastify, { FastifyInstance } from "fastify";
import { info, error } from "./logger";
import { formatUptime } from "./utils";

export interface HealthStats {
  startedAt: Date;
  messagesProcessed: number;
  errorsCount: number;
  lastMessageAt: Date | null;
  uptimeSeconds: number;
}

const stats: HealthStats = {
  startedAt: new Date(),
  messagesProcessed: 0,
  errorsCount: 0,
  lastMessageAt: null,
  uptimeSeconds: 0,
};

let statsLogInterval: NodeJS.Timeout | null = null;

export function resetStats(): void {
  stats.startedAt = new Date();
  stats.messagesProcessed = 0;
  stats.errorsCount = 0;
  stats.lastMessageAt = null;
  stats.uptimeSeconds = 0;
}

export function incrementMessages(): void {
  stats.messagesProcessed++;
  stats.lastMessageAt = new Date();
}

export function incrementErrors(): void {
  stats.errorsCount++;
}

export function getStats(): HealthStats {
  stats.uptimeSeconds = Math.floor((Date.now() - stats.startedAt.getTime()) / 1000);
  return { ...stats };
}

function logStats(): void {
  const s = getStats();
  info("health", "stats", {
    uptime: formatUptime(s.uptimeSeconds * 1000),
    messagesProcessed: s.messagesProcessed,
    errorsCount: s.errorsCount,
    lastMessageAt: s.lastMessageAt?.toISOString() || null,
  });
}

function liveness() {
  const s = getStats();
  return {
    status: "ok",
    uptimeSeconds: s.uptimeSeconds,
    messagesProcessed: s.messagesProcessed,
    errorsCount: s.errorsCount,
  };
}

/** Liveness responder for the hosting platform's probe. Reads counters only. */
export function createHealthServer(): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get("/", async () => liveness());
  app.get("/health", async () => liveness());

  app.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({ status: "not_found" });
  });

  return app;
}

export async function startHealthServer(port: number): Promise<FastifyInstance> {
  const app = createHealthServer();
  try {
    await app.listen({ port, host: "0.0.0.0" });
  } catch (err) {
    error("health", "server_failed", { port, error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
  info("health", "server_listening", { port });
  return app;
}

export function startHealthMonitor(): void {
  resetStats();
  if (!statsLogInterval) {
    statsLogInterval = setInterval(logStats, 60 * 60 * 1000);
    statsLogInterval.unref();
  }
  info("health", "monitor_started");
}

export function stopHealthMonitor(): void {
  if (statsLogInterval) {
    clearInterval(statsLogInterval);
    statsLogInterval = null;
  }
  info("health", "monitor_stopped");
}
