import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { Registry } from 'prom-client';
import type { RefreshStatus } from '../services/schedulerService.js';

interface HealthRoutesOptions {
  app: FastifyInstance;
  registry: Registry;
  getRefreshStatus: () => RefreshStatus;
  /** A refresh older than this marks /readyz as not ready. */
  staleAfterMs: number;
  now?: () => Date;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, registry, getRefreshStatus, staleAfterMs } = options;
  const now = options.now ?? (() => new Date());

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send({ status: 'ok', refresh: getRefreshStatus() });
  });

  app.get('/readyz', (_req: FastifyRequest, res: FastifyReply) => {
    const refresh = getRefreshStatus();
    const lastSuccessMs = refresh.lastSuccessAt ? Date.parse(refresh.lastSuccessAt) : NaN;
    const ready = Number.isFinite(lastSuccessMs) && now().getTime() - lastSuccessMs <= staleAfterMs;
    return res.code(ready ? 200 : 503).send({ ready, lastSuccessAt: refresh.lastSuccessAt });
  });

  app.get('/metrics', async (_req: FastifyRequest, res: FastifyReply) => {
    const body = await registry.metrics();
    return res.code(200).header('Content-Type', registry.contentType).send(body);
  });
}

/** Fastify app exposing health, readiness and Prometheus metrics for the scheduler. */
function buildMonitoringServer(options: Omit<HealthRoutesOptions, 'app'>): FastifyInstance {
  const app = Fastify({ logger: false });
  registerHealthRoutes({ ...options, app });
  return app;
}

export { registerHealthRoutes, buildMonitoringServer };
