import type { FastifyInstance } from 'fastify';
import { cacheSizes } from '../../cache/cacheStore';
import { SERVICE_NAME, SERVICE_VERSION } from '../../config/system/constants';
import type { ServiceContainer } from '../../services/container';

export async function registerStatusRoutes(app: FastifyInstance, services: ServiceContainer): Promise<void> {
  app.get('/api/status', async () => {
    const { config } = services;
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      agents: {
        enabled: services.generativeModel !== null,
        model: services.generativeModel,
        max_concurrency: config.AGENT_MAX_CHUNKS,
        timeout_ms: config.AGENT_TIMEOUT_MS
      },
      circuits: services.resilience.snapshot().map((circuit) => ({
        name: circuit.name,
        state: circuit.state,
        consecutive_failures: circuit.consecutiveFailures,
        opened_at: circuit.openedAt === null ? null : new Date(circuit.openedAt).toISOString(),
        last_error: circuit.lastError
      })),
      cache: {
        enabled: config.CACHE_ENABLED,
        sizes: cacheSizes(services.caches)
      },
      search_logs: services.searchLogs.kind
    };
  });
}
