import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../lib/errors';
import type { ServiceContainer } from '../../services/container';

const logsSchema = z.object({
  limit: z.coerce.number().int().positive().max(200).default(50)
});

export async function registerLogsRoutes(app: FastifyInstance, services: ServiceContainer): Promise<void> {
  app.get('/api/logs', async (req, reply) => {
    const parsed = logsSchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError('Invalid logs query', parsed.error.flatten());
    }
    const records = await services.searchLogs.recent(parsed.data.limit);
    return reply.send({
      logs: records.map((record) => ({
        id: record.id,
        query: record.query,
        results_count: record.resultsCount,
        duration_ms: record.durationMs,
        degraded_mode: record.degradedMode,
        citation_style: record.citationStyle,
        created_at: record.createdAt
      }))
    });
  });
}
