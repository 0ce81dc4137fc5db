import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { SERVICE_NAME, SERVICE_VERSION } from '../../config/system/constants';
import type { ProbeStatus, ServiceContainer } from '../../services/container';

const SERVICES = ['api', 'search', 'generative'] as const;
type Service = (typeof SERVICES)[number];

const healthQuerySchema = z.object({
  services: z.string().optional()
});

function isService(name: string): name is Service {
  return SERVICES.some((service) => service === name);
}

export async function registerHealthRoutes(app: FastifyInstance, services: ServiceContainer): Promise<void> {
  app.get('/', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'ok',
    endpoints: ['/health', '/ready', '/api/search', '/api/status', '/api/logs']
  }));

  app.get('/health', async (req) => {
    const parsed = healthQuerySchema.safeParse(req.query);
    const servicesParam = parsed.success ? parsed.data.services : undefined;
    const requested: Service[] = servicesParam
      ? servicesParam.split(',').map((s) => s.trim()).filter(isService)
      : [...SERVICES];

    const checks: Record<Service, ProbeStatus | 'unknown'> = {
      api: 'ok',
      search: 'unknown',
      generative: 'unknown'
    };

    if (requested.includes('search')) {
      checks.search = await services.probes.search();
    }
    if (requested.includes('generative')) {
      checks.generative = await services.probes.generative();
    }

    const healthy = requested.every((name) => checks[name] === 'ok' || checks[name] === 'disabled');
    return { status: healthy ? 'ok' : 'degraded', services: checks };
  });

  app.get('/ready', async () => ({ status: 'ready' }));
}
