import fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';
import { createServices, type ServiceContainer } from '../services/container';
import { registerSearchRoutes } from './routes/search';
import { registerHealthRoutes } from './routes/health';
import { registerStatusRoutes } from './routes/status';
import { registerLogsRoutes } from './routes/logs';
import { apiKeyGuard } from './hooks/auth';
import { registerErrorHandlers } from './hooks/errors';

export async function buildServer(services: ServiceContainer = createServices(config)) {
  const settings = services.config;
  const app = fastify({
    logger: {
      level: settings.LOG_LEVEL,
      transport: settings.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]']
    }
  });

  registerErrorHandlers(app);

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: settings.corsOrigins.length > 0 ? settings.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: settings.RATE_LIMIT_MAX,
    timeWindow: settings.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  app.addHook('onRequest', apiKeyGuard(settings.API_KEY));
  app.addHook('onClose', async () => {
    await services.close();
  });

  await registerHealthRoutes(app, services);
  await registerStatusRoutes(app, services);
  await registerLogsRoutes(app, services);
  await registerSearchRoutes(app, services);

  return app;
}

if (process.env.NODE_ENV !== 'test') {
  buildServer()
    .then((app) =>
      app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`Citeline API running on ${config.PORT}`);
      })
    )
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
