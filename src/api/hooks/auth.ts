import type { FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../../lib/errors';

const PUBLIC_PATHS = new Set(['/', '/health', '/ready']);

export function apiKeyGuard(apiKey: string | undefined) {
  return async (req: FastifyRequest): Promise<void> => {
    if (!apiKey) return;
    const path = req.url.split('?')[0];
    if (PUBLIC_PATHS.has(path)) return;

    if (req.headers['x-api-key'] !== apiKey) {
      throw new UnauthorizedError();
    }
  };
}
