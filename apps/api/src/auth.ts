import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from '@autosel/config';

export const ADMIN_TOKEN_HEADER = 'x-autosel-admin-token';

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const aBuffer = Buffer.from(a, 'utf8');
  const bBuffer = Buffer.from(b, 'utf8');
  if (aBuffer.length !== bBuffer.length) {
    return false;
  }
  return timingSafeEqual(aBuffer, bBuffer);
}

export interface AdminAuthOptions {
  /** Expected token; unset means open in development and closed elsewhere */
  token?: string;
  nodeEnv?: string;
  logger: Logger;
}

function isDevelopment(nodeEnv: string | undefined): boolean {
  return nodeEnv === 'development' || nodeEnv === 'dev' || nodeEnv === 'test';
}

export function createAdminPreHandler(options: AdminAuthOptions) {
  const { token, logger } = options;
  const openWithoutToken = isDevelopment(options.nodeEnv);

  return async function adminPreHandler(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    if (!token) {
      if (openWithoutToken) {
        return undefined;
      }
      logger.warn({ event: 'api.auth.failed', reason: 'ADMIN_TOKEN not configured' }, 'Admin token not configured');
      return reply.code(401).send({ error: 'Unauthorized', message: 'Admin token not configured' });
    }

    const provided = request.headers[ADMIN_TOKEN_HEADER];
    if (typeof provided !== 'string' || provided.length === 0) {
      logger.info({ event: 'api.auth.failed', reason: 'missing header' }, 'Missing admin token header');
      return reply.code(401).send({ error: 'Unauthorized', message: `Missing ${ADMIN_TOKEN_HEADER} header` });
    }

    if (!constantTimeCompare(provided, token)) {
      logger.info({ event: 'api.auth.failed', reason: 'token mismatch' }, 'Invalid admin token');
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid admin token' });
    }
    return undefined;
  };
}
