/**
 * Plugin Fastify de autenticacao por Bearer token.
 *
 * REGRAS:
 * - /health*: sempre publico
 * - /api/*: exige o token configurado, quando houver um
 */

import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import * as crypto from 'crypto';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface AuthPluginOptions {
  /**
   * Token exigido nas rotas /api. Vazio: autenticacao desligada.
   */
  apiToken?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Extrai Bearer token do header Authorization
 */
function extractBearerToken(authorization: string | undefined): string | null {
  if (!authorization || !authorization.startsWith('Bearer ')) {
    return null;
  }

  const token = authorization.slice(7).trim();
  return token || null;
}

/**
 * Comparacao em tempo constante.
 * Tamanhos diferentes ainda executam uma comparacao de mesmo custo.
 */
export function secureCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    crypto.timingSafeEqual(bufA, bufA);
    return false;
  }

  return crypto.timingSafeEqual(bufA, bufB);
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

const authPluginImpl: FastifyPluginAsync<AuthPluginOptions> = async (app, opts) => {
  const apiToken = opts.apiToken ?? '';

  app.addHook('preHandler', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiToken || !request.url.startsWith('/api/')) {
      return;
    }

    const token = extractBearerToken(request.headers.authorization);

    if (!token) {
      return reply.code(401).send({
        error: 'Unauthorized',
        code: 'MISSING_TOKEN',
        message: 'Authorization header with Bearer token is required'
      });
    }

    if (!secureCompare(token, apiToken)) {
      return reply.code(401).send({
        error: 'Unauthorized',
        code: 'INVALID_TOKEN',
        message: 'Invalid API token'
      });
    }
  });
};

export const authPlugin = fp(authPluginImpl, {
  name: 'auth-plugin',
  fastify: '5.x'
});
