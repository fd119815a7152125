/**
 * Plugin Fastify de rastreamento de requisicoes.
 *
 * Cada requisicao recebe um requestId (X-Request-Id do cliente, saneado,
 * ou UUID novo), devolvido no header de resposta. Ao concluir, grava uma
 * linha com rota, status, duracao e os ids de sessao/CCO da URL.
 */

import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import * as crypto from 'crypto';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    requestStartTime: number;
  }
}

type NivelRequisicao = 'info' | 'debug' | 'trace';

export interface RequestIdPluginOptions {
  /**
   * Grava a linha de requisicao concluida (default: true)
   */
  logMetrics?: boolean;

  /**
   * Nivel das requisicoes bem-sucedidas (default: 'info').
   * 4xx sai em warn e 5xx em error.
   */
  logLevel?: NivelRequisicao;
}

interface LinhaRequisicao {
  requestId: string;
  method: string;
  route: string;
  statusCode: number;
  latencyMs: number;
  sessaoId?: string;
  ccoId?: string;
  ccoCorrigidaId?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

const TAMANHO_MAXIMO_ID = 64;

function extractOrGenerateRequestId(request: FastifyRequest): string {
  const headerValue = request.headers['x-request-id'];

  if (typeof headerValue === 'string') {
    const sanitized = headerValue.replace(/[^a-zA-Z0-9\-_]/g, '').slice(0, TAMANHO_MAXIMO_ID);
    if (sanitized.length > 0) {
      return sanitized;
    }
  }

  return crypto.randomUUID();
}

/**
 * Le o parametro :id da rota conforme o recurso: /sessoes/:id, /ccos/:id
 * ou /correcoes/:id (registro corrigido).
 */
function idsDaRota(request: FastifyRequest): Pick<LinhaRequisicao, 'sessaoId' | 'ccoId' | 'ccoCorrigidaId'> {
  const rota = request.routeOptions.url ?? '';
  const params = request.params;
  if (typeof params !== 'object' || params === null || !('id' in params) || typeof params.id !== 'string') {
    return {};
  }
  if (rota.includes('/sessoes/:id')) {
    return { sessaoId: params.id };
  }
  if (rota.includes('/ccos/:id')) {
    return { ccoId: params.id };
  }
  if (rota.includes('/correcoes/:id')) {
    return { ccoCorrigidaId: params.id };
  }
  return {};
}

function registrar(request: FastifyRequest, linha: LinhaRequisicao, nivel: NivelRequisicao): void {
  if (linha.statusCode >= 500) {
    request.log.error(linha, 'requisicao concluida');
  } else if (linha.statusCode >= 400) {
    request.log.warn(linha, 'requisicao concluida');
  } else {
    request.log[nivel](linha, 'requisicao concluida');
  }
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

const requestIdPluginImpl: FastifyPluginAsync<RequestIdPluginOptions> = async (app, opts) => {
  const logMetrics = opts.logMetrics !== false;
  const nivel = opts.logLevel ?? 'info';

  app.decorateRequest('requestId', '');
  app.decorateRequest('requestStartTime', 0);

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    request.requestStartTime = Date.now();
    request.requestId = extractOrGenerateRequestId(request);
    reply.header('X-Request-Id', request.requestId);
  });

  if (!logMetrics) {
    return;
  }

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    registrar(
      request,
      {
        requestId: request.requestId,
        method: request.method,
        route: request.routeOptions.url ?? request.url,
        statusCode: reply.statusCode,
        latencyMs: Date.now() - request.requestStartTime,
        ...idsDaRota(request)
      },
      nivel
    );
  });
};

export const requestIdPlugin = fp(requestIdPluginImpl, {
  name: 'request-id-plugin',
  fastify: '5.x'
});
