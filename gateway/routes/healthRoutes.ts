/**
 * Rotas de health check.
 */

import { FastifyPluginAsync } from 'fastify';
import { ContaCustoOleoRepository } from '../../repositorios/interfaces/ContaCustoOleoRepository';
import { TaxaRepository } from '../../repositorios/interfaces/TaxaRepository';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyInstance {
    ccoRepo: ContaCustoOleoRepository;
    taxaRepo: TaxaRepository;
  }
}

interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  uptime: number;
}

interface ReadinessResponse extends HealthResponse {
  dados: {
    carregados: boolean;
    ccos: number;
    taxas: number;
  };
}

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

const startTime = Date.now();

function carimbo(status: HealthResponse['status']): HealthResponse {
  return { status, timestamp: new Date().toISOString(), uptime: Date.now() - startTime };
}

export const healthRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /health
   * Liveness: sempre retorna 200 se o servidor esta rodando
   */
  app.get('/health', async (): Promise<HealthResponse> => {
    return carimbo('ok');
  });

  /**
   * GET /health/ready
   * Readiness: documentos de CCO e taxas legiveis
   */
  app.get('/health/ready', async (request, reply): Promise<ReadinessResponse> => {
    try {
      const [ccos, taxas] = await Promise.all([app.ccoRepo.listar(), app.taxaRepo.listar()]);

      return {
        ...carimbo('ok'),
        dados: {
          carregados: true,
          ccos: ccos.length,
          taxas: taxas.length
        }
      };
    } catch (error) {
      request.log.error({ err: error }, 'documentos de CCO ou taxas ilegiveis');
      reply.code(503);
      return {
        ...carimbo('error'),
        dados: {
          carregados: false,
          ccos: 0,
          taxas: 0
        }
      };
    }
  });
};
