/**
 * Rotas de promocao dos registros corrigidos.
 */

import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { PromocaoCorrecoes, FiltrosPromocao, LIMITE_HISTORICO } from '../../servicos/PromocaoCorrecoes';
import { StatusPromocao } from '../../entidades/tipos';
import { Esquema } from '../../entidades/esquemas';
import { validarEntrada } from './respostas';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyInstance {
    promocao: PromocaoCorrecoes;
  }
}

interface IdParams {
  id: string;
}

interface PromocaoBody {
  usuarioId: string;
  observacoes: string | null;
}

interface HistoricoQuery {
  limite: number;
}

const pesquisaSchema: Esquema<FiltrosPromocao> = z
  .object({
    id: z.string().min(1).optional(),
    contrato: z.string().min(1).optional(),
    campo: z.string().min(1).optional(),
    remessa: z.coerce.number().int().optional(),
    status: z.nativeEnum(StatusPromocao).optional()
  })
  .transform((query): FiltrosPromocao => {
    const filtros: FiltrosPromocao = {};
    if (query.id !== undefined) filtros.id = query.id;
    if (query.contrato !== undefined) filtros.contratoCpp = query.contrato;
    if (query.campo !== undefined) filtros.campo = query.campo;
    if (query.remessa !== undefined) filtros.remessa = query.remessa;
    if (query.status !== undefined) filtros.status = query.status;
    return filtros;
  });

const promocaoSchema: Esquema<PromocaoBody> = z
  .object({
    usuarioId: z.string().min(1),
    observacoes: z.string().max(500).nullish()
  })
  .transform((corpo): PromocaoBody => ({ usuarioId: corpo.usuarioId, observacoes: corpo.observacoes ?? null }));

const historicoSchema: Esquema<HistoricoQuery> = z.object({
  limite: z.coerce.number().int().min(1).max(500).default(LIMITE_HISTORICO)
});

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const promocaoRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /correcoes
   * Filtros: id, contrato, campo, remessa, status (default PENDENTE)
   */
  app.get('/correcoes', async (request, reply) => {
    const filtros = validarEntrada(pesquisaSchema, request.query);
    if (!filtros.ok) {
      return reply.code(400).send(filtros.erro);
    }
    return app.promocao.pesquisar(filtros.valor);
  });

  /**
   * GET /correcoes/:id
   * Registro, CCO de origem, sessao, linhas do tempo e validacao
   */
  app.get<{ Params: IdParams }>('/correcoes/:id', async (request) => {
    return app.promocao.detalhar(request.params.id);
  });

  /**
   * GET /correcoes/:id/validacao
   */
  app.get<{ Params: IdParams }>('/correcoes/:id/validacao', async (request) => {
    const detalhe = await app.promocao.detalhar(request.params.id);
    return detalhe.validacao;
  });

  /**
   * POST /correcoes/:id/promocao
   */
  app.post<{ Params: IdParams }>('/correcoes/:id/promocao', async (request, reply) => {
    const corpo = validarEntrada(promocaoSchema, request.body);
    if (!corpo.ok) {
      return reply.code(400).send(corpo.erro);
    }
    return app.promocao.promover(request.params.id, corpo.valor.usuarioId, corpo.valor.observacoes);
  });

  /**
   * GET /sessoes/:id/memoria-calculo
   */
  app.get<{ Params: IdParams }>('/sessoes/:id/memoria-calculo', async (request) => {
    return app.promocao.obterMemoriaCalculo(request.params.id);
  });

  app.get('/estatisticas', async () => {
    return app.promocao.obterEstatisticas();
  });

  /**
   * GET /historico
   * limite: 1..500 (default 50)
   */
  app.get('/historico', async (request, reply) => {
    const query = validarEntrada(historicoSchema, request.query);
    if (!query.ok) {
      return reply.code(400).send(query.erro);
    }
    return app.promocao.historico(query.valor.limite);
  });
};
