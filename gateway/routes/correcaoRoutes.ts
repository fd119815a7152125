/**
 * Rotas do fluxo de correcao: analise, propostas, aprovacao, aplicacao.
 */

import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { OrquestradorCorrecao } from '../../orquestrador/OrquestradorCorrecao';
import { Esquema } from '../../entidades/esquemas';
import { validarEntrada } from './respostas';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyInstance {
    orquestrador: OrquestradorCorrecao;
  }
}

interface IdParams {
  id: string;
}

interface IniciarAnaliseBody {
  ccoId: string;
  usuarioId: string;
}

interface AprovacaoBody {
  propostasIds: string[];
}

interface RejeicaoBody {
  motivo: string | null;
}

interface IpcaVigenteBody {
  usuarioId: string;
}

const iniciarAnaliseSchema: Esquema<IniciarAnaliseBody> = z.object({
  ccoId: z.string().min(1),
  usuarioId: z.string().min(1)
});

const aprovacaoSchema: Esquema<AprovacaoBody> = z.object({
  propostasIds: z.array(z.string().min(1))
});

const rejeicaoSchema: Esquema<RejeicaoBody> = z
  .object({ motivo: z.string().max(500).nullish() })
  .nullish()
  .transform((corpo): RejeicaoBody => ({ motivo: corpo?.motivo ?? null }));

const ipcaVigenteSchema: Esquema<IpcaVigenteBody> = z.object({
  usuarioId: z.string().min(1)
});

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const correcaoRoutes: FastifyPluginAsync = async (app) => {
  /**
   * POST /analises
   * Analisa a CCO e abre sessao em ANALYZING
   */
  app.post('/analises', async (request, reply) => {
    const corpo = validarEntrada(iniciarAnaliseSchema, request.body);
    if (!corpo.ok) {
      return reply.code(400).send(corpo.erro);
    }

    const resumo = await app.orquestrador.IniciarAnalise(corpo.valor.ccoId, corpo.valor.usuarioId);
    return reply.code(201).send(resumo);
  });

  /**
   * POST /sessoes/:id/propostas
   */
  app.post<{ Params: IdParams }>('/sessoes/:id/propostas', async (request) => {
    return app.orquestrador.GerarPropostas(request.params.id);
  });

  /**
   * POST /sessoes/:id/aprovacao
   * Retorna o preview final com o relatorio de validacao
   */
  app.post<{ Params: IdParams }>('/sessoes/:id/aprovacao', async (request, reply) => {
    const corpo = validarEntrada(aprovacaoSchema, request.body);
    if (!corpo.ok) {
      return reply.code(400).send(corpo.erro);
    }

    return app.orquestrador.AprovarCorrecoes(request.params.id, corpo.valor.propostasIds);
  });

  /**
   * POST /sessoes/:id/aplicacao
   */
  app.post<{ Params: IdParams }>('/sessoes/:id/aplicacao', async (request) => {
    return app.orquestrador.AplicarCorrecoes(request.params.id);
  });

  /**
   * POST /sessoes/:id/rejeicao
   */
  app.post<{ Params: IdParams }>('/sessoes/:id/rejeicao', async (request, reply) => {
    const corpo = validarEntrada(rejeicaoSchema, request.body);
    if (!corpo.ok) {
      return reply.code(400).send(corpo.erro);
    }

    return app.orquestrador.RejeitarSessao(request.params.id, corpo.valor.motivo);
  });

  /**
   * GET /sessoes/:id
   */
  app.get<{ Params: IdParams }>('/sessoes/:id', async (request) => {
    return app.orquestrador.ObterStatusSessao(request.params.id);
  });

  /**
   * POST /ccos/:id/ipca-vigente
   * Cria sessao em PREVIEW quando a correcao do ano corrente e devida
   */
  app.post<{ Params: IdParams }>('/ccos/:id/ipca-vigente', async (request, reply) => {
    const corpo = validarEntrada(ipcaVigenteSchema, request.body);
    if (!corpo.ok) {
      return reply.code(400).send(corpo.erro);
    }

    const avaliacao = await app.orquestrador.AvaliarIpcaAnoVigente(request.params.id, corpo.valor.usuarioId);
    return reply.code(avaliacao.aplicavel ? 201 : 200).send(avaliacao);
  });
};
