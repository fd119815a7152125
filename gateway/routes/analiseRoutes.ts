/**
 * Rotas de consulta: analise por CCO, analise do sistema e relatorios.
 * Somente leitura; nenhuma sessao e criada.
 */

import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AnalisadorGaps } from '../../servicos/AnalisadorGaps';
import {
  analisarImpactoFinanceiro,
  gerarRelatorioResumido,
  gerarRelatorioExecutivo,
  gerarRelatorioDetalhadoContrato
} from '../../servicos/RelatorioGaps';
import { FiltrosCco } from '../../repositorios/interfaces/ContaCustoOleoRepository';
import { ConfiguracaoCorrecao } from '../../entidades/tipos';
import { Esquema } from '../../entidades/esquemas';
import { Decimal } from '../../utilitarios/Decimal';
import { validarEntrada } from './respostas';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyInstance {
    analisador: AnalisadorGaps;
    configuracao: ConfiguracaoCorrecao;
    relogio: () => Date;
  }
}

interface IdParams {
  id: string;
}

interface ContratoParams {
  contrato: string;
}

interface ImpactoQuery extends FiltrosCco {
  taxa: Decimal | null;
}

const filtrosShape = {
  contrato: z.string().min(1).optional(),
  campo: z.string().min(1).optional(),
  anoReconhecimento: z.coerce.number().int().min(1900).max(2999).optional()
};

function paraFiltros(query: { contrato?: string; campo?: string; anoReconhecimento?: number }): FiltrosCco {
  const filtros: FiltrosCco = {};
  if (query.contrato !== undefined) filtros.contratoCpp = query.contrato;
  if (query.campo !== undefined) filtros.campo = query.campo;
  if (query.anoReconhecimento !== undefined) filtros.anoReconhecimento = query.anoReconhecimento;
  return filtros;
}

const filtrosSchema: Esquema<FiltrosCco> = z.object(filtrosShape).transform(paraFiltros);

const impactoSchema: Esquema<ImpactoQuery> = z
  .object({
    ...filtrosShape,
    taxa: z
      .string()
      .refine(valor => Decimal.isDecimalValido(valor), 'taxa deve ser decimal')
      .optional()
  })
  .transform((query): ImpactoQuery => ({
    ...paraFiltros(query),
    taxa: query.taxa !== undefined ? Decimal.parse(query.taxa) : null
  }));

const TEXTO = 'text/plain; charset=utf-8';

// ════════════════════════════════════════════════════════════════════════════
// PLUGIN
// ════════════════════════════════════════════════════════════════════════════

export const analiseRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /ccos/:id/analise
   */
  app.get<{ Params: IdParams }>('/ccos/:id/analise', async (request) => {
    return app.analisador.analisarPorId(request.params.id, app.relogio());
  });

  /**
   * GET /analises/gaps
   * Filtros: contrato, campo, anoReconhecimento
   */
  app.get('/analises/gaps', async (request, reply) => {
    const filtros = validarEntrada(filtrosSchema, request.query);
    if (!filtros.ok) {
      return reply.code(400).send(filtros.erro);
    }
    return app.analisador.analisarSistema(filtros.valor, app.relogio());
  });

  /**
   * GET /analises/impacto-financeiro
   * taxa: fracao decimal (default da configuracao)
   */
  app.get('/analises/impacto-financeiro', async (request, reply) => {
    const query = validarEntrada(impactoSchema, request.query);
    if (!query.ok) {
      return reply.code(400).send(query.erro);
    }

    const { taxa, ...filtros } = query.valor;
    const resultado = await app.analisador.analisarSistema(filtros, app.relogio());
    return analisarImpactoFinanceiro(resultado, taxa ?? app.configuracao.taxaEstimadaImpacto);
  });

  /**
   * GET /analises/relatorio-resumido
   */
  app.get('/analises/relatorio-resumido', async (request, reply) => {
    const filtros = validarEntrada(filtrosSchema, request.query);
    if (!filtros.ok) {
      return reply.code(400).send(filtros.erro);
    }

    const resultado = await app.analisador.analisarSistema(filtros.valor, app.relogio());
    return reply.type(TEXTO).send(gerarRelatorioResumido(resultado));
  });

  /**
   * GET /analises/relatorio-executivo
   */
  app.get('/analises/relatorio-executivo', async (request, reply) => {
    const filtros = validarEntrada(filtrosSchema, request.query);
    if (!filtros.ok) {
      return reply.code(400).send(filtros.erro);
    }

    const resultado = await app.analisador.analisarSistema(filtros.valor, app.relogio());
    const relatorio = gerarRelatorioExecutivo(resultado, app.configuracao.taxaEstimadaImpacto);
    return reply.type(TEXTO).send(relatorio);
  });

  /**
   * GET /analises/contratos/:contrato/relatorio
   */
  app.get<{ Params: ContratoParams }>('/analises/contratos/:contrato/relatorio', async (request, reply) => {
    const { contrato } = request.params;
    const analises = await app.analisador.analisarContrato(contrato, app.relogio());
    return reply.type(TEXTO).send(gerarRelatorioDetalhadoContrato(contrato, analises));
  });
};
