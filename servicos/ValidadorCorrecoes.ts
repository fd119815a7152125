/**
 * Relatório de validação pré-aplicação.
 *
 * Informativo: erros e avisos ficam registrados na sessão,
 * mas não impedem a aplicação.
 */

import {
  PropostaCorrecao,
  TipoProposta,
  AvisoValidacao,
  RelatorioValidacao
} from '../entidades/tipos';
import { Decimal } from '../utilitarios/Decimal';
import { chavePeriodo, formatarDataBr, periodoDe } from '../utilitarios/Periodo';

const TAXA_MINIMA = Decimal.parse('0.5');
const TAXA_MAXIMA = Decimal.parse('2.0');

const CODIGO_VALIDACAO = {
  SOBREPOSICAO_TEMPORAL: 'SOBREPOSICAO_TEMPORAL',
  VALOR_NEGATIVO: 'VALOR_NEGATIVO',
  VALOR_ZERO: 'VALOR_ZERO',
  TAXA_FORA_INTERVALO: 'TAXA_FORA_INTERVALO',
  TAXA_NEUTRA: 'TAXA_NEUTRA',
  PROPOSTA_NAO_RESOLVIVEL: 'PROPOSTA_NAO_RESOLVIVEL'
} as const;

/** Propostas auxiliares: sem valor monetário próprio a validar */
const TIPOS_SEM_VALOR = new Set<TipoProposta>([
  TipoProposta.REACTIVATION,
  TipoProposta.DUPLICATA_REMOVAL,
  TipoProposta.DUPLICATA_ADJUSTMENT,
  TipoProposta.CORRECTION_DATE_CHANGE
]);

const TIPOS_SEM_DATA = new Set<TipoProposta>([
  TipoProposta.REACTIVATION,
  TipoProposta.CORRECTION_DATE_CHANGE
]);

const TIPOS_INDICE = new Set<TipoProposta>([
  TipoProposta.IPCA_ADDITION,
  TipoProposta.IPCA_UPDATE
]);

function verificarSobreposicao(propostas: readonly PropostaCorrecao[]): AvisoValidacao[] {
  const datadas = propostas
    .filter(p => !TIPOS_SEM_DATA.has(p.tipo))
    .sort((a, b) => a.dataAlvo.getTime() - b.dataAlvo.getTime());

  const avisos: AvisoValidacao[] = [];
  for (let i = 1; i < datadas.length; i++) {
    const anterior = datadas[i - 1];
    const atual = datadas[i];
    if (chavePeriodo(periodoDe(anterior.dataAlvo)) === chavePeriodo(periodoDe(atual.dataAlvo))) {
      avisos.push({
        codigo: CODIGO_VALIDACAO.SOBREPOSICAO_TEMPORAL,
        mensagem: `Propostas ${anterior.tipo} e ${atual.tipo} no mesmo mês (${formatarDataBr(atual.dataAlvo)})`
      });
    }
  }
  return avisos;
}

function validarPropostas(propostas: readonly PropostaCorrecao[]): RelatorioValidacao {
  const erros: AvisoValidacao[] = [];
  const avisos: AvisoValidacao[] = verificarSobreposicao(propostas);

  for (const p of propostas) {
    if (!p.resolvivel) {
      erros.push({
        codigo: CODIGO_VALIDACAO.PROPOSTA_NAO_RESOLVIVEL,
        mensagem: `Proposta ${p.tipo} ${p.periodoAlvo} sem cálculo: ${p.erro ?? 'motivo desconhecido'}`
      });
      continue;
    }

    if (!TIPOS_SEM_VALOR.has(p.tipo)) {
      if (p.valorProposto.isNegative()) {
        erros.push({
          codigo: CODIGO_VALIDACAO.VALOR_NEGATIVO,
          mensagem: `Proposta ${p.tipo} ${p.periodoAlvo} com valor negativo: ${p.valorProposto.toFixed(2)}`
        });
      } else if (p.valorProposto.isZero()) {
        avisos.push({
          codigo: CODIGO_VALIDACAO.VALOR_ZERO,
          mensagem: `Proposta ${p.tipo} ${p.periodoAlvo} com valor zero`
        });
      }
    }

    if (!p.taxaAplicada.isZero() && (p.taxaAplicada.lt(TAXA_MINIMA) || p.taxaAplicada.gt(TAXA_MAXIMA))) {
      avisos.push({
        codigo: CODIGO_VALIDACAO.TAXA_FORA_INTERVALO,
        mensagem: `Proposta ${p.tipo} ${p.periodoAlvo} com taxa ${p.taxaAplicada.toString()} fora de [0.5, 2.0]`
      });
    }

    if (TIPOS_INDICE.has(p.tipo) && p.taxaAplicada.eq(Decimal.UM)) {
      avisos.push({
        codigo: CODIGO_VALIDACAO.TAXA_NEUTRA,
        mensagem: `Proposta ${p.tipo} ${p.periodoAlvo} com taxa 1.0 (sem correção efetiva)`
      });
    }
  }

  return { valido: erros.length === 0, erros, avisos };
}

export { validarPropostas, CODIGO_VALIDACAO };
