/**
 * Reconstrução da lista de correções de uma CCO.
 *
 * Funções puras: recebem listas e devolvem novas listas,
 * sem tocar no documento de origem.
 */

import {
  ContaCustoOleo,
  CorrecaoMonetaria,
  TipoCorrecaoMonetaria,
  TipoIndice,
  ValoresLancamento,
  ehTipoIndice
} from '../entidades/tipos';
import { Decimal } from '../utilitarios/Decimal';
import { PeriodoMensal, periodoDe, mesmoPeriodo, formatarPeriodo } from '../utilitarios/Periodo';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface InsercaoCorrecao {
  propostaId: string;
  correcao: CorrecaoMonetaria;
}

/**
 * Substitui os valores da correção de índice do período.
 */
interface AtualizacaoCorrecao {
  propostaId: string;
  periodo: PeriodoMensal;
  valorReconhecidoComOH: Decimal;
  valorReconhecidoComOhOriginal: Decimal;
  diferencaValor: Decimal;
  observacao: string;
  dataAtualizacao: Date;
}

interface ConflitoMesclagem {
  propostaId: string;
  /** "MM/YYYY" */
  periodo: string;
  motivo: string;
}

interface ResultadoMesclagem {
  correcoes: CorrecaoMonetaria[];
  conflitos: ConflitoMesclagem[];
}

// ════════════════════════════════════════════════════════════════════════
// MESCLAGEM
// ════════════════════════════════════════════════════════════════════════

function indiceDoPeriodo(correcoes: readonly CorrecaoMonetaria[], periodo: PeriodoMensal): number {
  return correcoes.findIndex(
    c => ehTipoIndice(c.tipo) && mesmoPeriodo(periodoDe(c.dataCorrecao), periodo)
  );
}

/**
 * Mescla originais, atualizações e inserções em ordem cronológica.
 *
 * - Atualização sem correção de índice no período vira conflito.
 * - Inserção de índice num período que já tem correção de índice vira conflito.
 * - Ordenação estável: empates de data mantêm a ordem de chegada.
 */
function mesclarCorrecoes(
  originais: readonly CorrecaoMonetaria[],
  insercoes: readonly InsercaoCorrecao[],
  atualizacoes: readonly AtualizacaoCorrecao[]
): ResultadoMesclagem {
  const correcoes = [...originais];
  const conflitos: ConflitoMesclagem[] = [];

  for (const atualizacao of atualizacoes) {
    const indice = indiceDoPeriodo(correcoes, atualizacao.periodo);
    if (indice < 0) {
      conflitos.push({
        propostaId: atualizacao.propostaId,
        periodo: formatarPeriodo(atualizacao.periodo),
        motivo: 'Nenhuma correção de índice no período para atualizar'
      });
      continue;
    }
    correcoes[indice] = {
      ...correcoes[indice],
      valorReconhecidoComOH: atualizacao.valorReconhecidoComOH,
      valorReconhecidoComOhOriginal: atualizacao.valorReconhecidoComOhOriginal,
      diferencaValor: atualizacao.diferencaValor,
      observacao: atualizacao.observacao,
      dataCriacaoCorrecao: atualizacao.dataAtualizacao
    };
  }

  for (const insercao of insercoes) {
    const nova = insercao.correcao;
    if (ehTipoIndice(nova.tipo)) {
      const periodo = periodoDe(nova.dataCorrecao);
      if (indiceDoPeriodo(correcoes, periodo) >= 0) {
        conflitos.push({
          propostaId: insercao.propostaId,
          periodo: formatarPeriodo(periodo),
          motivo: 'Já existe correção de índice no período'
        });
        continue;
      }
    }
    correcoes.push(nova);
  }

  correcoes.sort((a, b) => a.dataCorrecao.getTime() - b.dataCorrecao.getTime());

  return { correcoes, conflitos };
}

// ════════════════════════════════════════════════════════════════════════
// ACUMULADOS
// ════════════════════════════════════════════════════════════════════════

interface EstadoAcumulado {
  igpmAcumulado: Decimal;
  igpmAcumuladoReais: Decimal;
  valorLancamentoTotal: Decimal;
  valorNaoReconhecido: Decimal;
  valorReconhecivel: Decimal;
  valorNaoPassivelRecuperacao: Decimal;
}

/**
 * Recalcula, em sequência, os acumulados das correções de índice.
 * A primeira semeia o estado com a própria taxa/diferença e os próprios
 * valores base × taxa; as seguintes multiplicam o estado pela sua taxa e
 * somam sua diferença em igpmAcumuladoReais.
 */
function recalcularAcumulados(correcoes: readonly CorrecaoMonetaria[]): CorrecaoMonetaria[] {
  let estado: EstadoAcumulado | null = null;

  return correcoes.map(c => {
    if (!ehTipoIndice(c.tipo)) {
      return c;
    }

    const taxa = c.taxaCorrecao;
    const novo: EstadoAcumulado = estado === null
      ? {
          igpmAcumulado: taxa,
          igpmAcumuladoReais: c.diferencaValor,
          valorLancamentoTotal: c.valorLancamentoTotal.times(taxa),
          valorNaoReconhecido: c.valorNaoReconhecido.times(taxa),
          valorReconhecivel: c.valorReconhecivel.times(taxa),
          valorNaoPassivelRecuperacao: c.valorNaoPassivelRecuperacao.times(taxa)
        }
      : {
          igpmAcumulado: estado.igpmAcumulado.times(taxa),
          igpmAcumuladoReais: estado.igpmAcumuladoReais.plus(c.diferencaValor),
          valorLancamentoTotal: estado.valorLancamentoTotal.times(taxa),
          valorNaoReconhecido: estado.valorNaoReconhecido.times(taxa),
          valorReconhecivel: estado.valorReconhecivel.times(taxa),
          valorNaoPassivelRecuperacao: estado.valorNaoPassivelRecuperacao.times(taxa)
        };

    estado = novo;
    return { ...c, ...novo };
  });
}

// ════════════════════════════════════════════════════════════════════════
// CONSTRUÇÃO DE ENTRADAS
// ════════════════════════════════════════════════════════════════════════

function copiarValores(origem: ValoresLancamento): ValoresLancamento {
  return {
    valorLancamentoTotal: origem.valorLancamentoTotal,
    valorNaoReconhecido: origem.valorNaoReconhecido,
    valorReconhecivel: origem.valorReconhecivel,
    valorNaoPassivelRecuperacao: origem.valorNaoPassivelRecuperacao,
    valorReconhecido: origem.valorReconhecido,
    valorReconhecidoComOH: origem.valorReconhecidoComOH,
    overHeadExploracao: origem.overHeadExploracao,
    overHeadProducao: origem.overHeadProducao,
    overHeadTotal: origem.overHeadTotal,
    valorReconhecidoExploracao: origem.valorReconhecidoExploracao,
    valorReconhecidoProducao: origem.valorReconhecidoProducao,
    valorRecuperado: origem.valorRecuperado,
    quantidadeLancamento: origem.quantidadeLancamento
  };
}

interface DadosNovaCorrecaoIndice {
  tipo?: TipoIndice;
  subTipo: string;
  dataCorrecao: Date;
  valorAnterior: Decimal;
  valorNovo: Decimal;
  taxa: Decimal;
  observacao: string;
  criadaEm: Date;
}

/**
 * Nova correção de índice com os valores de lançamento da raiz da CCO.
 */
function novaCorrecaoIndice(cco: ContaCustoOleo, dados: DadosNovaCorrecaoIndice): CorrecaoMonetaria {
  return {
    ...copiarValores(cco),
    tipo: dados.tipo ?? TipoCorrecaoMonetaria.IPCA,
    subTipo: dados.subTipo,
    dataCorrecao: dados.dataCorrecao,
    dataCriacaoCorrecao: dados.criadaEm,
    contrato: cco.contratoCpp,
    campo: cco.campo,
    faseRemessa: cco.faseRemessa,
    valorReconhecidoComOH: dados.valorNovo,
    valorReconhecidoComOhOriginal: dados.valorAnterior,
    diferencaValor: dados.valorNovo.minus(dados.valorAnterior),
    taxaCorrecao: dados.taxa,
    valorRecuperadoTotal: Decimal.ZERO,
    igpmAcumulado: Decimal.ZERO,
    igpmAcumuladoReais: Decimal.ZERO,
    ativo: true,
    transferencia: false,
    observacao: dados.observacao
  };
}

/**
 * Retificação de compensação: parte do valor corrente e soma o ajuste.
 * Valores de lançamento vêm da última correção, ou da raiz.
 */
function novaCorrecaoCompensacao(
  cco: ContaCustoOleo,
  correcoes: readonly CorrecaoMonetaria[],
  ajuste: Decimal,
  data: Date,
  observacao: string
): CorrecaoMonetaria {
  const ultima = correcoes.length > 0 ? correcoes[correcoes.length - 1] : null;
  const valorAnterior = ultima ? ultima.valorReconhecidoComOH : cco.valorReconhecidoComOH;
  const valorNovo = valorAnterior.plus(ajuste);

  return {
    ...copiarValores(ultima ?? cco),
    tipo: TipoCorrecaoMonetaria.RETIFICACAO,
    subTipo: 'COMPENSACAO',
    dataCorrecao: data,
    dataCriacaoCorrecao: data,
    contrato: cco.contratoCpp,
    campo: cco.campo,
    faseRemessa: cco.faseRemessa,
    valorReconhecidoComOH: valorNovo,
    valorReconhecidoComOhOriginal: valorAnterior,
    diferencaValor: ajuste,
    taxaCorrecao: Decimal.UM,
    valorRecuperadoTotal: ultima ? ultima.valorRecuperadoTotal : Decimal.ZERO,
    igpmAcumulado: Decimal.ZERO,
    igpmAcumuladoReais: Decimal.ZERO,
    ativo: true,
    transferencia: false,
    observacao
  };
}

export {
  mesclarCorrecoes,
  recalcularAcumulados,
  novaCorrecaoIndice,
  novaCorrecaoCompensacao
};
export type {
  InsercaoCorrecao,
  AtualizacaoCorrecao,
  ConflitoMesclagem,
  ResultadoMesclagem,
  DadosNovaCorrecaoIndice
};
