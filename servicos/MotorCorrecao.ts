/**
 * Motor de correção IPCA/IGPM.
 *
 * Transforma os achados do AnalisadorGaps em propostas de correção por cenário
 * e aplica o subconjunto aprovado, gravando um novo registro corrigido.
 *
 * PRINCÍPIOS:
 * - Taxa ausente não aborta o lote: a proposta sai marcada como não resolvível
 * - O registro de origem nunca é alterado
 * - Toda reconstrução termina com os acumulados recalculados
 */

import * as crypto from 'crypto';
import {
  ContaCustoOleo,
  CorrecaoMonetaria,
  TipoCorrecaoMonetaria,
  CenarioCorrecao,
  TipoProposta,
  Gap,
  CorrecaoForaPeriodo,
  Duplicata,
  PropostaCorrecao,
  PassoCascata,
  ConfiguracaoCorrecao,
  ehTipoIndice
} from '../entidades/tipos';
import { TaxaRepository } from '../repositorios/interfaces/TaxaRepository';
import { ContaCustoOleoRepository } from '../repositorios/interfaces/ContaCustoOleoRepository';
import { Decimal } from '../utilitarios/Decimal';
import { Resultado, sucesso, falha } from '../utilitarios/Resultado';
import { Logger } from '../utilitarios/Logger';
import { formatarMoeda } from '../utilitarios/Formatacao';
import {
  PeriodoMensal,
  dataUtc,
  periodoDe,
  compararPeriodos,
  mesmoPeriodo,
  formatarPeriodo,
  formatarDataBr,
  calcularPrimeiroAniversario,
  calcularPeriodoTaxa
} from '../utilitarios/Periodo';
import { obterTaxa } from './taxas';
import { valorAtualCco } from './AnalisadorGaps';
import { calcularEfeitoCascata, etapasDeCorrecoes, ordenarEtapas } from './cascata';
import {
  mesclarCorrecoes,
  recalcularAcumulados,
  novaCorrecaoIndice,
  novaCorrecaoCompensacao,
  InsercaoCorrecao,
  AtualizacaoCorrecao,
  ConflitoMesclagem
} from './reconstrucao';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface MotorCorrecaoContext {
  taxaRepo: TaxaRepository;
  ccoRepo: ContaCustoOleoRepository;
  logger: Logger;
  configuracao: Pick<ConfiguracaoCorrecao, 'offsetMesTaxa'>;
  /** Gerador de ids de proposta (default: UUID v4) */
  gerarId?: () => string;
}

/**
 * Achados da análise que alimentam o cálculo.
 */
interface AchadosAnalise {
  gaps: Gap[];
  correcoesForaPeriodo: CorrecaoForaPeriodo[];
  duplicatas: Duplicata[];
}

type DadosProposta =
  Pick<PropostaCorrecao, 'tipo' | 'cenario' | 'dataAlvo' | 'periodoAlvo' | 'valorAtual' | 'valorProposto' | 'descricao'> &
  Partial<Omit<PropostaCorrecao, 'id'>>;

interface PropostaDeGap {
  gap: Gap;
  proposta: PropostaCorrecao;
}

/**
 * Correção posterior a recalcular no Cenário 1.
 */
interface CandidataAtualizacao {
  periodo: PeriodoMensal;
  data: Date;
  base: Decimal;
  valorAntigo: Decimal;
  taxa: Decimal;
}

/**
 * Resultado da avaliação do IPCA do ano vigente.
 */
interface AvaliacaoIpcaVigente {
  base: ContaCustoOleo;
  periodo: PeriodoMensal;
  propostas: PropostaCorrecao[];
}

// ════════════════════════════════════════════════════════════════════════
// REGRAS
// ════════════════════════════════════════════════════════════════════════

const REGRA = {
  ANIVERSARIO: 'ANIVERSARIO_MES_SEGUINTE_RECONHECIMENTO',
  TAXA_DESLOCADA: 'TAXA_PERIODO_DESLOCADO',
  BASE_ENCADEADA: 'BASE_ENCADEADA_GAP_ANTERIOR',
  RECALCULO_POSTERIOR: 'RECALCULO_CORRECAO_POSTERIOR',
  CASCATA: 'EFEITO_CASCATA',
  COMPENSACAO_RECUPERACAO: 'COMPENSACAO_POS_RECUPERACAO',
  REATIVACAO: 'REATIVACAO_SALDO',
  REMOCAO_DUPLICATA: 'REMOCAO_DUPLICATA',
  AJUSTE_DUPLICATA: 'AJUSTE_CONSOLIDADO_DUPLICATAS',
  ORDEM_CRONOLOGICA: 'PRESERVAR_ORDEM_CRONOLOGICA',
  IPCA_VIGENTE: 'IPCA_ANO_VIGENTE'
} as const;

const SUBTIPO_RETIFICACAO = 'RETIFICACAO';
const SUBTIPO_VIGENTE = 'VIGENTE';

/** Dia do mês em que a correção de um aniversário é lançada */
const DIA_LANCAMENTO = 16;

function somaImpactos(propostas: readonly PropostaCorrecao[]): Decimal {
  return Decimal.soma(propostas.map(p => p.impacto));
}

/**
 * A entrada ainda é a retificação de onde a mudança de data foi proposta.
 */
function retificacaoDaProposta(correcao: CorrecaoMonetaria, proposta: PropostaCorrecao): boolean {
  return (
    correcao.tipo === TipoCorrecaoMonetaria.RETIFICACAO &&
    proposta.dataOrigem !== null &&
    correcao.dataCorrecao.getTime() === proposta.dataOrigem.getTime() &&
    correcao.valorReconhecidoComOH.eq(proposta.valorAtual)
  );
}

function ultimoIndiceRestante(total: number, removidos: ReadonlySet<number>): number {
  for (let i = total - 1; i >= 0; i--) {
    if (!removidos.has(i)) {
      return i;
    }
  }
  return -1;
}

function inicioDoMes(periodo: PeriodoMensal): Date {
  return dataUtc(periodo.ano, periodo.mes, 1);
}

function aprovadasDoTipo(propostas: readonly PropostaCorrecao[], tipo: TipoProposta): PropostaCorrecao[] {
  return propostas.filter(p => p.tipo === tipo);
}

// ════════════════════════════════════════════════════════════════════════
// MOTOR
// ════════════════════════════════════════════════════════════════════════

class MotorCorrecao {
  private taxaRepo: TaxaRepository;
  private ccoRepo: ContaCustoOleoRepository;
  private logger: Logger;
  private offsetMesTaxa: number;
  private gerarId: () => string;

  constructor(context: MotorCorrecaoContext) {
    this.taxaRepo = context.taxaRepo;
    this.ccoRepo = context.ccoRepo;
    this.logger = context.logger.child({ componente: 'MotorCorrecao' });
    this.offsetMesTaxa = context.configuracao.offsetMesTaxa;
    this.gerarId = context.gerarId ?? (() => crypto.randomUUID());
  }

  private proposta(dados: DadosProposta): PropostaCorrecao {
    return {
      id: this.gerarId(),
      impacto: dados.valorProposto.minus(dados.valorAtual),
      valorBase: null,
      taxaAplicada: Decimal.ZERO,
      periodoTaxaReferencia: 'N/A',
      dependencias: [],
      regrasAplicadas: [],
      resolvivel: true,
      erro: null,
      indiceRemover: null,
      dataOrigem: null,
      passosCascata: [],
      ...dados
    };
  }

  // ══════════════════════════════════════════════════════════════════════
  // DESPACHO
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Calcula as propostas do cenário.
   * Cenários sem algoritmo automático retornam falha.
   */
  async calcularPropostas(
    cenario: CenarioCorrecao,
    cco: ContaCustoOleo,
    achados: AchadosAnalise,
    agora: Date
  ): Promise<Resultado<PropostaCorrecao[], string>> {
    switch (cenario) {
      case CenarioCorrecao.CENARIO_0:
        return sucesso(await this.calcularCenario0(cco, achados.gaps));
      case CenarioCorrecao.CENARIO_1:
        return sucesso(await this.calcularCenario1(cco, achados.gaps, achados.correcoesForaPeriodo));
      case CenarioCorrecao.CENARIO_2:
        return sucesso(await this.calcularCenario2(cco, achados.gaps, agora));
      case CenarioCorrecao.CENARIO_DUPLICATAS:
        return sucesso(this.calcularDuplicatas(cco, achados.duplicatas, agora));
      default:
        return falha(`Cenário ${cenario} não possui cálculo automático`);
    }
  }

  // ══════════════════════════════════════════════════════════════════════
  // CENÁRIO 0: GAP SIMPLES
  // ══════════════════════════════════════════════════════════════════════

  async calcularCenario0(
    cco: ContaCustoOleo,
    gaps: readonly Gap[],
    cenario: CenarioCorrecao = CenarioCorrecao.CENARIO_0
  ): Promise<PropostaCorrecao[]> {
    const calculadas = await this.calcularGaps(cco, gaps, cenario);
    return calculadas.map(c => c.proposta);
  }

  /**
   * Gaps em ordem cronológica. A base de cada gap é o valor corrigido do gap
   * anterior resolvido, ou a base do próprio gap.
   */
  private async calcularGaps(
    cco: ContaCustoOleo,
    gaps: readonly Gap[],
    cenario: CenarioCorrecao
  ): Promise<PropostaDeGap[]> {
    const ordenados = [...gaps].sort((a, b) => compararPeriodos(a, b));
    const resultado: PropostaDeGap[] = [];
    let anterior: PropostaCorrecao | null = null;

    for (const gap of ordenados) {
      const encadeada: boolean = anterior !== null && anterior.resolvivel;
      const base: Decimal = anterior !== null && anterior.resolvivel ? anterior.valorProposto : gap.valorBase;

      if (base.lte(0)) {
        this.logger.debug({ ccoId: cco.id, gap: gap.dataAniversario }, 'Gap ignorado: base não positiva');
        continue;
      }

      const dataAlvo = dataUtc(gap.ano, gap.mes, DIA_LANCAMENTO);
      const taxa = await obterTaxa(this.taxaRepo, { ano: gap.anoTaxa, mes: gap.mesTaxa }, TipoCorrecaoMonetaria.IPCA);
      const regras: string[] = [REGRA.ANIVERSARIO, REGRA.TAXA_DESLOCADA];
      const dependencias: string[] = [];
      if (encadeada && anterior !== null) {
        regras.push(REGRA.BASE_ENCADEADA);
        dependencias.push(anterior.id);
      }

      let proposta: PropostaCorrecao;
      if (!taxa.ok) {
        this.logger.warn({ ccoId: cco.id, gap: gap.dataAniversario, periodoTaxa: gap.periodoTaxa }, taxa.erro.mensagem);
        proposta = this.proposta({
          tipo: TipoProposta.IPCA_ADDITION,
          cenario,
          dataAlvo,
          periodoAlvo: gap.dataAniversario,
          valorAtual: base,
          valorProposto: base,
          valorBase: base,
          periodoTaxaReferencia: gap.periodoTaxa,
          descricao: `Correção IPCA ${gap.dataAniversario} não calculada: taxa indisponível`,
          dependencias,
          regrasAplicadas: regras,
          resolvivel: false,
          erro: taxa.erro.mensagem
        });
      } else {
        const corrigido = base.times(taxa.valor);
        proposta = this.proposta({
          tipo: TipoProposta.IPCA_ADDITION,
          cenario,
          dataAlvo,
          periodoAlvo: gap.dataAniversario,
          valorAtual: base,
          valorProposto: corrigido,
          valorBase: base,
          taxaAplicada: taxa.valor,
          periodoTaxaReferencia: gap.periodoTaxa,
          descricao:
            `Correção IPCA do aniversário ${gap.dataAniversario} com taxa de ${gap.periodoTaxa} ` +
            `sobre ${formatarMoeda(base)}`,
          dependencias,
          regrasAplicadas: regras
        });
      }

      resultado.push({ gap, proposta });
      anterior = proposta;
    }

    return resultado;
  }

  // ══════════════════════════════════════════════════════════════════════
  // CENÁRIO 1: GAP + CORREÇÃO POSTERIOR
  // ══════════════════════════════════════════════════════════════════════

  async calcularCenario1(
    cco: ContaCustoOleo,
    gaps: readonly Gap[],
    foraPeriodo: readonly CorrecaoForaPeriodo[]
  ): Promise<PropostaCorrecao[]> {
    const calculadas = await this.calcularGaps(cco, gaps, CenarioCorrecao.CENARIO_1);
    const propostas = calculadas.map(c => c.proposta);
    const resolvidas = calculadas.filter(c => c.proposta.resolvivel);

    if (resolvidas.length === 0) {
      return propostas;
    }

    const inicio = inicioDoMes(resolvidas[0].gap);
    const candidatas = this.candidatasAtualizacao(cco.correcoesMonetarias, foraPeriodo, inicio);

    for (const candidata of candidatas) {
      const anteriores = resolvidas.filter(c => inicioDoMes(c.gap) < inicioDoMes(candidata.periodo));
      if (anteriores.length === 0) {
        continue;
      }

      const baseCorreta = candidata.base.plus(somaImpactos(anteriores.map(c => c.proposta)));
      const novoValor = baseCorreta.times(candidata.taxa);
      const periodo = formatarPeriodo(candidata.periodo);

      propostas.push(this.proposta({
        tipo: TipoProposta.IPCA_UPDATE,
        cenario: CenarioCorrecao.CENARIO_1,
        dataAlvo: candidata.data,
        periodoAlvo: periodo,
        valorAtual: candidata.valorAntigo,
        valorProposto: novoValor,
        valorBase: baseCorreta,
        taxaAplicada: candidata.taxa,
        descricao:
          `Recalcular correção de ${periodo}: base ${formatarMoeda(candidata.base)} → ` +
          `${formatarMoeda(baseCorreta)} pelos gaps anteriores`,
        dependencias: anteriores.map(c => c.proposta.id),
        regrasAplicadas: [REGRA.RECALCULO_POSTERIOR]
      }));
    }

    return propostas;
  }

  /**
   * Correções de índice da CCO depois de `inicio`, mais as fora do período
   * de meses ainda não cobertos, em ordem de data.
   */
  private candidatasAtualizacao(
    correcoes: readonly CorrecaoMonetaria[],
    foraPeriodo: readonly CorrecaoForaPeriodo[],
    inicio: Date
  ): CandidataAtualizacao[] {
    const candidatas: CandidataAtualizacao[] = [];

    for (const c of correcoes) {
      if (!ehTipoIndice(c.tipo) || c.dataCorrecao <= inicio) continue;
      candidatas.push({
        periodo: periodoDe(c.dataCorrecao),
        data: c.dataCorrecao,
        base: c.valorReconhecidoComOhOriginal,
        valorAntigo: c.valorReconhecidoComOH,
        taxa: c.taxaCorrecao
      });
    }

    for (const fora of foraPeriodo) {
      const periodo = { ano: fora.anoAplicado, mes: fora.mesAplicado };
      if (candidatas.some(c => mesmoPeriodo(c.periodo, periodo))) continue;
      candidatas.push({
        periodo,
        data: fora.dataAplicacao,
        base: fora.valorBaseNaAplicacao,
        valorAntigo: fora.valorBaseNaAplicacao.times(fora.taxaAplicada),
        taxa: fora.taxaAplicada
      });
    }

    return candidatas.sort((a, b) => a.data.getTime() - b.data.getTime());
  }

  // ══════════════════════════════════════════════════════════════════════
  // CENÁRIO 2: GAP + RECUPERAÇÃO
  // ══════════════════════════════════════════════════════════════════════

  async calcularCenario2(cco: ContaCustoOleo, gaps: readonly Gap[], agora: Date): Promise<PropostaCorrecao[]> {
    const calculadas = await this.calcularGaps(cco, gaps, CenarioCorrecao.CENARIO_2);
    const propostas = calculadas.map(c => c.proposta);
    const correcoes = cco.correcoesMonetarias;

    const recuperacoes = correcoes.filter(c => c.tipo === TipoCorrecaoMonetaria.RECUPERACAO);
    let compensacao: PropostaCorrecao | null = null;

    if (recuperacoes.length > 0) {
      const ultimaRecuperacao = recuperacoes.reduce((a, b) => (b.dataCorrecao > a.dataCorrecao ? b : a));
      const gapsAntes = calculadas.filter(
        c => c.proposta.resolvivel &&
          c.proposta.impacto.isPositive() &&
          inicioDoMes(c.gap) < ultimaRecuperacao.dataCorrecao
      );

      if (gapsAntes.length > 0) {
        const soma = somaImpactos(gapsAntes.map(c => c.proposta));
        const maisRecente = gapsAntes[gapsAntes.length - 1].gap;
        const inicio = inicioDoMes(maisRecente);
        const etapas = ordenarEtapas(etapasDeCorrecoes(correcoes, c => c.dataCorrecao > inicio));
        const cascata = calcularEfeitoCascata(soma, etapas);
        const fatorEfetivo = soma.isZero() ? Decimal.UM : cascata.valorFinal.dividedBy(soma);

        compensacao = this.proposta({
          tipo: TipoProposta.COMPENSATION,
          cenario: CenarioCorrecao.CENARIO_2,
          dataAlvo: agora,
          periodoAlvo: 'COMPENSACAO',
          valorAtual: Decimal.ZERO,
          valorProposto: cascata.valorFinal,
          impacto: cascata.valorFinal,
          valorBase: soma,
          taxaAplicada: fatorEfetivo,
          periodoTaxaReferencia: 'CASCATA',
          descricao: this.descreverCompensacao(soma, cascata.passos, cascata.valorFinal, ultimaRecuperacao),
          dependencias: gapsAntes.map(c => c.proposta.id),
          regrasAplicadas: [REGRA.COMPENSACAO_RECUPERACAO, REGRA.CASCATA],
          passosCascata: cascata.passos
        });
        propostas.push(compensacao);
      }
    }

    const adicoes = propostas.filter(p => p.resolvivel && p.tipo === TipoProposta.IPCA_ADDITION);
    const totalAdicoes = somaImpactos(adicoes);
    const totalComCompensacao = compensacao ? totalAdicoes.plus(compensacao.impacto) : totalAdicoes;

    if (cco.flgRecuperado && totalComCompensacao.isPositive()) {
      propostas.push(this.proposta({
        tipo: TipoProposta.REACTIVATION,
        cenario: CenarioCorrecao.CENARIO_2,
        dataAlvo: agora,
        periodoAlvo: 'REATIVACAO',
        valorAtual: Decimal.ZERO,
        valorProposto: totalAdicoes,
        impacto: Decimal.ZERO,
        descricao: 'Reativar CCO recuperada: correções adicionam saldo',
        dependencias: compensacao ? [compensacao.id] : adicoes.map(p => p.id),
        regrasAplicadas: [REGRA.REATIVACAO]
      }));
    }

    return propostas;
  }

  private descreverCompensacao(
    soma: Decimal,
    passos: readonly PassoCascata[],
    valorFinal: Decimal,
    recuperacao: CorrecaoMonetaria
  ): string {
    const detalhes = passos.map(
      p => `${p.periodo} × ${p.taxa.toString()} (+${formatarMoeda(p.incremento)})`
    );
    return (
      `Compensação dos gaps anteriores à recuperação de ${formatarDataBr(recuperacao.dataCorrecao)}: ` +
      `${formatarMoeda(soma)}` +
      (detalhes.length > 0 ? ` → ${detalhes.join(' → ')}` : '') +
      ` = ${formatarMoeda(valorFinal)}`
    );
  }

  // ══════════════════════════════════════════════════════════════════════
  // DUPLICATAS
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Uma remoção por duplicata e um ajuste consolidado.
   *
   * O ajuste desconta de cada duplicata só o que ainda está embutido na
   * última entrada que sobra após as remoções: o incremento propagado pelas
   * taxas de índice não duplicadas entre a duplicata e essa entrada. Duplicata
   * na cauda da lista não entra no ajuste, a remoção já a retira do saldo.
   */
  calcularDuplicatas(cco: ContaCustoOleo, duplicatas: readonly Duplicata[], agora: Date): PropostaCorrecao[] {
    const correcoes = cco.correcoesMonetarias;
    const propostas: PropostaCorrecao[] = [];
    let totalRemovido = Decimal.ZERO;
    let totalCascata = Decimal.ZERO;

    const removidos = new Set(duplicatas.map(dup => dup.indice));
    const ultimaRestante = ultimoIndiceRestante(correcoes.length, removidos);
    const valorRestante = ultimaRestante >= 0
      ? correcoes[ultimaRestante].valorReconhecidoComOH
      : cco.valorReconhecidoComOH;

    const ordenadas = [...duplicatas].sort((a, b) => a.indice - b.indice);
    for (const dup of ordenadas) {
      const naCauda = dup.indice > ultimaRestante;
      const etapas = naCauda
        ? []
        : etapasDeCorrecoes(correcoes, (_c, i) => i > dup.indice && i <= ultimaRestante && !removidos.has(i));
      const cascata = calcularEfeitoCascata(dup.valorDuplicado, etapas);
      const duplicada = correcoes[dup.indice];

      propostas.push(this.proposta({
        tipo: TipoProposta.DUPLICATA_REMOVAL,
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        dataAlvo: dup.dataCorrecao,
        periodoAlvo: dup.periodo,
        valorAtual: dup.valorDuplicado,
        valorProposto: Decimal.ZERO,
        taxaAplicada: duplicada ? duplicada.taxaCorrecao : Decimal.ZERO,
        descricao:
          `Remover correção ${dup.tipo} duplicada de ${dup.periodo} (posição ${dup.indice}, ` +
          `original na posição ${dup.indiceOriginal}): ${formatarMoeda(dup.valorDuplicado)}`,
        regrasAplicadas: [REGRA.REMOCAO_DUPLICATA, REGRA.CASCATA],
        indiceRemover: dup.indice,
        passosCascata: cascata.passos
      }));

      totalRemovido = totalRemovido.plus(dup.valorDuplicado);
      if (!naCauda) {
        totalCascata = totalCascata.plus(cascata.valorFinal);
      }
    }

    if (!totalCascata.isZero()) {
      propostas.push(this.proposta({
        tipo: TipoProposta.DUPLICATA_ADJUSTMENT,
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        dataAlvo: agora,
        periodoAlvo: 'AJUSTE_DUPLICATAS',
        valorAtual: Decimal.ZERO,
        valorProposto: totalCascata.negated(),
        valorBase: totalRemovido,
        descricao:
          `Ajuste consolidado: ${formatarMoeda(totalRemovido)} duplicados, ` +
          `${formatarMoeda(totalCascata)} com efeito cascata`,
        dependencias: propostas.map(p => p.id),
        regrasAplicadas: [REGRA.AJUSTE_DUPLICATA, REGRA.CASCATA]
      }));
    }

    const saldoEstimado = valorRestante.minus(totalCascata);
    if (cco.flgRecuperado && !saldoEstimado.isZero()) {
      propostas.push(this.proposta({
        tipo: TipoProposta.REACTIVATION,
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        dataAlvo: agora,
        periodoAlvo: 'REATIVACAO',
        valorAtual: Decimal.ZERO,
        valorProposto: saldoEstimado,
        impacto: Decimal.ZERO,
        descricao: `Reativar CCO recuperada: saldo estimado após ajuste ${formatarMoeda(saldoEstimado)}`,
        regrasAplicadas: [REGRA.REATIVACAO]
      }));
    }

    return propostas;
  }

  // ══════════════════════════════════════════════════════════════════════
  // IPCA DO ANO VIGENTE
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Avalia se a correção do aniversário do ano corrente é devida.
   * Base: registro corrigido mais recente da CCO, ou o de origem.
   */
  async avaliarIpcaVigente(cco: ContaCustoOleo, agora: Date): Promise<Resultado<AvaliacaoIpcaVigente, string>> {
    const base = (await this.ccoRepo.buscarUltimaCorrigida(cco.id)) ?? cco;
    const valorAtual = valorAtualCco(base);

    if (valorAtual.lte(0)) {
      return falha('Saldo da CCO não é positivo');
    }

    const mesReconhecimento = periodoDe(base.dataReconhecimento).mes;
    const mes = mesReconhecimento === 12 ? 1 : mesReconhecimento + 1;
    const periodo: PeriodoMensal = { ano: agora.getUTCFullYear(), mes };
    const vencimento = dataUtc(periodo.ano, periodo.mes, DIA_LANCAMENTO);

    if (compararPeriodos(periodo, calcularPrimeiroAniversario(base.dataReconhecimento)) < 0) {
      return falha(`Primeiro aniversário ainda não atingido em ${formatarPeriodo(periodo)}`);
    }
    if (agora < vencimento) {
      return falha(`Aniversário ${formatarPeriodo(periodo)} vence em ${formatarDataBr(vencimento)}`);
    }

    const correcoes = base.correcoesMonetarias;
    const existente = correcoes.some(c => ehTipoIndice(c.tipo) && mesmoPeriodo(periodoDe(c.dataCorrecao), periodo));
    if (existente) {
      return falha(`Correção de ${formatarPeriodo(periodo)} já aplicada`);
    }

    const periodoTaxa = calcularPeriodoTaxa(periodo, this.offsetMesTaxa);
    const taxa = await obterTaxa(this.taxaRepo, periodoTaxa, TipoCorrecaoMonetaria.IPCA);
    if (!taxa.ok) {
      return falha(taxa.erro.mensagem);
    }

    const adicao = this.proposta({
      tipo: TipoProposta.IPCA_ADDITION,
      cenario: CenarioCorrecao.CENARIO_IPCA_VIGENTE,
      dataAlvo: vencimento,
      periodoAlvo: formatarPeriodo(periodo),
      valorAtual,
      valorProposto: valorAtual.times(taxa.valor),
      valorBase: valorAtual,
      taxaAplicada: taxa.valor,
      periodoTaxaReferencia: formatarPeriodo(periodoTaxa),
      descricao: `Correção IPCA do ano vigente ${formatarPeriodo(periodo)} sobre ${formatarMoeda(valorAtual)}`,
      regrasAplicadas: [REGRA.IPCA_VIGENTE, REGRA.TAXA_DESLOCADA]
    });
    const propostas = [adicao];

    const ultima = correcoes.length > 0 ? correcoes[correcoes.length - 1] : null;
    if (ultima && ultima.tipo === TipoCorrecaoMonetaria.RETIFICACAO) {
      propostas.push(this.proposta({
        tipo: TipoProposta.CORRECTION_DATE_CHANGE,
        cenario: CenarioCorrecao.CENARIO_IPCA_VIGENTE,
        dataAlvo: dataUtc(periodo.ano, periodo.mes, 15),
        periodoAlvo: 'CHANGE_ORDER',
        valorAtual: ultima.valorReconhecidoComOH,
        valorProposto: ultima.valorReconhecidoComOH,
        dataOrigem: ultima.dataCorrecao,
        descricao:
          `Mover retificação de ${formatarDataBr(ultima.dataCorrecao)} para antes da correção ` +
          `de ${formatarPeriodo(periodo)}`,
        dependencias: [adicao.id],
        regrasAplicadas: [REGRA.ORDEM_CRONOLOGICA]
      }));
    }

    return sucesso({ base, periodo, propostas });
  }

  // ══════════════════════════════════════════════════════════════════════
  // APLICAÇÃO
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Aplica as propostas aprovadas e grava o registro corrigido.
   * @throws Error se o cenário não admite aplicação ou a gravação falha
   */
  async aplicar(
    cenario: CenarioCorrecao,
    cco: ContaCustoOleo,
    aprovadas: readonly PropostaCorrecao[],
    sessaoId: string,
    agora: Date
  ): Promise<ContaCustoOleo> {
    const resolviveis = aprovadas.filter(p => {
      if (!p.resolvivel) {
        this.logger.warn({ ccoId: cco.id, sessaoId, propostaId: p.id }, 'Proposta não resolvível ignorada');
      }
      return p.resolvivel;
    });

    let correcoes: CorrecaoMonetaria[];
    let base = cco;

    switch (cenario) {
      case CenarioCorrecao.CENARIO_0:
      case CenarioCorrecao.CENARIO_1:
      case CenarioCorrecao.CENARIO_2:
        correcoes = this.reconstruirComGaps(cco, resolviveis, sessaoId, agora);
        break;
      case CenarioCorrecao.CENARIO_DUPLICATAS:
        correcoes = this.reconstruirSemDuplicatas(cco, resolviveis, agora);
        break;
      case CenarioCorrecao.CENARIO_IPCA_VIGENTE:
        base = (await this.ccoRepo.buscarUltimaCorrigida(cco.id)) ?? cco;
        correcoes = this.reconstruirIpcaVigente(base, resolviveis, agora);
        break;
      default:
        throw new Error(`Cenário ${cenario} não admite aplicação automática`);
    }

    const reativar = aprovadasDoTipo(resolviveis, TipoProposta.REACTIVATION).length > 0;
    const corrigida: ContaCustoOleo = {
      ...base,
      id: `${cco.id}_corrigida_${sessaoId}`,
      flgRecuperado: reativar ? false : base.flgRecuperado,
      correcoesMonetarias: recalcularAcumulados(correcoes),
      origemCorrecao: {
        ccoOriginalId: cco.id,
        sessaoId,
        cenario,
        aplicadoEm: agora
      }
    };

    await this.ccoRepo.salvarCorrigida(corrigida);

    this.logger.info(
      {
        ccoId: cco.id,
        ccoCorrigidaId: corrigida.id,
        sessaoId,
        cenario,
        propostas: resolviveis.length,
        correcoes: corrigida.correcoesMonetarias.length,
        valorFinal: valorAtualCco(corrigida).toFixed(2)
      },
      'Correções aplicadas'
    );

    return corrigida;
  }

  private registrarConflitos(ccoId: string, conflitos: readonly ConflitoMesclagem[]): void {
    for (const conflito of conflitos) {
      this.logger.warn({ ccoId, ...conflito }, 'Conflito na reconstrução: entrada ignorada');
    }
  }

  /**
   * Cenários 0, 1 e 2: insere gaps, atualiza correções posteriores
   * e acrescenta compensações sobre o saldo resultante.
   */
  private reconstruirComGaps(
    cco: ContaCustoOleo,
    aprovadas: readonly PropostaCorrecao[],
    sessaoId: string,
    agora: Date
  ): CorrecaoMonetaria[] {
    const insercoes: InsercaoCorrecao[] = aprovadasDoTipo(aprovadas, TipoProposta.IPCA_ADDITION).map(p => ({
      propostaId: p.id,
      correcao: novaCorrecaoIndice(cco, {
        subTipo: SUBTIPO_RETIFICACAO,
        dataCorrecao: p.dataAlvo,
        valorAnterior: p.valorAtual,
        valorNovo: p.valorProposto,
        taxa: p.taxaAplicada,
        observacao: `${p.descricao} - sessão ${sessaoId}`,
        criadaEm: agora
      })
    }));

    const atualizacoes: AtualizacaoCorrecao[] = aprovadasDoTipo(aprovadas, TipoProposta.IPCA_UPDATE).map(p => {
      const baseCorreta = p.valorBase ?? p.valorAtual;
      return {
        propostaId: p.id,
        periodo: periodoDe(p.dataAlvo),
        valorReconhecidoComOH: p.valorProposto,
        valorReconhecidoComOhOriginal: baseCorreta,
        diferencaValor: p.valorProposto.minus(baseCorreta),
        observacao: `${p.descricao} - sessão ${sessaoId}`,
        dataAtualizacao: agora
      };
    });

    const mescladas = mesclarCorrecoes(cco.correcoesMonetarias, insercoes, atualizacoes);
    this.registrarConflitos(cco.id, mescladas.conflitos);

    let correcoes = mescladas.correcoes;
    for (const p of aprovadasDoTipo(aprovadas, TipoProposta.COMPENSATION)) {
      const compensacao = novaCorrecaoCompensacao(cco, correcoes, p.impacto, agora, p.descricao);
      correcoes = mesclarCorrecoes(correcoes, [{ propostaId: p.id, correcao: compensacao }], []).correcoes;
    }

    return correcoes;
  }

  /**
   * Remove as duplicatas aprovadas (de trás para frente) e lança o ajuste
   * consolidado como retificação.
   */
  private reconstruirSemDuplicatas(
    cco: ContaCustoOleo,
    aprovadas: readonly PropostaCorrecao[],
    agora: Date
  ): CorrecaoMonetaria[] {
    const correcoes = [...cco.correcoesMonetarias];

    const indices = aprovadasDoTipo(aprovadas, TipoProposta.DUPLICATA_REMOVAL)
      .map(p => p.indiceRemover)
      .filter((i): i is number => i !== null && i >= 0 && i < correcoes.length)
      .sort((a, b) => b - a);

    for (const indice of new Set(indices)) {
      correcoes.splice(indice, 1);
    }

    const ajustes = aprovadasDoTipo(aprovadas, TipoProposta.DUPLICATA_ADJUSTMENT);
    const totalAjuste = Decimal.soma(ajustes.map(p => p.valorProposto));
    if (!totalAjuste.isZero()) {
      correcoes.push(novaCorrecaoCompensacao(
        cco,
        correcoes,
        totalAjuste,
        agora,
        `Ajuste por remoção de ${indices.length} duplicata(s)`
      ));
    }

    return correcoes;
  }

  /**
   * Acrescenta a correção do ano vigente ao registro base.
   * A mudança de data, se aprovada, recua a última retificação para o dia 15.
   */
  private reconstruirIpcaVigente(
    base: ContaCustoOleo,
    aprovadas: readonly PropostaCorrecao[],
    agora: Date
  ): CorrecaoMonetaria[] {
    const adicoes = aprovadasDoTipo(aprovadas, TipoProposta.IPCA_ADDITION);
    if (adicoes.length > 1) {
      throw new Error('Apenas uma correção do ano vigente pode ser aplicada por sessão');
    }

    let correcoes = [...base.correcoesMonetarias];

    const mudancaData = aprovadasDoTipo(aprovadas, TipoProposta.CORRECTION_DATE_CHANGE)[0];
    if (mudancaData) {
      const ultima = correcoes.length - 1;
      if (ultima < 0 || !retificacaoDaProposta(correcoes[ultima], mudancaData)) {
        throw new Error(`Última correção de ${base.id} não é mais a retificação a mover`);
      }
      correcoes[ultima] = { ...correcoes[ultima], dataCorrecao: mudancaData.dataAlvo };
    }

    if (adicoes.length === 1) {
      const p = adicoes[0];
      const nova = novaCorrecaoIndice(base, {
        subTipo: SUBTIPO_VIGENTE,
        dataCorrecao: p.dataAlvo,
        valorAnterior: p.valorAtual,
        valorNovo: p.valorProposto,
        taxa: p.taxaAplicada,
        observacao: p.descricao,
        criadaEm: agora
      });
      const mescladas = mesclarCorrecoes(correcoes, [{ propostaId: p.id, correcao: nova }], []);
      if (mescladas.conflitos.length > 0) {
        throw new Error(mescladas.conflitos.map(c => `${c.periodo}: ${c.motivo}`).join('; '));
      }
      correcoes = mescladas.correcoes;
    }

    return correcoes;
  }
}

export { MotorCorrecao, REGRA };
export type { MotorCorrecaoContext, AchadosAnalise, AvaliacaoIpcaVigente };
