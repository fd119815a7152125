/**
 * Analisador de gaps de correção IPCA/IGPM.
 *
 * Para cada aniversário vencido de uma CCO, classifica a correção esperada em:
 * - no prazo (correção do mesmo ano/mês)
 * - fora do período (aplicada depois do dia de corte, com até 12 meses de atraso)
 * - gap (nenhuma correção encontrada)
 * e detecta correções duplicadas no mesmo ano/mês.
 *
 * Somente leitura: não altera a CCO analisada.
 */

import {
  ContaCustoOleo,
  CorrecaoMonetaria,
  TipoCorrecaoMonetaria,
  TipoIndice,
  PrioridadeGap,
  Gap,
  AlteracaoNoPeriodo,
  CorrecaoForaPeriodo,
  Duplicata,
  AnaliseCco,
  ConfiguracaoCorrecao,
  ehTipoIndice
} from '../entidades/tipos';
import { CcoNaoEncontradaError } from '../entidades/CorrecaoErrors';
import { TaxaRepository } from '../repositorios/interfaces/TaxaRepository';
import { ContaCustoOleoRepository, FiltrosCco } from '../repositorios/interfaces/ContaCustoOleoRepository';
import { Decimal } from '../utilitarios/Decimal';
import { Resultado } from '../utilitarios/Resultado';
import { obterTaxa, TaxaIndisponivel } from './taxas';
import { Logger } from '../utilitarios/Logger';
import {
  PeriodoMensal,
  dataUtc,
  periodoDe,
  diferencaMeses,
  diasEntre,
  formatarPeriodo,
  formatarDataBr,
  chavePeriodo,
  calcularAniversarios,
  calcularPeriodoTaxa,
  calcularDataLimite
} from '../utilitarios/Periodo';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface AnalisadorGapsContext {
  taxaRepo: TaxaRepository;
  ccoRepo: ContaCustoOleoRepository;
  logger: Logger;
  configuracao: Pick<ConfiguracaoCorrecao, 'offsetMesTaxa' | 'diaCorteAniversario'>;
}

interface EstatisticasSistema {
  totalCcosAnalisadas: number;
  ccosComGaps: number;
  totalGaps: number;
  ccosComCorrecoesForaPeriodo: number;
  totalCorrecoesForaPeriodo: number;
  ccosComDuplicatas: number;
  totalDuplicatas: number;
  /** ano -> quantidade */
  gapsPorAno: Record<string, number>;
  /** contrato -> quantidade */
  gapsPorContrato: Record<string, number>;
  /** contrato -> quantidade */
  foraPeriodoPorContrato: Record<string, number>;
  /** Soma do valor atual das CCOs com gaps */
  valorTotalImpactado: Decimal;
}

interface ResultadoAnaliseSistema {
  geradoEm: Date;
  filtros: FiltrosCco;
  estatisticas: EstatisticasSistema;
  ccosComGaps: AnaliseCco[];
  ccosComCorrecoesForaPeriodo: AnaliseCco[];
  ccosComDuplicatas: AnaliseCco[];
}

// ════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════

const TOLERANCIA_TAXA = Decimal.parse('0.0001');
const DIAS_POR_ANO = 365.25;

/** Dia até o qual a correção conta para o mês anterior na busca por atraso */
const DIA_REFERENCIA_BUSCA = 15;

function ehCorrecaoIndice(correcao: CorrecaoMonetaria): boolean {
  return ehTipoIndice(correcao.tipo);
}

/**
 * Valor corrente da CCO: último elemento da lista de correções,
 * ou o valor raiz se não houver correções.
 */
function valorAtualCco(cco: ContaCustoOleo): Decimal {
  const correcoes = cco.correcoesMonetarias;
  if (correcoes.length === 0) {
    return cco.valorReconhecidoComOH;
  }
  return correcoes[correcoes.length - 1].valorReconhecidoComOH;
}

function calcularPrioridade(aniversario: PeriodoMensal, agora: Date): PrioridadeGap {
  const anos = diasEntre(dataUtc(aniversario.ano, aniversario.mes, 16), agora) / DIAS_POR_ANO;
  if (anos > 3) return PrioridadeGap.ALTA;
  if (anos > 1) return PrioridadeGap.MEDIA;
  return PrioridadeGap.BAIXA;
}

function incrementar(contador: Record<string, number>, chave: string, quantidade: number = 1): void {
  contador[chave] = (contador[chave] ?? 0) + quantidade;
}

// ════════════════════════════════════════════════════════════════════════
// SERVIÇO
// ════════════════════════════════════════════════════════════════════════

class AnalisadorGaps {
  private taxaRepo: TaxaRepository;
  private ccoRepo: ContaCustoOleoRepository;
  private logger: Logger;
  private offsetMesTaxa: number;
  private diaCorte: number;

  constructor(context: AnalisadorGapsContext) {
    this.taxaRepo = context.taxaRepo;
    this.ccoRepo = context.ccoRepo;
    this.logger = context.logger.child({ componente: 'AnalisadorGaps' });
    this.offsetMesTaxa = context.configuracao.offsetMesTaxa;
    this.diaCorte = context.configuracao.diaCorteAniversario;
  }

  // ══════════════════════════════════════════════════════════════════════
  // TAXAS
  // ══════════════════════════════════════════════════════════════════════

  async obterTaxa(periodo: PeriodoMensal, tipo: TipoIndice): Promise<Resultado<Decimal, TaxaIndisponivel>> {
    return obterTaxa(this.taxaRepo, periodo, tipo);
  }

  periodoTaxaDe(aniversario: PeriodoMensal): PeriodoMensal {
    return calcularPeriodoTaxa(aniversario, this.offsetMesTaxa);
  }

  // ══════════════════════════════════════════════════════════════════════
  // ANÁLISE DE UMA CCO
  // ══════════════════════════════════════════════════════════════════════

  async analisarPorId(ccoId: string, agora: Date): Promise<AnaliseCco> {
    const cco = await this.ccoRepo.buscarPorId(ccoId);
    if (!cco) {
      throw new CcoNaoEncontradaError(ccoId);
    }
    return this.analisarCco(cco, agora);
  }

  async analisarCco(cco: ContaCustoOleo, agora: Date): Promise<AnaliseCco> {
    const correcoes = cco.correcoesMonetarias;
    const aniversarios = calcularAniversarios(cco.dataReconhecimento, agora, this.diaCorte);

    const noPrazo = new Set<string>();
    correcoes.forEach(c => {
      if (ehCorrecaoIndice(c)) {
        noPrazo.add(chavePeriodo(periodoDe(c.dataCorrecao)));
      }
    });

    const gaps: Gap[] = [];
    const correcoesForaPeriodo: CorrecaoForaPeriodo[] = [];

    for (const aniversario of aniversarios) {
      if (noPrazo.has(chavePeriodo(aniversario))) {
        continue;
      }

      const dataLimite = calcularDataLimite(aniversario, this.diaCorte);
      const posterior = this.buscarCorrecaoPosterior(correcoes, aniversario);

      if (posterior !== null) {
        if (correcoes[posterior].dataCorrecao > dataLimite) {
          correcoesForaPeriodo.push(
            await this.analisarCorrecaoForaPeriodo(correcoes, posterior, aniversario, dataLimite)
          );
        }
        continue;
      }

      const gap = this.montarGap(cco, aniversario, dataLimite, agora);
      if (gap) {
        gaps.push(gap);
      }
    }

    const duplicatas = this.detectarDuplicatas(correcoes);

    this.logger.debug(
      {
        ccoId: cco.id,
        aniversarios: aniversarios.length,
        gaps: gaps.length,
        foraPeriodo: correcoesForaPeriodo.length,
        duplicatas: duplicatas.length
      },
      'CCO analisada'
    );

    return {
      ccoId: cco.id,
      contratoCpp: cco.contratoCpp,
      campo: cco.campo,
      dataReconhecimento: cco.dataReconhecimento,
      valorAtual: valorAtualCco(cco),
      gaps,
      correcoesForaPeriodo,
      duplicatas
    };
  }

  /**
   * Primeira correção de índice (ordem de inserção) aplicada depois do dia 15
   * do aniversário, no ano do aniversário ou no seguinte, com menos de 12 meses
   * de atraso.
   * @returns posição na lista ou null
   */
  private buscarCorrecaoPosterior(
    correcoes: readonly CorrecaoMonetaria[],
    aniversario: PeriodoMensal
  ): number | null {
    const referencia = dataUtc(aniversario.ano, aniversario.mes, DIA_REFERENCIA_BUSCA);

    for (const anoBusca of [aniversario.ano, aniversario.ano + 1]) {
      for (let i = 0; i < correcoes.length; i++) {
        const c = correcoes[i];
        if (!ehCorrecaoIndice(c)) continue;
        if (c.dataCorrecao.getUTCFullYear() !== anoBusca) continue;
        if (c.dataCorrecao <= referencia) continue;
        if (diferencaMeses(aniversario, periodoDe(c.dataCorrecao)) >= 12) continue;
        return i;
      }
    }

    return null;
  }

  private async analisarCorrecaoForaPeriodo(
    correcoes: readonly CorrecaoMonetaria[],
    indice: number,
    aniversario: PeriodoMensal,
    dataLimite: Date
  ): Promise<CorrecaoForaPeriodo> {
    const correcao = correcoes[indice];
    const tipo = ehTipoIndice(correcao.tipo) ? correcao.tipo : TipoCorrecaoMonetaria.IPCA;
    const aplicado = periodoDe(correcao.dataCorrecao);

    const alteracoes = this.alteracoesEntre(correcoes, dataLimite, correcao.dataCorrecao);

    const taxa = await this.obterTaxa(this.periodoTaxaDe(aniversario), tipo);
    const taxaEsperada = taxa.ok ? taxa.valor : null;
    const diferencaTaxa = taxaEsperada ? correcao.taxaCorrecao.minus(taxaEsperada) : null;
    const necessitaAjuste = diferencaTaxa ? diferencaTaxa.abs().gt(TOLERANCIA_TAXA) : true;

    const valorBaseNaAplicacao = correcao.valorReconhecidoComOhOriginal;
    const impactoAlteracoes = Decimal.soma(alteracoes.map(a => a.valorImpacto));

    return {
      anoAniversario: aniversario.ano,
      mesAniversario: aniversario.mes,
      anoAplicado: aplicado.ano,
      mesAplicado: aplicado.mes,
      dataLimite,
      dataAplicacao: correcao.dataCorrecao,
      diasAtraso: diasEntre(dataLimite, correcao.dataCorrecao),
      tipoCorrecao: tipo,
      indiceCorrecao: indice,
      taxaAplicada: correcao.taxaCorrecao,
      taxaEsperada,
      diferencaTaxa,
      necessitaAjuste,
      teveAlteracoesNoPeriodo: alteracoes.length > 0,
      alteracoesNoPeriodo: alteracoes,
      valorBaseAntesAlteracoes: valorBaseNaAplicacao.minus(impactoAlteracoes),
      valorBaseNaAplicacao
    };
  }

  /**
   * Eventos que não são de índice (recuperação, retificação...) entre o prazo
   * e a aplicação atrasada, em ordem cronológica.
   */
  private alteracoesEntre(
    correcoes: readonly CorrecaoMonetaria[],
    inicio: Date,
    fim: Date
  ): AlteracaoNoPeriodo[] {
    return correcoes
      .filter(c => !ehCorrecaoIndice(c) && c.dataCorrecao >= inicio && c.dataCorrecao <= fim)
      .sort((a, b) => a.dataCorrecao.getTime() - b.dataCorrecao.getTime())
      .map(c => {
        const valorImpacto = c.valorReconhecidoComOH.minus(c.valorReconhecidoComOhOriginal);
        const impactoPercentual = c.valorReconhecidoComOhOriginal.isZero()
          ? 0
          : valorImpacto.dividedBy(c.valorReconhecidoComOhOriginal).times(100).round(4).toNumber();
        return {
          tipo: c.tipo,
          dataAplicacao: c.dataCorrecao,
          valorAntes: c.valorReconhecidoComOhOriginal,
          valorDepois: c.valorReconhecidoComOH,
          valorImpacto,
          impactoPercentual
        };
      });
  }

  /**
   * Base do gap: valor da última correção (por data) anterior ao dia 15
   * do mês de aniversário, ou valor raiz. O corte é o dia 15, véspera do
   * lançamento no dia 16, e não a data limite do aniversário (dia de corte
   * configurado): uma retificação lançada entre os dias 15 e o corte não
   * entra na base. Base <= 0 não gera gap.
   */
  private montarGap(
    cco: ContaCustoOleo,
    aniversario: PeriodoMensal,
    dataLimite: Date,
    agora: Date
  ): Gap | null {
    const limiteBase = dataUtc(aniversario.ano, aniversario.mes, DIA_REFERENCIA_BUSCA);

    let anterior: CorrecaoMonetaria | null = null;
    for (const c of cco.correcoesMonetarias) {
      if (c.dataCorrecao < limiteBase && (!anterior || c.dataCorrecao >= anterior.dataCorrecao)) {
        anterior = c;
      }
    }
    const valorBase = anterior ? anterior.valorReconhecidoComOH : cco.valorReconhecidoComOH;

    if (valorBase.lte(0)) {
      this.logger.debug(
        { ccoId: cco.id, periodo: formatarPeriodo(aniversario), valorBase: valorBase.toString() },
        'Gap ignorado: base não positiva'
      );
      return null;
    }

    const periodoTaxa = this.periodoTaxaDe(aniversario);

    return {
      id: `gap_${aniversario.ano}${String(aniversario.mes).padStart(2, '0')}`,
      ano: aniversario.ano,
      mes: aniversario.mes,
      dataAniversario: formatarPeriodo(aniversario),
      anoTaxa: periodoTaxa.ano,
      mesTaxa: periodoTaxa.mes,
      periodoTaxa: formatarPeriodo(periodoTaxa),
      valorBase,
      dataLimite: formatarDataBr(dataLimite),
      prioridade: calcularPrioridade(aniversario, agora)
    };
  }

  /**
   * Toda correção de índice cujo ano/mês já apareceu antes na lista.
   */
  detectarDuplicatas(correcoes: readonly CorrecaoMonetaria[]): Duplicata[] {
    const vistos = new Map<string, number>();
    const duplicatas: Duplicata[] = [];

    correcoes.forEach((c, indice) => {
      if (!ehTipoIndice(c.tipo)) return;

      const periodo = periodoDe(c.dataCorrecao);
      const chave = chavePeriodo(periodo);
      const indiceOriginal = vistos.get(chave);

      if (indiceOriginal === undefined) {
        vistos.set(chave, indice);
        return;
      }

      duplicatas.push({
        indice,
        periodo: formatarPeriodo(periodo),
        valorDuplicado: c.diferencaValor,
        dataCorrecao: c.dataCorrecao,
        dataCorrecaoOriginal: correcoes[indiceOriginal].dataCorrecao,
        indiceOriginal,
        tipo: c.tipo
      });
    });

    return duplicatas;
  }

  // ══════════════════════════════════════════════════════════════════════
  // ANÁLISE DO SISTEMA
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Análise de todas as CCOs do contrato, com ou sem pendências.
   */
  async analisarContrato(contratoCpp: string, agora: Date): Promise<AnaliseCco[]> {
    const ccos = await this.ccoRepo.listar({ contratoCpp });
    const analises: AnaliseCco[] = [];
    for (const cco of ccos) {
      analises.push(await this.analisarCco(cco, agora));
    }
    return analises;
  }

  async analisarSistema(filtros: FiltrosCco, agora: Date): Promise<ResultadoAnaliseSistema> {
    const ccos = await this.ccoRepo.listar(filtros);

    const estatisticas: EstatisticasSistema = {
      totalCcosAnalisadas: ccos.length,
      ccosComGaps: 0,
      totalGaps: 0,
      ccosComCorrecoesForaPeriodo: 0,
      totalCorrecoesForaPeriodo: 0,
      ccosComDuplicatas: 0,
      totalDuplicatas: 0,
      gapsPorAno: {},
      gapsPorContrato: {},
      foraPeriodoPorContrato: {},
      valorTotalImpactado: Decimal.ZERO
    };

    const ccosComGaps: AnaliseCco[] = [];
    const ccosComCorrecoesForaPeriodo: AnaliseCco[] = [];
    const ccosComDuplicatas: AnaliseCco[] = [];

    for (const cco of ccos) {
      const analise = await this.analisarCco(cco, agora);

      if (analise.gaps.length > 0) {
        ccosComGaps.push(analise);
        estatisticas.ccosComGaps += 1;
        estatisticas.totalGaps += analise.gaps.length;
        estatisticas.valorTotalImpactado = estatisticas.valorTotalImpactado.plus(analise.valorAtual);
        incrementar(estatisticas.gapsPorContrato, cco.contratoCpp, analise.gaps.length);
        for (const gap of analise.gaps) {
          incrementar(estatisticas.gapsPorAno, String(gap.ano));
        }
      }

      if (analise.correcoesForaPeriodo.length > 0) {
        ccosComCorrecoesForaPeriodo.push(analise);
        estatisticas.ccosComCorrecoesForaPeriodo += 1;
        estatisticas.totalCorrecoesForaPeriodo += analise.correcoesForaPeriodo.length;
        incrementar(estatisticas.foraPeriodoPorContrato, cco.contratoCpp, analise.correcoesForaPeriodo.length);
      }

      if (analise.duplicatas.length > 0) {
        ccosComDuplicatas.push(analise);
        estatisticas.ccosComDuplicatas += 1;
        estatisticas.totalDuplicatas += analise.duplicatas.length;
      }
    }

    this.logger.info(
      {
        filtros,
        ccos: estatisticas.totalCcosAnalisadas,
        gaps: estatisticas.totalGaps,
        foraPeriodo: estatisticas.totalCorrecoesForaPeriodo,
        duplicatas: estatisticas.totalDuplicatas
      },
      'Análise do sistema concluída'
    );

    return {
      geradoEm: agora,
      filtros,
      estatisticas,
      ccosComGaps,
      ccosComCorrecoesForaPeriodo,
      ccosComDuplicatas
    };
  }
}

export { AnalisadorGaps, ehCorrecaoIndice, valorAtualCco };
export type {
  AnalisadorGapsContext,
  EstatisticasSistema,
  ResultadoAnaliseSistema
};
