/**
 * Relatórios textuais e estimativa de impacto sobre o resultado da análise.
 *
 * Funções puras: recebem o resultado já calculado pelo AnalisadorGaps.
 */

import { AnaliseCco, PrioridadeGap } from '../entidades/tipos';
import { ResultadoAnaliseSistema } from './AnalisadorGaps';
import { Decimal } from '../utilitarios/Decimal';
import { formatarDataBr } from '../utilitarios/Periodo';
import { formatarMoeda, formatarPercentual } from '../utilitarios/Formatacao';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface ImpactoEstimado {
  taxaEstimada: Decimal;
  totalGaps: number;
  impactoTotalEstimado: Decimal;
  /** contrato -> impacto */
  impactoPorContrato: Record<string, Decimal>;
  /** ano -> impacto */
  impactoPorAno: Record<string, Decimal>;
  /** impacto / valor total impactado × 100 */
  percentualSobreImpactado: number;
}

const TAXA_ESTIMADA_PADRAO = Decimal.parse('0.045');
const SEPARADOR = '='.repeat(60);

function acumular(mapa: Record<string, Decimal>, chave: string, valor: Decimal): void {
  mapa[chave] = (mapa[chave] ?? Decimal.ZERO).plus(valor);
}

/**
 * Entradas do contador ordenadas por quantidade desc, chave asc no empate.
 */
function ordenarContagem(contador: Record<string, number>): Array<[string, number]> {
  return Object.entries(contador).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

// ════════════════════════════════════════════════════════════════════════
// IMPACTO ESTIMADO
// ════════════════════════════════════════════════════════════════════════

/**
 * Estima o impacto dos gaps aplicando uma taxa única sobre a base de cada gap.
 */
function analisarImpactoFinanceiro(
  resultado: ResultadoAnaliseSistema,
  taxaEstimada: Decimal = TAXA_ESTIMADA_PADRAO
): ImpactoEstimado {
  const impactoPorContrato: Record<string, Decimal> = {};
  const impactoPorAno: Record<string, Decimal> = {};
  let impactoTotalEstimado = Decimal.ZERO;
  let totalGaps = 0;

  for (const analise of resultado.ccosComGaps) {
    for (const gap of analise.gaps) {
      const impacto = gap.valorBase.times(taxaEstimada);
      impactoTotalEstimado = impactoTotalEstimado.plus(impacto);
      totalGaps += 1;
      acumular(impactoPorContrato, analise.contratoCpp, impacto);
      acumular(impactoPorAno, String(gap.ano), impacto);
    }
  }

  const valorImpactado = resultado.estatisticas.valorTotalImpactado;
  const percentualSobreImpactado = valorImpactado.isZero()
    ? 0
    : impactoTotalEstimado.dividedBy(valorImpactado).times(100).round(4).toNumber();

  return {
    taxaEstimada,
    totalGaps,
    impactoTotalEstimado,
    impactoPorContrato,
    impactoPorAno,
    percentualSobreImpactado
  };
}

// ════════════════════════════════════════════════════════════════════════
// RELATÓRIOS
// ════════════════════════════════════════════════════════════════════════

function gerarRelatorioResumido(resultado: ResultadoAnaliseSistema): string {
  const e = resultado.estatisticas;
  const linhas: string[] = [
    'RELATÓRIO RESUMIDO DE GAPS IPCA/IGPM',
    `Gerado em: ${formatarDataBr(resultado.geradoEm)}`,
    SEPARADOR,
    `CCOs analisadas: ${e.totalCcosAnalisadas}`,
    `CCOs com gaps: ${e.ccosComGaps}`,
    `Total de gaps: ${e.totalGaps}`,
    `CCOs com correções fora do período: ${e.ccosComCorrecoesForaPeriodo}`,
    `Correções fora do período: ${e.totalCorrecoesForaPeriodo}`,
    `CCOs com duplicatas: ${e.ccosComDuplicatas}`,
    `Duplicatas: ${e.totalDuplicatas}`,
    `Valor total impactado: ${formatarMoeda(e.valorTotalImpactado)}`
  ];

  const anos = Object.keys(e.gapsPorAno).sort();
  if (anos.length > 0) {
    linhas.push('', 'GAPS POR ANO');
    for (const ano of anos) {
      linhas.push(`  ${ano}: ${e.gapsPorAno[ano]}`);
    }
  }

  const contratos = ordenarContagem(e.gapsPorContrato);
  if (contratos.length > 0) {
    linhas.push('', 'GAPS POR CONTRATO');
    for (const [contrato, quantidade] of contratos) {
      linhas.push(`  ${contrato}: ${quantidade}`);
    }
  }

  return linhas.join('\n');
}

/**
 * Visão executiva: 5 contratos e 3 anos com mais gaps.
 */
function gerarRelatorioExecutivo(
  resultado: ResultadoAnaliseSistema,
  taxaEstimada: Decimal = TAXA_ESTIMADA_PADRAO
): string {
  const e = resultado.estatisticas;
  const impacto = analisarImpactoFinanceiro(resultado, taxaEstimada);

  const linhas: string[] = [
    'RELATÓRIO EXECUTIVO - CORREÇÕES IPCA/IGPM',
    `Gerado em: ${formatarDataBr(resultado.geradoEm)}`,
    SEPARADOR,
    `CCOs com pendências: ${e.ccosComGaps} de ${e.totalCcosAnalisadas}`,
    `Gaps identificados: ${e.totalGaps}`,
    `Impacto estimado (taxa ${formatarPercentual(taxaEstimada.times(100).toNumber())}): ${formatarMoeda(impacto.impactoTotalEstimado)}`,
    `Percentual sobre valor impactado: ${formatarPercentual(impacto.percentualSobreImpactado)}`
  ];

  const contratos = ordenarContagem(e.gapsPorContrato).slice(0, 5);
  if (contratos.length > 0) {
    linhas.push('', 'CONTRATOS MAIS AFETADOS');
    contratos.forEach(([contrato, quantidade], i) => {
      const valor = impacto.impactoPorContrato[contrato] ?? Decimal.ZERO;
      linhas.push(`  ${i + 1}. ${contrato}: ${quantidade} gaps, ${formatarMoeda(valor)}`);
    });
  }

  const anos = ordenarContagem(e.gapsPorAno).slice(0, 3);
  if (anos.length > 0) {
    linhas.push('', 'ANOS CRÍTICOS');
    anos.forEach(([ano, quantidade], i) => {
      linhas.push(`  ${i + 1}. ${ano}: ${quantidade} gaps`);
    });
  }

  return linhas.join('\n');
}

function gerarRelatorioDetalhadoContrato(contrato: string, analises: readonly AnaliseCco[]): string {
  const linhas: string[] = [
    `RELATÓRIO DETALHADO - CONTRATO ${contrato}`,
    SEPARADOR,
    `CCOs: ${analises.length}`
  ];

  for (const analise of analises) {
    linhas.push(
      '',
      `CCO ${analise.ccoId} (campo ${analise.campo || 'N/A'})`,
      `  Reconhecimento: ${formatarDataBr(analise.dataReconhecimento)}`,
      `  Valor atual: ${formatarMoeda(analise.valorAtual)}`
    );

    if (analise.gaps.length === 0) {
      linhas.push('  Sem gaps');
    } else {
      for (const gap of analise.gaps) {
        const marcador = gap.prioridade === PrioridadeGap.ALTA ? '!' : '-';
        linhas.push(
          `  ${marcador} ${gap.dataAniversario}: base ${formatarMoeda(gap.valorBase)}, ` +
          `taxa ${gap.periodoTaxa}, prioridade ${gap.prioridade}`
        );
      }
    }

    if (analise.correcoesForaPeriodo.length > 0) {
      linhas.push(`  Correções fora do período: ${analise.correcoesForaPeriodo.length}`);
    }
    if (analise.duplicatas.length > 0) {
      linhas.push(`  Duplicatas: ${analise.duplicatas.length}`);
    }
  }

  return linhas.join('\n');
}

export {
  analisarImpactoFinanceiro,
  gerarRelatorioResumido,
  gerarRelatorioExecutivo,
  gerarRelatorioDetalhadoContrato,
  TAXA_ESTIMADA_PADRAO
};
export type { ImpactoEstimado };
