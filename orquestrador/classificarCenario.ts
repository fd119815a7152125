import {
  CenarioCorrecao,
  ContaCustoOleo,
  Gap,
  TipoCorrecaoMonetaria,
  ehTipoIndice
} from '../entidades/tipos';
import { dataUtc } from '../utilitarios/Periodo';

/**
 * Sinais da análise que decidem o cenário.
 */
interface IndicadoresCenario {
  temGaps: boolean;
  temCorrecoesForaPeriodo: boolean;
  temRecuperacao: boolean;
  temDuplicatas: boolean;
  /** Existe correção IPCA/IGPM depois do gap mais antigo */
  temCorrecaoAposPrimeiroGap: boolean;
}

/**
 * Regras avaliadas em ordem; a primeira que casa decide.
 */
function classificarCenario(ind: IndicadoresCenario): CenarioCorrecao {
  if (ind.temDuplicatas) {
    return CenarioCorrecao.CENARIO_DUPLICATAS;
  }

  if (
    ind.temGaps &&
    !ind.temCorrecoesForaPeriodo &&
    !ind.temRecuperacao &&
    !ind.temCorrecaoAposPrimeiroGap
  ) {
    return CenarioCorrecao.CENARIO_0;
  }

  if (
    ind.temGaps &&
    (ind.temCorrecoesForaPeriodo || ind.temCorrecaoAposPrimeiroGap) &&
    !ind.temRecuperacao
  ) {
    return CenarioCorrecao.CENARIO_1;
  }

  if ((ind.temGaps || ind.temCorrecoesForaPeriodo) && ind.temRecuperacao) {
    return CenarioCorrecao.CENARIO_2;
  }

  if (ind.temCorrecoesForaPeriodo && !ind.temGaps && !ind.temRecuperacao) {
    return CenarioCorrecao.CENARIO_CORRECAO_FORA_APENAS;
  }

  return CenarioCorrecao.CENARIO_COMPLEXO;
}

/**
 * Compara com o dia 15 do mês do gap mais antigo.
 */
function temCorrecaoAposPrimeiroGap(cco: ContaCustoOleo, gaps: readonly Gap[]): boolean {
  if (gaps.length === 0) return false;

  const primeiro = Math.min(...gaps.map(g => dataUtc(g.ano, g.mes, 15).getTime()));
  return cco.correcoesMonetarias.some(
    c => ehTipoIndice(c.tipo) && c.dataCorrecao.getTime() > primeiro
  );
}

function temRecuperacao(cco: ContaCustoOleo): boolean {
  return cco.correcoesMonetarias.some(c => c.tipo === TipoCorrecaoMonetaria.RECUPERACAO);
}

/**
 * Cenários com cálculo automático de propostas.
 */
const CENARIOS_AUTO_CORRIGIVEIS: ReadonlySet<CenarioCorrecao> = new Set([
  CenarioCorrecao.CENARIO_0,
  CenarioCorrecao.CENARIO_1,
  CenarioCorrecao.CENARIO_2,
  CenarioCorrecao.CENARIO_DUPLICATAS,
  CenarioCorrecao.CENARIO_IPCA_VIGENTE
]);

export { classificarCenario, temCorrecaoAposPrimeiroGap, temRecuperacao, CENARIOS_AUTO_CORRIGIVEIS };
export type { IndicadoresCenario };
