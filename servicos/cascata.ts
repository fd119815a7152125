/**
 * Efeito cascata: propagação de um ajuste de base pelas taxas
 * de índice aplicadas depois dele.
 */

import { CorrecaoMonetaria, PassoCascata, ehTipoIndice } from '../entidades/tipos';
import { Decimal } from '../utilitarios/Decimal';
import { formatarPeriodo, periodoDe } from '../utilitarios/Periodo';

interface EtapaCascata {
  data: Date;
  taxa: Decimal;
  /** "MM/YYYY" */
  periodo: string;
}

interface ResultadoCascata {
  valorInicial: Decimal;
  valorFinal: Decimal;
  passos: PassoCascata[];
}

/**
 * Multiplica a base por cada taxa, na ordem dada.
 * Cada passo registra o incremento: valor corrente × (taxa - 1).
 */
function calcularEfeitoCascata(base: Decimal, etapas: readonly EtapaCascata[]): ResultadoCascata {
  const passos: PassoCascata[] = [];
  let corrente = base;

  for (const etapa of etapas) {
    const incremento = corrente.times(etapa.taxa.minus(1));
    const valorDepois = corrente.plus(incremento);
    passos.push({
      periodo: etapa.periodo,
      data: etapa.data,
      taxa: etapa.taxa,
      valorAntes: corrente,
      valorDepois,
      incremento
    });
    corrente = valorDepois;
  }

  return { valorInicial: base, valorFinal: corrente, passos };
}

/**
 * Etapas a partir das correções de índice que satisfazem o filtro,
 * na ordem da lista.
 */
function etapasDeCorrecoes(
  correcoes: readonly CorrecaoMonetaria[],
  filtro: (correcao: CorrecaoMonetaria, indice: number) => boolean
): EtapaCascata[] {
  const etapas: EtapaCascata[] = [];
  correcoes.forEach((c, i) => {
    if (ehTipoIndice(c.tipo) && filtro(c, i)) {
      etapas.push({
        data: c.dataCorrecao,
        taxa: c.taxaCorrecao,
        periodo: formatarPeriodo(periodoDe(c.dataCorrecao))
      });
    }
  });
  return etapas;
}

function ordenarEtapas(etapas: readonly EtapaCascata[]): EtapaCascata[] {
  return [...etapas].sort((a, b) => a.data.getTime() - b.data.getTime());
}

export { calcularEfeitoCascata, etapasDeCorrecoes, ordenarEtapas };
export type { EtapaCascata, ResultadoCascata };
