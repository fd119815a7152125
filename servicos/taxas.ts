import { TipoIndice } from '../entidades/tipos';
import { TaxaRepository } from '../repositorios/interfaces/TaxaRepository';
import { Decimal } from '../utilitarios/Decimal';
import { Resultado, sucesso, falha } from '../utilitarios/Resultado';
import { PeriodoMensal, formatarPeriodo } from '../utilitarios/Periodo';

interface TaxaIndisponivel {
  ano: number;
  mes: number;
  tipo: TipoIndice;
  mensagem: string;
}

/**
 * Fator histórico do período. Taxa ausente é falha local, não exceção.
 */
async function obterTaxa(
  taxaRepo: TaxaRepository,
  periodo: PeriodoMensal,
  tipo: TipoIndice
): Promise<Resultado<Decimal, TaxaIndisponivel>> {
  const fator = await taxaRepo.buscarFator(periodo.ano, periodo.mes, tipo);
  if (fator === null) {
    return falha({
      ano: periodo.ano,
      mes: periodo.mes,
      tipo,
      mensagem: `Taxa ${tipo} de ${formatarPeriodo(periodo)} não encontrada`
    });
  }
  return sucesso(fator);
}

export { obterTaxa };
export type { TaxaIndisponivel };
