import { Decimal } from './Decimal';

/**
 * Formata valor monetário no padrão brasileiro: "R$ 1.234,56".
 */
function formatarMoeda(valor: Decimal): string {
  const texto = valor.abs().toFixed(2);
  const [inteiro, centavos] = texto.split('.');
  const agrupado = inteiro.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  const prefixo = valor.round(2).isNegative() ? '-R$ ' : 'R$ ';
  return `${prefixo}${agrupado},${centavos}`;
}

/**
 * Formata fator de taxa como percentual: 1.045 -> "4,50%".
 */
function formatarTaxaPercentual(fator: Decimal): string {
  const percentual = fator.minus(1).times(100).toFixed(2);
  return `${percentual.replace('.', ',')}%`;
}

function formatarPercentual(valor: number, casas: number = 2): string {
  return `${valor.toFixed(casas).replace('.', ',')}%`;
}

export { formatarMoeda, formatarTaxaPercentual, formatarPercentual };
