/**
 * Regras de calendário das correções monetárias.
 *
 * Todas as datas são tratadas em UTC.
 */

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface PeriodoMensal {
  ano: number;
  mes: number;
}

const MS_POR_DIA = 86_400_000;

// ════════════════════════════════════════════════════════════════════════
// CONSTRUÇÃO E CONVERSÃO
// ════════════════════════════════════════════════════════════════════════

function dataUtc(
  ano: number,
  mes: number,
  dia: number,
  hora: number = 0,
  minuto: number = 0,
  segundo: number = 0
): Date {
  return new Date(Date.UTC(ano, mes - 1, dia, hora, minuto, segundo));
}

function periodoDe(data: Date): PeriodoMensal {
  return { ano: data.getUTCFullYear(), mes: data.getUTCMonth() + 1 };
}

/**
 * Desloca um período em N meses, normalizando o mês em 1..12.
 */
function deslocarMeses(periodo: PeriodoMensal, meses: number): PeriodoMensal {
  const indice = periodo.ano * 12 + (periodo.mes - 1) + meses;
  return { ano: Math.floor(indice / 12), mes: (((indice % 12) + 12) % 12) + 1 };
}

function diferencaMeses(de: PeriodoMensal, ate: PeriodoMensal): number {
  return (ate.ano - de.ano) * 12 + (ate.mes - de.mes);
}

function compararPeriodos(a: PeriodoMensal, b: PeriodoMensal): number {
  return a.ano !== b.ano ? a.ano - b.ano : a.mes - b.mes;
}

function mesmoPeriodo(a: PeriodoMensal, b: PeriodoMensal): boolean {
  return a.ano === b.ano && a.mes === b.mes;
}

function diasEntre(inicio: Date, fim: Date): number {
  return Math.floor((fim.getTime() - inicio.getTime()) / MS_POR_DIA);
}

// ════════════════════════════════════════════════════════════════════════
// FORMATAÇÃO
// ════════════════════════════════════════════════════════════════════════

/** "MM/YYYY" */
function formatarPeriodo(periodo: PeriodoMensal): string {
  return `${String(periodo.mes).padStart(2, '0')}/${periodo.ano}`;
}

/** "YYYY-MM", usada como chave de mapa. */
function chavePeriodo(periodo: PeriodoMensal): string {
  return `${periodo.ano}-${String(periodo.mes).padStart(2, '0')}`;
}

/** "DD/MM/YYYY" */
function formatarDataBr(data: Date): string {
  const dia = String(data.getUTCDate()).padStart(2, '0');
  const mes = String(data.getUTCMonth() + 1).padStart(2, '0');
  return `${dia}/${mes}/${data.getUTCFullYear()}`;
}

// ════════════════════════════════════════════════════════════════════════
// PARSE
// ════════════════════════════════════════════════════════════════════════

const SUFIXO_FUSO = /(Z|[+-]\d{2}:\d{2})$/i;
const SUFIXO_FUSO_COMPACTO = /([+-]\d{2})(\d{2})$/;
const APENAS_DATA = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Interpreta data ISO. Sem fuso explícito, assume UTC.
 * Aceita offset compacto ("-0300").
 */
function parseData(entrada: string | Date): Date | null {
  if (entrada instanceof Date) {
    return Number.isNaN(entrada.getTime()) ? null : new Date(entrada.getTime());
  }

  let texto = entrada.trim().replace(' ', 'T');
  if (texto.length === 0) {
    return null;
  }

  if (APENAS_DATA.test(texto)) {
    texto = `${texto}T00:00:00Z`;
  } else if (texto.includes('T')) {
    if (SUFIXO_FUSO_COMPACTO.test(texto) && !SUFIXO_FUSO.test(texto)) {
      texto = texto.replace(SUFIXO_FUSO_COMPACTO, '$1:$2');
    } else if (!SUFIXO_FUSO.test(texto)) {
      texto = `${texto}Z`;
    }
  }

  const data = new Date(texto);
  return Number.isNaN(data.getTime()) ? null : data;
}

// ════════════════════════════════════════════════════════════════════════
// REGRAS DE ANIVERSÁRIO
// ════════════════════════════════════════════════════════════════════════

const DIA_CORTE_PADRAO = 19;
const OFFSET_MES_TAXA_PADRAO = -1;

/**
 * Primeiro aniversário: mês seguinte ao do reconhecimento, um ano depois.
 * Reconhecimento em dezembro vai para janeiro, dois anos depois.
 */
function calcularPrimeiroAniversario(dataReconhecimento: Date): PeriodoMensal {
  const reconhecimento = periodoDe(dataReconhecimento);
  if (reconhecimento.mes === 12) {
    return { ano: reconhecimento.ano + 2, mes: 1 };
  }
  return { ano: reconhecimento.ano + 1, mes: reconhecimento.mes + 1 };
}

/**
 * Aniversários vencidos até `agora`, em ordem crescente.
 * No mês corrente o aniversário só conta a partir do dia de corte.
 */
function calcularAniversarios(
  dataReconhecimento: Date,
  agora: Date,
  diaCorte: number = DIA_CORTE_PADRAO
): PeriodoMensal[] {
  const atual = periodoDe(agora);
  const diaAtual = agora.getUTCDate();
  const aniversarios: PeriodoMensal[] = [];

  let { ano, mes } = calcularPrimeiroAniversario(dataReconhecimento);

  while (ano <= atual.ano) {
    if (ano === atual.ano) {
      if (mes > atual.mes) break;
      if (mes === atual.mes && diaAtual < diaCorte) break;
    }
    aniversarios.push({ ano, mes });
    ano += 1;
  }

  return aniversarios;
}

/**
 * Período cuja taxa se aplica ao aniversário (default: mês anterior).
 */
function calcularPeriodoTaxa(
  aniversario: PeriodoMensal,
  offsetMeses: number = OFFSET_MES_TAXA_PADRAO
): PeriodoMensal {
  return deslocarMeses(aniversario, offsetMeses);
}

/**
 * Prazo de aplicação: dia de corte, 23:59:59 UTC do mês do aniversário.
 */
function calcularDataLimite(
  aniversario: PeriodoMensal,
  diaCorte: number = DIA_CORTE_PADRAO
): Date {
  return dataUtc(aniversario.ano, aniversario.mes, diaCorte, 23, 59, 59);
}

export {
  dataUtc,
  periodoDe,
  deslocarMeses,
  diferencaMeses,
  compararPeriodos,
  mesmoPeriodo,
  diasEntre,
  formatarPeriodo,
  chavePeriodo,
  formatarDataBr,
  parseData,
  calcularPrimeiroAniversario,
  calcularAniversarios,
  calcularPeriodoTaxa,
  calcularDataLimite,
  DIA_CORTE_PADRAO,
  OFFSET_MES_TAXA_PADRAO
};
export type { PeriodoMensal };
