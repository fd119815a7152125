/**
 * Decimal de ponto fixo para valores monetários.
 *
 * Representação interna: BigInt em unidades de 10^-15.
 * Arredondamento: half-up (empate se afasta de zero).
 * Nenhum valor monetário trafega como float binário.
 */

// ════════════════════════════════════════════════════════════════════════
// CONSTANTES
// ════════════════════════════════════════════════════════════════════════

const ESCALA = 15;
const FATOR_ESCALA = 10n ** BigInt(ESCALA);

const PADRAO_DECIMAL = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

type EntradaDecimal = Decimal | string | number | bigint;

// ════════════════════════════════════════════════════════════════════════
// ARITMÉTICA INTERNA
// ════════════════════════════════════════════════════════════════════════

function potenciaDeDez(expoente: number): bigint {
  return 10n ** BigInt(expoente);
}

/**
 * Divisão inteira com arredondamento half-up.
 */
function dividirArredondando(numerador: bigint, denominador: bigint): bigint {
  const negativo = (numerador < 0n) !== (denominador < 0n);
  const n = numerador < 0n ? -numerador : numerador;
  const d = denominador < 0n ? -denominador : denominador;

  let quociente = n / d;
  const resto = n % d;
  if (resto * 2n >= d) {
    quociente += 1n;
  }

  return negativo ? -quociente : quociente;
}

function parseUnidades(texto: string): bigint {
  const limpo = texto.trim();
  const match = PADRAO_DECIMAL.exec(limpo);
  if (!match) {
    throw new SyntaxError(`Valor decimal inválido: "${texto}"`);
  }

  const [, sinal, inteiro = '', fracao = '', expoenteTexto] = match;
  if (inteiro.length === 0 && fracao.length === 0) {
    throw new SyntaxError(`Valor decimal inválido: "${texto}"`);
  }

  const expoente = expoenteTexto ? parseInt(expoenteTexto, 10) : 0;
  const digitos = BigInt(inteiro + fracao || '0');
  const deslocamento = ESCALA + expoente - fracao.length;

  const unidades = deslocamento >= 0
    ? digitos * potenciaDeDez(deslocamento)
    : dividirArredondando(digitos, potenciaDeDez(-deslocamento));

  return sinal === '-' ? -unidades : unidades;
}

// ════════════════════════════════════════════════════════════════════════
// CLASSE
// ════════════════════════════════════════════════════════════════════════

class Decimal {
  static readonly ZERO = new Decimal(0n);
  static readonly UM = new Decimal(FATOR_ESCALA);

  private constructor(private readonly unidades: bigint) {}

  static from(valor: EntradaDecimal): Decimal {
    if (valor instanceof Decimal) {
      return valor;
    }
    if (typeof valor === 'bigint') {
      return new Decimal(valor * FATOR_ESCALA);
    }
    if (typeof valor === 'number') {
      if (!Number.isFinite(valor)) {
        throw new RangeError(`Número não finito não pode ser convertido: ${valor}`);
      }
      return new Decimal(parseUnidades(String(valor)));
    }
    return Decimal.parse(valor);
  }

  static parse(texto: string): Decimal {
    return new Decimal(parseUnidades(texto));
  }

  static isDecimalValido(texto: string): boolean {
    const match = PADRAO_DECIMAL.exec(texto.trim());
    return match !== null && ((match[2] ?? '').length > 0 || (match[3] ?? '').length > 0);
  }

  static soma(valores: readonly Decimal[]): Decimal {
    return valores.reduce((acc, v) => acc.plus(v), Decimal.ZERO);
  }

  static max(a: Decimal, b: Decimal): Decimal {
    return a.gte(b) ? a : b;
  }

  static min(a: Decimal, b: Decimal): Decimal {
    return a.lte(b) ? a : b;
  }

  // ══════════════════════════════════════════════════════════════════════
  // OPERAÇÕES
  // ══════════════════════════════════════════════════════════════════════

  plus(outro: EntradaDecimal): Decimal {
    return new Decimal(this.unidades + Decimal.from(outro).unidades);
  }

  minus(outro: EntradaDecimal): Decimal {
    return new Decimal(this.unidades - Decimal.from(outro).unidades);
  }

  times(outro: EntradaDecimal): Decimal {
    return new Decimal(dividirArredondando(this.unidades * Decimal.from(outro).unidades, FATOR_ESCALA));
  }

  dividedBy(outro: EntradaDecimal): Decimal {
    const divisor = Decimal.from(outro).unidades;
    if (divisor === 0n) {
      throw new RangeError('Divisão por zero');
    }
    return new Decimal(dividirArredondando(this.unidades * FATOR_ESCALA, divisor));
  }

  negated(): Decimal {
    return new Decimal(-this.unidades);
  }

  abs(): Decimal {
    return this.unidades < 0n ? this.negated() : this;
  }

  /**
   * Arredonda para o número de casas decimais informado (0..15).
   */
  round(casas: number = 2): Decimal {
    if (!Number.isInteger(casas) || casas < 0 || casas > ESCALA) {
      throw new RangeError(`Casas decimais fora do intervalo 0..${ESCALA}: ${casas}`);
    }
    const fator = potenciaDeDez(ESCALA - casas);
    return new Decimal(dividirArredondando(this.unidades, fator) * fator);
  }

  // ══════════════════════════════════════════════════════════════════════
  // COMPARAÇÃO
  // ══════════════════════════════════════════════════════════════════════

  cmp(outro: EntradaDecimal): -1 | 0 | 1 {
    const b = Decimal.from(outro).unidades;
    if (this.unidades < b) return -1;
    if (this.unidades > b) return 1;
    return 0;
  }

  eq(outro: EntradaDecimal): boolean {
    return this.cmp(outro) === 0;
  }

  lt(outro: EntradaDecimal): boolean {
    return this.cmp(outro) < 0;
  }

  gt(outro: EntradaDecimal): boolean {
    return this.cmp(outro) > 0;
  }

  lte(outro: EntradaDecimal): boolean {
    return this.cmp(outro) <= 0;
  }

  gte(outro: EntradaDecimal): boolean {
    return this.cmp(outro) >= 0;
  }

  isZero(): boolean {
    return this.unidades === 0n;
  }

  isNegative(): boolean {
    return this.unidades < 0n;
  }

  isPositive(): boolean {
    return this.unidades > 0n;
  }

  // ══════════════════════════════════════════════════════════════════════
  // FORMATAÇÃO
  // ══════════════════════════════════════════════════════════════════════

  toFixed(casas: number = 2): string {
    const arredondado = this.round(casas).unidades;
    const negativo = arredondado < 0n;
    const absoluto = negativo ? -arredondado : arredondado;

    const inteiro = absoluto / FATOR_ESCALA;
    const fracao = (absoluto % FATOR_ESCALA).toString().padStart(ESCALA, '0').slice(0, casas);

    const corpo = casas > 0 ? `${inteiro}.${fracao}` : inteiro.toString();
    return negativo ? `-${corpo}` : corpo;
  }

  toString(): string {
    const completo = this.toFixed(ESCALA);
    if (!completo.includes('.')) {
      return completo;
    }
    return completo.replace(/0+$/, '').replace(/\.$/, '');
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toJSON(): string {
    return this.toString();
  }
}

export { Decimal, ESCALA, dividirArredondando };
export type { EntradaDecimal };
