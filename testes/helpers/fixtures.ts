/**
 * Construtores de CCOs, correcoes e taxas para os testes,
 * mais repositorios em memoria para servicos isolados.
 */

import {
  ContaCustoOleo,
  CorrecaoMonetaria,
  TaxaIndice,
  TipoCorrecaoMonetaria,
  TipoIndice
} from '../../entidades/tipos';
import { ContaCustoOleoRepository, FiltrosCco } from '../../repositorios/interfaces/ContaCustoOleoRepository';
import { TaxaRepository } from '../../repositorios/interfaces/TaxaRepository';
import { Decimal } from '../../utilitarios/Decimal';
import { dataUtc } from '../../utilitarios/Periodo';

// ════════════════════════════════════════════════════════════════════════════
// VALORES
// ════════════════════════════════════════════════════════════════════════════

export function d(texto: string): Decimal {
  return Decimal.parse(texto);
}

export function data(ano: number, mes: number, dia: number): Date {
  return dataUtc(ano, mes, dia);
}

/**
 * Gerador sequencial de ids: prefixo-1, prefixo-2, ...
 */
export function idsSequenciais(prefixo: string): () => string {
  let contador = 0;
  return () => {
    contador += 1;
    return `${prefixo}-${contador}`;
  };
}

// ════════════════════════════════════════════════════════════════════════════
// CCO
// ════════════════════════════════════════════════════════════════════════════

export interface DadosCco {
  id?: string;
  contratoCpp?: string;
  campo?: string;
  dataReconhecimento: Date;
  valor: string;
  flgRecuperado?: boolean;
  correcoes?: CorrecaoMonetaria[];
}

export function criarCco(dados: DadosCco): ContaCustoOleo {
  const valor = d(dados.valor);
  return {
    id: dados.id ?? 'cco-1',
    contratoCpp: dados.contratoCpp ?? 'CPP-001',
    campo: dados.campo ?? 'Campo A',
    remessa: 1,
    remessaExposicao: null,
    faseRemessa: 'PRODUCAO',
    origemDosGastos: 'OPERACAO',
    anoReconhecimento: dados.dataReconhecimento.getUTCFullYear(),
    mesReconhecimento: dados.dataReconhecimento.getUTCMonth() + 1,
    dataReconhecimento: dados.dataReconhecimento,
    dataLancamento: null,
    flgRecuperado: dados.flgRecuperado ?? false,
    correcoesMonetarias: dados.correcoes ?? [],
    valorLancamentoTotal: valor,
    valorNaoReconhecido: Decimal.ZERO,
    valorReconhecivel: valor,
    valorNaoPassivelRecuperacao: Decimal.ZERO,
    valorReconhecido: valor,
    valorReconhecidoComOH: valor,
    overHeadExploracao: Decimal.ZERO,
    overHeadProducao: Decimal.ZERO,
    overHeadTotal: Decimal.ZERO,
    valorReconhecidoExploracao: Decimal.ZERO,
    valorReconhecidoProducao: valor,
    valorRecuperado: Decimal.ZERO,
    quantidadeLancamento: 1
  };
}

// ════════════════════════════════════════════════════════════════════════════
// CORRECOES
// ════════════════════════════════════════════════════════════════════════════

export interface DadosCorrecao {
  tipo: TipoCorrecaoMonetaria;
  data: Date;
  antes: string;
  depois: string;
  taxa?: string;
}

export function criarCorrecao(dados: DadosCorrecao): CorrecaoMonetaria {
  const antes = d(dados.antes);
  const depois = d(dados.depois);
  return {
    tipo: dados.tipo,
    subTipo: null,
    dataCorrecao: dados.data,
    dataCriacaoCorrecao: dados.data,
    contrato: 'CPP-001',
    campo: 'Campo A',
    faseRemessa: 'PRODUCAO',
    valorLancamentoTotal: depois,
    valorNaoReconhecido: Decimal.ZERO,
    valorReconhecivel: depois,
    valorNaoPassivelRecuperacao: Decimal.ZERO,
    valorReconhecido: depois,
    valorReconhecidoComOH: depois,
    overHeadExploracao: Decimal.ZERO,
    overHeadProducao: Decimal.ZERO,
    overHeadTotal: Decimal.ZERO,
    valorReconhecidoExploracao: Decimal.ZERO,
    valorReconhecidoProducao: depois,
    valorRecuperado: Decimal.ZERO,
    quantidadeLancamento: 1,
    valorReconhecidoComOhOriginal: antes,
    diferencaValor: depois.minus(antes),
    taxaCorrecao: d(dados.taxa ?? '1'),
    valorRecuperadoTotal: Decimal.ZERO,
    igpmAcumulado: Decimal.ZERO,
    igpmAcumuladoReais: Decimal.ZERO,
    ativo: true,
    transferencia: false,
    observacao: null
  };
}

/**
 * Correcao de indice: depois = antes × fator.
 */
export function correcaoIpca(dataCorrecao: Date, antes: string, fator: string): CorrecaoMonetaria {
  return criarCorrecao({
    tipo: TipoCorrecaoMonetaria.IPCA,
    data: dataCorrecao,
    antes,
    depois: d(antes).times(d(fator)).toString(),
    taxa: fator
  });
}

export function recuperacao(dataCorrecao: Date, antes: string, depois: string): CorrecaoMonetaria {
  return criarCorrecao({ tipo: TipoCorrecaoMonetaria.RECUPERACAO, data: dataCorrecao, antes, depois });
}

export function retificacao(dataCorrecao: Date, antes: string, depois: string): CorrecaoMonetaria {
  return criarCorrecao({ tipo: TipoCorrecaoMonetaria.RETIFICACAO, data: dataCorrecao, antes, depois });
}

// ════════════════════════════════════════════════════════════════════════════
// TAXAS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Taxa percentual: taxa(2024, 8, '4.5') vale fator 1.045.
 */
export function taxa(
  ano: number,
  mes: number,
  valor: string,
  tipo: TipoIndice = TipoCorrecaoMonetaria.IPCA
): TaxaIndice {
  return { anoReferencia: ano, mesReferencia: mes, tipo, valor: d(valor) };
}

// ════════════════════════════════════════════════════════════════════════════
// REPOSITORIOS EM MEMORIA
// ════════════════════════════════════════════════════════════════════════════

export class TaxaRepositoryMemoria implements TaxaRepository {
  private taxas: TaxaIndice[];

  constructor(taxas: TaxaIndice[] = []) {
    this.taxas = [...taxas];
  }

  async init(): Promise<void> {
    return;
  }

  async buscarFator(ano: number, mes: number, tipo: TipoIndice): Promise<Decimal | null> {
    const encontrada = this.taxas.find(
      t => t.anoReferencia === ano && t.mesReferencia === mes && t.tipo === tipo
    );
    return encontrada ? Decimal.UM.plus(encontrada.valor.dividedBy(100)) : null;
  }

  async listar(tipo?: TipoIndice): Promise<TaxaIndice[]> {
    return tipo ? this.taxas.filter(t => t.tipo === tipo) : [...this.taxas];
  }

  async salvar(nova: TaxaIndice): Promise<void> {
    this.taxas = this.taxas.filter(
      t => !(t.anoReferencia === nova.anoReferencia && t.mesReferencia === nova.mesReferencia && t.tipo === nova.tipo)
    );
    this.taxas.push(nova);
  }
}

export class ContaCustoOleoRepositoryMemoria implements ContaCustoOleoRepository {
  private origem: Map<string, ContaCustoOleo> = new Map();
  readonly corrigidas: ContaCustoOleo[] = [];

  constructor(ccos: ContaCustoOleo[] = []) {
    ccos.forEach(c => this.origem.set(c.id, c));
  }

  async buscarPorId(id: string): Promise<ContaCustoOleo | null> {
    return this.origem.get(id) ?? null;
  }

  async listar(filtros: FiltrosCco = {}): Promise<ContaCustoOleo[]> {
    return Array.from(this.origem.values()).filter(c =>
      (filtros.contratoCpp === undefined || c.contratoCpp === filtros.contratoCpp) &&
      (filtros.campo === undefined || c.campo === filtros.campo) &&
      (filtros.anoReconhecimento === undefined || c.anoReconhecimento === filtros.anoReconhecimento) &&
      (filtros.origemDosGastos === undefined || c.origemDosGastos === filtros.origemDosGastos)
    );
  }

  async salvar(cco: ContaCustoOleo): Promise<void> {
    this.origem.set(cco.id, cco);
  }

  async salvarCorrigida(cco: ContaCustoOleo): Promise<void> {
    if (this.corrigidas.some(c => c.id === cco.id)) {
      throw new Error(`Registro corrigido ${cco.id} já existe`);
    }
    this.corrigidas.push(cco);
  }

  async atualizarCorrigida(cco: ContaCustoOleo): Promise<void> {
    const posicao = this.corrigidas.findIndex(c => c.id === cco.id);
    if (posicao < 0) {
      throw new Error(`Registro corrigido ${cco.id} não existe`);
    }
    this.corrigidas[posicao] = cco;
  }

  async buscarCorrigida(id: string): Promise<ContaCustoOleo | null> {
    return this.corrigidas.find(c => c.id === id) ?? null;
  }

  async listarCorrigidas(ccoOriginalId?: string): Promise<ContaCustoOleo[]> {
    return this.corrigidas.filter(
      c => ccoOriginalId === undefined || c.origemCorrecao?.ccoOriginalId === ccoOriginalId
    );
  }

  async buscarUltimaCorrigida(ccoOriginalId: string): Promise<ContaCustoOleo | null> {
    const lista = await this.listarCorrigidas(ccoOriginalId);
    return lista.length > 0 ? lista[lista.length - 1] : null;
  }
}
