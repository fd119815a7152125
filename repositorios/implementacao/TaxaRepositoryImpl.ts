import * as path from 'path';
import { JsonFileStore } from '../../utilitarios/JsonFileStore';
import { TaxaRepository } from '../interfaces/TaxaRepository';
import { TaxaIndice, TipoIndice } from '../../entidades/tipos';
import { taxaIndiceSchema, interpretarDocumento } from '../../entidades/esquemas';
import { DocumentoInvalidoError } from '../../entidades/CorrecaoErrors';
import { Decimal } from '../../utilitarios/Decimal';

function chaveTaxa(ano: number, mes: number, tipo: TipoIndice): string {
  return `${tipo}:${ano}-${String(mes).padStart(2, '0')}`;
}

function compararTaxas(a: TaxaIndice, b: TaxaIndice): number {
  return a.anoReferencia - b.anoReferencia ||
    a.mesReferencia - b.mesReferencia ||
    a.tipo.localeCompare(b.tipo);
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * Tabela de taxas históricas (taxas.json), carregada uma vez em memória.
 */
class TaxaRepositoryImpl implements TaxaRepository {
  private store: Map<string, TaxaIndice> = new Map();
  private fileStore: JsonFileStore;
  private initialized: boolean = false;

  constructor(dataDir: string = './data') {
    this.fileStore = new JsonFileStore(path.join(dataDir, 'taxas.json'));
  }

  static async create(dataDir: string = './data'): Promise<TaxaRepositoryImpl> {
    const repo = new TaxaRepositoryImpl(dataDir);
    await repo.init();
    return repo;
  }

  async init(): Promise<void> {
    const items = await this.fileStore.readAll();
    this.store.clear();
    items.forEach((raw, i) => {
      const resultado = interpretarDocumento(taxaIndiceSchema, raw);
      if (!resultado.ok) {
        throw new DocumentoInvalidoError(`taxas.json[${i}]`, resultado.erro);
      }
      const taxa = resultado.valor;
      this.store.set(chaveTaxa(taxa.anoReferencia, taxa.mesReferencia, taxa.tipo), taxa);
    });
    this.initialized = true;
  }

  private checkInitialized(): void {
    if (!this.initialized) {
      throw new Error(
        'Repositório não inicializado. Use static create() ou chame init() antes de usar.'
      );
    }
  }

  async buscarFator(ano: number, mes: number, tipo: TipoIndice): Promise<Decimal | null> {
    this.checkInitialized();

    const taxa = this.store.get(chaveTaxa(ano, mes, tipo));
    if (!taxa) return null;
    return Decimal.UM.plus(taxa.valor.dividedBy(100));
  }

  async listar(tipo?: TipoIndice): Promise<TaxaIndice[]> {
    this.checkInitialized();

    const taxas = Array.from(this.store.values());
    return (tipo ? taxas.filter(t => t.tipo === tipo) : taxas).sort(compararTaxas);
  }

  async salvar(taxa: TaxaIndice): Promise<void> {
    this.checkInitialized();

    this.store.set(chaveTaxa(taxa.anoReferencia, taxa.mesReferencia, taxa.tipo), { ...taxa });
    await this.fileStore.writeAll(Array.from(this.store.values()).sort(compararTaxas));
  }
}

export { TaxaRepositoryImpl };
