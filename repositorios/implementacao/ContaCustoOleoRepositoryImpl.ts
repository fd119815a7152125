import * as path from 'path';
import { JsonFileStore } from '../../utilitarios/JsonFileStore';
import { ContaCustoOleoRepository, FiltrosCco } from '../interfaces/ContaCustoOleoRepository';
import { ContaCustoOleo } from '../../entidades/tipos';
import { contaCustoOleoSchema, interpretarDocumento } from '../../entidades/esquemas';
import { DocumentoInvalidoError } from '../../entidades/CorrecaoErrors';

// ════════════════════════════════════════════════════════════════════════
// RE-HIDRATAÇÃO
// ════════════════════════════════════════════════════════════════════════

function reviveCco(raw: unknown, arquivo: string, posicao: number): ContaCustoOleo {
  const resultado = interpretarDocumento(contaCustoOleoSchema, raw);
  if (!resultado.ok) {
    throw new DocumentoInvalidoError(`${path.basename(arquivo)}[${posicao}]`, resultado.erro);
  }
  return resultado.valor;
}

function compararCcos(a: ContaCustoOleo, b: ContaCustoOleo): number {
  return a.contratoCpp.localeCompare(b.contratoCpp) ||
    a.campo.localeCompare(b.campo) ||
    a.dataReconhecimento.getTime() - b.dataReconhecimento.getTime();
}

function aplicadoEm(cco: ContaCustoOleo): number {
  return cco.origemCorrecao ? cco.origemCorrecao.aplicadoEm.getTime() : 0;
}

// ════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * CCOs de origem em ccos.json; registros corrigidos em ccos-corrigidas.json.
 * Cada leitura vai ao disco; escritas passam pelo lock de persistência.
 */
class ContaCustoOleoRepositoryImpl implements ContaCustoOleoRepository {
  private origem: JsonFileStore;
  private corrigidas: JsonFileStore;
  private persistLock: Promise<void> = Promise.resolve();

  constructor(dataDir: string = './data') {
    this.origem = new JsonFileStore(path.join(dataDir, 'ccos.json'));
    this.corrigidas = new JsonFileStore(path.join(dataDir, 'ccos-corrigidas.json'));
  }

  // ══════════════════════════════════════════════════════════════════════
  // LOCK DE PERSISTÊNCIA
  // ══════════════════════════════════════════════════════════════════════

  private async withLock<T>(operation: () => Promise<T>): Promise<T> {
    const previousLock = this.persistLock;
    let releaseLock: () => void = () => undefined;

    this.persistLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });

    await previousLock;
    try {
      return await operation();
    } finally {
      releaseLock();
    }
  }

  private async lerTodas(store: JsonFileStore): Promise<ContaCustoOleo[]> {
    const items = await store.readAll();
    return items.map((raw, i) => reviveCco(raw, store.caminho, i));
  }

  // ══════════════════════════════════════════════════════════════════════
  // ORIGEM
  // ══════════════════════════════════════════════════════════════════════

  async buscarPorId(id: string): Promise<ContaCustoOleo | null> {
    const ccos = await this.lerTodas(this.origem);
    return ccos.find(c => c.id === id) ?? null;
  }

  async listar(filtros: FiltrosCco = {}): Promise<ContaCustoOleo[]> {
    let ccos = await this.lerTodas(this.origem);

    if (filtros.contratoCpp) {
      ccos = ccos.filter(c => c.contratoCpp === filtros.contratoCpp);
    }
    if (filtros.campo) {
      ccos = ccos.filter(c => c.campo === filtros.campo);
    }
    if (filtros.anoReconhecimento !== undefined) {
      ccos = ccos.filter(c => c.anoReconhecimento === filtros.anoReconhecimento);
    }
    if (filtros.origemDosGastos) {
      ccos = ccos.filter(c => c.origemDosGastos === filtros.origemDosGastos);
    }

    return ccos.sort(compararCcos);
  }

  async salvar(cco: ContaCustoOleo): Promise<void> {
    await this.withLock(async () => {
      const ccos = await this.lerTodas(this.origem);
      const posicao = ccos.findIndex(c => c.id === cco.id);
      if (posicao >= 0) {
        ccos[posicao] = cco;
      } else {
        ccos.push(cco);
      }
      await this.origem.writeAll(ccos);
    });
  }

  // ══════════════════════════════════════════════════════════════════════
  // CORRIGIDAS
  // ══════════════════════════════════════════════════════════════════════

  async salvarCorrigida(cco: ContaCustoOleo): Promise<void> {
    await this.withLock(async () => {
      const ccos = await this.lerTodas(this.corrigidas);
      if (ccos.some(c => c.id === cco.id)) {
        throw new Error(`Registro corrigido ${cco.id} já existe`);
      }
      ccos.push(cco);
      await this.corrigidas.writeAll(ccos);
    });
  }

  async atualizarCorrigida(cco: ContaCustoOleo): Promise<void> {
    await this.withLock(async () => {
      const ccos = await this.lerTodas(this.corrigidas);
      const posicao = ccos.findIndex(c => c.id === cco.id);
      if (posicao < 0) {
        throw new Error(`Registro corrigido ${cco.id} não existe`);
      }
      ccos[posicao] = cco;
      await this.corrigidas.writeAll(ccos);
    });
  }

  async buscarCorrigida(id: string): Promise<ContaCustoOleo | null> {
    const ccos = await this.lerTodas(this.corrigidas);
    return ccos.find(c => c.id === id) ?? null;
  }

  async listarCorrigidas(ccoOriginalId?: string): Promise<ContaCustoOleo[]> {
    const ccos = await this.lerTodas(this.corrigidas);
    return ccos
      .filter(c => ccoOriginalId === undefined || c.origemCorrecao?.ccoOriginalId === ccoOriginalId)
      .sort((a, b) => aplicadoEm(a) - aplicadoEm(b));
  }

  async buscarUltimaCorrigida(ccoOriginalId: string): Promise<ContaCustoOleo | null> {
    const corrigidas = await this.listarCorrigidas(ccoOriginalId);
    return corrigidas.length > 0 ? corrigidas[corrigidas.length - 1] : null;
  }
}

export { ContaCustoOleoRepositoryImpl };
