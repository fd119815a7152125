import * as path from 'path';
import { JsonFileStore } from '../../utilitarios/JsonFileStore';
import { SessaoCorrecaoRepository } from '../interfaces/SessaoCorrecaoRepository';
import { SessaoCorrecao } from '../../entidades/tipos';
import { sessaoCorrecaoSchema, interpretarDocumento } from '../../entidades/esquemas';
import { DocumentoInvalidoError } from '../../entidades/CorrecaoErrors';

/**
 * Sessões de correção em sessoes-correcao.json.
 * Sem cache: o estado da sessão sobrevive a reinícios do processo.
 */
class SessaoCorrecaoRepositoryImpl implements SessaoCorrecaoRepository {
  private store: JsonFileStore;
  private persistLock: Promise<void> = Promise.resolve();

  constructor(dataDir: string = './data') {
    this.store = new JsonFileStore(path.join(dataDir, 'sessoes-correcao.json'));
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

  private async lerTodas(): Promise<SessaoCorrecao[]> {
    const items = await this.store.readAll();
    return items.map((raw, i) => {
      const resultado = interpretarDocumento(sessaoCorrecaoSchema, raw);
      if (!resultado.ok) {
        throw new DocumentoInvalidoError(`sessoes-correcao.json[${i}]`, resultado.erro);
      }
      return resultado.valor;
    });
  }

  // ══════════════════════════════════════════════════════════════════════
  // OPERAÇÕES
  // ══════════════════════════════════════════════════════════════════════

  async salvar(sessao: SessaoCorrecao): Promise<void> {
    await this.withLock(async () => {
      const sessoes = await this.lerTodas();
      const posicao = sessoes.findIndex(s => s.id === sessao.id);
      if (posicao >= 0) {
        sessoes[posicao] = sessao;
      } else {
        sessoes.push(sessao);
      }
      await this.store.writeAll(sessoes);
    });
  }

  async buscarPorId(id: string): Promise<SessaoCorrecao | null> {
    const sessoes = await this.lerTodas();
    return sessoes.find(s => s.id === id) ?? null;
  }
}

export { SessaoCorrecaoRepositoryImpl };
