import { SessaoCorrecao } from '../../entidades/tipos';

/**
 * Armazenamento de sessões de correção.
 * Nenhum cache em memória é autoritativo: cada chamada lê o disco.
 */
interface SessaoCorrecaoRepository {
  /**
   * Grava (upsert) a sessão
   */
  salvar(sessao: SessaoCorrecao): Promise<void>;

  /**
   * @returns sessão ou null se não encontrada
   */
  buscarPorId(id: string): Promise<SessaoCorrecao | null>;
}

export { SessaoCorrecaoRepository };
