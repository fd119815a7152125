import { TaxaIndice, TipoIndice } from '../../entidades/tipos';
import { Decimal } from '../../utilitarios/Decimal';

interface TaxaRepository {
  /**
   * Carrega as taxas do disco
   * OBRIGATÓRIO chamar antes de usar qualquer outro método
   * Prefira usar static create() ao invés de constructor + init()
   */
  init(): Promise<void>;

  /**
   * Fator de correção do período: 1 + valor/100
   * @returns fator ou null se a taxa não está cadastrada
   */
  buscarFator(ano: number, mes: number, tipo: TipoIndice): Promise<Decimal | null>;

  /**
   * Lista taxas cadastradas em ordem cronológica
   */
  listar(tipo?: TipoIndice): Promise<TaxaIndice[]>;

  /**
   * Grava (upsert) taxa por (ano, mes, tipo)
   */
  salvar(taxa: TaxaIndice): Promise<void>;
}

export { TaxaRepository };
