import { ContaCustoOleo } from '../../entidades/tipos';

interface FiltrosCco {
  contratoCpp?: string;
  campo?: string;
  anoReconhecimento?: number;
  origemDosGastos?: string;
}

interface ContaCustoOleoRepository {
  /**
   * Busca CCO de origem por ID
   * @returns CCO ou null se não encontrada
   */
  buscarPorId(id: string): Promise<ContaCustoOleo | null>;

  /**
   * Lista CCOs de origem, ordenadas por contrato, campo e data de reconhecimento
   */
  listar(filtros?: FiltrosCco): Promise<ContaCustoOleo[]>;

  /**
   * Grava (upsert) uma CCO de origem
   */
  salvar(cco: ContaCustoOleo): Promise<void>;

  /**
   * Grava registro corrigido na coleção de corrigidas.
   * O registro de origem nunca é sobrescrito.
   * @throws Se já existe registro corrigido com o mesmo id
   */
  salvarCorrigida(cco: ContaCustoOleo): Promise<void>;

  /**
   * Substitui um registro corrigido existente (marcação de promoção)
   * @throws Se o registro não existe
   */
  atualizarCorrigida(cco: ContaCustoOleo): Promise<void>;

  buscarCorrigida(id: string): Promise<ContaCustoOleo | null>;

  /**
   * Registros corrigidos derivados de uma CCO, ou de todas quando omitida,
   * do mais antigo ao mais recente
   */
  listarCorrigidas(ccoOriginalId?: string): Promise<ContaCustoOleo[]>;

  /**
   * Registro corrigido mais recente derivado de uma CCO
   * @returns registro ou null se a CCO nunca foi corrigida
   */
  buscarUltimaCorrigida(ccoOriginalId: string): Promise<ContaCustoOleo | null>;
}

export { ContaCustoOleoRepository, FiltrosCco };
