import { Decimal } from '../utilitarios/Decimal';

// ════════════════════════════════════════════════════════════════════════
// ENUMERAÇÕES
// ════════════════════════════════════════════════════════════════════════

enum TipoCorrecaoMonetaria {
  IPCA = 'IPCA',
  IGPM = 'IGPM',
  RETIFICACAO = 'RETIFICACAO',
  RECUPERACAO = 'RECUPERACAO',
  INVALIDACAO_RECONHECIMENTO_PARCIAL = 'INVALIDACAO_RECONHECIMENTO_PARCIAL',
  COMPENSATION = 'COMPENSATION',
  REACTIVATION = 'REACTIVATION'
}

type TipoIndice = TipoCorrecaoMonetaria.IPCA | TipoCorrecaoMonetaria.IGPM;

enum StatusSessao {
  ANALYZING = 'ANALYZING',
  PREVIEW = 'PREVIEW',
  APPROVED = 'APPROVED',
  APPLIED = 'APPLIED',
  REJECTED = 'REJECTED',
  ERROR = 'ERROR'
}

enum CenarioCorrecao {
  CENARIO_0 = 'CENARIO_0',
  CENARIO_1 = 'CENARIO_1',
  CENARIO_2 = 'CENARIO_2',
  CENARIO_DUPLICATAS = 'CENARIO_DUPLICATAS',
  CENARIO_CORRECAO_FORA_APENAS = 'CENARIO_CORRECAO_FORA_APENAS',
  CENARIO_COMPLEXO = 'CENARIO_COMPLEXO',
  CENARIO_IPCA_VIGENTE = 'CENARIO_IPCA_VIGENTE'
}

enum TipoProposta {
  IPCA_ADDITION = 'IPCA_ADDITION',
  IPCA_UPDATE = 'IPCA_UPDATE',
  COMPENSATION = 'COMPENSATION',
  REACTIVATION = 'REACTIVATION',
  DUPLICATA_REMOVAL = 'DUPLICATA_REMOVAL',
  DUPLICATA_ADJUSTMENT = 'DUPLICATA_ADJUSTMENT',
  CORRECTION_DATE_CHANGE = 'CORRECTION_DATE_CHANGE'
}

enum StatusPromocao {
  PENDENTE = 'PENDENTE',
  PROMOVIDA = 'PROMOVIDA'
}

enum PrioridadeGap {
  ALTA = 'ALTA',
  MEDIA = 'MEDIA',
  BAIXA = 'BAIXA'
}

// ════════════════════════════════════════════════════════════════════════
// CONTA CUSTO ÓLEO
// ════════════════════════════════════════════════════════════════════════

/**
 * Valores monetários comuns à raiz da CCO e a cada correção.
 */
interface ValoresLancamento {
  valorLancamentoTotal: Decimal;
  valorNaoReconhecido: Decimal;
  valorReconhecivel: Decimal;
  valorNaoPassivelRecuperacao: Decimal;
  valorReconhecido: Decimal;
  valorReconhecidoComOH: Decimal;
  overHeadExploracao: Decimal;
  overHeadProducao: Decimal;
  overHeadTotal: Decimal;
  valorReconhecidoExploracao: Decimal;
  valorReconhecidoProducao: Decimal;
  valorRecuperado: Decimal;
  quantidadeLancamento: number;
}

/**
 * Entrada do histórico de correções de uma CCO.
 * Para IPCA/IGPM: valorReconhecidoComOH = valorReconhecidoComOhOriginal × taxaCorrecao.
 */
interface CorrecaoMonetaria extends ValoresLancamento {
  tipo: TipoCorrecaoMonetaria;
  subTipo: string | null;
  dataCorrecao: Date;
  dataCriacaoCorrecao: Date;
  contrato: string;
  campo: string;
  faseRemessa: string;
  valorReconhecidoComOhOriginal: Decimal;
  diferencaValor: Decimal;
  /** Fator (1.0447 para 4,47%) */
  taxaCorrecao: Decimal;
  valorRecuperadoTotal: Decimal;
  igpmAcumulado: Decimal;
  igpmAcumuladoReais: Decimal;
  ativo: boolean;
  transferencia: boolean;
  observacao: string | null;
}

interface OrigemCorrecao {
  ccoOriginalId: string;
  sessaoId: string;
  cenario: CenarioCorrecao;
  aplicadoEm: Date;
}

/**
 * Registro corrigido levado de volta à CCO de origem.
 */
interface PromocaoCorrecao {
  promovidaEm: Date;
  usuarioId: string;
  observacoes: string | null;
}

interface ContaCustoOleo extends ValoresLancamento {
  id: string;
  contratoCpp: string;
  campo: string;
  remessa: number;
  remessaExposicao: number | null;
  faseRemessa: string;
  origemDosGastos: string;
  anoReconhecimento: number;
  mesReconhecimento: number;
  dataReconhecimento: Date;
  dataLancamento: Date | null;
  /** true: saldo considerado integralmente compensado */
  flgRecuperado: boolean;
  /** Ordem de inserção, não necessariamente cronológica */
  correcoesMonetarias: CorrecaoMonetaria[];
  /** Presente apenas em registros corrigidos */
  origemCorrecao?: OrigemCorrecao;
  /** Presente em registros corrigidos já promovidos */
  promocao?: PromocaoCorrecao;
}

// ════════════════════════════════════════════════════════════════════════
// TAXAS
// ════════════════════════════════════════════════════════════════════════

interface TaxaIndice {
  anoReferencia: number;
  mesReferencia: number;
  tipo: TipoIndice;
  /** Percentual do período (4.5 para 4,5%) */
  valor: Decimal;
}

// ════════════════════════════════════════════════════════════════════════
// RESULTADOS DA ANÁLISE
// ════════════════════════════════════════════════════════════════════════

interface Gap {
  id: string;
  ano: number;
  mes: number;
  /** "MM/YYYY" */
  dataAniversario: string;
  anoTaxa: number;
  mesTaxa: number;
  /** "MM/YYYY" */
  periodoTaxa: string;
  valorBase: Decimal;
  /** "DD/MM/YYYY" */
  dataLimite: string;
  prioridade: PrioridadeGap;
}

interface AlteracaoNoPeriodo {
  tipo: TipoCorrecaoMonetaria;
  dataAplicacao: Date;
  valorAntes: Decimal;
  valorDepois: Decimal;
  valorImpacto: Decimal;
  impactoPercentual: number;
}

interface CorrecaoForaPeriodo {
  anoAniversario: number;
  mesAniversario: number;
  anoAplicado: number;
  mesAplicado: number;
  dataLimite: Date;
  dataAplicacao: Date;
  diasAtraso: number;
  tipoCorrecao: TipoIndice;
  /** Posição da correção na lista da CCO */
  indiceCorrecao: number;
  taxaAplicada: Decimal;
  taxaEsperada: Decimal | null;
  diferencaTaxa: Decimal | null;
  necessitaAjuste: boolean;
  teveAlteracoesNoPeriodo: boolean;
  alteracoesNoPeriodo: AlteracaoNoPeriodo[];
  valorBaseAntesAlteracoes: Decimal;
  valorBaseNaAplicacao: Decimal;
}

interface Duplicata {
  indice: number;
  /** "MM/YYYY" */
  periodo: string;
  valorDuplicado: Decimal;
  dataCorrecao: Date;
  dataCorrecaoOriginal: Date;
  indiceOriginal: number;
  tipo: TipoIndice;
}

interface AnaliseCco {
  ccoId: string;
  contratoCpp: string;
  campo: string;
  dataReconhecimento: Date;
  valorAtual: Decimal;
  gaps: Gap[];
  correcoesForaPeriodo: CorrecaoForaPeriodo[];
  duplicatas: Duplicata[];
}

// ════════════════════════════════════════════════════════════════════════
// PROPOSTAS E SESSÃO
// ════════════════════════════════════════════════════════════════════════

interface PassoCascata {
  /** "MM/YYYY" */
  periodo: string;
  data: Date;
  taxa: Decimal;
  valorAntes: Decimal;
  valorDepois: Decimal;
  incremento: Decimal;
}

interface PropostaCorrecao {
  id: string;
  tipo: TipoProposta;
  cenario: CenarioCorrecao;
  dataAlvo: Date;
  /** "MM/YYYY", ou marcador ("COMPENSACAO", "REATIVACAO", "CHANGE_ORDER") */
  periodoAlvo: string;
  valorAtual: Decimal;
  valorProposto: Decimal;
  /** valorProposto - valorAtual, salvo propostas auxiliares */
  impacto: Decimal;
  valorBase: Decimal | null;
  taxaAplicada: Decimal;
  periodoTaxaReferencia: string;
  descricao: string;
  dependencias: string[];
  regrasAplicadas: string[];
  /** false quando a taxa histórica não foi encontrada */
  resolvivel: boolean;
  erro: string | null;
  /** Posição da correção a remover (DUPLICATA_REMOVAL) */
  indiceRemover: number | null;
  /** Data atual da entrada a mover (CORRECTION_DATE_CHANGE) */
  dataOrigem: Date | null;
  passosCascata: PassoCascata[];
}

interface ImpactoFinanceiro {
  impactoTotal: Decimal;
  totalAdicoes: Decimal;
  totalAtualizacoes: Decimal;
  totalRemocao: Decimal;
  totalCompensacoes: Decimal;
  quantidadePropostas: number;
}

interface AvisoValidacao {
  codigo: string;
  mensagem: string;
}

interface RelatorioValidacao {
  valido: boolean;
  erros: AvisoValidacao[];
  avisos: AvisoValidacao[];
}

interface SessaoCorrecao {
  id: string;
  ccoId: string;
  usuarioId: string;
  status: StatusSessao;
  cenario: CenarioCorrecao;
  gapsIdentificados: Gap[];
  correcoesForaPeriodo: CorrecaoForaPeriodo[];
  duplicatas: Duplicata[];
  propostas: PropostaCorrecao[];
  aprovadas: string[];
  impactoFinanceiro: ImpactoFinanceiro | null;
  relatorioValidacao: RelatorioValidacao | null;
  criadaEm: Date;
  atualizadaEm: Date;
  aplicadaEm: Date | null;
  mensagemErro: string | null;
  motivoRejeicao: string | null;
  ccoCorrigidaId: string | null;
}

// ════════════════════════════════════════════════════════════════════════
// CONFIGURAÇÃO DE CÁLCULO
// ════════════════════════════════════════════════════════════════════════

interface ConfiguracaoCorrecao {
  /** Deslocamento do mês da taxa em relação ao aniversário */
  offsetMesTaxa: number;
  /** Dia limite de aplicação dentro do mês do aniversário */
  diaCorteAniversario: number;
  /** Taxa usada na estimativa de impacto de relatórios */
  taxaEstimadaImpacto: Decimal;
}

function ehTipoIndice(tipo: TipoCorrecaoMonetaria): tipo is TipoIndice {
  return tipo === TipoCorrecaoMonetaria.IPCA || tipo === TipoCorrecaoMonetaria.IGPM;
}

export {
  TipoCorrecaoMonetaria,
  StatusSessao,
  CenarioCorrecao,
  TipoProposta,
  PrioridadeGap,
  StatusPromocao,
  ehTipoIndice
};

export type {
  TipoIndice,
  ValoresLancamento,
  CorrecaoMonetaria,
  OrigemCorrecao,
  PromocaoCorrecao,
  ContaCustoOleo,
  TaxaIndice,
  Gap,
  AlteracaoNoPeriodo,
  CorrecaoForaPeriodo,
  Duplicata,
  AnaliseCco,
  PassoCascata,
  PropostaCorrecao,
  ImpactoFinanceiro,
  AvisoValidacao,
  RelatorioValidacao,
  SessaoCorrecao,
  ConfiguracaoCorrecao
};
