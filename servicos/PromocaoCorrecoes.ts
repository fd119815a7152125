/**
 * Promoção de registros corrigidos.
 *
 * Um registro corrigido fica PENDENTE até ser promovido: a promoção grava
 * o seu conteúdo sobre a CCO de origem e marca o registro como PROMOVIDA.
 * Pesquisa, detalhamento, memória de cálculo e estatísticas são só leitura.
 */

import {
  ContaCustoOleo,
  CorrecaoMonetaria,
  TipoCorrecaoMonetaria,
  CenarioCorrecao,
  StatusPromocao,
  SessaoCorrecao,
  PropostaCorrecao,
  ehTipoIndice
} from '../entidades/tipos';
import {
  RegistroCorrigidoNaoEncontradoError,
  SessaoNaoEncontradaError,
  PromocaoBloqueadaError
} from '../entidades/CorrecaoErrors';
import { ContaCustoOleoRepository } from '../repositorios/interfaces/ContaCustoOleoRepository';
import { SessaoCorrecaoRepository } from '../repositorios/interfaces/SessaoCorrecaoRepository';
import { Decimal } from '../utilitarios/Decimal';
import { Logger } from '../utilitarios/Logger';
import { formatarDataBr } from '../utilitarios/Periodo';
import { valorAtualCco } from './AnalisadorGaps';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface PromocaoCorrecoesContext {
  ccoRepo: ContaCustoOleoRepository;
  sessaoRepo: SessaoCorrecaoRepository;
  logger: Logger;
  relogio?: () => Date;
}

interface FiltrosPromocao {
  id?: string;
  contratoCpp?: string;
  campo?: string;
  remessa?: number;
  /** default: PENDENTE */
  status?: StatusPromocao;
}

interface ResumoRegistroCorrigido {
  id: string;
  ccoOriginalId: string;
  contratoCpp: string;
  campo: string;
  remessa: number;
  faseRemessa: string;
  sessaoId: string | null;
  cenario: CenarioCorrecao | null;
  aplicadoEm: Date | null;
  status: StatusPromocao;
  promovidaEm: Date | null;
  usuarioPromocao: string | null;
  valorAtual: Decimal;
  totalCorrecoes: number;
  correcoesIndice: number;
  flgRecuperado: boolean;
}

interface ResultadoPesquisa {
  totalEncontrados: number;
  valorTotalAtual: Decimal;
  porContrato: Record<string, number>;
  resultados: ResumoRegistroCorrigido[];
}

type SituacaoEntrada = 'MANTIDA' | 'ALTERADA' | 'NOVA' | 'REMOVIDA';

interface EntradaTimeline {
  posicao: number;
  dataCorrecao: Date;
  tipo: TipoCorrecaoMonetaria;
  subTipo: string | null;
  taxa: Decimal;
  valorAntes: Decimal;
  valorDepois: Decimal;
  diferenca: Decimal;
  situacao: SituacaoEntrada;
}

/**
 * Linhas do tempo lado a lado. Entradas casam por tipo e data;
 * NOVA só aparece na corrigida e REMOVIDA só na original.
 */
interface ComparativoTimelines {
  original: EntradaTimeline[];
  corrigida: EntradaTimeline[];
  valorAtualOriginal: Decimal | null;
  valorAtualCorrigido: Decimal;
  diferencaValorAtual: Decimal | null;
}

interface ValidacaoPromocao {
  podePromover: boolean;
  motivosBloqueio: string[];
  avisos: string[];
}

interface DetalheCorrecao {
  registro: ContaCustoOleo;
  original: ContaCustoOleo | null;
  sessao: SessaoCorrecao | null;
  comparativo: ComparativoTimelines;
  validacao: ValidacaoPromocao;
}

interface ResultadoPromocao {
  ccoId: string;
  ccoCorrigidaId: string;
  promovidaEm: Date;
  valorAtual: Decimal;
}

interface MemoriaCalculo {
  sessaoId: string;
  ccoId: string;
  usuarioId: string;
  status: SessaoCorrecao['status'];
  cenario: CenarioCorrecao;
  criadaEm: Date;
  atualizadaEm: Date;
  aplicadaEm: Date | null;
  gapsIdentificados: SessaoCorrecao['gapsIdentificados'];
  correcoesForaPeriodo: SessaoCorrecao['correcoesForaPeriodo'];
  duplicatas: SessaoCorrecao['duplicatas'];
  propostas: PropostaCorrecao[];
  propostasAprovadas: PropostaCorrecao[];
  impactoFinanceiro: SessaoCorrecao['impactoFinanceiro'];
  relatorioValidacao: SessaoCorrecao['relatorioValidacao'];
  mensagemErro: string | null;
  motivoRejeicao: string | null;
  ccoCorrigidaId: string | null;
}

interface EstatisticaStatus {
  status: StatusPromocao;
  quantidade: number;
  contratos: string[];
}

interface EstatisticasPromocao {
  totalRegistros: number;
  porStatus: EstatisticaStatus[];
}

interface ItemHistorico {
  id: string;
  ccoOriginalId: string;
  contratoCpp: string;
  campo: string;
  remessa: number;
  sessaoId: string | null;
  promovidaEm: Date;
  usuarioId: string;
  observacoes: string | null;
}

const LIMITE_HISTORICO = 50;

// ════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════

function statusDe(registro: ContaCustoOleo): StatusPromocao {
  return registro.promocao ? StatusPromocao.PROMOVIDA : StatusPromocao.PENDENTE;
}

function ccoOriginalDe(registro: ContaCustoOleo): string {
  return registro.origemCorrecao?.ccoOriginalId ?? registro.id;
}

function resumir(registro: ContaCustoOleo): ResumoRegistroCorrigido {
  const origem = registro.origemCorrecao;
  return {
    id: registro.id,
    ccoOriginalId: ccoOriginalDe(registro),
    contratoCpp: registro.contratoCpp,
    campo: registro.campo,
    remessa: registro.remessa,
    faseRemessa: registro.faseRemessa,
    sessaoId: origem?.sessaoId ?? null,
    cenario: origem?.cenario ?? null,
    aplicadoEm: origem?.aplicadoEm ?? null,
    status: statusDe(registro),
    promovidaEm: registro.promocao?.promovidaEm ?? null,
    usuarioPromocao: registro.promocao?.usuarioId ?? null,
    valorAtual: valorAtualCco(registro),
    totalCorrecoes: registro.correcoesMonetarias.length,
    correcoesIndice: registro.correcoesMonetarias.filter(c => ehTipoIndice(c.tipo)).length,
    flgRecuperado: registro.flgRecuperado
  };
}

function chaveEntrada(c: CorrecaoMonetaria): string {
  return `${c.tipo}|${c.dataCorrecao.getTime()}`;
}

function mesmosValores(a: CorrecaoMonetaria, b: CorrecaoMonetaria): boolean {
  return a.valorReconhecidoComOH.eq(b.valorReconhecidoComOH) && a.taxaCorrecao.eq(b.taxaCorrecao);
}

function entrada(c: CorrecaoMonetaria, posicao: number, situacao: SituacaoEntrada): EntradaTimeline {
  return {
    posicao,
    dataCorrecao: c.dataCorrecao,
    tipo: c.tipo,
    subTipo: c.subTipo,
    taxa: c.taxaCorrecao,
    valorAntes: c.valorReconhecidoComOhOriginal,
    valorDepois: c.valorReconhecidoComOH,
    diferenca: c.diferencaValor,
    situacao
  };
}

/**
 * Casa cada entrada da corrigida com a primeira entrada ainda livre
 * da original de mesmo tipo e data.
 */
function compararTimelines(original: ContaCustoOleo | null, corrigida: ContaCustoOleo): ComparativoTimelines {
  const correcoesOriginais = original ? original.correcoesMonetarias : [];
  const livres = new Map<string, number[]>();
  correcoesOriginais.forEach((c, i) => {
    const chave = chaveEntrada(c);
    livres.set(chave, [...(livres.get(chave) ?? []), i]);
  });

  const situacaoOriginal: SituacaoEntrada[] = correcoesOriginais.map(() => 'REMOVIDA');
  const timelineCorrigida = corrigida.correcoesMonetarias.map((c, i) => {
    const candidatas = livres.get(chaveEntrada(c));
    const par = candidatas ? candidatas.shift() : undefined;
    if (par === undefined) {
      return entrada(c, i, 'NOVA');
    }
    const situacao: SituacaoEntrada = mesmosValores(correcoesOriginais[par], c) ? 'MANTIDA' : 'ALTERADA';
    situacaoOriginal[par] = situacao;
    return entrada(c, i, situacao);
  });

  const valorAtualOriginal = original ? valorAtualCco(original) : null;
  const valorAtualCorrigido = valorAtualCco(corrigida);

  return {
    original: correcoesOriginais.map((c, i) => entrada(c, i, situacaoOriginal[i])),
    corrigida: timelineCorrigida,
    valorAtualOriginal,
    valorAtualCorrigido,
    diferencaValorAtual: valorAtualOriginal ? valorAtualCorrigido.minus(valorAtualOriginal) : null
  };
}

function atendeFiltros(resumo: ResumoRegistroCorrigido, filtros: FiltrosPromocao): boolean {
  return (
    (filtros.id === undefined || resumo.id === filtros.id) &&
    (filtros.contratoCpp === undefined || resumo.contratoCpp === filtros.contratoCpp) &&
    (filtros.campo === undefined || resumo.campo === filtros.campo) &&
    (filtros.remessa === undefined || resumo.remessa === filtros.remessa) &&
    resumo.status === (filtros.status ?? StatusPromocao.PENDENTE)
  );
}

// ════════════════════════════════════════════════════════════════════════
// SERVIÇO
// ════════════════════════════════════════════════════════════════════════

class PromocaoCorrecoes {
  private ccoRepo: ContaCustoOleoRepository;
  private sessaoRepo: SessaoCorrecaoRepository;
  private logger: Logger;
  private relogio: () => Date;

  constructor(context: PromocaoCorrecoesContext) {
    this.ccoRepo = context.ccoRepo;
    this.sessaoRepo = context.sessaoRepo;
    this.logger = context.logger.child({ componente: 'PromocaoCorrecoes' });
    this.relogio = context.relogio ?? (() => new Date());
  }

  // ══════════════════════════════════════════════════════════════════════
  // PESQUISA
  // ══════════════════════════════════════════════════════════════════════

  async pesquisar(filtros: FiltrosPromocao = {}): Promise<ResultadoPesquisa> {
    const registros = await this.ccoRepo.listarCorrigidas();
    const resultados = registros.map(resumir).filter(r => atendeFiltros(r, filtros));

    const porContrato: Record<string, number> = {};
    for (const r of resultados) {
      porContrato[r.contratoCpp] = (porContrato[r.contratoCpp] ?? 0) + 1;
    }

    return {
      totalEncontrados: resultados.length,
      valorTotalAtual: Decimal.soma(resultados.map(r => r.valorAtual)),
      porContrato,
      resultados
    };
  }

  // ══════════════════════════════════════════════════════════════════════
  // DETALHE E VALIDAÇÃO
  // ══════════════════════════════════════════════════════════════════════

  /**
   * @throws RegistroCorrigidoNaoEncontradoError
   */
  async detalhar(id: string): Promise<DetalheCorrecao> {
    const registro = await this.ccoRepo.buscarCorrigida(id);
    if (!registro) {
      throw new RegistroCorrigidoNaoEncontradoError(id);
    }

    const ccoOriginalId = ccoOriginalDe(registro);
    const [original, sessao, ultima] = await Promise.all([
      this.ccoRepo.buscarPorId(ccoOriginalId),
      registro.origemCorrecao ? this.sessaoRepo.buscarPorId(registro.origemCorrecao.sessaoId) : Promise.resolve(null),
      this.ccoRepo.buscarUltimaCorrigida(ccoOriginalId)
    ]);

    return {
      registro,
      original,
      sessao,
      comparativo: compararTimelines(original, registro),
      validacao: this.validar(registro, original, sessao, ultima)
    };
  }

  /**
   * Bloqueia registro já promovido, sem CCO de origem, superado por
   * correção mais recente ou cuja origem ganhou lançamentos depois da
   * aplicação.
   */
  private validar(
    registro: ContaCustoOleo,
    original: ContaCustoOleo | null,
    sessao: SessaoCorrecao | null,
    ultima: ContaCustoOleo | null
  ): ValidacaoPromocao {
    const motivosBloqueio: string[] = [];
    const avisos: string[] = [];

    if (registro.promocao) {
      motivosBloqueio.push(`Correção já promovida em ${formatarDataBr(registro.promocao.promovidaEm)}`);
    }

    if (!original) {
      motivosBloqueio.push(`CCO de origem ${ccoOriginalDe(registro)} não encontrada`);
    }

    if (ultima && ultima.id !== registro.id) {
      motivosBloqueio.push(`Existe registro corrigido mais recente: ${ultima.id}`);
    }

    const aplicadoEm = registro.origemCorrecao?.aplicadoEm;
    if (original && aplicadoEm) {
      const posteriores = original.correcoesMonetarias.filter(c => c.dataCriacaoCorrecao > aplicadoEm);
      if (posteriores.length > 0) {
        motivosBloqueio.push(`CCO de origem tem ${posteriores.length} lançamento(s) posterior(es) à correção`);
      }
    }

    if (!sessao) {
      avisos.push('Sessão de correção não encontrada: memória de cálculo indisponível');
    }

    if (original && original.flgRecuperado !== registro.flgRecuperado) {
      avisos.push(`flgRecuperado muda de ${original.flgRecuperado} para ${registro.flgRecuperado}`);
    }

    return { podePromover: motivosBloqueio.length === 0, motivosBloqueio, avisos };
  }

  // ══════════════════════════════════════════════════════════════════════
  // PROMOÇÃO
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Grava o registro corrigido sobre a CCO de origem e o marca como promovido.
   *
   * @throws RegistroCorrigidoNaoEncontradoError
   * @throws PromocaoBloqueadaError
   */
  async promover(id: string, usuarioId: string, observacoes: string | null): Promise<ResultadoPromocao> {
    const { registro, validacao } = await this.detalhar(id);
    if (!validacao.podePromover) {
      this.logger.warn({ ccoCorrigidaId: id, motivos: validacao.motivosBloqueio }, 'Promoção bloqueada');
      throw new PromocaoBloqueadaError(id, validacao.motivosBloqueio);
    }

    const agora = this.relogio();
    const ccoId = ccoOriginalDe(registro);

    const atualizada: ContaCustoOleo = { ...registro, id: ccoId };
    delete atualizada.origemCorrecao;
    delete atualizada.promocao;

    await this.ccoRepo.salvar(atualizada);
    await this.ccoRepo.atualizarCorrigida({
      ...registro,
      promocao: { promovidaEm: agora, usuarioId, observacoes }
    });

    const valorAtual = valorAtualCco(registro);
    this.logger.info(
      { ccoId, ccoCorrigidaId: id, usuarioId, valorAtual: valorAtual.toFixed(2) },
      'Correção promovida'
    );

    return { ccoId, ccoCorrigidaId: id, promovidaEm: agora, valorAtual };
  }

  // ══════════════════════════════════════════════════════════════════════
  // MEMÓRIA DE CÁLCULO
  // ══════════════════════════════════════════════════════════════════════

  /**
   * @throws SessaoNaoEncontradaError
   */
  async obterMemoriaCalculo(sessaoId: string): Promise<MemoriaCalculo> {
    const sessao = await this.sessaoRepo.buscarPorId(sessaoId);
    if (!sessao) {
      throw new SessaoNaoEncontradaError(sessaoId);
    }

    const aprovadas = new Set(sessao.aprovadas);
    return {
      sessaoId: sessao.id,
      ccoId: sessao.ccoId,
      usuarioId: sessao.usuarioId,
      status: sessao.status,
      cenario: sessao.cenario,
      criadaEm: sessao.criadaEm,
      atualizadaEm: sessao.atualizadaEm,
      aplicadaEm: sessao.aplicadaEm,
      gapsIdentificados: sessao.gapsIdentificados,
      correcoesForaPeriodo: sessao.correcoesForaPeriodo,
      duplicatas: sessao.duplicatas,
      propostas: sessao.propostas,
      propostasAprovadas: sessao.propostas.filter(p => aprovadas.has(p.id)),
      impactoFinanceiro: sessao.impactoFinanceiro,
      relatorioValidacao: sessao.relatorioValidacao,
      mensagemErro: sessao.mensagemErro,
      motivoRejeicao: sessao.motivoRejeicao,
      ccoCorrigidaId: sessao.ccoCorrigidaId
    };
  }

  // ══════════════════════════════════════════════════════════════════════
  // ESTATÍSTICAS
  // ══════════════════════════════════════════════════════════════════════

  async obterEstatisticas(): Promise<EstatisticasPromocao> {
    const registros = await this.ccoRepo.listarCorrigidas();

    const porStatus = [StatusPromocao.PENDENTE, StatusPromocao.PROMOVIDA].map((status): EstatisticaStatus => {
      const doStatus = registros.filter(r => statusDe(r) === status);
      return {
        status,
        quantidade: doStatus.length,
        contratos: [...new Set(doStatus.map(r => r.contratoCpp))].sort()
      };
    });

    return { totalRegistros: registros.length, porStatus };
  }

  /**
   * Promoções mais recentes primeiro.
   */
  async historico(limite: number = LIMITE_HISTORICO): Promise<ItemHistorico[]> {
    const registros = await this.ccoRepo.listarCorrigidas();
    const itens: ItemHistorico[] = [];
    for (const r of registros) {
      if (!r.promocao) continue;
      itens.push({
        id: r.id,
        ccoOriginalId: ccoOriginalDe(r),
        contratoCpp: r.contratoCpp,
        campo: r.campo,
        remessa: r.remessa,
        sessaoId: r.origemCorrecao?.sessaoId ?? null,
        promovidaEm: r.promocao.promovidaEm,
        usuarioId: r.promocao.usuarioId,
        observacoes: r.promocao.observacoes
      });
    }
    return itens
      .sort((a, b) => b.promovidaEm.getTime() - a.promovidaEm.getTime())
      .slice(0, limite);
  }
}

export { PromocaoCorrecoes, LIMITE_HISTORICO };
export type {
  PromocaoCorrecoesContext,
  FiltrosPromocao,
  ResumoRegistroCorrigido,
  ResultadoPesquisa,
  SituacaoEntrada,
  EntradaTimeline,
  ComparativoTimelines,
  ValidacaoPromocao,
  DetalheCorrecao,
  ResultadoPromocao,
  MemoriaCalculo,
  EstatisticasPromocao,
  ItemHistorico
};
