import * as crypto from 'crypto';
import { ContaCustoOleoRepository } from '../repositorios/interfaces/ContaCustoOleoRepository';
import { SessaoCorrecaoRepository } from '../repositorios/interfaces/SessaoCorrecaoRepository';
import { AnalisadorGaps } from '../servicos/AnalisadorGaps';
import { MotorCorrecao } from '../servicos/MotorCorrecao';
import { validarPropostas } from '../servicos/ValidadorCorrecoes';
import {
  SessaoCorrecao,
  StatusSessao,
  CenarioCorrecao,
  TipoProposta,
  PropostaCorrecao,
  ImpactoFinanceiro,
  RelatorioValidacao
} from '../entidades/tipos';
import {
  CcoNaoEncontradaError,
  SessaoNaoEncontradaError,
  TransicaoInvalidaError,
  AprovacaoInvalidaError,
  AplicacaoCorrecaoError
} from '../entidades/CorrecaoErrors';
import {
  classificarCenario,
  temCorrecaoAposPrimeiroGap,
  temRecuperacao,
  CENARIOS_AUTO_CORRIGIVEIS
} from './classificarCenario';
import { Decimal } from '../utilitarios/Decimal';
import { Logger } from '../utilitarios/Logger';
import { formatarPeriodo } from '../utilitarios/Periodo';

// ════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════

interface OrquestradorCorrecaoContext {
  ccoRepo: ContaCustoOleoRepository;
  sessaoRepo: SessaoCorrecaoRepository;
  analisador: AnalisadorGaps;
  motor: MotorCorrecao;
  logger: Logger;
  /** Relógio injetável (default: new Date()) */
  relogio?: () => Date;
  /** Gerador de ids de sessão (default: UUID v4) */
  gerarId?: () => string;
}

interface ResumoAnalise {
  sessaoId: string;
  ccoId: string;
  cenario: CenarioCorrecao;
  autoCorrigivel: boolean;
  quantidadeGaps: number;
  quantidadeCorrecoesForaPeriodo: number;
  quantidadeDuplicatas: number;
  analisadoEm: Date;
}

interface ResultadoPropostas {
  sessaoId: string;
  cenario: CenarioCorrecao;
  autoCorrigivel: boolean;
  propostas: PropostaCorrecao[];
  impactoFinanceiro: ImpactoFinanceiro;
}

interface PreviewFinal {
  sessaoId: string;
  propostasAprovadas: PropostaCorrecao[];
  /** Soma das compensações aprovadas; sem compensação, soma de adições e atualizações */
  impactoFinanceiroTotal: Decimal;
  relatorioValidacao: RelatorioValidacao;
  prontoParaAplicar: boolean;
}

interface ResultadoAplicacao {
  sessaoId: string;
  status: StatusSessao;
  aplicadaEm: Date;
  ccoCorrigidaId: string;
  quantidadeAplicadas: number;
}

type AvaliacaoIpcaAnoVigente =
  | { aplicavel: false; motivo: string }
  | { aplicavel: true; sessao: SessaoCorrecao; propostas: PropostaCorrecao[] };

// ════════════════════════════════════════════════════════════════════════
// MÁQUINA DE ESTADOS
// ════════════════════════════════════════════════════════════════════════

/**
 * ERROR é alcançável de qualquer estado. De ERROR só se sai reaplicando.
 */
const TRANSICOES_SESSAO: Record<StatusSessao, StatusSessao[]> = {
  [StatusSessao.ANALYZING]: [StatusSessao.PREVIEW, StatusSessao.ERROR],
  [StatusSessao.PREVIEW]: [StatusSessao.APPROVED, StatusSessao.REJECTED, StatusSessao.ERROR],
  [StatusSessao.APPROVED]: [StatusSessao.APPROVED, StatusSessao.APPLIED, StatusSessao.REJECTED, StatusSessao.ERROR],
  [StatusSessao.APPLIED]: [StatusSessao.ERROR],
  [StatusSessao.REJECTED]: [StatusSessao.ERROR],
  [StatusSessao.ERROR]: [StatusSessao.APPLIED, StatusSessao.ERROR]
};

const TIPOS_IMPACTO_DIRETO = new Set<TipoProposta>([TipoProposta.IPCA_ADDITION, TipoProposta.IPCA_UPDATE]);

function somarImpacto(propostas: readonly PropostaCorrecao[], tipo: TipoProposta): Decimal {
  return Decimal.soma(propostas.filter(p => p.tipo === tipo).map(p => p.impacto));
}

/**
 * Totais do lote. O ajuste de duplicatas entra pelo valor proposto.
 */
function calcularImpactoFinanceiro(propostas: readonly PropostaCorrecao[]): ImpactoFinanceiro {
  const totalAdicoes = somarImpacto(propostas, TipoProposta.IPCA_ADDITION);
  const totalAtualizacoes = somarImpacto(propostas, TipoProposta.IPCA_UPDATE);
  const totalCompensacoes = somarImpacto(propostas, TipoProposta.COMPENSATION);
  const totalRemocao = Decimal.soma(
    propostas.filter(p => p.tipo === TipoProposta.DUPLICATA_ADJUSTMENT).map(p => p.valorProposto)
  );

  return {
    impactoTotal: totalAdicoes.plus(totalAtualizacoes).plus(totalRemocao),
    totalAdicoes,
    totalAtualizacoes,
    totalRemocao,
    totalCompensacoes,
    quantidadePropostas: propostas.length
  };
}

function impactoDasAprovadas(aprovadas: readonly PropostaCorrecao[]): Decimal {
  const compensacoes = aprovadas.filter(p => p.tipo === TipoProposta.COMPENSATION);
  if (compensacoes.length > 0) {
    return Decimal.soma(compensacoes.map(p => p.impacto));
  }
  return Decimal.soma(aprovadas.filter(p => TIPOS_IMPACTO_DIRETO.has(p.tipo)).map(p => p.impacto));
}

function mensagemDe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ════════════════════════════════════════════════════════════════════════
// ORQUESTRADOR
// ════════════════════════════════════════════════════════════════════════

/**
 * Orquestrador de Correção
 *
 * PRINCÍPIOS:
 * - Sessão persistida é a única fonte de verdade entre chamadas
 * - Todo passo revalida o status antes de agir
 * - Registro de origem da CCO nunca é alterado
 *
 * Fluxo: ANALYZING → PREVIEW → APPROVED → APPLIED
 */
class OrquestradorCorrecao {
  private ccoRepo: ContaCustoOleoRepository;
  private sessaoRepo: SessaoCorrecaoRepository;
  private analisador: AnalisadorGaps;
  private motor: MotorCorrecao;
  private logger: Logger;
  private relogio: () => Date;
  private gerarId: () => string;

  constructor(context: OrquestradorCorrecaoContext) {
    this.ccoRepo = context.ccoRepo;
    this.sessaoRepo = context.sessaoRepo;
    this.analisador = context.analisador;
    this.motor = context.motor;
    this.logger = context.logger.child({ componente: 'OrquestradorCorrecao' });
    this.relogio = context.relogio ?? (() => new Date());
    this.gerarId = context.gerarId ?? (() => crypto.randomUUID());
  }

  // ══════════════════════════════════════════════════════════════════════
  // SUPORTE
  // ══════════════════════════════════════════════════════════════════════

  private async carregarSessao(sessaoId: string): Promise<SessaoCorrecao> {
    const sessao = await this.sessaoRepo.buscarPorId(sessaoId);
    if (!sessao) {
      throw new SessaoNaoEncontradaError(sessaoId);
    }
    return sessao;
  }

  private validarTransicao(sessao: SessaoCorrecao, destino: StatusSessao): void {
    if (!TRANSICOES_SESSAO[sessao.status].includes(destino)) {
      throw new TransicaoInvalidaError(sessao.id, sessao.status, destino);
    }
  }

  private async registrarErro(sessao: SessaoCorrecao, mensagem: string): Promise<void> {
    const agora = this.relogio();
    await this.sessaoRepo.salvar({
      ...sessao,
      status: StatusSessao.ERROR,
      mensagemErro: mensagem,
      atualizadaEm: agora
    });
    this.logger.error({ sessaoId: sessao.id, ccoId: sessao.ccoId, status: sessao.status }, mensagem);
  }

  // ══════════════════════════════════════════════════════════════════════
  // FLUXO PRINCIPAL
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Analisa a CCO, classifica o cenário e cria a sessão em ANALYZING.
   *
   * @throws CcoNaoEncontradaError
   */
  async IniciarAnalise(ccoId: string, usuarioId: string): Promise<ResumoAnalise> {
    const cco = await this.ccoRepo.buscarPorId(ccoId);
    if (!cco) {
      throw new CcoNaoEncontradaError(ccoId);
    }

    const agora = this.relogio();
    const analise = await this.analisador.analisarCco(cco, agora);

    const cenario = classificarCenario({
      temGaps: analise.gaps.length > 0,
      temCorrecoesForaPeriodo: analise.correcoesForaPeriodo.length > 0,
      temRecuperacao: temRecuperacao(cco),
      temDuplicatas: analise.duplicatas.length > 0,
      temCorrecaoAposPrimeiroGap: temCorrecaoAposPrimeiroGap(cco, analise.gaps)
    });

    const sessao: SessaoCorrecao = {
      id: this.gerarId(),
      ccoId,
      usuarioId,
      status: StatusSessao.ANALYZING,
      cenario,
      gapsIdentificados: analise.gaps,
      correcoesForaPeriodo: analise.correcoesForaPeriodo,
      duplicatas: analise.duplicatas,
      propostas: [],
      aprovadas: [],
      impactoFinanceiro: null,
      relatorioValidacao: null,
      criadaEm: agora,
      atualizadaEm: agora,
      aplicadaEm: null,
      mensagemErro: null,
      motivoRejeicao: null,
      ccoCorrigidaId: null
    };

    await this.sessaoRepo.salvar(sessao);

    this.logger.info(
      {
        sessaoId: sessao.id,
        ccoId,
        usuarioId,
        cenario,
        gaps: analise.gaps.length,
        foraPeriodo: analise.correcoesForaPeriodo.length,
        duplicatas: analise.duplicatas.length
      },
      'Análise iniciada'
    );

    return {
      sessaoId: sessao.id,
      ccoId,
      cenario,
      autoCorrigivel: CENARIOS_AUTO_CORRIGIVEIS.has(cenario),
      quantidadeGaps: analise.gaps.length,
      quantidadeCorrecoesForaPeriodo: analise.correcoesForaPeriodo.length,
      quantidadeDuplicatas: analise.duplicatas.length,
      analisadoEm: agora
    };
  }

  /**
   * Calcula as propostas do cenário da sessão e move para PREVIEW.
   * Cenários sem cálculo automático chegam a PREVIEW com lista vazia.
   */
  async GerarPropostas(sessaoId: string): Promise<ResultadoPropostas> {
    const sessao = await this.carregarSessao(sessaoId);
    this.validarTransicao(sessao, StatusSessao.PREVIEW);

    const agora = this.relogio();
    let propostas: PropostaCorrecao[];
    let autoCorrigivel = true;

    try {
      const cco = await this.ccoRepo.buscarPorId(sessao.ccoId);
      if (!cco) {
        throw new CcoNaoEncontradaError(sessao.ccoId);
      }

      const resultado = await this.motor.calcularPropostas(
        sessao.cenario,
        cco,
        {
          gaps: sessao.gapsIdentificados,
          correcoesForaPeriodo: sessao.correcoesForaPeriodo,
          duplicatas: sessao.duplicatas
        },
        agora
      );

      if (resultado.ok) {
        propostas = resultado.valor;
      } else {
        this.logger.warn({ sessaoId, cenario: sessao.cenario }, resultado.erro);
        propostas = [];
        autoCorrigivel = false;
      }
    } catch (error) {
      await this.registrarErro(sessao, mensagemDe(error));
      throw error;
    }

    const impactoFinanceiro = calcularImpactoFinanceiro(propostas);

    await this.sessaoRepo.salvar({
      ...sessao,
      status: StatusSessao.PREVIEW,
      propostas,
      impactoFinanceiro,
      atualizadaEm: agora
    });

    this.logger.info(
      {
        sessaoId,
        cenario: sessao.cenario,
        propostas: propostas.length,
        naoResolviveis: propostas.filter(p => !p.resolvivel).length,
        impactoTotal: impactoFinanceiro.impactoTotal.toFixed(2)
      },
      'Propostas geradas'
    );

    return {
      sessaoId,
      cenario: sessao.cenario,
      autoCorrigivel,
      propostas,
      impactoFinanceiro
    };
  }

  /**
   * Registra o subconjunto aprovado e o relatório de validação.
   *
   * @throws AprovacaoInvalidaError se a lista é vazia ou tem ids fora da sessão
   */
  async AprovarCorrecoes(sessaoId: string, propostasIds: readonly string[]): Promise<PreviewFinal> {
    const sessao = await this.carregarSessao(sessaoId);
    this.validarTransicao(sessao, StatusSessao.APPROVED);

    if (propostasIds.length === 0) {
      throw new AprovacaoInvalidaError(sessaoId, 'nenhuma proposta selecionada');
    }

    const conhecidas = new Set(sessao.propostas.map(p => p.id));
    const invalidos = propostasIds.filter(id => !conhecidas.has(id));
    if (invalidos.length > 0) {
      throw new AprovacaoInvalidaError(sessaoId, `ids desconhecidos: ${invalidos.join(', ')}`, invalidos);
    }

    const selecionadas = new Set(propostasIds);
    const aprovadas = sessao.propostas.filter(p => selecionadas.has(p.id));
    const relatorioValidacao = validarPropostas(aprovadas);
    const agora = this.relogio();

    await this.sessaoRepo.salvar({
      ...sessao,
      status: StatusSessao.APPROVED,
      aprovadas: aprovadas.map(p => p.id),
      relatorioValidacao,
      atualizadaEm: agora
    });

    this.logger.info(
      {
        sessaoId,
        aprovadas: aprovadas.length,
        erros: relatorioValidacao.erros.length,
        avisos: relatorioValidacao.avisos.length
      },
      'Correções aprovadas'
    );

    return {
      sessaoId,
      propostasAprovadas: aprovadas,
      impactoFinanceiroTotal: impactoDasAprovadas(aprovadas),
      relatorioValidacao,
      prontoParaAplicar: true
    };
  }

  /**
   * Aplica as aprovadas. Falha leva a sessão para ERROR; a sessão continua
   * carregável e pode ser reaplicada.
   *
   * @throws AplicacaoCorrecaoError
   */
  async AplicarCorrecoes(sessaoId: string): Promise<ResultadoAplicacao> {
    const sessao = await this.carregarSessao(sessaoId);
    this.validarTransicao(sessao, StatusSessao.APPLIED);

    if (sessao.aprovadas.length === 0) {
      throw new TransicaoInvalidaError(sessao.id, sessao.status, StatusSessao.APPLIED);
    }

    const aprovadas = new Set(sessao.aprovadas);
    const propostas = sessao.propostas.filter(p => aprovadas.has(p.id));
    const agora = this.relogio();

    let ccoCorrigidaId: string;
    try {
      const cco = await this.ccoRepo.buscarPorId(sessao.ccoId);
      if (!cco) {
        throw new CcoNaoEncontradaError(sessao.ccoId);
      }
      const corrigida = await this.motor.aplicar(sessao.cenario, cco, propostas, sessao.id, agora);
      ccoCorrigidaId = corrigida.id;
    } catch (error) {
      const mensagem = mensagemDe(error);
      await this.registrarErro(sessao, mensagem);
      throw new AplicacaoCorrecaoError(sessaoId, mensagem);
    }

    await this.sessaoRepo.salvar({
      ...sessao,
      status: StatusSessao.APPLIED,
      aplicadaEm: agora,
      atualizadaEm: agora,
      mensagemErro: null,
      ccoCorrigidaId
    });

    return {
      sessaoId,
      status: StatusSessao.APPLIED,
      aplicadaEm: agora,
      ccoCorrigidaId,
      quantidadeAplicadas: propostas.length
    };
  }

  async RejeitarSessao(sessaoId: string, motivo: string | null = null): Promise<SessaoCorrecao> {
    const sessao = await this.carregarSessao(sessaoId);
    this.validarTransicao(sessao, StatusSessao.REJECTED);

    const rejeitada: SessaoCorrecao = {
      ...sessao,
      status: StatusSessao.REJECTED,
      motivoRejeicao: motivo,
      atualizadaEm: this.relogio()
    };
    await this.sessaoRepo.salvar(rejeitada);

    this.logger.info({ sessaoId, statusAnterior: sessao.status, motivo }, 'Sessão rejeitada');
    return rejeitada;
  }

  async ObterStatusSessao(sessaoId: string): Promise<SessaoCorrecao> {
    return this.carregarSessao(sessaoId);
  }

  // ══════════════════════════════════════════════════════════════════════
  // IPCA DO ANO VIGENTE
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Cria sessão direto em PREVIEW quando a correção do ano corrente é devida.
   *
   * @throws CcoNaoEncontradaError
   */
  async AvaliarIpcaAnoVigente(ccoId: string, usuarioId: string): Promise<AvaliacaoIpcaAnoVigente> {
    const cco = await this.ccoRepo.buscarPorId(ccoId);
    if (!cco) {
      throw new CcoNaoEncontradaError(ccoId);
    }

    const agora = this.relogio();
    const avaliacao = await this.motor.avaliarIpcaVigente(cco, agora);
    if (!avaliacao.ok) {
      this.logger.info({ ccoId, motivo: avaliacao.erro }, 'IPCA do ano vigente não aplicável');
      return { aplicavel: false, motivo: avaliacao.erro };
    }

    const { propostas, periodo, base } = avaliacao.valor;
    const sessao: SessaoCorrecao = {
      id: this.gerarId(),
      ccoId,
      usuarioId,
      status: StatusSessao.PREVIEW,
      cenario: CenarioCorrecao.CENARIO_IPCA_VIGENTE,
      gapsIdentificados: [],
      correcoesForaPeriodo: [],
      duplicatas: [],
      propostas,
      aprovadas: [],
      impactoFinanceiro: calcularImpactoFinanceiro(propostas),
      relatorioValidacao: null,
      criadaEm: agora,
      atualizadaEm: agora,
      aplicadaEm: null,
      mensagemErro: null,
      motivoRejeicao: null,
      ccoCorrigidaId: null
    };
    await this.sessaoRepo.salvar(sessao);

    this.logger.info(
      { sessaoId: sessao.id, ccoId, base: base.id, periodo: formatarPeriodo(periodo) },
      'Sessão de IPCA do ano vigente criada'
    );

    return { aplicavel: true, sessao, propostas };
  }
}

export { OrquestradorCorrecao, TRANSICOES_SESSAO, calcularImpactoFinanceiro };
export type {
  OrquestradorCorrecaoContext,
  ResumoAnalise,
  ResultadoPropostas,
  PreviewFinal,
  ResultadoAplicacao,
  AvaliacaoIpcaAnoVigente
};
