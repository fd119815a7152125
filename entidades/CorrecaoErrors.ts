/**
 * Erros do fluxo de correção monetária.
 */

// ════════════════════════════════════════════════════════════════════════════
// CLASSE BASE
// ════════════════════════════════════════════════════════════════════════════

/**
 * Erro base para operações de correção.
 */
class CorrecaoError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CorrecaoError';
    this.code = code;
  }
}

// ════════════════════════════════════════════════════════════════════════════
// ERROS ESPECÍFICOS
// ════════════════════════════════════════════════════════════════════════════

class CcoNaoEncontradaError extends CorrecaoError {
  constructor(ccoId: string) {
    super(`CCO ${ccoId} não encontrada`, 'CCO_NOT_FOUND');
    this.name = 'CcoNaoEncontradaError';
  }
}

class SessaoNaoEncontradaError extends CorrecaoError {
  constructor(sessaoId: string) {
    super(`Sessão de correção ${sessaoId} não encontrada`, 'SESSION_NOT_FOUND');
    this.name = 'SessaoNaoEncontradaError';
  }
}

/**
 * Transição de status inválida.
 */
class TransicaoInvalidaError extends CorrecaoError {
  constructor(sessaoId: string, statusAtual: string, statusDestino: string) {
    super(
      `Transição inválida para sessão ${sessaoId}: ${statusAtual} → ${statusDestino}`,
      'INVALID_SESSION_TRANSITION'
    );
    this.name = 'TransicaoInvalidaError';
  }
}

/**
 * Conjunto de propostas aprovadas inválido (vazio ou com ids estranhos à sessão).
 */
class AprovacaoInvalidaError extends CorrecaoError {
  readonly idsInvalidos: string[];

  constructor(sessaoId: string, motivo: string, idsInvalidos: string[] = []) {
    super(`Aprovação inválida na sessão ${sessaoId}: ${motivo}`, 'INVALID_APPROVAL');
    this.name = 'AprovacaoInvalidaError';
    this.idsInvalidos = idsInvalidos;
  }
}

/**
 * Falha ao aplicar correções aprovadas. Sessão vai para ERROR.
 */
class AplicacaoCorrecaoError extends CorrecaoError {
  constructor(sessaoId: string, causa: string) {
    super(`Falha ao aplicar correções da sessão ${sessaoId}: ${causa}`, 'APPLY_FAILED');
    this.name = 'AplicacaoCorrecaoError';
  }
}

class RegistroCorrigidoNaoEncontradoError extends CorrecaoError {
  constructor(id: string) {
    super(`Registro corrigido ${id} não encontrado`, 'CORRECTED_RECORD_NOT_FOUND');
    this.name = 'RegistroCorrigidoNaoEncontradoError';
  }
}

/**
 * Registro corrigido que não pode voltar à CCO de origem.
 */
class PromocaoBloqueadaError extends CorrecaoError {
  readonly motivos: string[];

  constructor(id: string, motivos: string[]) {
    super(`Promoção de ${id} bloqueada: ${motivos.join('; ')}`, 'PROMOTION_BLOCKED');
    this.name = 'PromocaoBloqueadaError';
    this.motivos = motivos;
  }
}

/**
 * Documento persistido que não passa na validação de schema.
 */
class DocumentoInvalidoError extends CorrecaoError {
  constructor(descricao: string, detalhe: string) {
    super(`Documento inválido (${descricao}): ${detalhe}`, 'INVALID_DOCUMENT');
    this.name = 'DocumentoInvalidoError';
  }
}

// ════════════════════════════════════════════════════════════════════════════
// CÓDIGOS DE REGRA
// ════════════════════════════════════════════════════════════════════════════

const CORRECAO_RULE = {
  CCO_NOT_FOUND: 'CCO_NOT_FOUND',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  INVALID_TRANSITION: 'INVALID_SESSION_TRANSITION',
  INVALID_APPROVAL: 'INVALID_APPROVAL',
  APPLY_FAILED: 'APPLY_FAILED',
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',
  CORRECTED_RECORD_NOT_FOUND: 'CORRECTED_RECORD_NOT_FOUND',
  PROMOTION_BLOCKED: 'PROMOTION_BLOCKED'
} as const;

export {
  CorrecaoError,
  CcoNaoEncontradaError,
  SessaoNaoEncontradaError,
  TransicaoInvalidaError,
  AprovacaoInvalidaError,
  AplicacaoCorrecaoError,
  RegistroCorrigidoNaoEncontradoError,
  PromocaoBloqueadaError,
  DocumentoInvalidoError,
  CORRECAO_RULE
};
