/**
 * Mapeamento de erros de dominio para respostas HTTP.
 */

import { CorrecaoError, CORRECAO_RULE } from '../../entidades/CorrecaoErrors';
import { Esquema, interpretarDocumento } from '../../entidades/esquemas';
import { Resultado, falha } from '../../utilitarios/Resultado';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface ErroHttp {
  status: number;
  corpo: {
    error: string;
    code: string;
    message: string;
  };
}

const STATUS_POR_CODIGO: Record<string, number> = {
  [CORRECAO_RULE.CCO_NOT_FOUND]: 404,
  [CORRECAO_RULE.SESSION_NOT_FOUND]: 404,
  [CORRECAO_RULE.INVALID_TRANSITION]: 409,
  [CORRECAO_RULE.INVALID_APPROVAL]: 400,
  [CORRECAO_RULE.INVALID_DOCUMENT]: 422,
  [CORRECAO_RULE.APPLY_FAILED]: 500,
  [CORRECAO_RULE.CORRECTED_RECORD_NOT_FOUND]: 404,
  [CORRECAO_RULE.PROMOTION_BLOCKED]: 409
};

const NOME_STATUS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  422: 'Unprocessable Entity',
  500: 'Internal Server Error'
};

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

function statusDoFramework(error: unknown): number | null {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return null;
}

/**
 * Converte qualquer erro lancado por uma rota em status + corpo.
 * Erros desconhecidos viram 500 sem expor a mensagem interna.
 */
export function mapearErro(error: unknown): ErroHttp {
  if (error instanceof CorrecaoError) {
    const status = STATUS_POR_CODIGO[error.code] ?? 500;
    return {
      status,
      corpo: { error: NOME_STATUS[status] ?? 'Error', code: error.code, message: error.message }
    };
  }

  const statusFramework = statusDoFramework(error);
  if (statusFramework !== null) {
    return {
      status: statusFramework,
      corpo: {
        error: NOME_STATUS[statusFramework] ?? 'Bad Request',
        code: 'INVALID_REQUEST',
        message: error instanceof Error ? error.message : 'Invalid request'
      }
    };
  }

  return {
    status: 500,
    corpo: { error: 'Internal Server Error', code: 'INTERNAL_ERROR', message: 'Unexpected error' }
  };
}

/**
 * Valida entrada (body, params, querystring) com o schema.
 * Em falha, retorna o corpo de resposta 400.
 */
export function validarEntrada<T>(schema: Esquema<T>, bruto: unknown): Resultado<T, ErroHttp['corpo']> {
  const resultado = interpretarDocumento(schema, bruto);
  if (!resultado.ok) {
    return falha({ error: 'Bad Request', code: 'INVALID_REQUEST', message: resultado.erro });
  }
  return resultado;
}
