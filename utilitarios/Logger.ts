/**
 * Logger estruturado (pino) dos serviços de correção.
 *
 * O gateway HTTP mantém o logger próprio do Fastify; serviços recebem
 * uma instância deste módulo pelo contexto e derivam filhos por componente.
 */

import pino, { Logger } from 'pino';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface LoggerOptions {
  /**
   * Nivel minimo (default: 'info')
   */
  level?: string;

  /**
   * Nome do processo nos registros (default: 'correcao-cco')
   */
  name?: string;
}

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

export function criarLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? 'info',
    name: options.name ?? 'correcao-cco',
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

/**
 * Logger que descarta tudo. Usado em testes.
 */
export function criarLoggerSilencioso(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
