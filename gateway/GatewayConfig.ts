/**
 * Configuracao do gateway HTTP de correcao monetaria.
 *
 * Unico ponto que le variaveis de ambiente; servicos recebem
 * ConfiguracaoCorrecao ja montada.
 */

import { Decimal } from '../utilitarios/Decimal';
import { DIA_CORTE_PADRAO, OFFSET_MES_TAXA_PADRAO } from '../utilitarios/Periodo';
import { ConfiguracaoCorrecao } from '../entidades/tipos';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

type NodeEnv = 'development' | 'production' | 'test';
type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Configuracao do Gateway
 */
export interface GatewayConfig {
  /**
   * Porta HTTP (default: 3000)
   */
  port: number;

  /**
   * Host para bind (default: '0.0.0.0')
   */
  host: string;

  /**
   * Diretorio dos documentos JSON (default: './data')
   */
  baseDir: string;

  /**
   * Bearer token exigido em /api/*.
   * Vazio desliga a autenticacao; obrigatorio em producao.
   */
  apiToken: string;

  /**
   * Origens CORS permitidas (default: ['*'])
   */
  corsOrigins: string[];

  nodeEnv: NodeEnv;

  /**
   * Nivel de log (default: 'info')
   */
  logLevel: LogLevel;

  /**
   * Regras de calculo das correcoes
   */
  correcao: ConfiguracaoCorrecao;
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_CONFIG: GatewayConfig = {
  port: 3000,
  host: '0.0.0.0',
  baseDir: './data',
  apiToken: '',
  corsOrigins: ['*'],
  nodeEnv: 'development',
  logLevel: 'info',
  correcao: {
    offsetMesTaxa: OFFSET_MES_TAXA_PADRAO,
    diaCorteAniversario: DIA_CORTE_PADRAO,
    taxaEstimadaImpacto: Decimal.parse('0.045')
  }
};

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseNodeEnv(valor: string | undefined): NodeEnv {
  return NODE_ENVS.find(e => e === valor) ?? DEFAULT_CONFIG.nodeEnv;
}

function parseLogLevel(valor: string | undefined): LogLevel {
  return LOG_LEVELS.find(l => l === valor) ?? DEFAULT_CONFIG.logLevel;
}

function parseInteiro(valor: string | undefined, padrao: number): number {
  if (valor === undefined || valor.trim() === '') {
    return padrao;
  }
  return parseInt(valor, 10);
}

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

/**
 * Carrega configuracao do ambiente.
 * Variaveis de ambiente:
 * - GATEWAY_PORT
 * - GATEWAY_HOST
 * - GATEWAY_BASE_DIR
 * - GATEWAY_API_TOKEN
 * - GATEWAY_CORS_ORIGINS (comma-separated)
 * - NODE_ENV
 * - GATEWAY_LOG_LEVEL
 * - CORRECAO_OFFSET_MES_TAXA
 * - CORRECAO_DIA_CORTE
 * - CORRECAO_TAXA_ESTIMADA
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);
  const apiToken = env.GATEWAY_API_TOKEN || '';

  // Em producao, apiToken e obrigatorio
  if (nodeEnv === 'production' && !apiToken) {
    throw new Error('GATEWAY_API_TOKEN is required in production');
  }

  const corsOriginsEnv = env.GATEWAY_CORS_ORIGINS;
  const corsOrigins = corsOriginsEnv
    ? corsOriginsEnv.split(',').map(s => s.trim())
    : DEFAULT_CONFIG.corsOrigins;

  const taxaEstimada = env.CORRECAO_TAXA_ESTIMADA;
  if (taxaEstimada && !Decimal.isDecimalValido(taxaEstimada)) {
    throw new Error(`Invalid CORRECAO_TAXA_ESTIMADA: ${taxaEstimada}`);
  }

  return {
    port: parseInteiro(env.GATEWAY_PORT, DEFAULT_CONFIG.port),
    host: env.GATEWAY_HOST || DEFAULT_CONFIG.host,
    baseDir: env.GATEWAY_BASE_DIR || DEFAULT_CONFIG.baseDir,
    apiToken,
    corsOrigins,
    nodeEnv,
    logLevel: parseLogLevel(env.GATEWAY_LOG_LEVEL),
    correcao: {
      offsetMesTaxa: parseInteiro(env.CORRECAO_OFFSET_MES_TAXA, DEFAULT_CONFIG.correcao.offsetMesTaxa),
      diaCorteAniversario: parseInteiro(env.CORRECAO_DIA_CORTE, DEFAULT_CONFIG.correcao.diaCorteAniversario),
      taxaEstimadaImpacto: taxaEstimada
        ? Decimal.parse(taxaEstimada)
        : DEFAULT_CONFIG.correcao.taxaEstimadaImpacto
    }
  };
}

/**
 * Valida a configuracao carregada.
 * @throws Error se a configuracao for invalida
 */
export function validateConfig(config: GatewayConfig): void {
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}`);
  }

  if (!config.baseDir) {
    throw new Error('baseDir is required');
  }

  if (config.nodeEnv === 'production' && !config.apiToken) {
    throw new Error('apiToken is required in production');
  }

  const { offsetMesTaxa, diaCorteAniversario } = config.correcao;
  if (!Number.isInteger(offsetMesTaxa) || offsetMesTaxa < -12 || offsetMesTaxa > 12) {
    throw new Error(`Invalid offsetMesTaxa: ${offsetMesTaxa}`);
  }

  if (!Number.isInteger(diaCorteAniversario) || diaCorteAniversario < 1 || diaCorteAniversario > 28) {
    throw new Error(`Invalid diaCorteAniversario: ${diaCorteAniversario}`);
  }
}

export { DEFAULT_CONFIG };
