/**
 * Factory da instancia Fastify do servico de correcao.
 * Separado do entrypoint para facilitar testes.
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { GatewayConfig } from './GatewayConfig';
import { ContaCustoOleoRepositoryImpl } from '../repositorios/implementacao/ContaCustoOleoRepositoryImpl';
import { TaxaRepositoryImpl } from '../repositorios/implementacao/TaxaRepositoryImpl';
import { SessaoCorrecaoRepositoryImpl } from '../repositorios/implementacao/SessaoCorrecaoRepositoryImpl';
import { AnalisadorGaps } from '../servicos/AnalisadorGaps';
import { MotorCorrecao } from '../servicos/MotorCorrecao';
import { PromocaoCorrecoes } from '../servicos/PromocaoCorrecoes';
import { OrquestradorCorrecao } from '../orquestrador/OrquestradorCorrecao';
import { criarLogger, Logger } from '../utilitarios/Logger';

import { requestIdPlugin } from './plugins/requestIdPlugin';
import { authPlugin } from './plugins/authPlugin';

import { healthRoutes } from './routes/healthRoutes';
import { correcaoRoutes } from './routes/correcaoRoutes';
import { analiseRoutes } from './routes/analiseRoutes';
import { promocaoRoutes } from './routes/promocaoRoutes';
import { mapearErro } from './routes/respostas';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface BuildAppOptions {
  config: GatewayConfig;

  /**
   * Relogio das analises e sessoes (default: new Date())
   */
  relogio?: () => Date;

  /**
   * Logger dos servicos (default: pino no nivel da configuracao)
   */
  logger?: Logger;
}

// ════════════════════════════════════════════════════════════════════════════
// FACTORY
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cria e configura instancia Fastify com todos os plugins e rotas.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const relogio = options.relogio ?? (() => new Date());
  const logger = options.logger ?? criarLogger({ level: config.logLevel });

  // ══════════════════════════════════════════════════════════════════════════
  // REPOSITORIOS E SERVICOS
  // ══════════════════════════════════════════════════════════════════════════

  const ccoRepo = new ContaCustoOleoRepositoryImpl(config.baseDir);
  const sessaoRepo = new SessaoCorrecaoRepositoryImpl(config.baseDir);
  const taxaRepo = await TaxaRepositoryImpl.create(config.baseDir);

  const analisador = new AnalisadorGaps({
    taxaRepo,
    ccoRepo,
    logger,
    configuracao: config.correcao
  });
  const motor = new MotorCorrecao({
    taxaRepo,
    ccoRepo,
    logger,
    configuracao: config.correcao
  });
  const orquestrador = new OrquestradorCorrecao({
    ccoRepo,
    sessaoRepo,
    analisador,
    motor,
    logger,
    relogio
  });
  const promocao = new PromocaoCorrecoes({
    ccoRepo,
    sessaoRepo,
    logger,
    relogio
  });

  // ══════════════════════════════════════════════════════════════════════════
  // CRIAR FASTIFY
  // ══════════════════════════════════════════════════════════════════════════

  const app = Fastify({
    logger: {
      level: config.logLevel
    }
  });

  app.decorate('ccoRepo', ccoRepo);
  app.decorate('taxaRepo', taxaRepo);
  app.decorate('analisador', analisador);
  app.decorate('orquestrador', orquestrador);
  app.decorate('promocao', promocao);
  app.decorate('configuracao', config.correcao);
  app.decorate('relogio', relogio);

  // ══════════════════════════════════════════════════════════════════════════
  // REGISTRAR PLUGINS
  // ══════════════════════════════════════════════════════════════════════════

  // Request ID tracking (primeiro de todos)
  await app.register(requestIdPlugin, {
    logMetrics: config.nodeEnv !== 'test',
    logLevel: 'info'
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS']
  });

  await app.register(authPlugin, {
    apiToken: config.apiToken
  });

  app.setErrorHandler((error, request, reply) => {
    const { status, corpo } = mapearErro(error);
    if (status >= 500) {
      request.log.error({ err: error, requestId: request.requestId }, corpo.message);
    } else {
      request.log.warn({ code: corpo.code, requestId: request.requestId }, corpo.message);
    }
    return reply.code(status).send(corpo);
  });

  // ══════════════════════════════════════════════════════════════════════════
  // REGISTRAR ROTAS
  // ══════════════════════════════════════════════════════════════════════════

  await app.register(healthRoutes);
  await app.register(correcaoRoutes, { prefix: '/api/v1/correcoes' });
  await app.register(analiseRoutes, { prefix: '/api/v1' });
  await app.register(promocaoRoutes, { prefix: '/api/v1/promocoes' });

  app.addHook('onClose', async () => {
    logger.info({ baseDir: config.baseDir }, 'Gateway encerrado');
  });

  return app;
}
