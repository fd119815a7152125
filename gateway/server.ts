#!/usr/bin/env node
/**
 * Entrypoint do gateway de correcao monetaria.
 *
 * Uso:
 *   npm run build && npm start
 *
 * Variaveis de ambiente:
 *   GATEWAY_PORT              - Porta HTTP (default: 3000)
 *   GATEWAY_HOST              - Host para bind (default: 0.0.0.0)
 *   GATEWAY_BASE_DIR          - Diretorio de dados (default: ./data)
 *   GATEWAY_API_TOKEN         - Bearer token de /api (obrigatorio em prod)
 *   GATEWAY_CORS_ORIGINS      - Origens CORS (comma-separated, default: *)
 *   GATEWAY_LOG_LEVEL         - Nivel de log (default: info)
 *   CORRECAO_OFFSET_MES_TAXA  - Deslocamento do mes da taxa (default: -1)
 *   CORRECAO_DIA_CORTE        - Dia de corte do aniversario (default: 19)
 *   CORRECAO_TAXA_ESTIMADA    - Taxa de estimativa de impacto (default: 0.045)
 *   NODE_ENV                  - Ambiente (development/production/test)
 */

import { loadConfig, validateConfig } from './GatewayConfig';
import { buildApp } from './app';

// ════════════════════════════════════════════════════════════════════════════
// MAIN
// ════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  Correção IPCA/IGPM - Contas Custo Óleo');
  console.log('═══════════════════════════════════════════════════════════');

  const config = loadConfig();
  validateConfig(config);

  console.log(`\n📋 Configuration:`);
  console.log(`   Port:     ${config.port}`);
  console.log(`   Host:     ${config.host}`);
  console.log(`   Base Dir: ${config.baseDir}`);
  console.log(`   Env:      ${config.nodeEnv}`);
  console.log(`   Log:      ${config.logLevel}`);
  console.log(`   Token:    ${config.apiToken ? '✓ configured' : '✗ not set'}`);
  console.log(`   Offset:   ${config.correcao.offsetMesTaxa} mês(es)`);
  console.log(`   Corte:    dia ${config.correcao.diaCorteAniversario}`);

  const app = await buildApp({ config });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\n${signal} received, shutting down...`);
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });

  try {
    await app.listen({
      port: config.port,
      host: config.host
    });

    console.log(`\n✅ Gateway listening on http://${config.host}:${config.port}`);
    console.log(`\n📚 Endpoints:`);
    console.log(`   Health:    GET /health, GET /health/ready`);
    console.log(`   Correção:  /api/v1/correcoes/*`);
    console.log(`   Análises:  /api/v1/analises/*, /api/v1/ccos/:id/analise`);
    console.log(`\n═══════════════════════════════════════════════════════════\n`);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
