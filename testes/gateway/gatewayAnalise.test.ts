/**
 * Testes HTTP das rotas de consulta, health e autenticacao.
 */

import { FastifyInstance } from 'fastify';
import { buildApp } from '../../gateway/app';
import { GatewayConfig, DEFAULT_CONFIG } from '../../gateway/GatewayConfig';
import { criarLoggerSilencioso } from '../../utilitarios/Logger';
import { createTestDataDir, TestDataDir } from '../helpers/testDataDir';
import { criarCco, correcaoIpca, taxa, data } from '../helpers/fixtures';

// ════════════════════════════════════════════════════════════════════════════
// SETUP
// ════════════════════════════════════════════════════════════════════════════

const AGORA = data(2024, 12, 1);
const API_TOKEN = 'test-secret';

let testDir: TestDataDir;

function testConfig(baseDir: string, apiToken: string = ''): GatewayConfig {
  return {
    ...DEFAULT_CONFIG,
    port: 0,
    host: '127.0.0.1',
    baseDir,
    apiToken,
    nodeEnv: 'test',
    logLevel: 'silent'
  };
}

async function criarApp(apiToken: string = ''): Promise<FastifyInstance> {
  return buildApp({
    config: testConfig(testDir.dir, apiToken),
    relogio: () => AGORA,
    logger: criarLoggerSilencioso()
  });
}

beforeEach(async () => {
  testDir = await createTestDataDir('gateway-analise');
  await testDir.escreverJson('ccos.json', [
    criarCco({ id: 'a', contratoCpp: 'CPP-001', dataReconhecimento: data(2023, 8, 15), valor: '1000000' }),
    criarCco({
      id: 'b',
      contratoCpp: 'CPP-001',
      dataReconhecimento: data(2023, 8, 15),
      valor: '200000',
      correcoes: [correcaoIpca(data(2024, 9, 16), '200000', '1.045')]
    }),
    criarCco({ id: 'c', contratoCpp: 'CPP-002', dataReconhecimento: data(2022, 5, 3), valor: '300000' })
  ]);
  await testDir.escreverJson('taxas.json', [taxa(2024, 8, '4.5')]);
});

afterEach(async () => {
  await testDir.cleanup();
});

// ════════════════════════════════════════════════════════════════════════════
// HEALTH
// ════════════════════════════════════════════════════════════════════════════

describe('Gateway - health', () => {
  test('GET /health responde ok', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).status).toBe('ok');
    await app.close();
  });

  test('GET /health/ready conta documentos carregados', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body).dados).toEqual({ carregados: true, ccos: 3, taxas: 1 });
    await app.close();
  });

  test('GET /health/ready responde 503 com documento invalido', async () => {
    const app = await criarApp();
    await testDir.escreverJson('ccos.json', [{ id: 'quebrada' }]);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(JSON.parse(response.body).dados.carregados).toBe(false);
    await app.close();
  });

  test('X-Request-Id e devolvido na resposta', async () => {
    const app = await criarApp();

    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'req-123' }
    });

    expect(response.headers['x-request-id']).toBe('req-123');
    await app.close();
  });
});

// ════════════════════════════════════════════════════════════════════════════
// AUTENTICACAO
// ════════════════════════════════════════════════════════════════════════════

describe('Gateway - autenticacao', () => {
  test('sem token responde 401 MISSING_TOKEN', async () => {
    const app = await criarApp(API_TOKEN);

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/gaps' });

    expect(response.statusCode).toBe(401);
    expect(JSON.parse(response.body).code).toBe('MISSING_TOKEN');
    await app.close();
  });

  test('token errado responde 401 INVALID_TOKEN', async () => {
    const app = await criarApp(API_TOKEN);

    const response = await app.inject({
      method: 'GET',
      url: '/api/v1/analises/gaps',
      headers: { authorization: 'Bearer outro-token' }
    });

    expect(response.statusCode).toBe(401);
    expect(JSON.parse(response.body).code).toBe('INVALID_TOKEN');
    await app.close();
  });

  test('token correto passa; health continua publico', async () => {
    const app = await criarApp(API_TOKEN);

    const autenticada = await app.inject({
      method: 'GET',
      url: '/api/v1/analises/gaps',
      headers: { authorization: `Bearer ${API_TOKEN}` }
    });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(autenticada.statusCode).toBe(200);
    expect(health.statusCode).toBe(200);
    await app.close();
  });
});

// ════════════════════════════════════════════════════════════════════════════
// CONSULTAS
// ════════════════════════════════════════════════════════════════════════════

describe('Gateway - analises', () => {
  test('GET /ccos/:id/analise', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/ccos/a/analise' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.ccoId).toBe('a');
    expect(body.valorAtual).toBe('1000000');
    expect(body.gaps).toHaveLength(1);
    expect(body.gaps[0].id).toBe('gap_202409');
    expect(body.gaps[0].valorBase).toBe('1000000');
    await app.close();
  });

  test('GET /ccos/:id/analise para CCO inexistente responde 404', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/ccos/zzz/analise' });

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body).code).toBe('CCO_NOT_FOUND');
    await app.close();
  });

  test('GET /analises/gaps com filtro de contrato', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/gaps?contrato=CPP-002' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.filtros).toEqual({ contratoCpp: 'CPP-002' });
    expect(body.estatisticas.totalCcosAnalisadas).toBe(1);
    expect(body.estatisticas.totalGaps).toBe(2);
    expect(body.estatisticas.valorTotalImpactado).toBe('300000');
    await app.close();
  });

  test('GET /analises/gaps com ano invalido responde 400', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/gaps?anoReconhecimento=abc' });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).code).toBe('INVALID_REQUEST');
    await app.close();
  });

  test('GET /analises/impacto-financeiro usa taxa da configuracao ou da query', async () => {
    const app = await criarApp();

    const padrao = await app.inject({ method: 'GET', url: '/api/v1/analises/impacto-financeiro' });
    const informada = await app.inject({ method: 'GET', url: '/api/v1/analises/impacto-financeiro?taxa=0.1' });
    const invalida = await app.inject({ method: 'GET', url: '/api/v1/analises/impacto-financeiro?taxa=abc' });

    expect(padrao.statusCode).toBe(200);
    expect(JSON.parse(padrao.body).impactoTotalEstimado).toBe('72000');
    expect(JSON.parse(padrao.body).impactoPorContrato).toEqual({ 'CPP-001': '45000', 'CPP-002': '27000' });
    expect(JSON.parse(informada.body).impactoTotalEstimado).toBe('160000');
    expect(invalida.statusCode).toBe(400);
    await app.close();
  });

  test('GET /analises/relatorio-resumido responde texto', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/relatorio-resumido' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.body.split('\n')).toContain('Total de gaps: 3');
    await app.close();
  });

  test('GET /analises/relatorio-executivo responde texto', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/relatorio-executivo' });

    expect(response.statusCode).toBe(200);
    expect(response.body.split('\n')).toContain('Impacto estimado (taxa 4,50%): R$ 72.000,00');
    await app.close();
  });

  test('GET /analises/contratos/:contrato/relatorio', async () => {
    const app = await criarApp();

    const response = await app.inject({ method: 'GET', url: '/api/v1/analises/contratos/CPP-001/relatorio' });

    expect(response.statusCode).toBe(200);
    const linhas = response.body.split('\n');
    expect(linhas[0]).toBe('RELATÓRIO DETALHADO - CONTRATO CPP-001');
    expect(linhas).toContain('CCO b (campo Campo A)');
    await app.close();
  });
});
