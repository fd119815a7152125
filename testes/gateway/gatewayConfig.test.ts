/**
 * Testes do carregamento e validacao da configuracao do gateway.
 */

import { loadConfig, validateConfig, DEFAULT_CONFIG } from '../../gateway/GatewayConfig';

describe('loadConfig', () => {
  test('ambiente vazio usa defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.baseDir).toBe('./data');
    expect(config.apiToken).toBe('');
    expect(config.corsOrigins).toEqual(['*']);
    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
    expect(config.correcao.offsetMesTaxa).toBe(-1);
    expect(config.correcao.diaCorteAniversario).toBe(19);
    expect(config.correcao.taxaEstimadaImpacto.toString()).toBe('0.045');
  });

  test('le variaveis de ambiente', () => {
    const config = loadConfig({
      GATEWAY_PORT: '8080',
      GATEWAY_BASE_DIR: '/tmp/dados',
      GATEWAY_API_TOKEN: 'test-secret',
      GATEWAY_CORS_ORIGINS: 'http://a.local, http://b.local',
      NODE_ENV: 'test',
      GATEWAY_LOG_LEVEL: 'warn',
      CORRECAO_DIA_CORTE: '20',
      CORRECAO_TAXA_ESTIMADA: '0.05'
    });

    expect(config.port).toBe(8080);
    expect(config.baseDir).toBe('/tmp/dados');
    expect(config.apiToken).toBe('test-secret');
    expect(config.corsOrigins).toEqual(['http://a.local', 'http://b.local']);
    expect(config.nodeEnv).toBe('test');
    expect(config.logLevel).toBe('warn');
    expect(config.correcao.diaCorteAniversario).toBe(20);
    expect(config.correcao.taxaEstimadaImpacto.toString()).toBe('0.05');
  });

  test('valores desconhecidos de NODE_ENV e nivel caem no default', () => {
    const config = loadConfig({ NODE_ENV: 'staging', GATEWAY_LOG_LEVEL: 'verbose' });

    expect(config.nodeEnv).toBe('development');
    expect(config.logLevel).toBe('info');
  });

  test('producao exige token', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('GATEWAY_API_TOKEN is required in production');
  });

  test('taxa estimada invalida', () => {
    expect(() => loadConfig({ CORRECAO_TAXA_ESTIMADA: 'quatro' })).toThrow('Invalid CORRECAO_TAXA_ESTIMADA: quatro');
  });
});

describe('validateConfig', () => {
  test('aceita defaults', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });

  test('rejeita porta fora do intervalo', () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, port: 70000 })).toThrow('Invalid port: 70000');
  });

  test('rejeita dia de corte fora de 1..28', () => {
    const config = { ...DEFAULT_CONFIG, correcao: { ...DEFAULT_CONFIG.correcao, diaCorteAniversario: 31 } };

    expect(() => validateConfig(config)).toThrow('Invalid diaCorteAniversario: 31');
  });

  test('rejeita offset fora de -12..12', () => {
    const config = { ...DEFAULT_CONFIG, correcao: { ...DEFAULT_CONFIG.correcao, offsetMesTaxa: 13 } };

    expect(() => validateConfig(config)).toThrow('Invalid offsetMesTaxa: 13');
  });
});
