/**
 * Testes dos schemas de documento e dos repositorios em arquivo JSON.
 */

import { contaCustoOleoSchema, interpretarDocumento } from '../entidades/esquemas';
import { DocumentoInvalidoError } from '../entidades/CorrecaoErrors';
import { CenarioCorrecao, ContaCustoOleo, TipoCorrecaoMonetaria } from '../entidades/tipos';
import { ContaCustoOleoRepositoryImpl } from '../repositorios/implementacao/ContaCustoOleoRepositoryImpl';
import { TaxaRepositoryImpl } from '../repositorios/implementacao/TaxaRepositoryImpl';
import { createTestDataDir, TestDataDir } from './helpers/testDataDir';
import { criarCco, taxa, data } from './helpers/fixtures';

let testDir: TestDataDir;

beforeEach(async () => {
  testDir = await createTestDataDir('repositorios');
});

afterEach(async () => {
  await testDir.cleanup();
});

function corrigida(id: string, aplicadoEm: Date): ContaCustoOleo {
  return {
    ...criarCco({ id, dataReconhecimento: data(2023, 8, 15), valor: '1000' }),
    origemCorrecao: {
      ccoOriginalId: 'cco-1',
      sessaoId: id,
      cenario: CenarioCorrecao.CENARIO_0,
      aplicadoEm
    }
  };
}

// ════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ════════════════════════════════════════════════════════════════════════

describe('contaCustoOleoSchema', () => {
  test('documento minimo recebe defaults', () => {
    const resultado = interpretarDocumento(contaCustoOleoSchema, {
      id: 'cco-9',
      contratoCpp: 'CPP-009',
      dataReconhecimento: '2023-08-15',
      valorReconhecidoComOH: { $numberDecimal: '1234.50' },
      correcoesMonetarias: [{ tipo: 'IPCA', dataCriacaoCorrecao: '2024-09-16', taxaCorrecao: 2 }]
    });

    expect(resultado.ok).toBe(true);
    if (!resultado.ok) return;
    const cco = resultado.valor;
    expect(cco.valorReconhecidoComOH.toString()).toBe('1234.5');
    expect(cco.valorRecuperado.toString()).toBe('0');
    expect(cco.anoReconhecimento).toBe(2023);
    expect(cco.mesReconhecimento).toBe(8);
    expect(cco.campo).toBe('');
    expect(cco.flgRecuperado).toBe(false);
    expect(cco.dataLancamento).toBeNull();
    expect(cco.origemCorrecao).toBeUndefined();

    const correcao = cco.correcoesMonetarias[0];
    expect(correcao.tipo).toBe(TipoCorrecaoMonetaria.IPCA);
    expect(correcao.dataCorrecao.toISOString()).toBe('2024-09-16T00:00:00.000Z');
    expect(correcao.taxaCorrecao.toString()).toBe('2');
    expect(correcao.ativo).toBe(true);
    expect(correcao.subTipo).toBeNull();
  });

  test('correcao sem data e rejeitada com o caminho do campo', () => {
    const resultado = interpretarDocumento(contaCustoOleoSchema, {
      id: 'cco-9',
      contratoCpp: 'CPP-009',
      dataReconhecimento: '2023-08-15',
      correcoesMonetarias: [{ tipo: 'IPCA' }]
    });

    expect(resultado).toEqual({
      ok: false,
      erro: 'correcoesMonetarias.0: Correção sem dataCorrecao nem dataCriacaoCorrecao'
    });
  });

  test('decimal invalido e rejeitado', () => {
    const resultado = interpretarDocumento(contaCustoOleoSchema, {
      id: 'cco-9',
      contratoCpp: 'CPP-009',
      dataReconhecimento: '2023-08-15',
      valorReconhecidoComOH: 'abc'
    });

    expect(resultado).toEqual({ ok: false, erro: 'valorReconhecidoComOH: Decimal inválido: "abc"' });
  });
});

// ════════════════════════════════════════════════════════════════════════
// CCO
// ════════════════════════════════════════════════════════════════════════

describe('ContaCustoOleoRepositoryImpl', () => {
  test('arquivo ausente equivale a lista vazia', async () => {
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);

    await expect(repo.listar()).resolves.toEqual([]);
    await expect(repo.buscarPorId('cco-1')).resolves.toBeNull();
  });

  test('listar ordena por contrato e data e aplica filtros', async () => {
    await testDir.escreverJson('ccos.json', [
      criarCco({ id: 'c', contratoCpp: 'CPP-002', dataReconhecimento: data(2022, 1, 10), valor: '1' }),
      criarCco({ id: 'b', contratoCpp: 'CPP-001', dataReconhecimento: data(2023, 1, 10), valor: '1' }),
      criarCco({ id: 'a', contratoCpp: 'CPP-001', dataReconhecimento: data(2021, 1, 10), valor: '1' })
    ]);
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);

    expect((await repo.listar()).map(c => c.id)).toEqual(['a', 'b', 'c']);
    expect((await repo.listar({ contratoCpp: 'CPP-001' })).map(c => c.id)).toEqual(['a', 'b']);
    expect((await repo.listar({ anoReconhecimento: 2022 })).map(c => c.id)).toEqual(['c']);
  });

  test('documento invalido lanca DocumentoInvalidoError', async () => {
    await testDir.escreverJson('ccos.json', [{ id: 'quebrada' }]);
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);

    await expect(repo.buscarPorId('quebrada')).rejects.toBeInstanceOf(DocumentoInvalidoError);
  });

  test('registro corrigido nao e sobrescrito', async () => {
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);
    await repo.salvarCorrigida(corrigida('x', data(2024, 1, 1)));

    await expect(repo.salvarCorrigida(corrigida('x', data(2024, 2, 1)))).rejects.toThrow(
      'Registro corrigido x já existe'
    );
  });

  test('ultima corrigida segue a data de aplicacao', async () => {
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);
    await repo.salvarCorrigida(corrigida('recente', data(2025, 1, 1)));
    await repo.salvarCorrigida(corrigida('antiga', data(2024, 1, 1)));

    expect((await repo.listarCorrigidas('cco-1')).map(c => c.id)).toEqual(['antiga', 'recente']);
    expect((await repo.buscarUltimaCorrigida('cco-1'))?.id).toBe('recente');
    await expect(repo.buscarUltimaCorrigida('outra')).resolves.toBeNull();
  });

  test('atualizarCorrigida grava a promocao e exige registro existente', async () => {
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);
    await repo.salvarCorrigida(corrigida('x', data(2024, 1, 1)));

    await repo.atualizarCorrigida({
      ...corrigida('x', data(2024, 1, 1)),
      promocao: { promovidaEm: data(2024, 3, 1), usuarioId: 'revisor-1', observacoes: null }
    });

    expect((await repo.buscarCorrigida('x'))?.promocao).toEqual({
      promovidaEm: data(2024, 3, 1),
      usuarioId: 'revisor-1',
      observacoes: null
    });
    expect((await repo.listarCorrigidas()).map(c => c.id)).toEqual(['x']);
    await expect(repo.atualizarCorrigida(corrigida('y', data(2024, 1, 1)))).rejects.toThrow(
      'Registro corrigido y não existe'
    );
  });

  test('salvar substitui a CCO de mesmo id', async () => {
    const repo = new ContaCustoOleoRepositoryImpl(testDir.dir);
    await repo.salvar(criarCco({ id: 'a', dataReconhecimento: data(2023, 1, 10), valor: '10' }));
    await repo.salvar(criarCco({ id: 'a', dataReconhecimento: data(2023, 1, 10), valor: '20' }));

    const todas = await repo.listar();
    expect(todas).toHaveLength(1);
    expect(todas[0].valorReconhecidoComOH.toString()).toBe('20');
  });
});

// ════════════════════════════════════════════════════════════════════════
// TAXAS
// ════════════════════════════════════════════════════════════════════════

describe('TaxaRepositoryImpl', () => {
  test('uso antes de init lanca', async () => {
    const repo = new TaxaRepositoryImpl(testDir.dir);

    await expect(repo.buscarFator(2024, 8, TipoCorrecaoMonetaria.IPCA)).rejects.toThrow(
      'Repositório não inicializado. Use static create() ou chame init() antes de usar.'
    );
  });

  test('fator e 1 + taxa/100', async () => {
    await testDir.escreverJson('taxas.json', [taxa(2024, 8, '4.5')]);
    const repo = await TaxaRepositoryImpl.create(testDir.dir);

    expect((await repo.buscarFator(2024, 8, TipoCorrecaoMonetaria.IPCA))?.toString()).toBe('1.045');
    await expect(repo.buscarFator(2024, 8, TipoCorrecaoMonetaria.IGPM)).resolves.toBeNull();
  });

  test('salvar persiste e listar ordena por periodo', async () => {
    const repo = await TaxaRepositoryImpl.create(testDir.dir);
    await repo.salvar(taxa(2024, 8, '4.5'));
    await repo.salvar(taxa(2023, 2, '5'));
    await repo.salvar(taxa(2024, 8, '4.6'));

    const recarregado = await TaxaRepositoryImpl.create(testDir.dir);
    const taxas = await recarregado.listar();

    expect(taxas.map(t => `${t.anoReferencia}-${t.mesReferencia}:${t.valor.toString()}`)).toEqual([
      '2023-2:5',
      '2024-8:4.6'
    ]);
  });

  test('taxa invalida no arquivo impede a carga', async () => {
    await testDir.escreverJson('taxas.json', [{ anoReferencia: 2024, mesReferencia: 13, tipo: 'IPCA', valor: '1' }]);

    await expect(TaxaRepositoryImpl.create(testDir.dir)).rejects.toBeInstanceOf(DocumentoInvalidoError);
  });
});
