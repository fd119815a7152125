/**
 * Testes da PromocaoCorrecoes: pesquisa, comparativo, bloqueios de
 * promocao e memoria de calculo sobre repositorios em arquivo.
 */

import { PromocaoCorrecoes } from '../servicos/PromocaoCorrecoes';
import { OrquestradorCorrecao } from '../orquestrador/OrquestradorCorrecao';
import { AnalisadorGaps, valorAtualCco } from '../servicos/AnalisadorGaps';
import { MotorCorrecao } from '../servicos/MotorCorrecao';
import { ContaCustoOleoRepositoryImpl } from '../repositorios/implementacao/ContaCustoOleoRepositoryImpl';
import { SessaoCorrecaoRepositoryImpl } from '../repositorios/implementacao/SessaoCorrecaoRepositoryImpl';
import { TaxaRepositoryImpl } from '../repositorios/implementacao/TaxaRepositoryImpl';
import {
  RegistroCorrigidoNaoEncontradoError,
  SessaoNaoEncontradaError,
  PromocaoBloqueadaError
} from '../entidades/CorrecaoErrors';
import { CenarioCorrecao, ContaCustoOleo, StatusPromocao, StatusSessao } from '../entidades/tipos';
import { criarLoggerSilencioso } from '../utilitarios/Logger';
import { createTestDataDir, TestDataDir } from './helpers/testDataDir';
import { criarCco, correcaoIpca, retificacao, taxa, data, idsSequenciais } from './helpers/fixtures';

// ════════════════════════════════════════════════════════════════════════
// SETUP
// ════════════════════════════════════════════════════════════════════════

const AGORA = data(2024, 12, 1);

const CCO_GAP = criarCco({ id: 'cco-gap', dataReconhecimento: data(2023, 8, 15), valor: '1000000' });

const CCO_DUPLICADA = criarCco({
  id: 'cco-b',
  contratoCpp: 'CPP-002',
  dataReconhecimento: data(2022, 8, 15),
  valor: '200000',
  correcoes: [
    correcaoIpca(data(2023, 9, 16), '200000', '1.04'),
    correcaoIpca(data(2023, 9, 20), '208000', '1.04')
  ]
});

/**
 * Corrigida gravada direto no repositorio, sem sessao correspondente.
 */
const CORRIGIDA_B: ContaCustoOleo = {
  ...CCO_DUPLICADA,
  id: 'cco-b_corrigida_s-x',
  correcoesMonetarias: [CCO_DUPLICADA.correcoesMonetarias[0]],
  origemCorrecao: {
    ccoOriginalId: 'cco-b',
    sessaoId: 's-x',
    cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
    aplicadoEm: data(2024, 11, 1)
  }
};

const CORRIGIDA_GAP = 'cco-gap_corrigida_s-1';

interface Contexto {
  promocao: PromocaoCorrecoes;
  ccoRepo: ContaCustoOleoRepositoryImpl;
}

async function criarContexto(dir: string): Promise<Contexto> {
  const logger = criarLoggerSilencioso();
  const ccoRepo = new ContaCustoOleoRepositoryImpl(dir);
  const sessaoRepo = new SessaoCorrecaoRepositoryImpl(dir);
  const taxaRepo = await TaxaRepositoryImpl.create(dir);
  const analisador = new AnalisadorGaps({
    taxaRepo,
    ccoRepo,
    logger,
    configuracao: { offsetMesTaxa: -1, diaCorteAniversario: 19 }
  });
  const motor = new MotorCorrecao({
    taxaRepo,
    ccoRepo,
    logger,
    configuracao: { offsetMesTaxa: -1 },
    gerarId: idsSequenciais('p')
  });
  const orquestrador = new OrquestradorCorrecao({
    ccoRepo,
    sessaoRepo,
    analisador,
    motor,
    logger,
    relogio: () => AGORA,
    gerarId: idsSequenciais('s')
  });

  await orquestrador.IniciarAnalise('cco-gap', 'usuario-1');
  await orquestrador.GerarPropostas('s-1');
  await orquestrador.AprovarCorrecoes('s-1', ['p-1']);
  await orquestrador.AplicarCorrecoes('s-1');
  await ccoRepo.salvarCorrigida(CORRIGIDA_B);

  const promocao = new PromocaoCorrecoes({ ccoRepo, sessaoRepo, logger, relogio: () => AGORA });
  return { promocao, ccoRepo };
}

let testDir: TestDataDir;
let ctx: Contexto;

beforeEach(async () => {
  testDir = await createTestDataDir('promocao');
  await testDir.escreverJson('ccos.json', [CCO_GAP, CCO_DUPLICADA]);
  await testDir.escreverJson('taxas.json', [taxa(2024, 8, '4.5')]);
  ctx = await criarContexto(testDir.dir);
});

afterEach(async () => {
  await testDir.cleanup();
});

// ════════════════════════════════════════════════════════════════════════
// PESQUISA
// ════════════════════════════════════════════════════════════════════════

describe('PromocaoCorrecoes - pesquisar', () => {
  test('lista pendentes por padrao, da aplicacao mais antiga a mais recente', async () => {
    const resultado = await ctx.promocao.pesquisar();

    expect(resultado.totalEncontrados).toBe(2);
    expect(resultado.resultados.map(r => r.id)).toEqual(['cco-b_corrigida_s-x', CORRIGIDA_GAP]);
    expect(resultado.valorTotalAtual.toString()).toBe('1253000');
    expect(resultado.porContrato).toEqual({ 'CPP-001': 1, 'CPP-002': 1 });
  });

  test('resume o registro corrigido', async () => {
    const resultado = await ctx.promocao.pesquisar({ contratoCpp: 'CPP-001' });

    expect(resultado.totalEncontrados).toBe(1);
    const resumo = resultado.resultados[0];
    expect(resumo.id).toBe(CORRIGIDA_GAP);
    expect(resumo.ccoOriginalId).toBe('cco-gap');
    expect(resumo.sessaoId).toBe('s-1');
    expect(resumo.cenario).toBe(CenarioCorrecao.CENARIO_0);
    expect(resumo.aplicadoEm).toEqual(AGORA);
    expect(resumo.status).toBe(StatusPromocao.PENDENTE);
    expect(resumo.promovidaEm).toBeNull();
    expect(resumo.valorAtual.toString()).toBe('1045000');
    expect(resumo.totalCorrecoes).toBe(1);
    expect(resumo.correcoesIndice).toBe(1);
  });

  test('filtros sem correspondencia devolvem lista vazia', async () => {
    const promovidas = await ctx.promocao.pesquisar({ status: StatusPromocao.PROMOVIDA });
    const outraRemessa = await ctx.promocao.pesquisar({ remessa: 2 });

    expect(promovidas.totalEncontrados).toBe(0);
    expect(promovidas.valorTotalAtual.toString()).toBe('0');
    expect(outraRemessa.resultados).toEqual([]);
  });
});

// ════════════════════════════════════════════════════════════════════════
// DETALHE
// ════════════════════════════════════════════════════════════════════════

describe('PromocaoCorrecoes - detalhar', () => {
  test('correcao nova aparece so na linha do tempo corrigida', async () => {
    const detalhe = await ctx.promocao.detalhar(CORRIGIDA_GAP);

    expect(detalhe.original?.id).toBe('cco-gap');
    expect(detalhe.sessao?.status).toBe(StatusSessao.APPLIED);
    expect(detalhe.comparativo.original).toEqual([]);
    expect(detalhe.comparativo.corrigida.map(e => e.situacao)).toEqual(['NOVA']);
    expect(detalhe.comparativo.corrigida[0].dataCorrecao).toEqual(data(2024, 9, 16));
    expect(detalhe.comparativo.valorAtualOriginal?.toString()).toBe('1000000');
    expect(detalhe.comparativo.valorAtualCorrigido.toString()).toBe('1045000');
    expect(detalhe.comparativo.diferencaValorAtual?.toString()).toBe('45000');
    expect(detalhe.validacao).toEqual({ podePromover: true, motivosBloqueio: [], avisos: [] });
  });

  test('duplicata removida fica so na linha do tempo original', async () => {
    const detalhe = await ctx.promocao.detalhar('cco-b_corrigida_s-x');

    expect(detalhe.comparativo.original.map(e => e.situacao)).toEqual(['MANTIDA', 'REMOVIDA']);
    expect(detalhe.comparativo.corrigida.map(e => e.situacao)).toEqual(['MANTIDA']);
    expect(detalhe.comparativo.diferencaValorAtual?.toString()).toBe('-8320');
    expect(detalhe.sessao).toBeNull();
    expect(detalhe.validacao).toEqual({
      podePromover: true,
      motivosBloqueio: [],
      avisos: ['Sessão de correção não encontrada: memória de cálculo indisponível']
    });
  });

  test('registro inexistente lanca RegistroCorrigidoNaoEncontradoError', async () => {
    await expect(ctx.promocao.detalhar('nao-existe')).rejects.toThrow(RegistroCorrigidoNaoEncontradoError);
  });
});

// ════════════════════════════════════════════════════════════════════════
// PROMOCAO
// ════════════════════════════════════════════════════════════════════════

describe('PromocaoCorrecoes - promover', () => {
  test('grava a corrigida sobre a origem e marca o registro', async () => {
    const resultado = await ctx.promocao.promover(CORRIGIDA_GAP, 'revisor-1', 'conferido');

    expect(resultado.ccoId).toBe('cco-gap');
    expect(resultado.ccoCorrigidaId).toBe(CORRIGIDA_GAP);
    expect(resultado.promovidaEm).toEqual(AGORA);
    expect(resultado.valorAtual.toString()).toBe('1045000');

    const origem = await ctx.ccoRepo.buscarPorId('cco-gap');
    expect(origem?.correcoesMonetarias).toHaveLength(1);
    expect(origem?.origemCorrecao).toBeUndefined();
    expect(origem?.promocao).toBeUndefined();
    expect(origem ? valorAtualCco(origem).toString() : null).toBe('1045000');

    const registro = await ctx.ccoRepo.buscarCorrigida(CORRIGIDA_GAP);
    expect(registro?.promocao).toEqual({ promovidaEm: AGORA, usuarioId: 'revisor-1', observacoes: 'conferido' });
  });

  test('segunda promocao do mesmo registro e bloqueada', async () => {
    await ctx.promocao.promover(CORRIGIDA_GAP, 'revisor-1', null);

    const erro = await ctx.promocao.promover(CORRIGIDA_GAP, 'revisor-1', null).catch((e: unknown) => e);

    expect(erro).toBeInstanceOf(PromocaoBloqueadaError);
    if (erro instanceof PromocaoBloqueadaError) {
      expect(erro.motivos).toEqual(['Correção já promovida em 01/12/2024']);
      expect(erro.code).toBe('PROMOTION_BLOCKED');
    }
  });

  test('registro superado por corrigida mais recente e bloqueado', async () => {
    await ctx.ccoRepo.salvarCorrigida({
      ...CORRIGIDA_B,
      id: 'cco-b_corrigida_s-y',
      origemCorrecao: {
        ccoOriginalId: 'cco-b',
        sessaoId: 's-y',
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        aplicadoEm: data(2024, 11, 20)
      }
    });

    const detalhe = await ctx.promocao.detalhar('cco-b_corrigida_s-x');

    expect(detalhe.validacao.podePromover).toBe(false);
    expect(detalhe.validacao.motivosBloqueio).toEqual(['Existe registro corrigido mais recente: cco-b_corrigida_s-y']);
    await expect(ctx.promocao.promover('cco-b_corrigida_s-x', 'revisor-1', null)).rejects.toThrow(
      'Promoção de cco-b_corrigida_s-x bloqueada: Existe registro corrigido mais recente: cco-b_corrigida_s-y'
    );
  });

  test('origem com lancamento posterior a aplicacao bloqueia', async () => {
    await ctx.ccoRepo.salvar({
      ...CCO_DUPLICADA,
      correcoesMonetarias: [
        ...CCO_DUPLICADA.correcoesMonetarias,
        retificacao(data(2024, 11, 10), '216320', '220000')
      ]
    });

    const detalhe = await ctx.promocao.detalhar('cco-b_corrigida_s-x');

    expect(detalhe.validacao.motivosBloqueio).toEqual([
      'CCO de origem tem 1 lançamento(s) posterior(es) à correção'
    ]);
  });

  test('corrigida sem CCO de origem e bloqueada e a origem nao e criada', async () => {
    await ctx.ccoRepo.salvarCorrigida({
      ...CORRIGIDA_B,
      id: 'cco-z_corrigida_s-z',
      origemCorrecao: {
        ccoOriginalId: 'cco-z',
        sessaoId: 's-z',
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        aplicadoEm: data(2024, 11, 1)
      }
    });

    await expect(ctx.promocao.promover('cco-z_corrigida_s-z', 'revisor-1', null)).rejects.toThrow(
      PromocaoBloqueadaError
    );
    expect(await ctx.ccoRepo.buscarPorId('cco-z')).toBeNull();
  });

  test('flgRecuperado diferente da origem gera aviso sem bloquear', async () => {
    await ctx.ccoRepo.salvarCorrigida({
      ...CORRIGIDA_B,
      id: 'cco-b_corrigida_s-w',
      flgRecuperado: true,
      origemCorrecao: {
        ccoOriginalId: 'cco-b',
        sessaoId: 's-1',
        cenario: CenarioCorrecao.CENARIO_DUPLICATAS,
        aplicadoEm: data(2024, 11, 25)
      }
    });

    const detalhe = await ctx.promocao.detalhar('cco-b_corrigida_s-w');

    expect(detalhe.validacao).toEqual({
      podePromover: true,
      motivosBloqueio: [],
      avisos: ['flgRecuperado muda de false para true']
    });
  });
});

// ════════════════════════════════════════════════════════════════════════
// MEMORIA DE CALCULO, ESTATISTICAS E HISTORICO
// ════════════════════════════════════════════════════════════════════════

describe('PromocaoCorrecoes - consultas', () => {
  test('memoria de calculo separa as propostas aprovadas', async () => {
    const memoria = await ctx.promocao.obterMemoriaCalculo('s-1');

    expect(memoria.ccoId).toBe('cco-gap');
    expect(memoria.status).toBe(StatusSessao.APPLIED);
    expect(memoria.cenario).toBe(CenarioCorrecao.CENARIO_0);
    expect(memoria.gapsIdentificados).toHaveLength(1);
    expect(memoria.propostasAprovadas.map(p => p.id)).toEqual(['p-1']);
    expect(memoria.propostasAprovadas[0].valorProposto.toString()).toBe('1045000');
    expect(memoria.ccoCorrigidaId).toBe(CORRIGIDA_GAP);
  });

  test('memoria de sessao inexistente lanca SessaoNaoEncontradaError', async () => {
    await expect(ctx.promocao.obterMemoriaCalculo('s-x')).rejects.toThrow(SessaoNaoEncontradaError);
  });

  test('estatisticas agrupam por status com contratos distintos', async () => {
    await ctx.promocao.promover(CORRIGIDA_GAP, 'revisor-1', null);

    const estatisticas = await ctx.promocao.obterEstatisticas();

    expect(estatisticas).toEqual({
      totalRegistros: 2,
      porStatus: [
        { status: StatusPromocao.PENDENTE, quantidade: 1, contratos: ['CPP-002'] },
        { status: StatusPromocao.PROMOVIDA, quantidade: 1, contratos: ['CPP-001'] }
      ]
    });
  });

  test('historico lista so as promovidas', async () => {
    expect(await ctx.promocao.historico()).toEqual([]);

    await ctx.promocao.promover(CORRIGIDA_GAP, 'revisor-1', 'conferido');

    expect(await ctx.promocao.historico(10)).toEqual([
      {
        id: CORRIGIDA_GAP,
        ccoOriginalId: 'cco-gap',
        contratoCpp: 'CPP-001',
        campo: 'Campo A',
        remessa: 1,
        sessaoId: 's-1',
        promovidaEm: AGORA,
        usuarioId: 'revisor-1',
        observacoes: 'conferido'
      }
    ]);
  });
});
