/**
 * Testes do AnalisadorGaps: gaps, correcoes fora do periodo,
 * duplicatas e analise do sistema.
 */

import { AnalisadorGaps, valorAtualCco } from '../servicos/AnalisadorGaps';
import { CcoNaoEncontradaError } from '../entidades/CorrecaoErrors';
import { PrioridadeGap, TipoCorrecaoMonetaria, ContaCustoOleo } from '../entidades/tipos';
import { criarLoggerSilencioso } from '../utilitarios/Logger';
import {
  criarCco,
  correcaoIpca,
  recuperacao,
  retificacao,
  taxa,
  data,
  TaxaRepositoryMemoria,
  ContaCustoOleoRepositoryMemoria
} from './helpers/fixtures';

// ════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════

const AGORA = data(2024, 12, 1);

function criarAnalisador(ccos: ContaCustoOleo[] = []): AnalisadorGaps {
  return new AnalisadorGaps({
    taxaRepo: new TaxaRepositoryMemoria([taxa(2024, 2, '3'), taxa(2024, 8, '4.5')]),
    ccoRepo: new ContaCustoOleoRepositoryMemoria(ccos),
    logger: criarLoggerSilencioso(),
    configuracao: { offsetMesTaxa: -1, diaCorteAniversario: 19 }
  });
}

// ════════════════════════════════════════════════════════════════════════
// GAPS
// ════════════════════════════════════════════════════════════════════════

describe('AnalisadorGaps - gaps', () => {
  test('aniversario sem correcao vira gap com taxa do mes anterior', async () => {
    const cco = criarCco({ dataReconhecimento: data(2023, 8, 15), valor: '1000000' });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toHaveLength(1);
    const gap = analise.gaps[0];
    expect(gap.id).toBe('gap_202409');
    expect(gap.dataAniversario).toBe('09/2024');
    expect(gap.periodoTaxa).toBe('08/2024');
    expect(gap.anoTaxa).toBe(2024);
    expect(gap.mesTaxa).toBe(8);
    expect(gap.valorBase.toString()).toBe('1000000');
    expect(gap.dataLimite).toBe('19/09/2024');
    expect(gap.prioridade).toBe(PrioridadeGap.BAIXA);
    expect(analise.valorAtual.toString()).toBe('1000000');
  });

  test('correcao no mes do aniversario conta como no prazo', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2023, 8, 15),
      valor: '1000000',
      correcoes: [correcaoIpca(data(2024, 9, 16), '1000000', '1.045')]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toEqual([]);
    expect(analise.correcoesForaPeriodo).toEqual([]);
    expect(analise.valorAtual.toString()).toBe('1045000');
  });

  test('base nao positiva nao gera gap', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2023, 8, 15),
      valor: '1000',
      correcoes: [recuperacao(data(2024, 1, 10), '1000', '0')]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toEqual([]);
  });

  test('base do gap ignora retificacao a partir do dia 15 do aniversario', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2023, 8, 15),
      valor: '1000000',
      correcoes: [
        retificacao(data(2024, 9, 14), '1000000', '1100000'),
        retificacao(data(2024, 9, 17), '1100000', '1200000')
      ]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toHaveLength(1);
    expect(analise.gaps[0].valorBase.toString()).toBe('1100000');
    expect(analise.gaps[0].dataLimite).toBe('19/09/2024');
  });

  test('prioridade por idade do aniversario', async () => {
    const cco = criarCco({ dataReconhecimento: data(2019, 5, 10), valor: '500000' });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps.map(g => g.dataAniversario)).toEqual([
      '06/2020', '06/2021', '06/2022', '06/2023', '06/2024'
    ]);
    expect(analise.gaps.map(g => g.prioridade)).toEqual([
      PrioridadeGap.ALTA,
      PrioridadeGap.ALTA,
      PrioridadeGap.MEDIA,
      PrioridadeGap.MEDIA,
      PrioridadeGap.BAIXA
    ]);
  });

  test('analise e somente leitura e idempotente', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2022, 2, 10),
      valor: '1000000',
      correcoes: [correcaoIpca(data(2023, 3, 16), '1000000', '1.05')]
    });
    const antes = JSON.stringify(cco);
    const analisador = criarAnalisador();

    const primeira = await analisador.analisarCco(cco, AGORA);
    const segunda = await analisador.analisarCco(cco, AGORA);

    expect(segunda).toEqual(primeira);
    expect(JSON.stringify(cco)).toBe(antes);
  });

  test('analisarPorId lanca para CCO inexistente', async () => {
    await expect(criarAnalisador().analisarPorId('nao-existe', AGORA)).rejects.toBeInstanceOf(
      CcoNaoEncontradaError
    );
  });
});

// ════════════════════════════════════════════════════════════════════════
// FORA DO PERIODO
// ════════════════════════════════════════════════════════════════════════

describe('AnalisadorGaps - correcoes fora do periodo', () => {
  test('correcao aplicada depois do dia de corte', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2022, 2, 10),
      valor: '1000000',
      correcoes: [
        correcaoIpca(data(2023, 3, 16), '1000000', '1.05'),
        correcaoIpca(data(2024, 4, 5), '1050000', '1.03')
      ]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toEqual([]);
    expect(analise.correcoesForaPeriodo).toHaveLength(1);
    const fora = analise.correcoesForaPeriodo[0];
    expect(fora.anoAniversario).toBe(2024);
    expect(fora.mesAniversario).toBe(3);
    expect(fora.anoAplicado).toBe(2024);
    expect(fora.mesAplicado).toBe(4);
    expect(fora.indiceCorrecao).toBe(1);
    expect(fora.diasAtraso).toBe(16);
    expect(fora.tipoCorrecao).toBe(TipoCorrecaoMonetaria.IPCA);
    expect(fora.taxaEsperada?.toString()).toBe('1.03');
    expect(fora.diferencaTaxa?.toString()).toBe('0');
    expect(fora.necessitaAjuste).toBe(false);
    expect(fora.teveAlteracoesNoPeriodo).toBe(false);
    expect(fora.valorBaseNaAplicacao.toString()).toBe('1050000');
  });

  test('registra alteracoes entre o prazo e a aplicacao', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2022, 2, 10),
      valor: '1000000',
      correcoes: [
        correcaoIpca(data(2023, 3, 16), '1000000', '1.05'),
        retificacao(data(2024, 3, 25), '1050000', '1100000'),
        correcaoIpca(data(2024, 4, 5), '1100000', '1.03')
      ]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    const fora = analise.correcoesForaPeriodo[0];
    expect(fora.indiceCorrecao).toBe(2);
    expect(fora.teveAlteracoesNoPeriodo).toBe(true);
    expect(fora.alteracoesNoPeriodo).toHaveLength(1);
    expect(fora.alteracoesNoPeriodo[0].tipo).toBe(TipoCorrecaoMonetaria.RETIFICACAO);
    expect(fora.alteracoesNoPeriodo[0].valorImpacto.toString()).toBe('50000');
    expect(fora.alteracoesNoPeriodo[0].impactoPercentual).toBe(4.7619);
    expect(fora.valorBaseNaAplicacao.toString()).toBe('1100000');
    expect(fora.valorBaseAntesAlteracoes.toString()).toBe('1050000');
  });

  test('taxa aplicada diferente da historica pede ajuste', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2022, 2, 10),
      valor: '1000000',
      correcoes: [
        correcaoIpca(data(2023, 3, 16), '1000000', '1.05'),
        correcaoIpca(data(2024, 4, 5), '1050000', '1.04')
      ]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    const fora = analise.correcoesForaPeriodo[0];
    expect(fora.diferencaTaxa?.toString()).toBe('0.01');
    expect(fora.necessitaAjuste).toBe(true);
  });
});

// ════════════════════════════════════════════════════════════════════════
// DUPLICATAS
// ════════════════════════════════════════════════════════════════════════

describe('AnalisadorGaps - duplicatas', () => {
  test('segunda correcao de indice no mesmo mes e duplicata', async () => {
    const cco = criarCco({
      dataReconhecimento: data(2023, 8, 15),
      valor: '1000000',
      correcoes: [
        correcaoIpca(data(2024, 9, 16), '1000000', '1.045'),
        correcaoIpca(data(2024, 9, 20), '1045000', '1.045')
      ]
    });

    const analise = await criarAnalisador().analisarCco(cco, AGORA);

    expect(analise.gaps).toEqual([]);
    expect(analise.duplicatas).toHaveLength(1);
    const dup = analise.duplicatas[0];
    expect(dup.indice).toBe(1);
    expect(dup.indiceOriginal).toBe(0);
    expect(dup.periodo).toBe('09/2024');
    expect(dup.valorDuplicado.toString()).toBe('47025');
    expect(dup.dataCorrecaoOriginal.toISOString()).toBe('2024-09-16T00:00:00.000Z');
  });

  test('eventos que nao sao de indice nao contam como duplicata', () => {
    const correcoes = [
      retificacao(data(2024, 9, 1), '1000000', '1100000'),
      retificacao(data(2024, 9, 2), '1100000', '1200000')
    ];

    expect(criarAnalisador().detectarDuplicatas(correcoes)).toEqual([]);
  });
});

// ════════════════════════════════════════════════════════════════════════
// SISTEMA
// ════════════════════════════════════════════════════════════════════════

describe('AnalisadorGaps - sistema', () => {
  const ccos = [
    criarCco({ id: 'a', contratoCpp: 'CPP-001', dataReconhecimento: data(2023, 8, 15), valor: '1000000' }),
    criarCco({
      id: 'b',
      contratoCpp: 'CPP-001',
      dataReconhecimento: data(2023, 8, 15),
      valor: '200000',
      correcoes: [correcaoIpca(data(2024, 9, 16), '200000', '1.045')]
    }),
    criarCco({ id: 'c', contratoCpp: 'CPP-002', dataReconhecimento: data(2022, 5, 3), valor: '300000' })
  ];

  test('consolida estatisticas', async () => {
    const resultado = await criarAnalisador(ccos).analisarSistema({}, AGORA);

    expect(resultado.estatisticas.totalCcosAnalisadas).toBe(3);
    expect(resultado.estatisticas.ccosComGaps).toBe(2);
    expect(resultado.estatisticas.totalGaps).toBe(3);
    expect(resultado.estatisticas.gapsPorContrato).toEqual({ 'CPP-001': 1, 'CPP-002': 2 });
    expect(resultado.estatisticas.gapsPorAno).toEqual({ '2023': 1, '2024': 2 });
    expect(resultado.estatisticas.valorTotalImpactado.toString()).toBe('1300000');
    expect(resultado.ccosComGaps.map(a => a.ccoId)).toEqual(['a', 'c']);
  });

  test('aplica filtro de contrato', async () => {
    const resultado = await criarAnalisador(ccos).analisarSistema({ contratoCpp: 'CPP-002' }, AGORA);

    expect(resultado.estatisticas.totalCcosAnalisadas).toBe(1);
    expect(resultado.filtros).toEqual({ contratoCpp: 'CPP-002' });
  });

  test('analisarContrato inclui CCOs sem pendencias', async () => {
    const analises = await criarAnalisador(ccos).analisarContrato('CPP-001', AGORA);

    expect(analises.map(a => a.ccoId)).toEqual(['a', 'b']);
    expect(analises[1].gaps).toEqual([]);
  });

  test('valorAtualCco usa a ultima correcao da lista', () => {
    expect(valorAtualCco(ccos[1]).toString()).toBe('209000');
    expect(valorAtualCco(ccos[0]).toString()).toBe('1000000');
  });
});
