/**
 * Testes do efeito cascata e da reconstrucao da lista de correcoes.
 */

import { calcularEfeitoCascata, etapasDeCorrecoes, ordenarEtapas } from '../servicos/cascata';
import {
  mesclarCorrecoes,
  recalcularAcumulados,
  novaCorrecaoIndice,
  novaCorrecaoCompensacao
} from '../servicos/reconstrucao';
import { TipoCorrecaoMonetaria } from '../entidades/tipos';
import { criarCco, correcaoIpca, retificacao, recuperacao, d, data } from './helpers/fixtures';

// ════════════════════════════════════════════════════════════════════════
// CASCATA
// ════════════════════════════════════════════════════════════════════════

describe('Efeito cascata', () => {
  test('multiplica a base por cada taxa registrando incrementos', () => {
    const resultado = calcularEfeitoCascata(d('1000'), [
      { data: data(2024, 1, 16), taxa: d('1.1'), periodo: '01/2024' },
      { data: data(2025, 1, 16), taxa: d('1.05'), periodo: '01/2025' }
    ]);

    expect(resultado.valorInicial.toString()).toBe('1000');
    expect(resultado.valorFinal.toString()).toBe('1155');
    expect(resultado.passos.map(p => p.incremento.toString())).toEqual(['100', '55']);
    expect(resultado.passos.map(p => p.valorDepois.toString())).toEqual(['1100', '1155']);
    expect(resultado.passos[1].valorAntes.toString()).toBe('1100');
  });

  test('sem etapas devolve a propria base', () => {
    const resultado = calcularEfeitoCascata(d('42.5'), []);

    expect(resultado.valorFinal.toString()).toBe('42.5');
    expect(resultado.passos).toEqual([]);
  });

  test('etapas so de correcoes de indice que passam no filtro', () => {
    const correcoes = [
      correcaoIpca(data(2023, 3, 16), '1000', '1.05'),
      recuperacao(data(2023, 6, 1), '1050', '0'),
      correcaoIpca(data(2024, 3, 16), '0', '1.03')
    ];

    const etapas = etapasDeCorrecoes(correcoes, c => c.dataCorrecao > data(2023, 4, 1));

    expect(etapas).toHaveLength(1);
    expect(etapas[0].periodo).toBe('03/2024');
    expect(etapas[0].taxa.toString()).toBe('1.03');
  });

  test('ordenarEtapas ordena por data sem alterar a entrada', () => {
    const entrada = [
      { data: data(2025, 1, 16), taxa: d('1.05'), periodo: '01/2025' },
      { data: data(2024, 1, 16), taxa: d('1.1'), periodo: '01/2024' }
    ];

    expect(ordenarEtapas(entrada).map(e => e.periodo)).toEqual(['01/2024', '01/2025']);
    expect(entrada[0].periodo).toBe('01/2025');
  });
});

// ════════════════════════════════════════════════════════════════════════
// MESCLAGEM
// ════════════════════════════════════════════════════════════════════════

describe('mesclarCorrecoes', () => {
  const cco = criarCco({ dataReconhecimento: data(2022, 2, 10), valor: '1000000' });
  const originais = [
    correcaoIpca(data(2023, 3, 16), '1000000', '1.05'),
    correcaoIpca(data(2025, 3, 16), '1081500', '1.02')
  ];

  function insercao(propostaId: string, dataCorrecao: Date) {
    return {
      propostaId,
      correcao: novaCorrecaoIndice(cco, {
        subTipo: 'RETIFICACAO',
        dataCorrecao,
        valorAnterior: d('1050000'),
        valorNovo: d('1081500'),
        taxa: d('1.03'),
        observacao: 'gap',
        criadaEm: data(2025, 6, 1)
      })
    };
  }

  test('insere em ordem cronologica', () => {
    const resultado = mesclarCorrecoes(originais, [insercao('p1', data(2024, 3, 16))], []);

    expect(resultado.conflitos).toEqual([]);
    expect(resultado.correcoes.map(c => c.dataCorrecao.toISOString().slice(0, 10))).toEqual([
      '2023-03-16', '2024-03-16', '2025-03-16'
    ]);
    expect(resultado.correcoes[1].subTipo).toBe('RETIFICACAO');
    expect(resultado.correcoes[1].diferencaValor.toString()).toBe('31500');
  });

  test('nao cria segunda correcao de indice no mesmo mes', () => {
    const resultado = mesclarCorrecoes(originais, [insercao('p1', data(2025, 3, 20))], []);

    expect(resultado.correcoes).toHaveLength(2);
    expect(resultado.conflitos).toEqual([
      { propostaId: 'p1', periodo: '03/2025', motivo: 'Já existe correção de índice no período' }
    ]);
  });

  test('atualizacao substitui valores da correcao do periodo', () => {
    const resultado = mesclarCorrecoes(originais, [], [{
      propostaId: 'p2',
      periodo: { ano: 2025, mes: 3 },
      valorReconhecidoComOH: d('1145000'),
      valorReconhecidoComOhOriginal: d('1122549.02'),
      diferencaValor: d('22450.98'),
      observacao: 'recalculo',
      dataAtualizacao: data(2025, 6, 1)
    }]);

    expect(resultado.conflitos).toEqual([]);
    const atualizada = resultado.correcoes[1];
    expect(atualizada.valorReconhecidoComOH.toString()).toBe('1145000');
    expect(atualizada.observacao).toBe('recalculo');
    expect(atualizada.dataCorrecao.toISOString()).toBe('2025-03-16T00:00:00.000Z');
    expect(atualizada.dataCriacaoCorrecao.toISOString()).toBe('2025-06-01T00:00:00.000Z');
  });

  test('atualizacao sem correcao no periodo vira conflito', () => {
    const resultado = mesclarCorrecoes(originais, [], [{
      propostaId: 'p3',
      periodo: { ano: 2024, mes: 7 },
      valorReconhecidoComOH: d('1'),
      valorReconhecidoComOhOriginal: d('1'),
      diferencaValor: d('0'),
      observacao: 'x',
      dataAtualizacao: data(2025, 6, 1)
    }]);

    expect(resultado.conflitos).toEqual([
      { propostaId: 'p3', periodo: '07/2024', motivo: 'Nenhuma correção de índice no período para atualizar' }
    ]);
  });

  test('empate de data mantem a ordem de chegada', () => {
    const evento = retificacao(data(2025, 3, 16), '1103130', '1200000');

    const resultado = mesclarCorrecoes(originais, [{ propostaId: 'p4', correcao: evento }], []);

    expect(resultado.correcoes.map(c => c.tipo)).toEqual([
      TipoCorrecaoMonetaria.IPCA,
      TipoCorrecaoMonetaria.IPCA,
      TipoCorrecaoMonetaria.RETIFICACAO
    ]);
  });

  test('nao altera a lista original', () => {
    mesclarCorrecoes(originais, [insercao('p1', data(2024, 3, 16))], []);

    expect(originais).toHaveLength(2);
  });
});

// ════════════════════════════════════════════════════════════════════════
// ACUMULADOS E NOVAS ENTRADAS
// ════════════════════════════════════════════════════════════════════════

describe('recalcularAcumulados', () => {
  test('primeira correcao semeia, as seguintes multiplicam', () => {
    const correcoes = recalcularAcumulados([
      correcaoIpca(data(2023, 3, 16), '1000000', '1.05'),
      retificacao(data(2023, 8, 1), '1050000', '1050000'),
      correcaoIpca(data(2024, 3, 16), '1050000', '1.03')
    ]);

    expect(correcoes[0].igpmAcumulado.toString()).toBe('1.05');
    expect(correcoes[0].igpmAcumuladoReais.toString()).toBe('50000');
    expect(correcoes[0].valorLancamentoTotal.toString()).toBe('1102500');

    expect(correcoes[1].igpmAcumulado.toString()).toBe('0');

    expect(correcoes[2].igpmAcumulado.toString()).toBe('1.0815');
    expect(correcoes[2].igpmAcumuladoReais.toString()).toBe('81500');
    expect(correcoes[2].valorLancamentoTotal.toString()).toBe('1135575');
  });
});

describe('novaCorrecaoCompensacao', () => {
  test('parte do valor corrente e soma o ajuste', () => {
    const cco = criarCco({ dataReconhecimento: data(2022, 2, 10), valor: '1000000' });
    const correcoes = [recuperacao(data(2024, 6, 10), '1081500', '0')];

    const compensacao = novaCorrecaoCompensacao(cco, correcoes, d('51500'), data(2024, 12, 1), 'obs');

    expect(compensacao.tipo).toBe(TipoCorrecaoMonetaria.RETIFICACAO);
    expect(compensacao.subTipo).toBe('COMPENSACAO');
    expect(compensacao.valorReconhecidoComOhOriginal.toString()).toBe('0');
    expect(compensacao.valorReconhecidoComOH.toString()).toBe('51500');
    expect(compensacao.diferencaValor.toString()).toBe('51500');
    expect(compensacao.taxaCorrecao.toString()).toBe('1');
    expect(compensacao.observacao).toBe('obs');
  });

  test('sem correcoes parte do valor raiz', () => {
    const cco = criarCco({ dataReconhecimento: data(2022, 2, 10), valor: '1000' });

    const compensacao = novaCorrecaoCompensacao(cco, [], d('-200'), data(2024, 12, 1), 'obs');

    expect(compensacao.valorReconhecidoComOH.toString()).toBe('800');
  });
});
