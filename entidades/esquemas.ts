/**
 * Schemas zod dos documentos persistidos.
 *
 * Convertem documentos sem tipo (JSON, Decimal128 em extended JSON)
 * nas estruturas tipadas do domínio. A serialização inversa é
 * JSON.stringify direto: Decimal e Date já produzem strings.
 */

import { z } from 'zod';
import { Decimal } from '../utilitarios/Decimal';
import { parseData } from '../utilitarios/Periodo';
import { Resultado, sucesso, falha } from '../utilitarios/Resultado';
import {
  TipoCorrecaoMonetaria,
  TipoIndice,
  StatusSessao,
  CenarioCorrecao,
  TipoProposta,
  PrioridadeGap,
  CorrecaoMonetaria,
  ContaCustoOleo,
  TaxaIndice,
  Gap,
  AlteracaoNoPeriodo,
  CorrecaoForaPeriodo,
  Duplicata,
  PassoCascata,
  PropostaCorrecao,
  ImpactoFinanceiro,
  RelatorioValidacao,
  SessaoCorrecao
} from './tipos';

type Esquema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ════════════════════════════════════════════════════════════════════════
// PRIMITIVOS
// ════════════════════════════════════════════════════════════════════════

const zDecimal = z
  .union([
    z.string(),
    z.number().finite(),
    z.object({ $numberDecimal: z.string() })
  ])
  .transform((valor, ctx): Decimal => {
    if (typeof valor === 'number') {
      return Decimal.from(valor);
    }
    const texto = typeof valor === 'string' ? valor : valor.$numberDecimal;
    if (!Decimal.isDecimalValido(texto)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Decimal inválido: "${texto}"` });
      return z.NEVER;
    }
    return Decimal.parse(texto);
  });

function zDecimalPadrao(padrao: Decimal = Decimal.ZERO) {
  return zDecimal.nullish().transform((valor): Decimal => valor ?? padrao);
}

const zData = z
  .union([z.string(), z.date()])
  .transform((valor, ctx): Date => {
    const data = parseData(valor);
    if (!data) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Data inválida: "${String(valor)}"` });
      return z.NEVER;
    }
    return data;
  });

const zTipoIndice: Esquema<TipoIndice> = z.union([
  z.literal(TipoCorrecaoMonetaria.IPCA),
  z.literal(TipoCorrecaoMonetaria.IGPM)
]);

const valoresLancamento = {
  valorLancamentoTotal: zDecimalPadrao(),
  valorNaoReconhecido: zDecimalPadrao(),
  valorReconhecivel: zDecimalPadrao(),
  valorNaoPassivelRecuperacao: zDecimalPadrao(),
  valorReconhecido: zDecimalPadrao(),
  valorReconhecidoComOH: zDecimalPadrao(),
  overHeadExploracao: zDecimalPadrao(),
  overHeadProducao: zDecimalPadrao(),
  overHeadTotal: zDecimalPadrao(),
  valorReconhecidoExploracao: zDecimalPadrao(),
  valorReconhecidoProducao: zDecimalPadrao(),
  valorRecuperado: zDecimalPadrao(),
  quantidadeLancamento: z.number().int().nonnegative().default(0)
};

// ════════════════════════════════════════════════════════════════════════
// CCO E CORREÇÕES
// ════════════════════════════════════════════════════════════════════════

const correcaoMonetariaSchema: Esquema<CorrecaoMonetaria> = z
  .object({
    ...valoresLancamento,
    tipo: z.nativeEnum(TipoCorrecaoMonetaria),
    subTipo: z.string().nullish(),
    dataCorrecao: zData.nullish(),
    dataCriacaoCorrecao: zData.nullish(),
    contrato: z.string().default(''),
    campo: z.string().default(''),
    faseRemessa: z.string().default(''),
    valorReconhecidoComOhOriginal: zDecimalPadrao(),
    diferencaValor: zDecimalPadrao(),
    taxaCorrecao: zDecimalPadrao(Decimal.UM),
    valorRecuperadoTotal: zDecimalPadrao(),
    igpmAcumulado: zDecimalPadrao(),
    igpmAcumuladoReais: zDecimalPadrao(),
    ativo: z.boolean().default(true),
    transferencia: z.boolean().default(false),
    observacao: z.string().nullish()
  })
  .transform((bruto, ctx): CorrecaoMonetaria => {
    const dataCorrecao = bruto.dataCorrecao ?? bruto.dataCriacaoCorrecao;
    const dataCriacaoCorrecao = bruto.dataCriacaoCorrecao ?? bruto.dataCorrecao;
    if (!dataCorrecao || !dataCriacaoCorrecao) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Correção sem dataCorrecao nem dataCriacaoCorrecao'
      });
      return z.NEVER;
    }
    return {
      ...bruto,
      subTipo: bruto.subTipo ?? null,
      dataCorrecao,
      dataCriacaoCorrecao,
      observacao: bruto.observacao ?? null
    };
  });

const contaCustoOleoSchema: Esquema<ContaCustoOleo> = z
  .object({
    ...valoresLancamento,
    id: z.string().min(1),
    contratoCpp: z.string().min(1),
    campo: z.string().default(''),
    remessa: z.number().int().default(0),
    remessaExposicao: z.number().int().nullish(),
    faseRemessa: z.string().default(''),
    origemDosGastos: z.string().default(''),
    anoReconhecimento: z.number().int().nullish(),
    mesReconhecimento: z.number().int().min(1).max(12).nullish(),
    dataReconhecimento: zData,
    dataLancamento: zData.nullish(),
    flgRecuperado: z.boolean().default(false),
    correcoesMonetarias: z.array(correcaoMonetariaSchema).default([]),
    origemCorrecao: z
      .object({
        ccoOriginalId: z.string(),
        sessaoId: z.string(),
        cenario: z.nativeEnum(CenarioCorrecao),
        aplicadoEm: zData
      })
      .optional(),
    promocao: z
      .object({
        promovidaEm: zData,
        usuarioId: z.string().min(1),
        observacoes: z.string().nullish()
      })
      .optional()
  })
  .transform((bruto): ContaCustoOleo => {
    const { origemCorrecao, promocao, ...resto } = bruto;
    const cco: ContaCustoOleo = {
      ...resto,
      remessaExposicao: bruto.remessaExposicao ?? null,
      anoReconhecimento: bruto.anoReconhecimento ?? bruto.dataReconhecimento.getUTCFullYear(),
      mesReconhecimento: bruto.mesReconhecimento ?? bruto.dataReconhecimento.getUTCMonth() + 1,
      dataLancamento: bruto.dataLancamento ?? null
    };
    if (origemCorrecao) {
      cco.origemCorrecao = origemCorrecao;
    }
    if (promocao) {
      cco.promocao = { ...promocao, observacoes: promocao.observacoes ?? null };
    }
    return cco;
  });

const taxaIndiceSchema: Esquema<TaxaIndice> = z.object({
  anoReferencia: z.number().int(),
  mesReferencia: z.number().int().min(1).max(12),
  tipo: zTipoIndice,
  valor: zDecimal
});

// ════════════════════════════════════════════════════════════════════════
// ANÁLISE
// ════════════════════════════════════════════════════════════════════════

const gapSchema: Esquema<Gap> = z.object({
  id: z.string(),
  ano: z.number().int(),
  mes: z.number().int(),
  dataAniversario: z.string(),
  anoTaxa: z.number().int(),
  mesTaxa: z.number().int(),
  periodoTaxa: z.string(),
  valorBase: zDecimal,
  dataLimite: z.string(),
  prioridade: z.nativeEnum(PrioridadeGap)
});

const alteracaoSchema: Esquema<AlteracaoNoPeriodo> = z.object({
  tipo: z.nativeEnum(TipoCorrecaoMonetaria),
  dataAplicacao: zData,
  valorAntes: zDecimal,
  valorDepois: zDecimal,
  valorImpacto: zDecimal,
  impactoPercentual: z.number()
});

const correcaoForaPeriodoSchema: Esquema<CorrecaoForaPeriodo> = z.object({
  anoAniversario: z.number().int(),
  mesAniversario: z.number().int(),
  anoAplicado: z.number().int(),
  mesAplicado: z.number().int(),
  dataLimite: zData,
  dataAplicacao: zData,
  diasAtraso: z.number().int(),
  tipoCorrecao: zTipoIndice,
  indiceCorrecao: z.number().int(),
  taxaAplicada: zDecimal,
  taxaEsperada: zDecimal.nullable(),
  diferencaTaxa: zDecimal.nullable(),
  necessitaAjuste: z.boolean(),
  teveAlteracoesNoPeriodo: z.boolean(),
  alteracoesNoPeriodo: z.array(alteracaoSchema),
  valorBaseAntesAlteracoes: zDecimal,
  valorBaseNaAplicacao: zDecimal
});

const duplicataSchema: Esquema<Duplicata> = z.object({
  indice: z.number().int(),
  periodo: z.string(),
  valorDuplicado: zDecimal,
  dataCorrecao: zData,
  dataCorrecaoOriginal: zData,
  indiceOriginal: z.number().int(),
  tipo: zTipoIndice
});

// ════════════════════════════════════════════════════════════════════════
// SESSÃO
// ════════════════════════════════════════════════════════════════════════

const passoCascataSchema: Esquema<PassoCascata> = z.object({
  periodo: z.string(),
  data: zData,
  taxa: zDecimal,
  valorAntes: zDecimal,
  valorDepois: zDecimal,
  incremento: zDecimal
});

const propostaSchema: Esquema<PropostaCorrecao> = z.object({
  id: z.string(),
  tipo: z.nativeEnum(TipoProposta),
  cenario: z.nativeEnum(CenarioCorrecao),
  dataAlvo: zData,
  periodoAlvo: z.string(),
  valorAtual: zDecimal,
  valorProposto: zDecimal,
  impacto: zDecimal,
  valorBase: zDecimal.nullable(),
  taxaAplicada: zDecimal,
  periodoTaxaReferencia: z.string(),
  descricao: z.string(),
  dependencias: z.array(z.string()),
  regrasAplicadas: z.array(z.string()),
  resolvivel: z.boolean(),
  erro: z.string().nullable(),
  indiceRemover: z.number().int().nullable(),
  dataOrigem: zData.nullish().transform((valor): Date | null => valor ?? null),
  passosCascata: z.array(passoCascataSchema)
});

const impactoFinanceiroSchema: Esquema<ImpactoFinanceiro> = z.object({
  impactoTotal: zDecimal,
  totalAdicoes: zDecimal,
  totalAtualizacoes: zDecimal,
  totalRemocao: zDecimal,
  totalCompensacoes: zDecimal,
  quantidadePropostas: z.number().int()
});

const avisoSchema = z.object({ codigo: z.string(), mensagem: z.string() });

const relatorioValidacaoSchema: Esquema<RelatorioValidacao> = z.object({
  valido: z.boolean(),
  erros: z.array(avisoSchema),
  avisos: z.array(avisoSchema)
});

const sessaoCorrecaoSchema: Esquema<SessaoCorrecao> = z.object({
  id: z.string().min(1),
  ccoId: z.string(),
  usuarioId: z.string(),
  status: z.nativeEnum(StatusSessao),
  cenario: z.nativeEnum(CenarioCorrecao),
  gapsIdentificados: z.array(gapSchema),
  correcoesForaPeriodo: z.array(correcaoForaPeriodoSchema),
  duplicatas: z.array(duplicataSchema),
  propostas: z.array(propostaSchema),
  aprovadas: z.array(z.string()),
  impactoFinanceiro: impactoFinanceiroSchema.nullable(),
  relatorioValidacao: relatorioValidacaoSchema.nullable(),
  criadaEm: zData,
  atualizadaEm: zData,
  aplicadaEm: zData.nullable(),
  mensagemErro: z.string().nullable(),
  motivoRejeicao: z.string().nullable(),
  ccoCorrigidaId: z.string().nullable()
});

// ════════════════════════════════════════════════════════════════════════
// INTERPRETAÇÃO
// ════════════════════════════════════════════════════════════════════════

/**
 * Valida documento bruto contra o schema.
 * Em falha, retorna as mensagens do zod concatenadas com o caminho.
 */
function interpretarDocumento<T>(schema: Esquema<T>, bruto: unknown): Resultado<T, string> {
  const resultado = schema.safeParse(bruto);
  if (resultado.success) {
    return sucesso(resultado.data);
  }
  const mensagem = resultado.error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return falha(mensagem);
}

export {
  zDecimal,
  zData,
  correcaoMonetariaSchema,
  contaCustoOleoSchema,
  taxaIndiceSchema,
  gapSchema,
  correcaoForaPeriodoSchema,
  duplicataSchema,
  propostaSchema,
  sessaoCorrecaoSchema,
  interpretarDocumento
};
export type { Esquema };
