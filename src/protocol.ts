/**
 * Tax Advisor Protocol Definitions
 * Using TypeBox for runtime validation of metrics, rate tables and model replies
 */

import { Type, Static } from '@sinclair/typebox';

// Metric identifiers recognised in uploaded statements
export const METRIC_IDS = [
    'total_revenue',
    'cost_of_sales',
    'operating_expenses',
    'profit_tax_paid',
    'output_vat',
    'input_vat'
] as const;

export type MetricId = typeof METRIC_IDS[number];

const Amount = Type.Number({ minimum: 0 });
const Rate = Type.Number({ minimum: 0, maximum: 1 });

// Financial metrics (normalized, every figure present)
export const FinancialMetricsSchema = Type.Object({
    total_revenue: Amount,
    cost_of_sales: Amount,
    operating_expenses: Amount,
    profit_tax_paid: Amount,
    output_vat: Amount,
    input_vat: Amount
});

export type FinancialMetrics = Readonly<Static<typeof FinancialMetricsSchema>>;

// Raw metrics as produced by the ingestor or a caller; only revenue is mandatory
export type RawFinancialMetrics = Partial<Record<MetricId, number>>;

// Tax rate table
export const TaxRateTableSchema = Type.Object({
    citThreshold: Amount,
    citSmallRate: Rate,
    citStandardRate: Rate,
    tetRate: Rate,
    vatRate: Rate
});

export type TaxRateTable = Readonly<Static<typeof TaxRateTableSchema>>;

// Tax report
export const ComplianceStatusSchema = Type.Union([
    Type.Literal('Compliant'),
    Type.Literal('Underpaid'),
    Type.Literal('Overpaid')
]);

export type ComplianceStatus = Static<typeof ComplianceStatusSchema>;

export const CompanySizeSchema = Type.Union([
    Type.Literal('small'),
    Type.Literal('standard')
]);

export type CompanySize = Static<typeof CompanySizeSchema>;

export const TaxReportSchema = Type.Object({
    grossProfit: Type.Number(),
    assessableProfit: Amount,
    companySize: CompanySizeSchema,
    citRate: Rate,
    cit: Amount,
    tetRate: Rate,
    tet: Amount,
    totalProfitTax: Amount,
    profitTaxPaid: Amount,
    outputVat: Amount,
    inputVat: Amount,
    vatRate: Rate,
    vatPayable: Amount,
    complianceStatus: ComplianceStatusSchema,
    variance: Amount
});

export type TaxReport = Readonly<Static<typeof TaxReportSchema>>;

// Tax advisory reply (batch audit)
export const TaxAdvisorySchema = Type.Object({
    compliance_recommendation: Type.String(),
    vat_recommendation: Type.String(),
    business_growth_advice: Type.String(),
    actionable_steps: Type.Array(Type.String())
});

export type TaxAdvisory = Static<typeof TaxAdvisorySchema>;

// Business advice reply (chatbot)
export const AdviceTypeSchema = Type.Union([
    Type.Literal('BUSINESS_STRATEGY'),
    Type.Literal('TAX_COMPLIANCE'),
    Type.Literal('IRRELEVANT')
]);

export type AdviceType = Static<typeof AdviceTypeSchema>;

export const BusinessAdviceSchema = Type.Object({
    relevance_score: Type.Number({ minimum: 0, maximum: 1 }),
    advice_type: AdviceTypeSchema,
    advice_title: Type.String(),
    key_points_summary: Type.String(),
    detailed_explanation: Type.String(),
    actionable_steps: Type.Array(Type.String()),
    potential_risks_or_considerations: Type.String()
});

export type BusinessAdvice = Static<typeof BusinessAdviceSchema>;

// Business analysis reply (analyst)
export const BusinessAnalysisReportSchema = Type.Object({
    profitability_analysis: Type.String(),
    growth_and_future_projection: Type.String(),
    business_efficiency_analysis: Type.String(),
    estimated_business_valuation: Type.String(),
    tax_compliance_overview: Type.String(),
    loan_eligibility_assessment: Type.String(),
    actionable_advice: Type.Array(Type.String())
});

export type BusinessAnalysisReport = Static<typeof BusinessAnalysisReportSchema>;

// Structured model result: validated record or typed fallback
export type AdvisorResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: string; value: T };
