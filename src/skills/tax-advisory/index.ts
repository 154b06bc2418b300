/**
 * Tax Advisory Skill
 * Asks the reasoning-tier model for compliance and growth advice on a computed
 * tax report. The figures come from TaxEngine; the model only writes advice.
 */

import { logger } from '../../utils/logger';
import { AIClient, aiClient } from '../../utils/ai-client';
import { describeSchema, parseStructuredReply } from '../../utils/structured-output';
import { formatCurrency, formatRate } from '../../utils/report-formatter';
import { errorMessage } from '../../agent-core/errors';
import {
    AdvisorResult,
    FinancialMetrics,
    TaxAdvisory,
    TaxAdvisorySchema,
    TaxReport
} from '../../protocol';

export type BusinessSize = 'MEDIUM' | 'LARGE';

export const BUSINESS_SIZES: readonly BusinessSize[] = ['MEDIUM', 'LARGE'];

export function isBusinessSize(value: string): value is BusinessSize {
    return BUSINESS_SIZES.some(size => size === value);
}

const SYSTEM_PROMPT = `You are a specialised Nigerian Corporate Tax and Business Advisory assistant.
The Companies Income Tax (CIT), Tertiary Education Tax (TET) and VAT figures you receive have
already been calculated. Do not recalculate them and do not contradict them.

Your job:
1. Advise on profit tax compliance (CIT and TET) given the payment status, including FIRS
   payment deadlines and how to settle an underpayment or claim an overpayment.
2. Advise on the VAT position: monthly remittance of VAT payable, and what to do with any
   input VAT that exceeds output VAT.
3. Give actionable business growth advice based on the cost structure in the data
   (for example a high cost of sales relative to revenue).
4. List 2-4 concrete next steps.

Respond with a single JSON object matching this schema and nothing else:
`;

export interface TaxAdvisoryInput {
    metrics: FinancialMetrics;
    report: TaxReport;
    businessSize: BusinessSize;
    tableText?: string;
}

export function fallbackAdvisory(reason: string): TaxAdvisory {
    return {
        compliance_recommendation: `Advisory service unavailable: ${reason}. The computed figures above are still valid.`,
        vat_recommendation: 'N/A',
        business_growth_advice: 'N/A. Cannot provide business advice due to error.',
        actionable_steps: []
    };
}

/**
 * Build the user prompt from raw data and computed liabilities
 */
export function buildAdvisoryPrompt(input: TaxAdvisoryInput): string {
    const { metrics, report, businessSize, tableText } = input;

    const lines = [
        `Provide tax compliance and business advice for a Nigerian company of '${businessSize}' size.`,
        ''
    ];

    if (tableText) {
        lines.push('--- FINANCIAL DATA (RAW, amounts in NGN) ---', tableText, '');
    }

    lines.push(
        '--- KEY EXTRACTED VALUES ---',
        `Total Revenue: ${formatCurrency(metrics.total_revenue)}`,
        `Cost of Sales: ${formatCurrency(metrics.cost_of_sales)}`,
        `Operating Expenses: ${formatCurrency(metrics.operating_expenses)}`,
        `Profit Tax Paid: ${formatCurrency(metrics.profit_tax_paid)}`,
        `Output VAT: ${formatCurrency(metrics.output_vat)}`,
        `Input VAT: ${formatCurrency(metrics.input_vat)}`,
        '',
        '--- COMPUTED LIABILITIES ---',
        `Gross Profit: ${formatCurrency(report.grossProfit)}`,
        `CIT @ ${formatRate(report.citRate)} (${report.companySize} company): ${formatCurrency(report.cit)}`,
        `TET @ ${formatRate(report.tetRate)}: ${formatCurrency(report.tet)}`,
        `Total Profit Tax Due: ${formatCurrency(report.totalProfitTax)}`,
        `Compliance Status: ${report.complianceStatus} (variance ${formatCurrency(report.variance)})`,
        `VAT Payable: ${formatCurrency(report.vatPayable)}`
    );

    return lines.join('\n');
}

export class TaxAdvisorySkill {
    constructor(private readonly client: AIClient = aiClient) {}

    isAvailable(): boolean {
        return this.client.isConfigured();
    }

    async advise(input: TaxAdvisoryInput): Promise<AdvisorResult<TaxAdvisory>> {
        try {
            logger.info('[Tax Advisory] Requesting advice', {
                businessSize: input.businessSize,
                status: input.report.complianceStatus
            });

            const reply = await this.client.chat({
                tier: 'reasoning',
                temperature: 0.1,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT + describeSchema(TaxAdvisorySchema) },
                    { role: 'user', content: buildAdvisoryPrompt(input) }
                ]
            });

            return { ok: true, value: parseStructuredReply(TaxAdvisorySchema, reply) };
        } catch (error) {
            logger.error('[Tax Advisory] Error:', error);
            const reason = errorMessage(error);
            return { ok: false, reason, value: fallbackAdvisory(reason) };
        }
    }
}

export const taxAdvisorySkill = new TaxAdvisorySkill();
