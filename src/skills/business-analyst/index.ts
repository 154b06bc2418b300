/**
 * Business Analyst Skill
 * Computes a monthly profitability snapshot locally and asks the model for a
 * seven-part analysis report
 */

import { logger } from '../../utils/logger';
import { AIClient, aiClient } from '../../utils/ai-client';
import { describeSchema, parseStructuredReply } from '../../utils/structured-output';
import { formatCurrency, formatRate } from '../../utils/report-formatter';
import { InvalidInputError, errorMessage } from '../../agent-core/errors';
import {
    AdvisorResult,
    BusinessAnalysisReport,
    BusinessAnalysisReportSchema,
    CompanySize,
    TaxRateTable
} from '../../protocol';

export interface MonthlyFigures {
    industry: string;
    revenue: number;
    totalCosts: number;
    bankBalance: number;
}

export interface BusinessSnapshot extends MonthlyFigures {
    netProfit: number;
    profitMargin: number | null;
    costToRevenue: number | null;
    annualizedRevenue: number;
    companySize: CompanySize;
}

const SYSTEM_PROMPT = `You are an expert Nigerian Business Analyst, Financial Valuator and Tax Advisor.
Analyse a small business's monthly figures and write a seven-part report:
1. Profitability: what the net profit and profit margin mean for the business.
2. Growth & projection: compare the margin with a reasonable benchmark for the industry in Nigeria and project 3-6 months.
3. Efficiency: interpret the cost-to-revenue ratio.
4. Valuation: a theoretical 2x-3x multiple of annual net profit, stating "This is a theoretical estimate for informational purposes only and not a formal valuation."
5. Tax overview: likely CIT, TET and VAT obligations from the annualised revenue and size band given. Do not calculate exact tax; advise consulting a professional.
6. Loan eligibility: a high-level view from net profit and bank balance. This is not a guarantee of a loan.
7. Actionable advice: 2-3 specific recommendations.

The arithmetic is already done; use the figures provided.
Respond with a single JSON object matching this schema and nothing else:
`;

/**
 * Local arithmetic: net profit, margin, efficiency and size band
 */
export function summarize(figures: MonthlyFigures, rates: Pick<TaxRateTable, 'citThreshold'>): BusinessSnapshot {
    const industry = figures.industry.trim();
    if (!industry) {
        throw new InvalidInputError('Industry is required to provide a benchmark', 'industry');
    }

    const amounts: Array<[keyof MonthlyFigures, number]> = [
        ['revenue', figures.revenue],
        ['totalCosts', figures.totalCosts],
        ['bankBalance', figures.bankBalance]
    ];
    for (const [field, value] of amounts) {
        if (!Number.isFinite(value) || value < 0) {
            throw new InvalidInputError(`${field} must be a non-negative number`, field);
        }
    }

    const netProfit = figures.revenue - figures.totalCosts;
    const annualizedRevenue = figures.revenue * 12;

    return {
        ...figures,
        industry,
        netProfit,
        profitMargin: figures.revenue > 0 ? netProfit / figures.revenue : null,
        costToRevenue: figures.revenue > 0 ? figures.totalCosts / figures.revenue : null,
        annualizedRevenue,
        companySize: annualizedRevenue <= rates.citThreshold ? 'small' : 'standard'
    };
}

export function buildAnalysisPrompt(snapshot: BusinessSnapshot): string {
    const ratio = (value: number | null) => (value === null ? 'n/a' : formatRate(value));

    return [
        '--- USER FINANCIAL DATA (1 Month) ---',
        `Industry: ${snapshot.industry}`,
        `Monthly Revenue: ${formatCurrency(snapshot.revenue)}`,
        `Total Monthly Costs: ${formatCurrency(snapshot.totalCosts)}`,
        `Current Bank Account Balance: ${formatCurrency(snapshot.bankBalance)}`,
        '---',
        `Net Profit/Loss: ${formatCurrency(snapshot.netProfit)}`,
        `Profit Margin: ${ratio(snapshot.profitMargin)}`,
        `Cost-to-Revenue Ratio: ${ratio(snapshot.costToRevenue)}`,
        `Annualised Revenue: ${formatCurrency(snapshot.annualizedRevenue)} (${snapshot.companySize} company band)`
    ].join('\n');
}

export function fallbackAnalysis(reason: string): BusinessAnalysisReport {
    return {
        profitability_analysis: `Error: Could not generate analysis (${reason}).`,
        growth_and_future_projection: 'N/A',
        business_efficiency_analysis: 'N/A',
        estimated_business_valuation: 'N/A',
        tax_compliance_overview: 'N/A. Check your AI provider configuration.',
        loan_eligibility_assessment: 'N/A',
        actionable_advice: ['Analysis unavailable; retry once the advisory service is reachable.']
    };
}

export class BusinessAnalystSkill {
    constructor(private readonly client: AIClient = aiClient) {}

    async analyze(snapshot: BusinessSnapshot): Promise<AdvisorResult<BusinessAnalysisReport>> {
        if (snapshot.revenue === 0) {
            throw new InvalidInputError('Cannot calculate profit margin or provide analysis with zero revenue', 'revenue');
        }

        try {
            logger.info('[Business Analyst] Requesting analysis', { industry: snapshot.industry });

            const reply = await this.client.chat({
                tier: 'reasoning',
                temperature: 0.1,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT + describeSchema(BusinessAnalysisReportSchema) },
                    { role: 'user', content: `Analyze the following data:\n${buildAnalysisPrompt(snapshot)}` }
                ]
            });

            return { ok: true, value: parseStructuredReply(BusinessAnalysisReportSchema, reply) };
        } catch (error) {
            logger.error('[Business Analyst] Error:', error);
            const reason = errorMessage(error);
            return { ok: false, reason, value: fallbackAnalysis(reason) };
        }
    }
}

export const businessAnalystSkill = new BusinessAnalystSkill();
