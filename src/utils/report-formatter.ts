/**
 * Report Formatter
 * Plain-text rendering of tax reports and model advice for the terminal
 */

import type {
    BusinessAdvice,
    BusinessAnalysisReport,
    TaxAdvisory,
    TaxReport
} from '../protocol';

export const RULE = '━'.repeat(60);
export const THIN_RULE = '-'.repeat(60);

const nairaFormat = new Intl.NumberFormat('en-NG', {
    style: 'currency',
    currency: 'NGN',
    currencyDisplay: 'narrowSymbol'
});

/**
 * Format currency as ₦1,234.56 (negatives as -₦1,234.56)
 */
export function formatCurrency(amount: number): string {
    return nairaFormat.format(Object.is(amount, -0) ? 0 : amount);
}

/**
 * Format a fractional rate as a percentage (0.075 -> 7.5%)
 */
export function formatRate(rate: number): string {
    return `${parseFloat((rate * 100).toFixed(2))}%`;
}

function row(label: string, value: string): string {
    return `  > ${label.padEnd(26)}${value}`;
}

const STATUS_LABELS: Record<TaxReport['complianceStatus'], string> = {
    Compliant: 'COMPLIANT (Paid in Full)',
    Underpaid: 'NON_COMPLIANT (Underpaid)',
    Overpaid: 'OVERPAID (Refund Due)'
};

export function complianceLabel(report: TaxReport): string {
    return STATUS_LABELS[report.complianceStatus];
}

export function renderTaxReport(report: TaxReport, title?: string): string {
    const lines: string[] = [RULE];
    if (title) {
        lines.push(`| ${title} |`, RULE);
    }

    lines.push(
        '--- PROFIT TAX CALCULATION (Annual) ---',
        row('Gross Profit:', formatCurrency(report.grossProfit)),
        row('Assessable Profit:', formatCurrency(report.assessableProfit)),
        row('Company Size:', report.companySize === 'small' ? 'Small (CIT band)' : 'Standard (CIT band)'),
        row(`CIT @ ${formatRate(report.citRate)}:`, formatCurrency(report.cit)),
        row(`TET @ ${formatRate(report.tetRate)}:`, formatCurrency(report.tet)),
        THIN_RULE,
        row('TOTAL PROFIT TAX DUE:', formatCurrency(report.totalProfitTax)),
        row('PROFIT TAX PAID:', formatCurrency(report.profitTaxPaid)),
        THIN_RULE
    );

    switch (report.complianceStatus) {
        case 'Underpaid':
            lines.push(row('PAYMENT STATUS:', `${formatCurrency(report.variance)} still owed (Underpaid)`));
            break;
        case 'Overpaid':
            lines.push(row('PAYMENT STATUS:', `${formatCurrency(report.variance)} refund/credit due (Overpaid)`));
            break;
        default:
            lines.push(row('PAYMENT STATUS:', 'Paid in Full'));
    }

    lines.push(
        RULE,
        `--- VAT CALCULATION (standard rate ${formatRate(report.vatRate)}) ---`,
        row('Output VAT (On Sales):', formatCurrency(report.outputVat)),
        row('Input VAT (On Purchases):', formatCurrency(report.inputVat)),
        THIN_RULE,
        row('VAT REMITTABLE TO FIRS:', formatCurrency(report.vatPayable))
    );

    if (report.inputVat > report.outputVat) {
        lines.push(`  ! Input VAT exceeds output VAT by ${formatCurrency(report.inputVat - report.outputVat)}; the excess is not carried forward here.`);
    }

    lines.push(RULE, `PROFIT TAX STATUS: ${complianceLabel(report)}`);

    return lines.join('\n');
}

export function renderTaxAdvisory(advisory: TaxAdvisory): string {
    const lines = [
        '--- TAX COMPLIANCE ---',
        advisory.compliance_recommendation,
        '',
        '--- VAT ---',
        advisory.vat_recommendation,
        '',
        '--- BUSINESS GROWTH ADVICE ---',
        advisory.business_growth_advice
    ];

    if (advisory.actionable_steps.length > 0) {
        lines.push('', '--- NEXT STEPS ---', ...advisory.actionable_steps.map(step => `  • ${step}`));
    }

    return lines.join('\n');
}

export function renderBusinessAdvice(advice: BusinessAdvice, relevant: boolean): string {
    const lines = [
        RULE,
        `TITLE: ${advice.advice_title.toUpperCase()}`,
        `TYPE: ${advice.advice_type}`,
        RULE
    ];

    if (!relevant) {
        lines.push(advice.key_points_summary);
        return lines.join('\n');
    }

    lines.push('--- KEY SUMMARY ---', advice.key_points_summary, '', '--- DETAILED EXPLANATION ---', advice.detailed_explanation);

    if (advice.actionable_steps.length > 0) {
        lines.push('', '--- ACTIONABLE NEXT STEPS ---', ...advice.actionable_steps.map(step => `  • ${step}`));
    }

    lines.push('', '--- KEY CONSIDERATIONS ---', advice.potential_risks_or_considerations);

    return lines.join('\n');
}

export function renderAnalysisReport(report: BusinessAnalysisReport): string {
    const sections: Array<[string, string]> = [
        ['1. PROFITABILITY ANALYSIS', report.profitability_analysis],
        ['2. GROWTH & FUTURE PROJECTION', report.growth_and_future_projection],
        ['3. BUSINESS EFFICIENCY ANALYSIS', report.business_efficiency_analysis],
        ['4. ESTIMATED BUSINESS VALUATION', report.estimated_business_valuation],
        ['5. TAX COMPLIANCE OVERVIEW', report.tax_compliance_overview],
        ['6. LOAN ELIGIBILITY ASSESSMENT', report.loan_eligibility_assessment]
    ];

    const lines = [RULE, '| AI BUSINESS ANALYSIS REPORT |', RULE];
    for (const [heading, body] of sections) {
        lines.push('', `--- ${heading} ---`, body);
    }
    lines.push('', '--- 7. ACTIONABLE ADVICE ---', ...report.actionable_advice.map(item => `  • ${item}`), RULE);

    return lines.join('\n');
}
