/**
 * Tax Engine
 * Computes Companies Income Tax (CIT), Tertiary Education Tax (TET) and VAT
 * payable from normalized financial metrics, and audits the profit tax paid.
 *
 * Pure and synchronous: the only state is the frozen rate table handed to the
 * constructor, so one engine can be shared across callers.
 */

import { Value } from '@sinclair/typebox/value';
import { InvalidConfigurationError, InvalidInputError } from '../../agent-core/errors';
import {
    ComplianceStatus,
    FinancialMetrics,
    MetricId,
    RawFinancialMetrics,
    TaxRateTable,
    TaxRateTableSchema,
    TaxReport
} from '../../protocol';

/**
 * Round to the kobo (smallest NGN unit)
 */
export function roundToKobo(amount: number): number {
    const rounded = Math.round(amount * 100) / 100;
    return rounded === 0 ? 0 : rounded;
}

/**
 * Validate a rate table, throwing InvalidConfigurationError on the first problem
 */
export function validateRateTable(rates: TaxRateTable): TaxRateTable {
    if (!Value.Check(TaxRateTableSchema, rates)) {
        const first = Value.Errors(TaxRateTableSchema, rates).First();
        const setting = first?.path.replace(/^\//, '') || undefined;
        throw new InvalidConfigurationError(
            `Invalid tax rate table${setting ? ` at ${setting}` : ''}: ${first?.message ?? 'unknown error'}`,
            setting
        );
    }

    return Object.freeze({
        citThreshold: rates.citThreshold,
        citSmallRate: rates.citSmallRate,
        citStandardRate: rates.citStandardRate,
        tetRate: rates.tetRate,
        vatRate: rates.vatRate
    });
}

/**
 * Fill optional metrics with zero and reject missing revenue or bad amounts
 */
export function normalizeMetrics(raw: RawFinancialMetrics): FinancialMetrics {
    if (raw.total_revenue === undefined) {
        throw new InvalidInputError('total_revenue is required', 'total_revenue');
    }

    const amount = (id: MetricId): number => {
        const value = raw[id] ?? 0;
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new InvalidInputError(`${id} must be a finite number`, id);
        }
        if (value < 0) {
            throw new InvalidInputError(`${id} cannot be negative (got ${value})`, id);
        }
        return value;
    };

    return Object.freeze({
        total_revenue: amount('total_revenue'),
        cost_of_sales: amount('cost_of_sales'),
        operating_expenses: amount('operating_expenses'),
        profit_tax_paid: amount('profit_tax_paid'),
        output_vat: amount('output_vat'),
        input_vat: amount('input_vat')
    });
}

export class TaxEngine {
    readonly rates: TaxRateTable;

    constructor(rates: TaxRateTable) {
        this.rates = validateRateTable(rates);
    }

    /**
     * CIT band: turnover at or below the threshold is a small company
     */
    citBandFor(totalRevenue: number): { companySize: 'small' | 'standard'; rate: number } {
        return totalRevenue <= this.rates.citThreshold
            ? { companySize: 'small', rate: this.rates.citSmallRate }
            : { companySize: 'standard', rate: this.rates.citStandardRate };
    }

    computeTaxReport(raw: RawFinancialMetrics): TaxReport {
        const metrics = normalizeMetrics(raw);

        const grossProfit = metrics.total_revenue - metrics.cost_of_sales - metrics.operating_expenses;
        const assessableProfit = Math.max(grossProfit, 0);

        const band = this.citBandFor(metrics.total_revenue);
        const cit = roundToKobo(assessableProfit * band.rate);
        const tet = roundToKobo(assessableProfit * this.rates.tetRate);
        const totalProfitTax = roundToKobo(cit + tet);

        // Excess input VAT is not carried forward
        const vatPayable = roundToKobo(Math.max(metrics.output_vat - metrics.input_vat, 0));

        const balance = roundToKobo(totalProfitTax - metrics.profit_tax_paid);
        let complianceStatus: ComplianceStatus;
        let variance: number;
        if (balance === 0) {
            complianceStatus = 'Compliant';
            variance = 0;
        } else if (balance > 0) {
            complianceStatus = 'Underpaid';
            variance = balance;
        } else {
            complianceStatus = 'Overpaid';
            variance = -balance;
        }

        return Object.freeze({
            grossProfit: roundToKobo(grossProfit),
            assessableProfit: roundToKobo(assessableProfit),
            companySize: band.companySize,
            citRate: band.rate,
            cit,
            tetRate: this.rates.tetRate,
            tet,
            totalProfitTax,
            profitTaxPaid: metrics.profit_tax_paid,
            outputVat: metrics.output_vat,
            inputVat: metrics.input_vat,
            vatRate: this.rates.vatRate,
            vatPayable,
            complianceStatus,
            variance
        });
    }
}
