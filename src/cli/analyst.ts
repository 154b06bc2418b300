#!/usr/bin/env node
/**
 * AI Business Analyst (Nigeria): monthly figures in, seven-part report out
 */

import { loadTaxRateTable } from '../config';
import { logger } from '../utils/logger';
import { formatCurrency, renderAnalysisReport, THIN_RULE } from '../utils/report-formatter';
import { InvalidInputError, errorMessage } from '../agent-core/errors';
import {
    BusinessAnalystSkill,
    businessAnalystSkill,
    summarize
} from '../skills/business-analyst';
import type { TaxRateTable } from '../protocol';
import { Prompter } from './prompt';

const EXIT_WORDS = ['quit', 'exit', 'q'];
const DECLINE_WORDS = ['no', 'n', ...EXIT_WORDS];

export type NumericInput =
    | { kind: 'value'; value: number }
    | { kind: 'exit' }
    | { kind: 'invalid'; message: string };

/**
 * Parse a typed amount such as "1,000,000"
 */
export function parseNumericInput(text: string): NumericInput {
    const input = text.trim().toLowerCase();
    if (EXIT_WORDS.includes(input)) return { kind: 'exit' };

    const value = input === '' ? NaN : Number(input.replace(/,/g, ''));
    if (!Number.isFinite(value)) {
        return { kind: 'invalid', message: 'Invalid input. Please enter a numeric value (e.g., 500000).' };
    }
    if (value < 0) {
        return { kind: 'invalid', message: 'Value cannot be negative. Please try again.' };
    }
    return { kind: 'value', value };
}

async function askNumber(prompter: Prompter, question: string): Promise<number | null> {
    while (true) {
        const answer = await prompter.ask(question);
        if (answer === null) return null;

        const parsed = parseNumericInput(answer);
        if (parsed.kind === 'exit') return null;
        if (parsed.kind === 'value') return parsed.value;
        prompter.print(parsed.message);
    }
}

export async function runAnalystSession(
    prompter: Prompter,
    analyst: BusinessAnalystSkill,
    rates: Pick<TaxRateTable, 'citThreshold'>
): Promise<void> {
    prompter.print('--- AI Business Analyst (Nigeria) ---');
    prompter.print('This tool collects your monthly financial data to provide a 7-part analysis.');
    prompter.print("Type 'quit' or 'exit' at any prompt to end the session.");

    while (true) {
        prompter.print(THIN_RULE);
        const industry = await prompter.ask("What is your business industry (e.g., 'Retail', 'Restaurant', 'Logistics')?\n> ");
        if (industry === null || EXIT_WORDS.includes(industry.toLowerCase())) break;
        if (!industry) {
            prompter.print('Industry is required to provide a benchmark. Please try again.');
            continue;
        }

        const revenue = await askNumber(prompter, 'Enter your total Monthly Revenue (NGN):\n> ');
        if (revenue === null) break;
        const totalCosts = await askNumber(prompter, 'Enter your total Monthly Costs (Fixed + Variable) (NGN):\n> ');
        if (totalCosts === null) break;
        const bankBalance = await askNumber(prompter, 'Enter your Current Business Bank Account Balance (NGN):\n> ');
        if (bankBalance === null) break;

        try {
            const snapshot = summarize({ industry, revenue, totalCosts, bankBalance }, rates);

            prompter.print('\n--- Your Data Summary ---');
            prompter.print(`  Monthly Revenue:    ${formatCurrency(snapshot.revenue)}`);
            prompter.print(`  Total Monthly Cost: ${formatCurrency(snapshot.totalCosts)}`);
            prompter.print(`  Net Profit/Loss:    ${formatCurrency(snapshot.netProfit)}`);
            prompter.print(`  Bank Balance:       ${formatCurrency(snapshot.bankBalance)}`);

            const result = await analyst.analyze(snapshot);
            prompter.print(renderAnalysisReport(result.value));
        } catch (error) {
            if (!(error instanceof InvalidInputError)) {
                logger.error('[Analyst CLI] Unexpected error:', error);
            }
            prompter.print(`\n${errorMessage(error)}.`);
        }

        const again = await prompter.ask("\nPress Enter to run a new analysis, or type 'no' to exit:\n> ");
        if (again === null || DECLINE_WORDS.includes(again.toLowerCase())) break;
    }

    prompter.print('Exiting analyst tool. Goodbye!');
}

if (require.main === module) {
    const prompter = new Prompter();
    Promise.resolve()
        .then(() => runAnalystSession(prompter, businessAnalystSkill, loadTaxRateTable()))
        .catch(error => {
            logger.error('[Analyst CLI] Fatal error:', error);
            process.stderr.write(`${errorMessage(error)}\n`);
            process.exitCode = 1;
        })
        .finally(() => prompter.close());
}
