#!/usr/bin/env node
/**
 * Nigerian Corporate Tax & Business Advisor (file uploader)
 *
 * Usage:
 *   tax-audit                                  interactive loop
 *   tax-audit <file> [--size MEDIUM|LARGE] [--no-advice]
 */

import { parseArgs } from 'util';
import { loadTaxRateTable } from '../config';
import { logger } from '../utils/logger';
import { TaxEngine, normalizeMetrics } from '../skills/tax-engine';
import { DataIngestor, dataIngestor } from '../skills/data-ingestion';
import {
    BusinessSize,
    TaxAdvisorySkill,
    isBusinessSize,
    taxAdvisorySkill
} from '../skills/tax-advisory';
import { RULE, THIN_RULE, renderTaxAdvisory, renderTaxReport } from '../utils/report-formatter';
import {
    IngestionError,
    InvalidConfigurationError,
    InvalidInputError,
    errorMessage
} from '../agent-core/errors';
import { Prompter } from './prompt';

export interface AuditOptions {
    filePath: string;
    businessSize: BusinessSize;
    withAdvice: boolean;
}

export interface AuditDependencies {
    engine: TaxEngine;
    ingestor: DataIngestor;
    advisor: TaxAdvisorySkill;
}

const EXIT_WORDS = ['exit', 'quit', 'q'];
const DECLINE_WORDS = ['no', 'n', ...EXIT_WORDS];

/**
 * Ingest, compute and (optionally) advise; returns the text to print.
 * Input and configuration problems become a SYSTEM ERROR block, not a throw.
 */
export async function auditFile(options: AuditOptions, deps: AuditDependencies): Promise<string> {
    const title = `TAX & BUSINESS ASSESSMENT FOR ${options.businessSize} COMPANY`;

    try {
        const ingestion = await deps.ingestor.ingestFile(options.filePath);
        const metrics = normalizeMetrics(ingestion.metrics);
        const report = deps.engine.computeTaxReport(metrics);
        const sections = [renderTaxReport(report, title)];

        if (options.withAdvice && deps.advisor.isAvailable()) {
            const result = await deps.advisor.advise({
                metrics,
                report,
                businessSize: options.businessSize,
                tableText: ingestion.tableText
            });
            sections.push(renderTaxAdvisory(result.value));
        } else if (options.withAdvice) {
            sections.push('Advice skipped: no AI provider configured (set OPENROUTER_API_KEY or ANTHROPIC_API_KEY).');
        }

        sections.push(RULE);
        return sections.join('\n\n');
    } catch (error) {
        if (
            error instanceof IngestionError ||
            error instanceof InvalidInputError ||
            error instanceof InvalidConfigurationError
        ) {
            return [RULE, `| ${title} |`, RULE, `SYSTEM ERROR: ${error.message}`, RULE].join('\n');
        }
        throw error;
    }
}

async function interactive(deps: AuditDependencies, withAdvice: boolean): Promise<void> {
    const prompter = new Prompter();
    prompter.print('--- Nigerian Corporate Tax & Business Advisor (File Uploader) ---');
    prompter.print('Computes CIT, TET and VAT from CSV or Excel data and adds AI business advice.');

    try {
        while (true) {
            prompter.print(THIN_RULE);
            const filePath = await prompter.ask("Enter the path to your CSV or Excel (.xlsx) file, or 'exit': ");
            if (filePath === null || EXIT_WORDS.includes(filePath.toLowerCase())) break;
            if (!filePath) continue;

            const size = await prompter.ask('Enter business size for context (MEDIUM or LARGE): ');
            if (size === null) break;
            const businessSize = size.toUpperCase();
            if (!isBusinessSize(businessSize)) {
                prompter.print("Invalid business size. Please enter 'MEDIUM' or 'LARGE'.");
                continue;
            }

            prompter.print();
            prompter.print(await auditFile({ filePath, businessSize, withAdvice }, deps));

            const again = await prompter.ask("Press Enter to run another calculation, or type 'no' to exit: ");
            if (again === null || DECLINE_WORDS.includes(again.toLowerCase())) break;
        }
        prompter.print('Exiting calculator. Goodbye!');
    } finally {
        prompter.close();
    }
}

async function main(): Promise<void> {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            size: { type: 'string', short: 's', default: 'MEDIUM' },
            'no-advice': { type: 'boolean', default: false }
        }
    });

    const deps: AuditDependencies = {
        engine: new TaxEngine(loadTaxRateTable()),
        ingestor: dataIngestor,
        advisor: taxAdvisorySkill
    };
    const withAdvice = !values['no-advice'];

    const [filePath] = positionals;
    if (!filePath) {
        await interactive(deps, withAdvice);
        return;
    }

    const businessSize = (values.size ?? 'MEDIUM').toUpperCase();
    if (!isBusinessSize(businessSize)) {
        throw new InvalidInputError(`--size must be MEDIUM or LARGE, got "${values.size}"`, 'size');
    }

    process.stdout.write(`${await auditFile({ filePath, businessSize, withAdvice }, deps)}\n`);
}

if (require.main === module) {
    main().catch(error => {
        logger.error('[Tax Audit] Fatal error:', error);
        process.stderr.write(`${errorMessage(error)}\n`);
        process.exit(1);
    });
}
