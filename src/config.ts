/**
 * Tax Advisor Configuration
 * Centralized config for environment variables and settings
 */

import dotenv from 'dotenv';
import { InvalidConfigurationError } from './agent-core/errors';
import type { TaxRateTable } from './protocol';

// Load environment variables
dotenv.config();

export interface AISettings {
    openRouter: {
        apiKey: string;
        baseUrl: string;
        siteUrl: string;
        siteName: string;
    };
    anthropic: {
        apiKey: string;
        model: string;
    };
    tiers: {
        fast: string;
        fastFallback: string;
        reasoning: string;
    };
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    maxTokens: number;
}

const config = {
    // AI Intelligence (OpenRouter & Tiering)
    ai: {
        openRouter: {
            apiKey: process.env.OPENROUTER_API_KEY || '',
            baseUrl: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
            siteUrl: process.env.SITE_URL || 'https://localhost',
            siteName: 'Nigerian Tax Advisor'
        },
        anthropic: {
            apiKey: process.env.ANTHROPIC_API_KEY || '',
            model: process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-5-20250929'
        },
        tiers: {
            // Chat answers, guardrail classification
            fast: process.env.MODEL_FAST || 'anthropic/claude-haiku-4.5',
            // Fallback for fast tier if primary fails
            fastFallback: process.env.MODEL_FAST_FALLBACK || 'openai/gpt-4o-mini',
            // Audit advice and business analysis
            reasoning: process.env.MODEL_REASONING || 'meta-llama/llama-3.3-70b-instruct'
        },
        timeoutMs: parseInt(process.env.AI_TIMEOUT_MS || '30000', 10),
        maxRetries: parseInt(process.env.AI_MAX_RETRIES || '3', 10),
        retryBaseDelayMs: 1000,
        maxTokens: parseInt(process.env.AI_MAX_TOKENS || '2048', 10)
    } satisfies AISettings,

    // Nigerian-specific
    defaultCurrency: 'NGN'
};

// Statutory defaults, overridable per run
export const DEFAULT_TAX_RATES: TaxRateTable = {
    citThreshold: 25_000_000, // ₦25M
    citSmallRate: 0,
    citStandardRate: 0.30,
    tetRate: 0.03,
    vatRate: 0.075
};

const TAX_RATE_ENV: Record<keyof TaxRateTable, string> = {
    citThreshold: 'CIT_SMALL_COMPANY_THRESHOLD',
    citSmallRate: 'CIT_SMALL_COMPANY_RATE',
    citStandardRate: 'CIT_STANDARD_RATE',
    tetRate: 'TET_RATE',
    vatRate: 'VAT_RATE'
};

/**
 * Build the tax rate table from the environment.
 * Unset values fall back to DEFAULT_TAX_RATES; range checks happen in TaxEngine.
 */
export function loadTaxRateTable(env: NodeJS.ProcessEnv = process.env): TaxRateTable {
    const resolve = (key: keyof TaxRateTable): number => {
        const varName = TAX_RATE_ENV[key];
        const raw = env[varName]?.trim();
        if (!raw) return DEFAULT_TAX_RATES[key];

        const value = Number(raw.replace(/[_,]/g, ''));
        if (!Number.isFinite(value)) {
            throw new InvalidConfigurationError(`${varName} must be a number, got "${raw}"`, key);
        }
        return value;
    };

    return {
        citThreshold: resolve('citThreshold'),
        citSmallRate: resolve('citSmallRate'),
        citStandardRate: resolve('citStandardRate'),
        tetRate: resolve('tetRate'),
        vatRate: resolve('vatRate')
    };
}

// Named export for destructuring
export { config };

// Export for convenience
export default config;
