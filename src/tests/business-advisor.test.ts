/**
 * Business Advisor Skill Tests
 * Greeting and exit handling, relevance guardrail and API failure fallback
 */

import {
    BusinessAdvisorSkill,
    fallbackAdvice,
    isDecline,
    isExitCommand,
    isGreeting,
    isRelevant
} from '../skills/business-advisor';
import { AIClient } from '../utils/ai-client';
import { logger } from '../utils/logger';
import type { BusinessAdvice } from '../protocol';
import type { AISettings } from '../config';

const SETTINGS: AISettings = {
    openRouter: { apiKey: 'test-key', baseUrl: 'https://openrouter.test/api/v1', siteUrl: 'https://localhost', siteName: 'Test' },
    anthropic: { apiKey: '', model: 'test-anthropic-model' },
    tiers: { fast: 'fast-model', fastFallback: 'fallback-model', reasoning: 'reasoning-model' },
    timeoutMs: 5_000,
    maxRetries: 1,
    retryBaseDelayMs: 0,
    maxTokens: 256
};

const VAT_ADVICE: BusinessAdvice = {
    relevance_score: 1,
    advice_type: 'TAX_COMPLIANCE',
    advice_title: 'Value Added Tax',
    key_points_summary: 'VAT is charged at 7.5% on taxable supplies.',
    detailed_explanation: 'Register with FIRS and file monthly returns.',
    actionable_steps: ['Register for VAT', 'File by the 21st'],
    potential_risks_or_considerations: 'Late filing attracts penalties.'
};

const REJECTION: BusinessAdvice = {
    relevance_score: 0,
    advice_type: 'IRRELEVANT',
    advice_title: 'Query Irrelevant',
    key_points_summary: 'I am only programmed to provide business and tax advice specific to Nigeria. Please ask a relevant question.',
    detailed_explanation: 'N/A',
    actionable_steps: [],
    potential_risks_or_considerations: 'N/A'
};

describe('BusinessAdvisor', () => {
    beforeAll(() => {
        logger.setLevel('silent');
    });

    describe('command words', () => {
        it('should recognise greetings as whole messages only', () => {
            expect(isGreeting(' Hello ')).toBe(true);
            expect(isGreeting('GOOD MORNING')).toBe(true);
            expect(isGreeting('hello, what is VAT?')).toBe(false);
        });

        it('should separate exit commands from decline words', () => {
            expect(isExitCommand('Q')).toBe(true);
            expect(isExitCommand('no')).toBe(false);
            expect(isDecline('no')).toBe(true);
            expect(isDecline('N')).toBe(true);
            expect(isDecline('exit')).toBe(true);
            expect(isDecline('not yet')).toBe(false);
        });
    });

    describe('isRelevant', () => {
        it('should require a score above one half and a relevant type', () => {
            expect(isRelevant(VAT_ADVICE)).toBe(true);
            expect(isRelevant(REJECTION)).toBe(false);
            expect(isRelevant({ ...VAT_ADVICE, relevance_score: 0.5 })).toBe(false);
            expect(isRelevant({ ...VAT_ADVICE, advice_type: 'IRRELEVANT' })).toBe(false);
        });
    });

    describe('BusinessAdvisorSkill', () => {
        let client: AIClient;
        let skill: BusinessAdvisorSkill;

        beforeEach(() => {
            client = new AIClient(SETTINGS);
            skill = new BusinessAdvisorSkill(client);
        });

        afterEach(() => {
            jest.restoreAllMocks();
        });

        it('should send the question on the fast tier and return the advice', async () => {
            const chat = jest.spyOn(client, 'chat').mockResolvedValue(JSON.stringify(VAT_ADVICE));

            const result = await skill.ask('What is VAT?');

            expect(result).toEqual({ ok: true, value: VAT_ADVICE });
            expect(chat.mock.calls[0][0].tier).toBe('fast');
            expect(chat.mock.calls[0][0].messages[1]).toEqual({ role: 'user', content: 'USER QUERY: What is VAT?' });
        });

        it('should pass a guardrail rejection through as a valid reply', async () => {
            jest.spyOn(client, 'chat').mockResolvedValue(JSON.stringify(REJECTION));

            const result = await skill.ask('Who won the match last night?');

            expect(result.ok).toBe(true);
            expect(isRelevant(result.value)).toBe(false);
            expect(result.value.key_points_summary).toBe(REJECTION.key_points_summary);
        });

        it('should return the system error advice when the call fails', async () => {
            jest.spyOn(client, 'chat').mockRejectedValue(new Error('ETIMEDOUT: OpenRouter request exceeded 5000ms'));

            const result = await skill.ask('How do I register a business?');

            expect(result).toEqual({
                ok: false,
                reason: 'ETIMEDOUT: OpenRouter request exceeded 5000ms',
                value: fallbackAdvice()
            });
            expect(result.value.advice_title).toBe('System Error: API Failure');
        });

        it('should return the system error advice when the reply is not JSON', async () => {
            jest.spyOn(client, 'chat').mockResolvedValue('Sorry, I am unable to answer.');

            const result = await skill.ask('What is CIT?');

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.reason).toBe('No JSON object found in model reply');
            }
        });
    });
});
