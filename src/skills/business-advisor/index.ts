/**
 * Business Advisor Skill
 * Answers Nigerian business and tax questions through the model, with a
 * relevance guardrail. Greetings are answered locally.
 */

import { logger } from '../../utils/logger';
import { AIClient, aiClient } from '../../utils/ai-client';
import { describeSchema, parseStructuredReply } from '../../utils/structured-output';
import { errorMessage } from '../../agent-core/errors';
import { AdvisorResult, BusinessAdvice, BusinessAdviceSchema } from '../../protocol';

const GREETINGS = ['hi', 'hello', 'hey', 'good morning', 'good afternoon', 'good evening'];
const EXIT_COMMANDS = ['quit', 'exit', 'q'];
const DECLINE_COMMANDS = ['no', 'n', ...EXIT_COMMANDS];

// Below this score the reply is treated as a guardrail rejection
const RELEVANCE_THRESHOLD = 0.5;

export const GREETING_REPLY = 'Hello! I am your Nigerian Business and Tax Advisor. How can I assist you with your business strategy or tax compliance questions today?';

export const REJECTION_MESSAGE = 'I am only programmed to provide business and tax advice specific to Nigeria. Please ask a relevant question.';

const SYSTEM_PROMPT = `You are a Senior Expert Nigerian Business and Tax Consultant. Give deeply detailed,
structured and comprehensive advice to help businesses in Nigeria.

STRICT RULE & GUARDRAIL:
If a question is NOT explicitly and solely related to Nigerian business or tax matters:
- set "relevance_score" to 0.0
- set "advice_type" to "IRRELEVANT"
- set "advice_title" to "Query Irrelevant"
- set "key_points_summary" to: "${REJECTION_MESSAGE}"
- set "detailed_explanation" to "N/A"
- set "actionable_steps" to []
- set "potential_risks_or_considerations" to "N/A"

For relevant queries set "relevance_score" to 1.0, choose "BUSINESS_STRATEGY" or "TAX_COMPLIANCE",
give 2-4 actionable steps and fill every field with expert advice.

Respond with a single JSON object matching this schema and nothing else:
`;

function normalize(text: string): string {
    return text.trim().toLowerCase();
}

export function isGreeting(text: string): boolean {
    return GREETINGS.includes(normalize(text));
}

export function isExitCommand(text: string): boolean {
    return EXIT_COMMANDS.includes(normalize(text));
}

/**
 * Exit words accepted at the "any other questions?" prompt
 */
export function isDecline(text: string): boolean {
    return DECLINE_COMMANDS.includes(normalize(text));
}

export function isRelevant(advice: BusinessAdvice): boolean {
    return advice.relevance_score > RELEVANCE_THRESHOLD && advice.advice_type !== 'IRRELEVANT';
}

export function fallbackAdvice(): BusinessAdvice {
    return {
        relevance_score: 0,
        advice_type: 'IRRELEVANT',
        advice_title: 'System Error: API Failure',
        key_points_summary: 'The advisory service is currently unavailable due to a connection or API error.',
        detailed_explanation: 'Please check your AI provider configuration and model access.',
        actionable_steps: [],
        potential_risks_or_considerations: 'N/A'
    };
}

export class BusinessAdvisorSkill {
    constructor(private readonly client: AIClient = aiClient) {}

    async ask(question: string): Promise<AdvisorResult<BusinessAdvice>> {
        try {
            logger.info('[Business Advisor] Processing question', { length: question.length });

            const reply = await this.client.chat({
                tier: 'fast',
                temperature: 0.1,
                messages: [
                    { role: 'system', content: SYSTEM_PROMPT + describeSchema(BusinessAdviceSchema) },
                    { role: 'user', content: `USER QUERY: ${question}` }
                ]
            });

            const advice = parseStructuredReply(BusinessAdviceSchema, reply);
            if (!isRelevant(advice)) {
                logger.info('[Business Advisor] Guardrail rejected question', { title: advice.advice_title });
            }

            return { ok: true, value: advice };
        } catch (error) {
            logger.error('[Business Advisor] Error:', error);
            return { ok: false, reason: errorMessage(error), value: fallbackAdvice() };
        }
    }
}

export const businessAdvisorSkill = new BusinessAdvisorSkill();
