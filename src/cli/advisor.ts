#!/usr/bin/env node
/**
 * Nigerian Business and Tax Advisor (interactive chatbot)
 */

import { logger } from '../utils/logger';
import { renderBusinessAdvice, THIN_RULE } from '../utils/report-formatter';
import { errorMessage } from '../agent-core/errors';
import {
    BusinessAdvisorSkill,
    GREETING_REPLY,
    businessAdvisorSkill,
    isDecline,
    isExitCommand,
    isGreeting,
    isRelevant
} from '../skills/business-advisor';
import { Prompter } from './prompt';

const GOODBYE = 'Thank you for using the Nigerian Business Advisor. Goodbye!';

/**
 * Question loop: greetings answered locally, exit words or end of input stop it
 */
export async function runAdvisorSession(prompter: Prompter, advisor: BusinessAdvisorSkill): Promise<void> {
    prompter.print('--- Nigerian Business and Tax Advisor ---');
    prompter.print("Type 'quit' or 'exit' at any prompt to end the session.");
    prompter.print();

    let nextQuery: string | null = null;

    while (true) {
        let query: string | null;
        if (nextQuery) {
            query = nextQuery;
            nextQuery = null;
            prompter.print(THIN_RULE);
        } else {
            query = await prompter.ask('Ask a business or tax question (specific to Nigeria):\n> ');
        }

        if (query === null || isExitCommand(query)) break;
        if (!query) continue;

        if (isGreeting(query)) {
            prompter.print(GREETING_REPLY);
            prompter.print(THIN_RULE);
            continue;
        }

        try {
            const result = await advisor.ask(query);
            prompter.print(renderBusinessAdvice(result.value, result.ok && isRelevant(result.value)));
        } catch (error) {
            logger.error('[Advisor CLI] Unexpected error:', error);
            prompter.print(`An unexpected runtime error occurred: ${errorMessage(error)}. Restarting loop.`);
            continue;
        }

        const next = await prompter.ask("\nDo you have any other questions? (Type 'no' to exit, or enter your next question):\n> ");
        if (next === null || isDecline(next)) break;
        if (next) nextQuery = next;
    }

    prompter.print(GOODBYE);
}

if (require.main === module) {
    const prompter = new Prompter();
    runAdvisorSession(prompter, businessAdvisorSkill)
        .catch(error => {
            logger.error('[Advisor CLI] Fatal error:', error);
            process.exitCode = 1;
        })
        .finally(() => prompter.close());
}
