/**
 * AI Client
 * Tier-based model routing over OpenRouter, with Anthropic as the last resort.
 *
 * A request walks the tier's model chain (reasoning: one model; fast: primary
 * then fallback). Each model gets `maxRetries` attempts with exponential
 * backoff, and only failures marked retryable are tried again. When the chain
 * is exhausted and an Anthropic key is set, the request goes there directly.
 */

import Anthropic from '@anthropic-ai/sdk';
import { Type, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ProviderError, errorMessage } from '../agent-core/errors';
import { config, AISettings } from '../config';
import { logger } from './logger';

export type ModelTier = 'fast' | 'reasoning';

export interface AIMessage {
    role: 'user' | 'assistant' | 'system';
    content: string;
}

export interface AIRequest {
    tier: ModelTier;
    messages: AIMessage[];
    temperature?: number;
    maxTokens?: number;
}

// The part of an OpenRouter chat completion this client reads
const ChatCompletionSchema = Type.Object({
    choices: Type.Array(Type.Object({
        message: Type.Optional(Type.Object({
            content: Type.Union([Type.String(), Type.Null()])
        }))
    })),
    usage: Type.Optional(Type.Object({
        prompt_tokens: Type.Number(),
        completion_tokens: Type.Number()
    }))
});

type ChatCompletion = Static<typeof ChatCompletionSchema>;

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED'];

const DEFAULT_TEMPERATURE = 0.1;

/**
 * Rate limits and server-side failures are worth another attempt
 */
export function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof TypeError)) return undefined;
    const cause: unknown = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

/**
 * Provider errors carry their own verdict; fetch reports socket failures as a
 * TypeError whose cause holds the system error code
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof ProviderError) return error.retryable;
    const code = networkErrorCode(error);
    return code !== undefined && NETWORK_ERROR_CODES.includes(code);
}

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class AIClient {
    private static instance: AIClient;
    private readonly settings: AISettings;
    private anthropic: Anthropic | null = null;

    constructor(settings: AISettings = config.ai) {
        this.settings = settings;
    }

    public static getInstance(): AIClient {
        if (!AIClient.instance) {
            AIClient.instance = new AIClient();
        }
        return AIClient.instance;
    }

    isConfigured(): boolean {
        return Boolean(this.settings.openRouter.apiKey || this.settings.anthropic.apiKey);
    }

    async chat(request: AIRequest): Promise<string> {
        if (!this.isConfigured()) {
            throw new Error('No AI provider configured: set OPENROUTER_API_KEY or ANTHROPIC_API_KEY');
        }
        if (!this.settings.openRouter.apiKey) {
            return this.completeWithAnthropic(request);
        }

        let lastError: unknown;
        for (const model of this.modelChain(request.tier)) {
            try {
                return await this.withRetry(model, () => this.completeWithOpenRouter(request, model));
            } catch (error) {
                lastError = error;
                logger.warn('[AIClient] Model exhausted', { model, error: errorMessage(error) });
            }
        }

        if (this.settings.anthropic.apiKey) {
            logger.warn('[AIClient] Falling back to Anthropic', { tier: request.tier });
            return this.completeWithAnthropic(request);
        }
        throw lastError;
    }

    private modelChain(tier: ModelTier): string[] {
        const { fast, fastFallback, reasoning } = this.settings.tiers;
        if (tier === 'reasoning') return [reasoning];
        return fastFallback && fastFallback !== fast ? [fast, fastFallback] : [fast];
    }

    private async withRetry(model: string, send: () => Promise<string>): Promise<string> {
        const attempts = Math.max(this.settings.maxRetries, 1);

        for (let attempt = 1; ; attempt++) {
            try {
                return await send();
            } catch (error) {
                if (attempt >= attempts || !isRetryableError(error)) throw error;

                const wait = this.settings.retryBaseDelayMs * 2 ** (attempt - 1);
                logger.warn('[AIClient] Retrying', { model, attempt, delayMs: wait, error: errorMessage(error) });
                await delay(wait);
            }
        }
    }

    private async completeWithOpenRouter(request: AIRequest, model: string): Promise<string> {
        const { timeoutMs } = this.settings;
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);

        try {
            return await this.postCompletion(request, model, controller.signal);
        } catch (error) {
            if (controller.signal.aborted) {
                throw new ProviderError('OpenRouter', `ETIMEDOUT: OpenRouter request exceeded ${timeoutMs}ms`, { retryable: true });
            }
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }

    private async postCompletion(request: AIRequest, model: string, signal: AbortSignal): Promise<string> {
        const { openRouter, maxTokens } = this.settings;

        logger.info('[AIClient] OpenRouter request', { tier: request.tier, model, messages: request.messages.length });

        const response = await fetch(`${openRouter.baseUrl}/chat/completions`, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${openRouter.apiKey}`,
                'HTTP-Referer': openRouter.siteUrl,
                'X-Title': openRouter.siteName,
                'Content-Type': 'application/json'
            },
            body: JSON.stringify({
                model,
                messages: request.messages,
                temperature: request.temperature ?? DEFAULT_TEMPERATURE,
                max_tokens: request.maxTokens ?? maxTokens
            }),
            signal
        });

        if (!response.ok) {
            const body = await response.text();
            throw new ProviderError('OpenRouter', `OpenRouter ${response.status}: ${body}`, {
                status: response.status,
                retryable: isRetryableStatus(response.status)
            });
        }

        const payload: unknown = await response.json();
        if (!Value.Check(ChatCompletionSchema, payload)) {
            throw new ProviderError('OpenRouter', 'Malformed completion from OpenRouter', { status: response.status, retryable: false });
        }
        const completion: ChatCompletion = payload;
        if (completion.usage) {
            logger.info('[AIClient] Token usage', {
                model,
                promptTokens: completion.usage.prompt_tokens,
                completionTokens: completion.usage.completion_tokens
            });
        }

        const content = completion.choices[0]?.message?.content;
        if (!content) {
            throw new ProviderError('OpenRouter', 'Empty response from OpenRouter', { status: response.status, retryable: false });
        }
        return content;
    }

    /**
     * The SDK applies its own retry policy and timeout
     */
    private async completeWithAnthropic(request: AIRequest): Promise<string> {
        const { anthropic: settings, timeoutMs, maxRetries, maxTokens } = this.settings;
        if (!this.anthropic) {
            this.anthropic = new Anthropic({ apiKey: settings.apiKey, timeout: timeoutMs, maxRetries });
        }

        const system = request.messages
            .filter(m => m.role === 'system')
            .map(m => m.content)
            .join('\n\n');
        const messages = request.messages
            .filter((m): m is AIMessage & { role: 'user' | 'assistant' } => m.role !== 'system')
            .map(m => ({ role: m.role, content: m.content }));

        logger.info('[AIClient] Anthropic request', { tier: request.tier, model: settings.model, messages: messages.length });

        const response = await this.anthropic.messages.create({
            model: settings.model,
            max_tokens: request.maxTokens ?? maxTokens,
            temperature: request.temperature ?? DEFAULT_TEMPERATURE,
            system: system || undefined,
            messages
        });

        logger.info('[AIClient] Token usage', {
            model: settings.model,
            promptTokens: response.usage.input_tokens,
            completionTokens: response.usage.output_tokens
        });

        const text = response.content
            .map(block => (block.type === 'text' ? block.text : ''))
            .join('');
        if (!text) {
            throw new ProviderError('Anthropic', 'Non-text response from Anthropic', { retryable: false });
        }
        return text;
    }
}

export const aiClient = AIClient.getInstance();
