/**
 * AI Client Tests
 * Tier routing, retry, fast-tier fallback and the direct Anthropic path
 */

import { AIClient, isRetryableError } from '../utils/ai-client';
import { ProviderError } from '../agent-core/errors';
import type { AISettings } from '../config';
import { logger } from '../utils/logger';

const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
    __esModule: true,
    default: class {
        messages = { create: mockCreate };
    }
}));

const settings = (overrides: Partial<AISettings> = {}): AISettings => ({
    openRouter: {
        apiKey: 'test-key',
        baseUrl: 'https://openrouter.test/api/v1',
        siteUrl: 'https://localhost',
        siteName: 'Test'
    },
    anthropic: { apiKey: '', model: 'test-anthropic-model' },
    tiers: { fast: 'fast-model', fastFallback: 'fallback-model', reasoning: 'reasoning-model' },
    timeoutMs: 5_000,
    maxRetries: 2,
    retryBaseDelayMs: 0,
    maxTokens: 256,
    ...overrides
});

const completion = (content: string | null): Response =>
    new Response(JSON.stringify({
        id: 'gen-1',
        choices: [{ message: { role: 'assistant', content } }],
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
    }), { status: 200 });

const failure = (status: number, body: string): Response => new Response(body, { status });

const networkFailure = (code: string): TypeError =>
    new TypeError('fetch failed', { cause: Object.assign(new Error(`read ${code}`), { code }) });

const requestedModel = (call: unknown[]): unknown => {
    const init = call[1];
    if (typeof init !== 'object' || init === null || !('body' in init)) return undefined;
    return JSON.parse(String(init.body)).model;
};

describe('AIClient', () => {
    let fetchSpy: jest.SpyInstance;

    beforeAll(() => {
        logger.setLevel('silent');
    });

    beforeEach(() => {
        fetchSpy = jest.spyOn(global, 'fetch');
        mockCreate.mockReset();
    });

    afterEach(() => {
        fetchSpy.mockRestore();
    });

    it('should post the tier model to OpenRouter and return the reply text', async () => {
        fetchSpy.mockImplementation(async () => completion('{"ok":true}'));
        const client = new AIClient(settings());

        const reply = await client.chat({
            tier: 'reasoning',
            messages: [{ role: 'user', content: 'Hello' }]
        });

        expect(reply).toBe('{"ok":true}');
        expect(fetchSpy).toHaveBeenCalledTimes(1);
        expect(fetchSpy.mock.calls[0][0]).toBe('https://openrouter.test/api/v1/chat/completions');

        const init = fetchSpy.mock.calls[0][1];
        expect(JSON.parse(String(init.body))).toEqual({
            model: 'reasoning-model',
            messages: [{ role: 'user', content: 'Hello' }],
            temperature: 0.1,
            max_tokens: 256
        });
        expect(init.headers.Authorization).toBe('Bearer test-key');
    });

    it('should retry a 503 and succeed on the next attempt', async () => {
        fetchSpy
            .mockImplementationOnce(async () => failure(503, 'busy'))
            .mockImplementationOnce(async () => completion('recovered'));
        const client = new AIClient(settings());

        await expect(client.chat({ tier: 'reasoning', messages: [] })).resolves.toBe('recovered');
        expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it('should not retry a 400', async () => {
        fetchSpy.mockImplementation(async () => failure(400, 'bad request'));
        const client = new AIClient(settings());

        await expect(client.chat({ tier: 'reasoning', messages: [] })).rejects.toThrow('OpenRouter 400: bad request');
        expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('should not retry a client error whose body contains a server status code', async () => {
        fetchSpy.mockImplementation(async () => failure(400, '{"error":"max_tokens must be <= 4500"}'));
        const client = new AIClient(settings({ maxRetries: 3 }));

        const error = await client.chat({ tier: 'reasoning', messages: [] }).catch((e: unknown) => e);

        expect(fetchSpy).toHaveBeenCalledTimes(1);
        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({ status: 400, retryable: false });
    });

    it('should retry a connection reset reported by fetch', async () => {
        fetchSpy
            .mockImplementationOnce(async () => { throw networkFailure('ECONNRESET'); })
            .mockImplementationOnce(async () => completion('after reset'));
        const client = new AIClient(settings({ maxRetries: 3 }));

        await expect(client.chat({ tier: 'reasoning', messages: [] })).resolves.toBe('after reset');
        expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it('should retry a request that exceeds the timeout', async () => {
        fetchSpy.mockImplementation((_input: unknown, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }));
        const client = new AIClient(settings({ timeoutMs: 5, maxRetries: 2 }));

        await expect(client.chat({ tier: 'reasoning', messages: [] }))
            .rejects.toThrow('ETIMEDOUT: OpenRouter request exceeded 5ms');
        expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it('should fall back to the secondary fast model after retries are exhausted', async () => {
        fetchSpy
            .mockImplementationOnce(async () => failure(500, 'down'))
            .mockImplementationOnce(async () => failure(500, 'down'))
            .mockImplementationOnce(async () => completion('from fallback'));
        const client = new AIClient(settings());

        await expect(client.chat({ tier: 'fast', messages: [] })).resolves.toBe('from fallback');
        expect(fetchSpy.mock.calls.map(requestedModel)).toEqual(['fast-model', 'fast-model', 'fallback-model']);
    });

    it('should treat an empty completion as an error', async () => {
        fetchSpy.mockImplementation(async () => completion(null));
        const client = new AIClient(settings());

        await expect(client.chat({ tier: 'reasoning', messages: [] })).rejects.toThrow('Empty response from OpenRouter');
    });

    it('should refuse to run without any provider key', async () => {
        const client = new AIClient(settings({
            openRouter: { ...settings().openRouter, apiKey: '' }
        }));

        expect(client.isConfigured()).toBe(false);
        await expect(client.chat({ tier: 'fast', messages: [] }))
            .rejects.toThrow('No AI provider configured: set OPENROUTER_API_KEY or ANTHROPIC_API_KEY');
        expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should call Anthropic directly when only an Anthropic key is set', async () => {
        mockCreate.mockResolvedValue({
            content: [{ type: 'text', text: 'direct reply' }],
            usage: { input_tokens: 12, output_tokens: 3 }
        });
        const client = new AIClient(settings({
            openRouter: { ...settings().openRouter, apiKey: '' },
            anthropic: { apiKey: 'test-secret', model: 'test-anthropic-model' }
        }));

        const reply = await client.chat({
            tier: 'reasoning',
            messages: [
                { role: 'system', content: 'Be brief.' },
                { role: 'user', content: 'What is TET?' }
            ]
        });

        expect(reply).toBe('direct reply');
        expect(fetchSpy).not.toHaveBeenCalled();
        expect(mockCreate).toHaveBeenCalledWith({
            model: 'test-anthropic-model',
            max_tokens: 256,
            temperature: 0.1,
            system: 'Be brief.',
            messages: [{ role: 'user', content: 'What is TET?' }]
        });
    });

    it('should fall back to Anthropic when OpenRouter fails', async () => {
        fetchSpy.mockImplementation(async () => failure(401, 'unauthorized'));
        mockCreate.mockResolvedValue({
            content: [{ type: 'text', text: 'anthropic reply' }],
            usage: { input_tokens: 1, output_tokens: 1 }
        });
        const client = new AIClient(settings({
            anthropic: { apiKey: 'test-secret', model: 'test-anthropic-model' }
        }));

        await expect(client.chat({ tier: 'reasoning', messages: [] })).resolves.toBe('anthropic reply');
        expect(mockCreate).toHaveBeenCalledTimes(1);
    });
});

describe('isRetryableError', () => {
    it('should follow the status carried by a provider error', () => {
        expect(isRetryableError(new ProviderError('OpenRouter', 'OpenRouter 429: slow down', { status: 429, retryable: true }))).toBe(true);
        expect(isRetryableError(new ProviderError('OpenRouter', 'OpenRouter 500: boom', { status: 500, retryable: true }))).toBe(true);
        expect(isRetryableError(new ProviderError('OpenRouter', 'OpenRouter 422: 500 tokens', { status: 422, retryable: false }))).toBe(false);
    });

    it('should retry socket failures by their error code only', () => {
        expect(isRetryableError(networkFailure('ECONNREFUSED'))).toBe(true);
        expect(isRetryableError(networkFailure('ETIMEDOUT'))).toBe(true);
        expect(isRetryableError(networkFailure('ENOTFOUND'))).toBe(false);
        expect(isRetryableError(new TypeError('fetch failed'))).toBe(false);
        expect(isRetryableError(new Error('ECONNRESET 503'))).toBe(false);
    });
});
