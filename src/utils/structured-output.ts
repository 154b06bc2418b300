/**
 * Structured Output
 * Turns a free-text model reply into a schema-checked record
 */

import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { AdvisorResponseError, errorMessage } from '../agent-core/errors';

/**
 * Pull the outermost JSON object out of a reply that may carry code fences or prose
 */
export function extractJsonObject(reply: string): unknown {
    const jsonMatch = reply.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
        throw new AdvisorResponseError('No JSON object found in model reply');
    }

    try {
        return JSON.parse(jsonMatch[0]);
    } catch (error) {
        throw new AdvisorResponseError(`Model reply is not valid JSON: ${errorMessage(error)}`);
    }
}

/**
 * Parse and validate a model reply against a TypeBox schema.
 * Unknown keys are dropped; missing or mistyped keys are rejected.
 */
export function parseStructuredReply<T extends TSchema>(schema: T, reply: string): Static<T> {
    const candidate = Value.Clean(schema, Value.Clone(extractJsonObject(reply)));

    if (!Value.Check(schema, candidate)) {
        const issues = [...Value.Errors(schema, candidate)].map(e => `${e.path || '/'}: ${e.message}`);
        throw new AdvisorResponseError('Model reply does not match the expected schema', issues);
    }

    return candidate;
}

/**
 * Render a JSON skeleton of a schema for the prompt
 */
export function describeSchema(schema: TSchema): string {
    return JSON.stringify(schema, null, 2);
}
