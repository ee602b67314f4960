/**
 * Action Router - routing for consolidated MCP tools
 *
 * One MCP tool exposes several actions through an `action` argument. The
 * router:
 * - resolves the action with fuzzy matching and aliases
 * - validates the action's arguments with its zod schema
 * - runs the handler, which returns a ToolResult envelope
 * - renders markdown and embeds the envelope as JSON
 *
 * Usage:
 *   const route = createActionRouter({
 *       tag: 'SPELL_LOOKUP',
 *       actions: ['find', 'list'] as const,
 *       definitions: { find: defineAction({ schema, handler, render }), ... }
 *   });
 *   const response = await route(args, { sessionId: 'default' });
 */

import { z } from 'zod';
import { RichFormatter } from '../server/utils/formatter.js';
import { isGuidingError, matchAction, type MatchResult } from './fuzzy-enum.js';
import { createLogger, getErrorMessage, logError } from './logger.js';
import type { ToolFailure, ToolResult } from './tool-result.js';

const log = createLogger('ActionRouter');

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * MCP text response. A type alias (not an interface) so it stays assignable
 * to the SDK's index-signature result type.
 */
export type McpResponse = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export type ActionInvocation =
    | { ok: true; payload: ToolResult<unknown, unknown>; markdown: string }
    | { ok: false; error: z.ZodError };

/**
 * Type-erased action, produced by `defineAction` so a router can hold
 * actions whose argument and result types differ.
 */
export interface ActionDefinition<TContext> {
    aliases?: string[];
    description?: string;
    invoke(args: Record<string, unknown>, ctx: TContext): Promise<ActionInvocation>;
}

export interface ActionSpec<TSchema extends z.ZodTypeAny, TResult, TError, TContext> {
    /** Validates the full argument object, `action` included */
    schema: TSchema;
    handler(args: z.output<TSchema>, ctx: TContext): ToolResult<TResult, TError> | Promise<ToolResult<TResult, TError>>;
    /** Markdown for a success; defaults to the confirmation message */
    render?(result: TResult, args: z.output<TSchema>, message?: string): string;
    /** Markdown for a failure; defaults to an error alert */
    renderFailure?(failure: ToolFailure<TError>): string;
    aliases?: string[];
    description?: string;
}

export interface ActionRouterConfig<TActions extends string, TContext> {
    /** Tag for the embedded JSON block, e.g. CHARACTER_SHEET */
    tag: string;
    actions: readonly TActions[];
    definitions: Record<TActions, ActionDefinition<TContext>>;
    /** Minimum similarity for fuzzy action matching (default: 0.6) */
    threshold?: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

function defaultRender(result: unknown, message?: string): string {
    if (message !== undefined) return RichFormatter.success(message);
    if (typeof result === 'string') return RichFormatter.success(result);
    return RichFormatter.success('Done');
}

export function defineAction<TSchema extends z.ZodTypeAny, TResult, TError = never, TContext = unknown>(
    spec: ActionSpec<TSchema, TResult, TError, TContext>
): ActionDefinition<TContext> {
    return {
        aliases: spec.aliases,
        description: spec.description,
        async invoke(args, ctx) {
            const parsed = spec.schema.safeParse(args);
            if (!parsed.success) {
                return { ok: false, error: parsed.error };
            }
            const data: z.output<TSchema> = parsed.data;
            const payload = await spec.handler(data, ctx);

            let markdown: string;
            if (payload.status === 'success') {
                markdown = spec.render
                    ? spec.render(payload.result, data, payload.message)
                    : defaultRender(payload.result, payload.message);
            } else {
                markdown = spec.renderFailure ? spec.renderFailure(payload) : RichFormatter.error(payload.message);
            }
            return { ok: true, payload, markdown };
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTION ROUTER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createActionRouter<TActions extends string, TContext>(
    config: ActionRouterConfig<TActions, TContext>
): (args: Record<string, unknown>, ctx: TContext) => Promise<McpResponse> {
    const { tag, actions, definitions, threshold = 0.6 } = config;

    const aliasMap: Record<string, TActions> = {};
    for (const action of actions) {
        for (const alias of definitions[action].aliases ?? []) {
            aliasMap[alias.toLowerCase()] = action;
        }
    }

    return async function route(args: Record<string, unknown>, ctx: TContext): Promise<McpResponse> {
        // Step 1: action must be a string
        const rawAction = args.action;
        if (typeof rawAction !== 'string') {
            return formatMcpError(tag, 'Missing or invalid "action" parameter', {
                error: 'invalid_action',
                validActions: [...actions]
            });
        }

        // Step 2: fuzzy match
        const match = matchAction(rawAction, actions, aliasMap, threshold);
        if (isGuidingError(match)) {
            return formatMcpError(tag, match.message, {
                error: match.error,
                input: match.input,
                suggestions: match.suggestions,
                hint: 'Try one of the suggested values above'
            });
        }

        // Steps 3-4: validate and run with the canonical action name
        const action = match.matched;
        try {
            const invocation = await definitions[action].invoke({ ...args, action }, ctx);
            if (!invocation.ok) {
                return formatValidationError(tag, action, invocation.error);
            }
            return formatMcpSuccess(tag, invocation.payload, invocation.markdown, match);
        } catch (error) {
            logError(log, `Action ${action} failed`, error);
            return {
                ...formatMcpError(tag, getErrorMessage(error), { error: 'internal_error', action }),
                isError: true
            };
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

function textResponse(text: string): McpResponse {
    return { content: [{ type: 'text', text }] };
}

/**
 * Render an envelope; a fuzzy-resolved action is reported in `_fuzzyMatch`.
 */
export function formatMcpSuccess<T extends string>(
    tag: string,
    payload: ToolResult<unknown, unknown>,
    markdown: string,
    match?: MatchResult<T>
): McpResponse {
    const envelope = match && !match.exact
        ? { ...payload, _fuzzyMatch: { resolved: match.matched, similarity: Math.round(match.similarity * 100) } }
        : payload;
    return textResponse(markdown + RichFormatter.embedJson(envelope, tag));
}

export function formatMcpError(tag: string, message: string, details: Record<string, unknown> = {}): McpResponse {
    const envelope = { status: 'failure', message, ...details };
    return textResponse(RichFormatter.error(message) + RichFormatter.embedJson(envelope, tag));
}

export function formatValidationError(tag: string, action: string, error: z.ZodError): McpResponse {
    const issues = error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code
    }));
    const message = `Invalid arguments for action "${action}": ` +
        issues.map(issue => issue.path ? `${issue.path}: ${issue.message}` : issue.message).join('; ');

    return textResponse(
        RichFormatter.error(message) +
        RichFormatter.list(issues.map(issue => `\`${issue.path || '(root)'}\` ${issue.message}`)) +
        RichFormatter.embedJson({
            status: 'failure',
            error: 'validation_error',
            action,
            message,
            issues,
            hint: 'Check the parameter types and required fields for this action'
        }, tag)
    );
}

/**
 * Text for the `action` parameter: every action plus its aliases.
 */
export function buildActionDescription<TActions extends string, TContext>(
    actions: readonly TActions[],
    definitions: Record<TActions, ActionDefinition<TContext>>
): string {
    const parts = [`Action to perform: ${actions.join(', ')}`];
    const aliasLines = actions
        .filter(action => (definitions[action].aliases ?? []).length > 0)
        .map(action => `${(definitions[action].aliases ?? []).join('/')} -> ${action}`);
    if (aliasLines.length > 0) {
        parts.push(`Aliases: ${aliasLines.join(', ')}`);
    }
    return parts.join('. ');
}
