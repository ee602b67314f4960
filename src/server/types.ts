import { z } from 'zod';
import { formatMcpError, type McpResponse } from '../utils/action-router.js';

export interface SessionContext {
    sessionId: string;
}

export const DEFAULT_SESSION_ID = 'default';

const SESSION_TAG = 'SESSION';

/** The `sessionId` argument as registered with every tool. */
export const SessionIdSchema = z.string().min(1);

const SessionArgsSchema = z.object({
    sessionId: SessionIdSchema.optional().default(DEFAULT_SESSION_ID)
}).passthrough();

/**
 * Splits the session id off the raw arguments; the rest goes to the handler.
 * A malformed session id comes back as a failure payload.
 */
export function withSession(
    handler: (args: Record<string, unknown>, ctx: SessionContext) => Promise<McpResponse>
): (args: unknown) => Promise<McpResponse> {
    return async (args: unknown) => {
        const parsed = SessionArgsSchema.safeParse(args ?? {});
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue =>
                issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
            return formatMcpError(SESSION_TAG, `Invalid session arguments: ${issues.join('; ')}`, {
                error: 'validation_error'
            });
        }
        const { sessionId, ...rest } = parsed.data;
        return handler(rest, { sessionId });
    };
}

/** One consolidated MCP tool: a name, its argument shape and the action router behind it. */
export interface ConsolidatedTool {
    name: string;
    description: string;
    inputShape: z.ZodRawShape;
    handler(args: Record<string, unknown>, ctx: SessionContext): Promise<McpResponse>;
}
