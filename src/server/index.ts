#!/usr/bin/env node
/**
 * Wizard Builder MCP Server
 *
 * Registers the consolidated character-creation tools over stdio.
 * stdout carries the protocol, so everything else goes to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ReferenceData } from '../engine/reference/reference-data.js';
import { closeDb, getDb, getDbPath } from '../storage/index.js';
import { createLogger, createTimer, getErrorMessage, logError } from '../utils/logger.js';
import { createConsolidatedTools } from './consolidated/index.js';
import { createToolServices } from './services.js';
import { SessionIdSchema, withSession, type ConsolidatedTool } from './types.js';

const log = createLogger('Server');

const SERVER_NAME = 'wizard-builder';
const SERVER_VERSION = '0.1.0';

/**
 * Setup graceful shutdown handlers to ensure database is properly closed.
 */
function setupShutdownHandlers(): void {
    let isShuttingDown = false;

    const shutdown = (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        log.info(`Received ${signal}, shutting down`);
        try {
            closeDb();
            process.exit(0);
        } catch (error) {
            log.error(`Error during shutdown: ${getErrorMessage(error)}`);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => shutdown('SIGHUP'));

    process.on('uncaughtException', (error) => {
        logError(log, 'Uncaught exception', error);
        shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
        logError(log, 'Unhandled rejection', reason);
        shutdown('unhandledRejection');
    });
}

function registerTool(server: McpServer, tool: ConsolidatedTool): void {
    const handler = withSession(tool.handler);
    server.tool(
        tool.name,
        tool.description,
        { ...tool.inputShape, sessionId: SessionIdSchema.optional().describe('Character-creation session (default: "default")') },
        async (args: Record<string, unknown>) => {
            const timer = createTimer(log);
            const response = await handler(args);
            timer.done(`${tool.name} ${String(args.action)}`);
            return response;
        }
    );
}

async function main(): Promise<void> {
    setupShutdownHandlers();

    // Bad reference data is fatal: nothing can be looked up without it.
    const reference = ReferenceData.load();
    log.info(`Database path: ${getDbPath()}`);
    const services = createToolServices(getDb(), reference);

    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
    const tools = createConsolidatedTools(services);
    for (const tool of tools) {
        registerTool(server, tool);
    }
    log.info(`Registered ${tools.length} tools: ${tools.map(tool => tool.name).join(', ')}`);

    await server.connect(new StdioServerTransport());
    log.info('Wizard Builder MCP server running on stdio');
}

main().catch((error: unknown) => {
    logError(log, 'Server failed to start', error);
    closeDb();
    process.exit(1);
});
