/**
 * Tool dispatch
 *
 * Maps tool names to handlers and wraps results and failures as MCP text
 * content. Kept free of transport code so it runs in-process.
 */

import {
    LogicException,
    createGenericError,
    serializeLogicError,
} from '../types/index.js';
import * as Handlers from '../handlers/index.js';
import type { ServerContainer } from '../container.js';

type ToolHandler = (args: unknown, container: ServerContainer) => unknown;

export const toolHandlers: Record<string, ToolHandler> = {
    'truth-table': (args, c) =>
        Handlers.truthTableHandler(args, c.config),

    'check-formula': (args, c) =>
        Handlers.checkFormulaHandler(args, c.config),

    'canonical-forms': (args, c) =>
        Handlers.canonicalFormsHandler(args, c.config),

    'karnaugh-map': (args, c) =>
        Handlers.karnaughMapHandler(args, c.config),

    'export-table': (args, c) =>
        Handlers.exportTableHandler(args, c.config),
};

/**
 * Run one tool call and wrap the outcome as MCP text content
 */
export function callTool(
    name: string,
    args: unknown,
    container: ServerContainer
): { content: Array<{ type: 'text'; text: string }>; isError?: boolean } {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createGenericError('INVALID_ARGUMENT', `Unknown tool: ${name}`);
        }

        const result = handler(args, container);

        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify(result, null, 2),
                },
            ],
        };
    } catch (error) {
        // Handle structured LogicException
        if (error instanceof LogicException) {
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(serializeLogicError(error.error), null, 2),
                    },
                ],
                isError: true,
            };
        }

        // Handle generic errors
        console.error(`Tool '${name}' failed:`, error);
        const errorMessage = error instanceof Error ? error.message : String(error);
        return {
            content: [
                {
                    type: 'text',
                    text: JSON.stringify({
                        error: errorMessage,
                        type: error instanceof Error ? error.constructor.name : 'Error',
                    }),
                },
            ],
            isError: true,
        };
    }
}
