/**
 * Truth Table MCP Server
 *
 * MCP server exposing the propositional logic core as tools:
 * truth-table, check-formula, canonical-forms, karnaugh-map, export-table.
 * Operator and export-format reference sheets are served as resources.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listResources, getResourceContent } from './resources/index.js';

import { createGenericError } from './types/index.js';
import { TOOLS } from './tools/definitions.js';
import { callTool } from './tools/dispatch.js';
import { createContainer, ServerContainer } from './container.js';
import { VERSION } from './version.js';

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: 'truthtable-mcp',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
            },
        }
    );

    // Handle list_tools request
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // ==================== MCP RESOURCES HANDLERS ====================

    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: listResources().map(r => ({
                uri: r.uri,
                name: r.name,
                description: r.description,
                mimeType: r.mimeType,
            })),
        };
    });

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        const content = getResourceContent(uri);

        if (content === null) {
            throw createGenericError('INVALID_ARGUMENT', `Resource not found: ${uri}`);
        }

        return {
            contents: [
                {
                    uri,
                    mimeType: 'text/plain',
                    text: content,
                },
            ],
        };
    });

    // Handle call_tool request
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return callTool(name, args ?? {}, container);
    });

    return server;
}

/**
 * Run the MCP server over stdio until the transport closes
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`truthtable-mcp ${VERSION} listening on stdio`);
}
