// MCP stdio server exposing the portfolio as tools

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ApiClient } from './api.js';
import { AuthenticationError, errorMessage } from './errors.js';
import { logInfo, setLogStream } from './logger.js';
import { connect, type ConnectOptions, type RunContext } from './pipeline.js';
import { extractHoldings, parsePortfolioResponse, summarizeHoldings } from './portfolio.js';
import { fetchAccounts } from './tools/getAccounts.js';
import { fetchPortfolio } from './tools/getPortfolio.js';

export const SERVER_NAME = 'monarch-portfolio';
export const SERVER_VERSION = '1.0.0';

export const TOOLS = [
    {
        name: 'get_portfolio',
        description: 'Get the raw Monarch Money investment portfolio (aggregate holdings with security and account details) as returned by the API.',
        inputSchema: {
            type: 'object' as const,
            properties: {},
            required: [],
        },
    },
    {
        name: 'get_holdings',
        description: 'Get flattened holdings (one row per account holding), sorted by value descending, with a per-account summary.',
        inputSchema: {
            type: 'object' as const,
            properties: {
                limit: {
                    type: 'number',
                    description: 'Maximum number of holdings to return (default: all)',
                },
                accountId: {
                    type: 'string',
                    description: 'Only return holdings of this account',
                },
            },
            required: [],
        },
    },
    {
        name: 'list_accounts',
        description: 'List all linked accounts with type, institution and current balance.',
        inputSchema: {
            type: 'object' as const,
            properties: {},
            required: [],
        },
    },
];

const GetHoldingsArgsSchema = z.object({
    limit: z.number().int().positive().optional(),
    accountId: z.string().min(1).optional(),
});

// A type alias so the result stays assignable to the SDK's index-signature result types
export type ToolResult = {
    content: { type: 'text'; text: string }[];
    isError?: boolean;
};

const jsonResult = (value: unknown): ToolResult => ({
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
});

export async function handleToolCall(api: ApiClient, name: string, args: unknown): Promise<ToolResult> {
    try {
        switch (name) {
            case 'get_portfolio': {
                return jsonResult(await fetchPortfolio(api));
            }

            case 'get_holdings': {
                const { limit, accountId } = GetHoldingsArgsSchema.parse(args ?? {});
                const document = await fetchPortfolio(api, accountId ? { accountIds: [accountId] } : {});
                let holdings = extractHoldings(parsePortfolioResponse(document));
                if (accountId) {
                    holdings = holdings.filter((h) => h.account_id === accountId);
                }
                const summary = summarizeHoldings(holdings);
                return jsonResult({ summary, holdings: limit ? holdings.slice(0, limit) : holdings });
            }

            case 'list_accounts': {
                return jsonResult(await fetchAccounts(api));
            }

            default:
                return {
                    content: [{ type: 'text', text: `Unknown tool: ${name}` }],
                    isError: true,
                };
        }
    } catch (error) {
        const message = error instanceof z.ZodError
            ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
            : errorMessage(error);
        return {
            content: [{ type: 'text', text: `Error: ${message}` }],
            isError: true,
        };
    }
}

export function createServer(api: ApiClient): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return handleToolCall(api, name, args);
    });

    return server;
}

const refusePrompt = async (): Promise<string> => {
    throw new AuthenticationError('two-factor code required; run `monarch-portfolio fetch` once to save a session, or pass --token');
};

/**
 * Authenticate for stdio serving: logs go to stderr and MFA prompts are refused.
 */
export async function connectForMcp(options: ConnectOptions, context: RunContext = {}): Promise<ApiClient> {
    // stdout carries the protocol
    setLogStream('stderr');

    return connect(options, { ...context, prompt: context.prompt ?? refusePrompt });
}

export async function runMcpServer(options: ConnectOptions, context: RunContext = {}): Promise<void> {
    const api = await connectForMcp(options, context);
    const server = createServer(api);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logInfo('MCP', `${SERVER_NAME} running on stdio`);
}
