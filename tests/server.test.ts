import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiClient } from '../src/api.js';
import { AuthManager } from '../src/auth.js';
import { AuthenticationError } from '../src/errors.js';
import { LogLevel, getLogLevel, setLogLevel, setLogStream } from '../src/logger.js';
import { TOOLS, connectForMcp, handleToolCall, type ToolResult } from '../src/server.js';
import type { Config } from '../src/types.js';
import { jsonResponse, makeTempDir, readFixture, stubFetch, testConfig } from './helpers/fixtures.js';

function parseResult(result: ToolResult): unknown {
    expect(result.isError).toBeUndefined();
    return JSON.parse(result.content[0].text);
}

describe('MCP tools', () => {
    let config: Config;
    let api: ApiClient;

    beforeEach(() => {
        setLogLevel(LogLevel.ERROR);
        config = testConfig(makeTempDir(), { token: 'test-token' });
        api = new ApiClient(new AuthManager(config), config);
    });

    it('lists every tool', () => {
        expect(TOOLS.map((tool) => tool.name)).toEqual(['get_portfolio', 'get_holdings', 'list_accounts']);
    });

    it('get_portfolio returns the raw document', async () => {
        const fixture = readFixture();
        stubFetch(jsonResponse(200, { data: fixture }));

        expect(parseResult(await handleToolCall(api, 'get_portfolio', {}))).toEqual(fixture);
    });

    it('get_holdings returns sorted holdings with a summary', async () => {
        stubFetch(jsonResponse(200, { data: readFixture() }));

        const body = parseResult(await handleToolCall(api, 'get_holdings', { limit: 2 }));

        expect(body).toMatchObject({
            summary: {
                totalValue: 9137.25,
                holdingCount: 4,
                accounts: [
                    { accountId: 'acct-1', holdings: 2, value: 8010 },
                    { accountId: 'acct-2', holdings: 2, value: 1127.25 },
                ],
            },
            holdings: [
                { account_id: 'acct-1', ticker: 'VTI', value: 5010 },
                { account_id: 'acct-1', ticker: 'AAPL', value: 3000 },
            ],
        });
    });

    it('get_holdings filters by account', async () => {
        const requests = stubFetch(jsonResponse(200, { data: readFixture() }));

        const body = parseResult(await handleToolCall(api, 'get_holdings', { accountId: 'acct-2' }));

        expect(requests[0].body.variables).toEqual({ portfolioInput: { accountIds: ['acct-2'] } });
        expect(body).toMatchObject({
            summary: { totalValue: 1127.25, holdingCount: 2 },
            holdings: [
                { account_id: 'acct-2', holding_name: 'Vanguard Total Stock Market ETF' },
                { account_id: 'acct-2', holding_name: 'Cash' },
            ],
        });
    });

    it('list_accounts returns the normalized accounts', async () => {
        stubFetch(jsonResponse(200, {
            data: {
                accounts: [
                    { id: 42, displayName: 'Checking', currentBalance: null, type: { name: 'depository', display: 'Cash' }, subtype: null, institution: null },
                ],
            },
        }));

        expect(parseResult(await handleToolCall(api, 'list_accounts', undefined))).toEqual([
            {
                id: '42',
                displayName: 'Checking',
                type: { name: 'depository', display: 'Cash' },
                subtype: { name: '', display: '' },
                currentBalance: 0,
                institutionName: '',
            },
        ]);
    });

    it('rejects invalid arguments', async () => {
        const requests = stubFetch();

        const result = await handleToolCall(api, 'get_holdings', { limit: -1 });

        expect(result).toEqual({
            content: [{ type: 'text', text: 'Error: limit: Number must be greater than 0' }],
            isError: true,
        });
        expect(requests).toHaveLength(0);
    });

    it('reports API failures as tool errors', async () => {
        stubFetch(new Response('down', { status: 502 }));

        const result = await handleToolCall(api, 'get_portfolio', {});

        expect(result).toEqual({
            content: [{ type: 'text', text: 'Error: graphql HTTP 502: down' }],
            isError: true,
        });
    });

    it('reports unknown tools', async () => {
        expect(await handleToolCall(api, 'delete_everything', {})).toEqual({
            content: [{ type: 'text', text: 'Unknown tool: delete_everything' }],
            isError: true,
        });
    });
});

describe('connectForMcp', () => {
    let dir: string;
    let previous: LogLevel;

    beforeEach(() => {
        previous = getLogLevel();
        setLogLevel(LogLevel.DEBUG);
        dir = makeTempDir();
    });

    afterEach(() => {
        setLogLevel(previous);
        setLogStream('console');
    });

    it('refuses a two-factor prompt and keeps stdout clean', async () => {
        const credentials = path.join(dir, 'credentials.json');
        fs.writeFileSync(credentials, JSON.stringify({ email: 'user@example.com', password: 'test-secret' }));
        const requests = stubFetch(jsonResponse(403, {}));
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const error = await connectForMcp({ credentials, useSession: false }, { config: testConfig(dir) }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(AuthenticationError);
        expect(String(error)).toMatch(/two-factor code required/);
        expect(requests).toHaveLength(1);
        expect(log).not.toHaveBeenCalled();
        expect(warn).not.toHaveBeenCalled();
        expect(stderr.mock.calls.some(([line]) => String(line).includes('falling back to MFA'))).toBe(true);
    });

    it('connects with a token without logging in', async () => {
        const requests = stubFetch();
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const api = await connectForMcp({ credentials: 'unused.json', token: 'test-token', useSession: false }, { config: testConfig(dir) });

        expect(api.auth.getToken()).toBe('test-token');
        expect(requests).toHaveLength(0);
    });
});
