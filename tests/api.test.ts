import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import { ApiClient } from '../src/api.js';
import { AuthManager } from '../src/auth.js';
import { AuthenticationError, GraphQLError } from '../src/errors.js';
import { LogLevel, setLogLevel } from '../src/logger.js';
import { PORTFOLIO_OPERATION, PORTFOLIO_QUERY, fetchPortfolio } from '../src/tools/getPortfolio.js';
import type { Config } from '../src/types.js';
import { jsonResponse, makeTempDir, readFixture, stubFetch, testConfig } from './helpers/fixtures.js';

describe('ApiClient.graphql', () => {
    let dir: string;
    let config: Config;

    beforeEach(() => {
        setLogLevel(LogLevel.ERROR);
        dir = makeTempDir();
        config = testConfig(dir, { token: 'test-token' });
    });

    it('refuses to call the API without a token', async () => {
        const api = new ApiClient(new AuthManager(testConfig(dir)), config);

        await expect(api.graphql('GetAccounts', 'query GetAccounts { accounts { id } }')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('posts the operation with the auth headers and returns data', async () => {
        const requests = stubFetch(jsonResponse(200, { data: { accounts: [] } }));
        const api = new ApiClient(new AuthManager(config), config);

        const data = await api.graphql('GetAccounts', 'query GetAccounts { accounts { id } }', { first: 1 });

        expect(data).toEqual({ accounts: [] });
        expect(requests[0].url).toBe('https://api.test/graphql');
        expect(requests[0].headers['authorization']).toBe('Token test-token');
        expect(requests[0].headers['client-platform']).toBe('web');
        expect(requests[0].headers['content-type']).toBe('application/json');
        expect(requests[0].body).toEqual({
            query: 'query GetAccounts { accounts { id } }',
            operationName: 'GetAccounts',
            variables: { first: 1 },
        });
    });

    it('surfaces the first GraphQL error', async () => {
        stubFetch(jsonResponse(200, { data: null, errors: [{ message: 'bad things' }, { message: 'more' }] }));
        const api = new ApiClient(new AuthManager(config), config);

        const error = await api.graphql('GetAccounts', 'query').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(GraphQLError);
        expect(error).toMatchObject({ message: 'graphql error: bad things', operationName: 'GetAccounts' });
    });

    it('reports non-200 responses', async () => {
        stubFetch(new Response('oops', { status: 500 }));
        const api = new ApiClient(new AuthManager(config), config);

        await expect(api.graphql('GetAccounts', 'query')).rejects.toThrow('graphql HTTP 500: oops');
    });

    it('reports bodies that are not JSON', async () => {
        stubFetch(new Response('<html>', { status: 200 }));
        const api = new ApiClient(new AuthManager(config), config);

        await expect(api.graphql('GetAccounts', 'query')).rejects.toThrow(/^decode graphql response: /);
    });

    it('logs in again once after a 401 and retries', async () => {
        const credentialsPath = path.join(dir, 'credentials.json');
        fs.writeFileSync(credentialsPath, JSON.stringify({ email: 'user@example.com', password: 'test-secret' }));
        const expired = new Response('expired', { status: 401 });
        const requests = stubFetch(
            jsonResponse(200, { token: 'first-token' }),
            expired,
            jsonResponse(200, { token: 'second-token' }),
            jsonResponse(200, { data: { ok: true } }),
        );
        const plainConfig = testConfig(dir);
        const auth = new AuthManager(plainConfig);
        const api = new ApiClient(auth, plainConfig);
        await auth.authenticate({ credentialsPath, useSavedSession: false });

        const data = await api.graphql('Ping', 'query Ping { ok }');

        expect(data).toEqual({ ok: true });
        expect(requests.map((r) => r.url)).toEqual([
            'https://api.test/auth/login/',
            'https://api.test/graphql',
            'https://api.test/auth/login/',
            'https://api.test/graphql',
        ]);
        expect(requests[1].headers['authorization']).toBe('Token first-token');
        expect(requests[3].headers['authorization']).toBe('Token second-token');
        expect(expired.bodyUsed).toBe(true);
    });
});

describe('fetchPortfolio', () => {
    let config: Config;

    beforeEach(() => {
        setLogLevel(LogLevel.ERROR);
        config = testConfig(makeTempDir(), { token: 'test-token' });
    });

    it('runs the portfolio query and returns the envelope', async () => {
        const fixture = readFixture();
        const requests = stubFetch(jsonResponse(200, { data: fixture }));
        const api = new ApiClient(new AuthManager(config), config);

        const document = await fetchPortfolio(api);

        expect(document).toEqual(fixture);
        expect(requests[0].body).toEqual({
            query: PORTFOLIO_QUERY,
            operationName: PORTFOLIO_OPERATION,
            variables: { portfolioInput: {} },
        });
    });

    it('passes the account filter through', async () => {
        const requests = stubFetch(jsonResponse(200, { data: { portfolio: {} } }));
        const api = new ApiClient(new AuthManager(config), config);

        await fetchPortfolio(api, { accountIds: ['acct-1'], includeHiddenHoldings: true });

        expect(requests[0].body.variables).toEqual({ portfolioInput: { accountIds: ['acct-1'], includeHiddenHoldings: true } });
    });

    it('fails when the response has no portfolio', async () => {
        stubFetch(jsonResponse(200, { data: { somethingElse: 1 } }));
        const api = new ApiClient(new AuthManager(config), config);

        await expect(fetchPortfolio(api)).rejects.toThrow('portfolio key missing from GraphQL response');
    });
});
