// HTTP API client wrapper for the Monarch Money GraphQL endpoint

import { setGlobalDispatcher, Agent } from 'undici';
import { z } from 'zod';
import type { AuthManager } from './auth.js';
import { AuthenticationError, GraphQLError } from './errors.js';
import { createTimer, logDebug, logError, logWarn } from './logger.js';
import type { Config } from './types.js';

const GraphQLEnvelopeSchema = z.object({
    data: z.record(z.unknown()).nullish(),
    errors: z.array(z.object({ message: z.string() }).passthrough()).nullish(),
});

export type GraphQLVariables = Record<string, unknown>;

export class ApiClient {
    public auth: AuthManager;
    private config: Config;

    constructor(auth: AuthManager, config: Config) {
        this.auth = auth;
        this.config = config;

        setGlobalDispatcher(new Agent({
            connect: { timeout: config.timeoutMs },
            bodyTimeout: config.timeoutMs,
            headersTimeout: config.timeoutMs,
            keepAliveTimeout: 10000,
            keepAliveMaxTimeout: 30000
        }));
    }

    private async post(operationName: string, query: string, variables: GraphQLVariables): Promise<Response> {
        return fetch(`${this.config.baseUrl}/graphql`, {
            method: 'POST',
            headers: this.auth.getHeaders(),
            body: JSON.stringify({ query, operationName, variables }),
        });
    }

    /**
     * Send a GraphQL operation and return its `data` object.
     */
    async graphql(operationName: string, query: string, variables: GraphQLVariables = {}): Promise<Record<string, unknown>> {
        if (!this.auth.isLoggedIn()) {
            throw new AuthenticationError('not authenticated: log in first, load a saved session, or pass a token');
        }

        const elapsed = createTimer();
        let response = await this.post(operationName, query, variables);

        if (response.status === 401) {
            logWarn('API', `${operationName} returned 401, refreshing session`);
            await response.body?.cancel();
            await this.auth.refreshSession();
            response = await this.post(operationName, query, variables);
        }

        const text = await response.text();
        if (response.status !== 200) {
            throw new GraphQLError(operationName, `graphql HTTP ${response.status}: ${text.trim()}`, response.status);
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (e) {
            logError('API', `Failed to parse JSON from ${operationName}. Body: ${text.substring(0, 1000)}`, e);
            throw new GraphQLError(operationName, `decode graphql response: ${e instanceof Error ? e.message : String(e)}`);
        }

        const envelope = GraphQLEnvelopeSchema.safeParse(json);
        if (!envelope.success) {
            throw new GraphQLError(operationName, 'decode graphql response: unexpected envelope');
        }
        const { data, errors } = envelope.data;
        if (errors && errors.length > 0) {
            throw new GraphQLError(operationName, `graphql error: ${errors[0].message}`);
        }

        logDebug('API', `${operationName} completed in ${elapsed()}ms`);
        return data ?? {};
    }
}
