// Configuration and credential loading

import * as fs from 'fs';
import { z } from 'zod';
import { CredentialsError } from './errors.js';
import type { Config, Credentials } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.monarch.com';
export const DEFAULT_SESSION_FILE = '.mm/session.json';
export const DEFAULT_TIMEOUT_MS = 30000;

export const DEFAULT_FILES = {
    credentials: 'credentials.json',
    portfolioJson: 'portfolio.json',
    holdingsCsv: 'portfolio_holdings.csv',
    holdingsMarkdown: 'portfolio_holdings.md',
    accountsCsv: 'monarch_data.csv',
} as const;

type Env = Record<string, string | undefined>;

const TimeoutSchema = z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive());

export function loadConfig(env: Env = process.env): Config {
    let timeoutMs = DEFAULT_TIMEOUT_MS;
    if (env.MONARCH_TIMEOUT_MS) {
        const parsed = TimeoutSchema.safeParse(env.MONARCH_TIMEOUT_MS);
        if (!parsed.success) {
            throw new Error(`MONARCH_TIMEOUT_MS must be a positive integer, got '${env.MONARCH_TIMEOUT_MS}'`);
        }
        timeoutMs = parsed.data;
    }

    return {
        baseUrl: (env.MONARCH_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
        sessionFile: env.MONARCH_SESSION_FILE || DEFAULT_SESSION_FILE,
        timeoutMs,
        token: env.MONARCH_TOKEN || undefined,
    };
}

const CredentialsFileSchema = z.object({
    email: z.string().optional(),
    password: z.string().optional(),
});

/**
 * Read credentials from a JSON file ({"email", "password"}), falling back to
 * MONARCH_EMAIL / MONARCH_PASSWORD when the file is missing or incomplete.
 */
export function loadCredentials(path: string = DEFAULT_FILES.credentials, env: Env = process.env): Credentials {
    if (fs.existsSync(path)) {
        let data: unknown;
        try {
            data = JSON.parse(fs.readFileSync(path, 'utf-8'));
        } catch (error) {
            throw new CredentialsError(`parse ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }

        const parsed = CredentialsFileSchema.safeParse(data);
        if (parsed.success && parsed.data.email && parsed.data.password) {
            return { email: parsed.data.email, password: parsed.data.password };
        }
    }

    const email = env.MONARCH_EMAIL || '';
    const password = env.MONARCH_PASSWORD || '';
    if (!email || !password) {
        throw new CredentialsError(
            `Credentials not found. Create ${path} with {"email": ..., "password": ...} or set MONARCH_EMAIL and MONARCH_PASSWORD`
        );
    }
    return { email, password };
}
