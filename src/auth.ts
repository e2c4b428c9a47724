// Authentication and session management for Monarch Money

import * as fs from 'fs/promises';
import * as path from 'path';
import { createInterface } from 'readline/promises';
import { z } from 'zod';
import { loadCredentials } from './config.js';
import { AuthenticationError, MfaRequiredError } from './errors.js';
import { logDebug, logInfo, logWarn } from './logger.js';
import type { Config } from './types.js';

export const USER_AGENT = 'monarch-portfolio/1.0 (+node)';

export type PromptFn = (label: string) => Promise<string>;

export interface AuthenticateOptions {
    credentialsPath: string;
    useSavedSession: boolean;
}

export interface AuthManagerOptions {
    prompt?: PromptFn;
}

const LoginResponseSchema = z.object({
    token: z.string().nullish(),
});

const SessionSchema = z.object({
    token: z.string().nullish(),
});

/**
 * Read one line from the terminal.
 */
export async function promptLine(label: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const answer = await rl.question(label);
        return answer.trim();
    } finally {
        rl.close();
    }
}

function isEnoent(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class AuthManager {
    private config: Config;
    private token: string = '';
    private prompt: PromptFn;
    private lastOptions?: AuthenticateOptions;

    constructor(config: Config, options: AuthManagerOptions = {}) {
        this.config = config;
        this.prompt = options.prompt ?? promptLine;
        if (config.token) {
            this.token = config.token;
        }
    }

    getHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Accept': 'application/json',
            'Client-Platform': 'web',
            'Content-Type': 'application/json',
            'User-Agent': USER_AGENT,
        };
        if (this.token) {
            headers['Authorization'] = `Token ${this.token}`;
        }
        return headers;
    }

    /**
     * POST email/password (and optionally a TOTP code) to the login endpoint.
     * Throws MfaRequiredError when the server answers 403.
     */
    async login(email: string, password: string, totp?: string): Promise<void> {
        const body: Record<string, unknown> = {
            password,
            supports_mfa: true,
            trusted_device: false,
            username: email,
        };
        if (totp) {
            body.totp = totp;
        }

        logDebug('AUTH', `Logging in to ${this.config.baseUrl}/auth/login/`, { username: email, totp: Boolean(totp) });

        const response = await fetch(`${this.config.baseUrl}/auth/login/`, {
            method: 'POST',
            headers: this.getHeaders(),
            body: JSON.stringify(body),
        });

        const text = await response.text();
        if (response.status === 403) {
            throw new MfaRequiredError();
        }
        if (response.status !== 200) {
            throw new AuthenticationError(`login failed (HTTP ${response.status}): ${text.trim()}`, response.status);
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (e) {
            throw new AuthenticationError(`decode login response: ${e instanceof Error ? e.message : String(e)}`, response.status, { cause: e });
        }

        const parsed = LoginResponseSchema.safeParse(json);
        if (!parsed.success || !parsed.data.token) {
            throw new AuthenticationError('no token in login response', response.status);
        }

        this.token = parsed.data.token;
        logInfo('AUTH', 'Login successful');
    }

    /**
     * Saved session first, then credentials; a 403 gets exactly one retry with a prompted two-factor code.
     */
    async authenticate(options: AuthenticateOptions): Promise<void> {
        this.lastOptions = options;

        if (options.useSavedSession && await this.loadSession()) {
            logInfo('AUTH', `Using saved session from ${this.config.sessionFile}`);
            return;
        }

        await this.loginWithCredentials(options.credentialsPath);

        if (options.useSavedSession) {
            await this.saveSession();
        }
    }

    private async loginWithCredentials(credentialsPath: string): Promise<void> {
        const { email, password } = loadCredentials(credentialsPath);

        try {
            await this.login(email, password);
        } catch (error) {
            if (!(error instanceof MfaRequiredError)) {
                throw error;
            }
            logWarn('AUTH', `Failed to login, falling back to MFA: ${error.message}`);
            const code = await this.prompt('Two-factor code: ');
            if (!code) {
                throw new AuthenticationError('no two-factor code provided');
            }
            await this.login(email, password, code);
        }
    }

    setToken(token: string): void {
        this.token = token;
    }

    getToken(): string {
        return this.token;
    }

    isLoggedIn(): boolean {
        return this.token !== '';
    }

    async saveSession(): Promise<void> {
        await fs.mkdir(path.dirname(this.config.sessionFile), { recursive: true, mode: 0o700 });
        await fs.writeFile(this.config.sessionFile, JSON.stringify({ token: this.token }), { mode: 0o600 });
        logDebug('AUTH', `Saved session to ${this.config.sessionFile}`);
    }

    /**
     * Returns false when no session file exists or it holds no token.
     */
    async loadSession(): Promise<boolean> {
        let raw: string;
        try {
            raw = await fs.readFile(this.config.sessionFile, 'utf-8');
        } catch (error) {
            if (isEnoent(error)) return false;
            throw error;
        }

        const parsed = SessionSchema.safeParse(JSON.parse(raw));
        if (!parsed.success || !parsed.data.token) {
            return false;
        }
        this.token = parsed.data.token;
        return true;
    }

    async deleteSession(): Promise<boolean> {
        try {
            await fs.unlink(this.config.sessionFile);
            return true;
        } catch (error) {
            if (isEnoent(error)) return false;
            throw error;
        }
    }

    // Reset session (call on 401 or session expiry)
    async refreshSession(): Promise<void> {
        this.token = '';
        if (!this.lastOptions) {
            throw new AuthenticationError('session expired and no credentials are available to log in again', 401);
        }
        if (this.lastOptions.useSavedSession) {
            await this.deleteSession();
        }
        logInfo('AUTH', 'Session expired, logging in again');
        await this.loginWithCredentials(this.lastOptions.credentialsPath);
        if (this.lastOptions.useSavedSession) {
            await this.saveSession();
        }
    }
}
