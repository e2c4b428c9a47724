import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { Config } from '../../src/types.js';

export const FIXTURE_PATH = path.resolve('tests/fixtures/portfolio.json');

// Expected CSV for tests/fixtures/portfolio.json
export const FIXTURE_CSV = [
    'account_id,account_name,account_mask,institution_name,holding_name,ticker,type,type_display,quantity,closing_price,value,security_id,security_name,security_ticker,current_price,price_updated',
    'acct-1,Individual Brokerage,1234,Example Securities,Vanguard Total Stock Market ETF,VTI,etf,ETF,20,250.5,5010,s-1,Vanguard Total Stock Market ETF,VTI,250.5,2026-10-16T20:00:00Z',
    'acct-1,Individual Brokerage,,,Apple Inc.,AAPL,equity,Equity,15,200,3000,s-2,Apple Inc.,AAPL,201.25,2026-10-17T14:30:00Z',
    'acct-2,"Roth IRA, Joint",9876,Sample Bank,Vanguard Total Stock Market ETF,VTI,etf,ETF,4,250.5,1002,s-1,Vanguard Total Stock Market ETF,VTI,250.5,2026-10-16T20:00:00Z',
    'acct-2,"Roth IRA, Joint",9876,Sample Bank,Cash,,cash,Cash,125.25,1,125.25,,,,0,',
].join('\n') + '\n';

export function readFixture(): { portfolio: unknown } {
    return JSON.parse(fs.readFileSync(FIXTURE_PATH, 'utf-8'));
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'monarch-portfolio-'));
}

export function testConfig(dir: string, overrides: Partial<Config> = {}): Config {
    return {
        baseUrl: 'https://api.test',
        sessionFile: path.join(dir, '.mm', 'session.json'),
        timeoutMs: 5000,
        ...overrides,
    };
}

export function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

export interface RecordedRequest {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

/**
 * Stub global fetch with a queue of responses; records every request.
 */
export function stubFetch(...responses: Response[]): RecordedRequest[] {
    const requests: RecordedRequest[] = [];
    const queue = [...responses];

    vi.stubGlobal('fetch', vi.fn(async (input: string | URL, init?: RequestInit) => {
        const headers: Record<string, string> = {};
        new Headers(init?.headers).forEach((value, key) => {
            headers[key] = value;
        });
        requests.push({
            url: String(input),
            headers,
            body: typeof init?.body === 'string' ? JSON.parse(init.body) : {},
        });

        const next = queue.shift();
        if (!next) {
            throw new Error(`unexpected request to ${String(input)}`);
        }
        return next;
    }));

    return requests;
}
