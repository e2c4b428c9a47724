// fetch / parse / pipeline / accounts commands

import { ApiClient } from './api.js';
import { AuthManager, type PromptFn } from './auth.js';
import { loadConfig } from './config.js';
import { MonarchError, errorMessage } from './errors.js';
import { logInfo, logWarn } from './logger.js';
import { extractHoldings, loadPortfolioFile, parsePortfolioResponse } from './portfolio.js';
import { accountRowsToCsv, holdingsToCsv, holdingsToMarkdown, writePortfolioJson, writeTextFile } from './report.js';
import { buildAccountHoldingRows, fetchAccounts } from './tools/getAccounts.js';
import { fetchPortfolio } from './tools/getPortfolio.js';
import type { AccountHoldingRow, Config, HoldingRecord } from './types.js';

export interface RunContext {
    config?: Config;
    prompt?: PromptFn;
    print?: (line: string) => void;
    printError?: (line: string) => void;
}

export interface ConnectOptions {
    credentials: string;
    token?: string;
    useSession: boolean;
}

export interface FetchOptions extends ConnectOptions {
    output: string;
    csv?: string;
}

export interface ParseOptions {
    input: string;
    output: string;
    markdown: boolean;
}

export interface PipelineOptions extends ConnectOptions {
    portfolioJson: string;
    portfolioCsv: string;
    portfolioMd: string;
    skipFetch: boolean;
}

export interface AccountsOptions extends ConnectOptions {
    output: string;
}

const defaultPrint = (line: string): void => console.log(line);

/**
 * Build an authenticated client: explicit token, then saved session, then credentials (with MFA fallback).
 */
export async function connect(options: ConnectOptions, context: RunContext = {}): Promise<ApiClient> {
    const config = context.config ?? loadConfig();
    const auth = new AuthManager(config, { prompt: context.prompt });
    const api = new ApiClient(auth, config);

    const token = options.token || config.token;
    if (token) {
        logInfo('AUTH', 'Using provided auth token');
        auth.setToken(token);
    } else {
        await auth.authenticate({ credentialsPath: options.credentials, useSavedSession: options.useSession });
    }
    return api;
}

export async function runFetch(options: FetchOptions, context: RunContext = {}): Promise<void> {
    const print = context.print ?? defaultPrint;

    const api = await connect(options, context);
    const document = await fetchPortfolio(api);

    await writePortfolioJson(options.output, document);
    print(`Saved portfolio to ${options.output}`);

    if (options.csv) {
        const records = extractHoldings(parsePortfolioResponse(document));
        if (records.length === 0) {
            logWarn('PORTFOLIO', 'No holdings found to write to CSV');
        } else {
            await writeTextFile(options.csv, holdingsToCsv(records));
            print(`Wrote ${records.length} holdings to ${options.csv}`);
        }
    }

    print('Sync complete!');
}

export async function runParse(options: ParseOptions, context: RunContext = {}): Promise<HoldingRecord[]> {
    const print = context.print ?? defaultPrint;

    const records = extractHoldings(loadPortfolioFile(options.input));

    if (options.markdown) {
        print(holdingsToMarkdown(records).trimEnd());
    }

    await writeTextFile(options.output, holdingsToCsv(records));
    print(`Saved ${records.length} holdings to ${options.output}`);
    return records;
}

async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        throw new MonarchError(`${name} step: ${errorMessage(error)}`, { cause: error });
    }
}

export async function runPipeline(options: PipelineOptions, context: RunContext = {}): Promise<void> {
    const print = context.print ?? defaultPrint;

    if (!options.skipFetch) {
        print('\n=== Step 1: Fetching portfolio from Monarch Money ===');
        await step('fetch', () => runFetch({
            credentials: options.credentials,
            output: options.portfolioJson,
            token: options.token,
            useSession: options.useSession,
        }, context));
    }

    print('\n=== Step 2: Parsing portfolio to CSV ===');
    const records = await step('parse', () => runParse({
        input: options.portfolioJson,
        output: options.portfolioCsv,
        markdown: false,
    }, context));

    print('\n=== Step 3: Writing portfolio Markdown ===');
    await step('markdown', async () => {
        await writeTextFile(options.portfolioMd, holdingsToMarkdown(records));
        print(`Saved ${records.length} holdings to ${options.portfolioMd}`);
    });

    print('\n=== Pipeline completed successfully ===');
}

export async function runAccounts(options: AccountsOptions, context: RunContext = {}): Promise<AccountHoldingRow[]> {
    const print = context.print ?? defaultPrint;

    const api = await connect(options, context);
    const accounts = await fetchAccounts(api);
    const rows = await buildAccountHoldingRows(api, accounts);

    await writeTextFile(options.output, accountRowsToCsv(rows));
    print(`Wrote ${rows.length} holdings to ${options.output}`);
    print('Sync complete!');
    return rows;
}

export async function runLogout(context: RunContext = {}): Promise<boolean> {
    const print = context.print ?? defaultPrint;
    const config = context.config ?? loadConfig();

    const removed = await new AuthManager(config).deleteSession();
    print(removed ? `Removed saved session ${config.sessionFile}` : 'No saved session to remove');
    return removed;
}
