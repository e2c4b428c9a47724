import { Command } from 'commander';
import { DEFAULT_FILES } from './config.js';
import { errorMessage } from './errors.js';
import { LogLevel, logDebug, setLogLevel } from './logger.js';
import { runAccounts, runFetch, runLogout, runParse, runPipeline, type RunContext } from './pipeline.js';
import { runMcpServer } from './server.js';

interface SessionCliOptions {
    credentials: string;
    token?: string;
    session: boolean;
}

interface FetchCliOptions extends SessionCliOptions {
    output: string;
    csv?: string;
}

interface ParseCliOptions {
    input: string;
    output: string;
    markdown: boolean;
}

interface PipelineCliOptions extends SessionCliOptions {
    portfolioJson: string;
    portfolioCsv: string;
    portfolioMd: string;
    skipFetch: boolean;
}

interface AccountsCliOptions extends SessionCliOptions {
    output: string;
}

/**
 * Wrap an action so failures print `Error: <message>` and set exit code 1.
 */
function guarded<A extends unknown[]>(fn: (...args: A) => Promise<unknown>, context: RunContext): (...args: A) => Promise<void> {
    const printError = context.printError ?? ((line: string) => console.error(line));
    return async (...args: A) => {
        try {
            await fn(...args);
        } catch (error) {
            logDebug('CLI', 'Command failed', error);
            printError(`Error: ${errorMessage(error)}`);
            process.exitCode = 1;
        }
    };
}

function withSessionOptions(command: Command): Command {
    return command
        .option('-c, --credentials <path>', 'Path to credentials JSON file', DEFAULT_FILES.credentials)
        .option('--token <token>', 'Auth token (skips login)')
        .option('--no-session', 'Skip the saved session and always re-authenticate');
}

export function createProgram(context: RunContext = {}): Command {
    const program = new Command();

    program
        .name('monarch-portfolio')
        .description('Fetch a Monarch Money investment portfolio and export the holdings to JSON, CSV and Markdown')
        .version('1.0.0')
        .option('-v, --verbose', 'Enable debug logging')
        .hook('preAction', (thisCommand) => {
            if (thisCommand.opts().verbose) {
                setLogLevel(LogLevel.DEBUG);
            }
        });

    withSessionOptions(
        program
            .command('fetch')
            .description('Fetch portfolio from the Monarch Money API and save it to JSON')
            .option('-o, --output <path>', 'Output JSON filename', DEFAULT_FILES.portfolioJson)
            .option('--csv <path>', 'Output CSV filename for holdings (optional)')
    ).action(guarded(async (opts: FetchCliOptions) => {
        await runFetch({
            credentials: opts.credentials,
            output: opts.output,
            csv: opts.csv,
            token: opts.token,
            useSession: opts.session,
        }, context);
    }, context));

    program
        .command('parse')
        .description('Parse a portfolio JSON file and export holdings to CSV (and optionally Markdown)')
        .option('-i, --input <path>', 'Input JSON portfolio file', DEFAULT_FILES.portfolioJson)
        .option('-o, --output <path>', 'Output CSV filename', DEFAULT_FILES.holdingsCsv)
        .option('--markdown', 'Also print the holdings as a Markdown table', false)
        .action(guarded(async (opts: ParseCliOptions) => {
            await runParse({ input: opts.input, output: opts.output, markdown: opts.markdown }, context);
        }, context));

    withSessionOptions(
        program
            .command('pipeline')
            .description('Fetch the portfolio, then write the holdings CSV and Markdown reports')
            .option('--portfolio-json <path>', 'Portfolio JSON file', DEFAULT_FILES.portfolioJson)
            .option('--portfolio-csv <path>', 'Output CSV file', DEFAULT_FILES.holdingsCsv)
            .option('--portfolio-md <path>', 'Output Markdown file', DEFAULT_FILES.holdingsMarkdown)
            .option('--skip-fetch', 'Skip fetching, only parse the existing portfolio JSON', false)
    ).action(guarded(async (opts: PipelineCliOptions) => {
        await runPipeline({
            credentials: opts.credentials,
            portfolioJson: opts.portfolioJson,
            portfolioCsv: opts.portfolioCsv,
            portfolioMd: opts.portfolioMd,
            skipFetch: opts.skipFetch,
            token: opts.token,
            useSession: opts.session,
        }, context);
    }, context));

    withSessionOptions(
        program
            .command('accounts')
            .description('Export holdings of every investment account, account by account')
            .option('-o, --output <path>', 'Output CSV filename', DEFAULT_FILES.accountsCsv)
    ).action(guarded(async (opts: AccountsCliOptions) => {
        await runAccounts({
            credentials: opts.credentials,
            output: opts.output,
            token: opts.token,
            useSession: opts.session,
        }, context);
    }, context));

    program
        .command('logout')
        .description('Delete the saved session')
        .action(guarded(async () => {
            await runLogout(context);
        }, context));

    withSessionOptions(
        program
            .command('mcp')
            .description('Serve the portfolio as MCP tools over stdio')
    ).action(guarded(async (opts: SessionCliOptions) => {
        await runMcpServer({ credentials: opts.credentials, token: opts.token, useSession: opts.session }, context);
    }, context));

    return program;
}
