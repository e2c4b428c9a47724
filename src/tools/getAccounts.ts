import { z } from 'zod';
import type { ApiClient } from '../api.js';
import { GraphQLError } from '../errors.js';
import { logDebug, logInfo, logWarn } from '../logger.js';
import { extractHoldings, parsePortfolioResponse } from '../portfolio.js';
import type { Account, AccountHoldingRow } from '../types.js';
import { fetchPortfolio } from './getPortfolio.js';

export const ACCOUNTS_OPERATION = 'GetAccounts';

export const ACCOUNTS_QUERY = `query GetAccounts {
  accounts {
    id
    displayName
    currentBalance
    type {
      name
      display
      __typename
    }
    subtype {
      name
      display
      __typename
    }
    institution {
      id
      name
      __typename
    }
    __typename
  }
}`;

export const DEFAULT_INVESTMENT_TYPES = ['investment', 'investments', 'brokerage', 'equity'];

const text = z.string().nullish().transform((v) => v ?? '');
const TypeSchema = z.object({ name: text, display: text }).nullish().transform((v) => v ?? { name: '', display: '' });

const AccountSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    displayName: text,
    currentBalance: z.number().nullish().transform((v) => v ?? 0),
    type: TypeSchema,
    subtype: TypeSchema,
    institution: z.object({ name: text }).nullish(),
});

const AccountsResponseSchema = z.object({
    accounts: z.array(AccountSchema),
});

export async function fetchAccounts(api: ApiClient): Promise<Account[]> {
    const data = await api.graphql(ACCOUNTS_OPERATION, ACCOUNTS_QUERY);
    const parsed = AccountsResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new GraphQLError(ACCOUNTS_OPERATION, `unexpected accounts response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const accounts = parsed.data.accounts.map((account) => ({
        id: account.id,
        displayName: account.displayName,
        type: account.type,
        subtype: account.subtype,
        currentBalance: account.currentBalance,
        institutionName: account.institution?.name ?? '',
    }));
    logInfo('ACCOUNTS', `Fetched ${accounts.length} accounts`);
    return accounts;
}

export function isInvestmentAccount(account: Account, types: readonly string[] = DEFAULT_INVESTMENT_TYPES): boolean {
    const wanted = new Set(types.map((t) => t.toLowerCase()));
    return wanted.has(account.type.name.toLowerCase()) || wanted.has(account.type.display.toLowerCase());
}

/**
 * One row per holding of every investment account, fetched account by account.
 */
export async function buildAccountHoldingRows(
    api: ApiClient,
    accounts: readonly Account[],
    types: readonly string[] = DEFAULT_INVESTMENT_TYPES
): Promise<AccountHoldingRow[]> {
    const rows: AccountHoldingRow[] = [];
    const investmentAccounts = accounts.filter((account) => isInvestmentAccount(account, types));

    if (investmentAccounts.length === 0) {
        logWarn('ACCOUNTS', `No accounts of type ${types.join(', ')} found`);
        return rows;
    }

    for (const account of investmentAccounts) {
        const document = await fetchPortfolio(api, { accountIds: [account.id], includeHiddenHoldings: true });
        const holdings = extractHoldings(parsePortfolioResponse(document));
        logDebug('ACCOUNTS', `${account.displayName}: ${holdings.length} holdings`);

        for (const holding of holdings) {
            rows.push({
                accountName: account.displayName,
                accountType: account.type.name,
                holding: holding.holding_name,
                value: holding.value,
            });
        }
    }

    return rows;
}
