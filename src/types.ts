// Type definitions for the Monarch portfolio tools

export interface Config {
    baseUrl: string;
    sessionFile: string;
    timeoutMs: number;
    token?: string;
}

export interface Credentials {
    email: string;
    password: string;
}

/**
 * One flattened row of the holdings report. Keys are the CSV column names.
 */
export interface HoldingRecord {
    account_id: string;
    account_name: string;
    account_mask: string;
    institution_name: string;
    holding_name: string;
    ticker: string;
    type: string;
    type_display: string;
    quantity: number;
    closing_price: number;
    value: number;
    security_id: string;
    security_name: string;
    security_ticker: string;
    current_price: number;
    price_updated: string;
}

export interface AccountTotal {
    accountId: string;
    accountName: string;
    institutionName: string;
    holdings: number;
    value: number;
}

export interface HoldingsSummary {
    totalValue: number;
    holdingCount: number;
    accounts: AccountTotal[];
}

export interface AccountType {
    name: string;
    display: string;
}

export interface Account {
    id: string;
    displayName: string;
    type: AccountType;
    subtype: AccountType;
    currentBalance: number;
    institutionName: string;
}

export interface AccountHoldingRow {
    accountName: string;
    accountType: string;
    holding: string;
    value: number;
}

/** Filter passed as `portfolioInput` to the portfolio query. */
export interface PortfolioInput {
    accountIds?: string[];
    startDate?: string;
    endDate?: string;
    includeHiddenHoldings?: boolean;
}
