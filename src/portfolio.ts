// Portfolio response parsing and holding extraction

import * as fs from 'fs';
import { z } from 'zod';
import { PortfolioFormatError } from './errors.js';
import type { AccountTotal, HoldingRecord, HoldingsSummary } from './types.js';

// Absent and null both collapse to '' / 0 / {} / []
const text = z.union([z.string(), z.number()]).nullish().transform((v) => (v === null || v === undefined ? '' : String(v)));
const amount = z.number().nullish().transform((v) => v ?? 0);
const object = <T extends z.ZodTypeAny>(schema: T) => z.preprocess((v) => v ?? {}, schema);
const list = <T extends z.ZodTypeAny>(item: T) => z.preprocess((v) => v ?? [], z.array(item));

const InstitutionSchema = z.object({
    id: text,
    name: text,
});

const AccountSchema = z.object({
    id: text,
    mask: text,
    displayName: text,
    institution: object(InstitutionSchema),
});

export const HoldingSchema = z.object({
    id: text,
    type: text,
    typeDisplay: text,
    name: text,
    ticker: text,
    closingPrice: amount,
    closingPriceUpdatedAt: text,
    quantity: amount,
    value: amount,
    account: object(AccountSchema),
});

export const SecuritySchema = z.object({
    id: text,
    name: text,
    ticker: text,
    currentPrice: amount,
    currentPriceUpdatedAt: text,
    closingPrice: amount,
    type: text,
    typeDisplay: text,
});

const AggregateNodeSchema = z.object({
    security: object(SecuritySchema),
    holdings: list(HoldingSchema),
});

const EdgeSchema = z.object({
    node: object(AggregateNodeSchema),
});

export const PortfolioResponseSchema = z.object({
    portfolio: object(z.object({
        aggregateHoldings: object(z.object({
            edges: list(EdgeSchema),
        })),
    })),
});

export type Holding = z.infer<typeof HoldingSchema>;
export type Security = z.infer<typeof SecuritySchema>;
export type PortfolioResponse = z.infer<typeof PortfolioResponseSchema>;

export const HOLDING_FIELDS = [
    'account_id',
    'account_name',
    'account_mask',
    'institution_name',
    'holding_name',
    'ticker',
    'type',
    'type_display',
    'quantity',
    'closing_price',
    'value',
    'security_id',
    'security_name',
    'security_ticker',
    'current_price',
    'price_updated',
] as const satisfies readonly (keyof HoldingRecord)[];

export const NUMERIC_HOLDING_FIELDS: ReadonlySet<keyof HoldingRecord> = new Set<keyof HoldingRecord>([
    'quantity',
    'closing_price',
    'value',
    'current_price',
]);

function describeIssues(error: z.ZodError): string {
    return error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate a decoded portfolio document ({"portfolio": {...}}).
 */
export function parsePortfolioResponse(raw: unknown): PortfolioResponse {
    const result = PortfolioResponseSchema.safeParse(raw);
    if (!result.success) {
        throw new PortfolioFormatError(`unexpected portfolio format: ${describeIssues(result.error)}`, { cause: result.error });
    }
    return result.data;
}

export function loadPortfolioFile(path: string): PortfolioResponse {
    let contents: string;
    try {
        contents = fs.readFileSync(path, 'utf-8');
    } catch (error) {
        throw new PortfolioFormatError(`open ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(contents);
    } catch (error) {
        throw new PortfolioFormatError(`decode ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    try {
        return parsePortfolioResponse(raw);
    } catch (error) {
        if (error instanceof PortfolioFormatError) {
            throw new PortfolioFormatError(`decode ${path}: ${error.message}`, { cause: error });
        }
        throw error;
    }
}

/**
 * Project one holding and the security it belongs to onto a flat record.
 */
export function extractHoldingFields(holding: Holding, security: Security): HoldingRecord {
    const account = holding.account;
    const institution = account.institution;

    return {
        account_id: account.id,
        account_name: account.displayName,
        account_mask: account.mask,
        institution_name: institution.name,
        holding_name: holding.name,
        ticker: holding.ticker,
        type: holding.type,
        type_display: holding.typeDisplay,
        quantity: holding.quantity,
        closing_price: holding.closingPrice,
        value: holding.value,
        security_id: security.id,
        security_name: security.name,
        security_ticker: security.ticker,
        current_price: security.currentPrice,
        price_updated: security.currentPriceUpdatedAt,
    };
}

/**
 * Flatten every (aggregate holding, account holding) pair, largest value first.
 */
export function extractHoldings(response: PortfolioResponse): HoldingRecord[] {
    const records: HoldingRecord[] = [];

    for (const edge of response.portfolio.aggregateHoldings.edges) {
        const security = edge.node.security;
        for (const holding of edge.node.holdings) {
            records.push(extractHoldingFields(holding, security));
        }
    }

    // Array.prototype.sort is stable, so equal values keep response order
    return records.sort((a, b) => b.value - a.value);
}

const roundCents = (n: number): number => Math.round(n * 100) / 100;

export function summarizeHoldings(records: HoldingRecord[]): HoldingsSummary {
    const byAccount = new Map<string, AccountTotal>();
    let totalValue = 0;

    for (const record of records) {
        totalValue += record.value;

        let entry = byAccount.get(record.account_id);
        if (!entry) {
            entry = {
                accountId: record.account_id,
                accountName: record.account_name,
                institutionName: record.institution_name,
                holdings: 0,
                value: 0,
            };
            byAccount.set(record.account_id, entry);
        }
        entry.holdings += 1;
        entry.value += record.value;
    }

    const accounts = [...byAccount.values()]
        .map((entry) => ({ ...entry, value: roundCents(entry.value) }))
        .sort((a, b) => b.value - a.value);

    return {
        totalValue: roundCents(totalValue),
        holdingCount: records.length,
        accounts,
    };
}
