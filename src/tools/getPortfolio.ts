import type { ApiClient } from '../api.js';
import { GraphQLError } from '../errors.js';
import { logDebug, logInfo, createTimer } from '../logger.js';
import type { PortfolioInput } from '../types.js';

export const PORTFOLIO_OPERATION = 'Web_GetPortfolio';

export const PORTFOLIO_QUERY = `query Web_GetPortfolio($portfolioInput: PortfolioInput) {
  portfolio(input: $portfolioInput) {
    aggregateHoldings {
      edges {
        node {
          holdings {
            id
            type
            typeDisplay
            name
            ticker
            closingPrice
            closingPriceUpdatedAt
            quantity
            value
            account {
              id
              mask
              displayName
              institution {
                id
                name
                __typename
              }
              __typename
            }
            __typename
          }
          security {
            id
            name
            ticker
            currentPrice
            currentPriceUpdatedAt
            closingPrice
            type
            typeDisplay
            __typename
          }
          __typename
        }
        __typename
      }
      __typename
    }
    __typename
  }
}`;

/**
 * The raw portfolio document, wrapped back in its {"portfolio": ...} envelope.
 */
export interface PortfolioDocument {
    portfolio: unknown;
}

export async function fetchPortfolio(api: ApiClient, input: PortfolioInput = {}): Promise<PortfolioDocument> {
    const elapsed = createTimer();
    logDebug('PORTFOLIO', 'Fetching portfolio', input);

    const data = await api.graphql(PORTFOLIO_OPERATION, PORTFOLIO_QUERY, { portfolioInput: input });

    const portfolio = data.portfolio;
    if (portfolio === null || portfolio === undefined) {
        throw new GraphQLError(PORTFOLIO_OPERATION, 'portfolio key missing from GraphQL response');
    }

    logInfo('PORTFOLIO', `Fetched portfolio in ${elapsed()}ms`);
    return { portfolio };
}
