// Error types for the Monarch portfolio tools

export class MonarchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MonarchError';
    }
}

/** No usable email/password in the credentials file or the environment. */
export class CredentialsError extends MonarchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CredentialsError';
    }
}

/** The login endpoint answered 403: a two-factor code is needed. */
export class MfaRequiredError extends MonarchError {
    constructor(message = 'multi-factor authentication required') {
        super(message);
        this.name = 'MfaRequiredError';
    }
}

export class AuthenticationError extends MonarchError {
    public readonly status?: number;

    constructor(message: string, status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AuthenticationError';
        this.status = status;
    }
}

export class GraphQLError extends MonarchError {
    public readonly operationName: string;
    public readonly status?: number;

    constructor(operationName: string, message: string, status?: number) {
        super(message);
        this.name = 'GraphQLError';
        this.operationName = operationName;
        this.status = status;
    }
}

/** A portfolio JSON document that cannot be read or does not have the expected shape. */
export class PortfolioFormatError extends MonarchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PortfolioFormatError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
