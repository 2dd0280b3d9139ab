export class AppError extends Error {
    public status: number;
    public isOperational: boolean;
    public additionalInfo?: Record<string, unknown>;

    constructor(message: string, status: number, additionalInfo?: Record<string, unknown>, isOperational = true) {
        super(message);
        this.name = new.target.name;
        this.status = status;
        this.isOperational = isOperational;
        this.additionalInfo = additionalInfo;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Base class of every failure raised by the client. Carries the HTTP method
 * and resolved URL of the operation that failed.
 */
export class WebDAVError extends AppError {
    public readonly method: string;
    public readonly url: string;

    constructor(message: string, method: string, url: string, status = 0, additionalInfo?: Record<string, unknown>) {
        super(message, status, additionalInfo);
        this.method = method;
        this.url = url;
    }
}

/** The server could not be reached or the exchange broke mid-flight. */
export class NetworkError extends WebDAVError {
    constructor(message: string, method: string, url: string, cause?: unknown) {
        super(message, method, url, 0, cause instanceof Error ? { cause: cause.message } : undefined);
        this.cause = cause;
    }
}

export interface ProtocolErrorDetails {
    body?: string;
    conditions?: string[];
    description?: string;
}

/** The server answered with a status other than 2xx or 207. */
export class ProtocolError extends WebDAVError {
    public readonly statusCode: number;
    public readonly body: string;
    public readonly conditions: string[];
    public readonly description?: string;

    constructor(message: string, method: string, url: string, statusCode: number, details: ProtocolErrorDetails = {}) {
        super(message, method, url, statusCode, {
            conditions: details.conditions ?? [],
        });
        this.statusCode = statusCode;
        this.body = details.body ?? '';
        this.conditions = details.conditions ?? [];
        this.description = details.description;
    }

    hasCondition(condition: string): boolean {
        return this.conditions.includes(condition);
    }
}

export class AuthenticationError extends WebDAVError {
    constructor(message: string, method: string, url: string, status = 401) {
        super(message, method, url, status);
    }
}

export class MalformedResponseError extends WebDAVError {
    constructor(message: string, method = '', url = '') {
        super(message, method, url, 0);
    }

    /** Returns a copy tagged with the operation that received the body. */
    withContext(method: string, url: string): MalformedResponseError {
        return new MalformedResponseError(this.message, method, url);
    }
}

export const formatErrorMessage = (error: Error): string => {
    if (error instanceof ProtocolError) {
        const conditions = error.conditions.length > 0 ? ` [${error.conditions.join(', ')}]` : '';
        return `${error.method} ${error.url}: ${error.message} (${error.statusCode})${conditions}`;
    }
    if (error instanceof WebDAVError) {
        return `${error.method} ${error.url}: ${error.message}`;
    }
    return `Error during operation: ${error.message}`;
};
