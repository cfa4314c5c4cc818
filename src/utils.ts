import { type Span, SpanStatusCode } from '@opentelemetry/api';
import { getActiveSpan } from './metrics/tracing/tracing-utils';

export type Props = {
    instanceUrl: string;
    username: string;
    password: string;
    authType: string;
};

export type ErrorDetails = {
    statusCode?: number;
    body?: string;
    cause?: unknown;
};

/**
 * Base class for every error raised while talking to the BusinessObjects server.
 * The active span, if any, is marked as failed when the error is created.
 */
export class BusinessObjectsError extends Error {
    public readonly span?: Span;
    public readonly statusCode?: number;
    public readonly body?: string;

    constructor(message: string, details: ErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });

        this.name = new.target.name;
        this.span = getActiveSpan();
        this.statusCode = details.statusCode;
        this.body = details.body;

        if (this.span) {
            this.span.setStatus({
                code: SpanStatusCode.ERROR,
                message: this.message
            });
            this.span.recordException(this);
            this.span.setAttribute('error.type', this.name);
            if (this.statusCode !== undefined) {
                this.span.setAttribute('error.status_code', this.statusCode);
            }
        }

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            statusCode: this.statusCode,
            body: this.body,
        };
    }
}

export class AuthenticationError extends BusinessObjectsError { }

export class NotFoundError extends BusinessObjectsError { }

export class UnsupportedFormatError extends BusinessObjectsError { }

export class UnresolvedColumnError extends BusinessObjectsError {
    constructor(public readonly columns: string[]) {
        super(`Column(s) not found in universe: ${columns.join(", ")}`);
    }
}

export class SchemaInconsistencyError extends BusinessObjectsError { }

export class RemoteCallError extends BusinessObjectsError { }

export class SchemaParseError extends BusinessObjectsError { }

export class ConfigurationError extends BusinessObjectsError { }

/**
 * Outcome of a remote call under the degrade-or-fail policy:
 * - ok: the call succeeded
 * - degraded: the call failed in a way the caller reports as "nothing found"
 * - fail: the call failed in a way the caller must surface
 */
export type RemoteResult<T> =
    | { kind: "ok"; data: T }
    | { kind: "degraded"; data: T; error: BusinessObjectsError }
    | { kind: "fail"; error: BusinessObjectsError };

export const ok = <T>(data: T): RemoteResult<T> => ({ kind: "ok", data });

export const degraded = <T>(data: T, error: BusinessObjectsError): RemoteResult<T> => ({ kind: "degraded", data, error });

export const fail = <T>(error: BusinessObjectsError): RemoteResult<T> => ({ kind: "fail", error });

/**
 * Unwraps a result: degraded results yield their fallback data, failures throw.
 */
export function unwrap<T>(result: RemoteResult<T>): T {
    if (result.kind === "fail") {
        throw result.error;
    }
    return result.data;
}

/**
 * Normalizes the REST API base URL. Unlike a bare origin, the path is kept
 * since the web service is usually mounted under /biprws.
 */
export function validateAndSanitizeUrl(url: string): string {
    try {
        const trimmedUrl = url.trim();

        // Add https:// if no protocol is specified
        const urlWithProtocol = trimmedUrl.startsWith('http://') || trimmedUrl.startsWith('https://')
            ? trimmedUrl
            : `https://${trimmedUrl}`;

        const parsedUrl = new URL(urlWithProtocol);
        const path = parsedUrl.pathname.replace(/\/+$/, '');

        return `${parsedUrl.origin}${path}`;
    } catch (e) {
        if (e instanceof Error) {
            throw new Error(`Invalid URL: ${e.message}`);
        }
        throw new Error('Invalid URL format');
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
