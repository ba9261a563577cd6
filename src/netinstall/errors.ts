/**
 * @file Load Failures
 *
 * One error class per failure cause. Errors travel as values in result
 * unions; the loader turns each into a status transition and a log entry.
 *
 * @module netinstall/errors
 */

import type { FailureStatus } from './status.js';

export class NetInstallError extends Error {
    readonly status: FailureStatus;
    readonly details: string[];

    constructor(status: FailureStatus, message: string, details: string[] = []) {
        super(message);
        this.name = 'NetInstallError';
        this.status = status;
        this.details = details;
    }
}

/** Invalid or missing URL, or a configuration map that fails validation. */
export class ConfigurationError extends NetInstallError {
    constructor(message: string, details: string[] = []) {
        super('FailedBadConfiguration', message, details);
        this.name = 'ConfigurationError';
    }
}

/** Transfer failure reported by the transport, including timeouts. */
export class TransportError extends NetInstallError {
    constructor(message: string, details: string[] = []) {
        super('FailedNetworkError', message, details);
        this.name = 'TransportError';
    }
}

/** Malformed or structurally wrong groups document. */
export class DataError extends NetInstallError {
    constructor(message: string, details: string[] = []) {
        super('FailedBadData', message, details);
        this.name = 'DataError';
    }
}

/** Completion observed with no pending request, or with an unfinished one. */
export class InternalError extends NetInstallError {
    constructor(message: string, details: string[] = []) {
        super('FailedInternalError', message, details);
        this.name = 'InternalError';
    }
}
