/**
 * @file Load Status
 *
 * Outcome of the most recent load attempt and its user-facing text.
 * `Ok` is the initial state and describes as the empty string; every
 * failure is terminal until the next `configure`.
 *
 * @module netinstall/status
 */

import type { Translator } from './types.js';

export type FailureStatus =
    | 'FailedBadConfiguration'
    | 'FailedBadData'
    | 'FailedInternalError'
    | 'FailedNetworkError';

export type Status = 'Ok' | FailureStatus;

/**
 * English description of a status, before translation.
 */
export function status_message(status: Status): string {
    switch (status) {
        case 'Ok':
            return '';
        case 'FailedBadConfiguration':
            return 'Network Installation. (Disabled: Incorrect configuration)';
        case 'FailedBadData':
            return 'Network Installation. (Disabled: Received invalid groups data)';
        case 'FailedInternalError':
            return 'Network Installation. (Disabled: internal error)';
        case 'FailedNetworkError':
            return 'Network Installation. (Disabled: Unable to fetch package lists, check your network connection)';
        default: {
            const unreachable: never = status;
            return unreachable;
        }
    }
}

export type StatusListener = (status: Status) => void;

/**
 * Holds the current status and reports every transition.
 */
export class StatusMachine {
    private current: Status = 'Ok';

    constructor(private readonly listener: StatusListener) {}

    current_get(): Status {
        return this.current;
    }

    failed_is(): boolean {
        return this.current !== 'Ok';
    }

    /**
     * Move to `next` and notify, even when the value is unchanged.
     */
    transition(next: Status): void {
        this.current = next;
        this.listener(next);
    }

    /**
     * Return to `Ok` for a new attempt; notifies only if a failure is cleared.
     */
    reset(): void {
        if (this.current === 'Ok') return;
        this.transition('Ok');
    }

    description_get(translate: Translator, locale: string): string {
        const message: string = status_message(this.current);
        return message ? translate(message, locale) : '';
    }
}
