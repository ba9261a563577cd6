/**
 * @file Async Fetcher
 *
 * Owns the single outstanding groups request. Starting a new request
 * while one is pending replaces it: the previous handle is aborted and
 * released first, so it can never deliver.
 *
 * Completion is turned into a `FetchOutcome` and handed to the listener.
 * The delivered handle is released on every path.
 *
 * @module netinstall/fetch/AsyncFetcher
 */

import type { Logger } from '../../logging/logger.js';
import { ConfigurationError, InternalError, TransportError } from '../errors.js';
import type { FetchOptions, TransferHandle, Transport } from './types.js';

export type FetchOutcome =
    | { kind: 'payload'; url: URL; payload: Uint8Array }
    | { kind: 'failed'; error: TransportError | InternalError };

export type FetchOutcomeListener = (outcome: FetchOutcome) => void;

export type FetchStart =
    | { ok: true; handle: TransferHandle }
    | { ok: false; error: ConfigurationError };

export class AsyncFetcher {
    private pending: TransferHandle | null = null;

    constructor(
        private readonly transport: Transport,
        private readonly options: FetchOptions,
        private readonly logger: Logger,
        private readonly listener: FetchOutcomeListener
    ) {}

    /** The outstanding request, if any. */
    pending_get(): TransferHandle | null {
        return this.pending;
    }

    /**
     * Start fetching `url`. Fails without creating a handle when the URL
     * is not absolute or the transport cannot start it.
     */
    fetch(url: string): FetchStart {
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            return { ok: false, error: new ConfigurationError(`Invalid groups URL "${url}"`) };
        }

        if (this.pending) {
            this.logger.debug(`Replacing outstanding request for ${this.pending.url.href}`);
            this.cancel();
        }

        this.logger.debug(`NetInstall loading groups from ${parsed.href}`);
        const handle: TransferHandle | null = this.transport.request_start(
            parsed,
            this.options,
            (finished: TransferHandle): void => this.completion_receive(finished)
        );
        if (!handle) {
            this.logger.debug('request failed immediately.');
            return { ok: false, error: new ConfigurationError(`Unable to start request for ${parsed.href}`) };
        }

        this.pending = handle;
        return { ok: true, handle };
    }

    /**
     * Handle a transport completion.
     */
    completion_receive(handle: TransferHandle): void {
        const pending: TransferHandle | null = this.pending;

        if (pending !== null && handle !== pending) {
            handle.release();
            this.logger.warn(`Ignoring completion of superseded request for ${handle.url.href}`);
            return;
        }

        this.pending = null;
        try {
            if (pending === null || !handle.finished_is()) {
                this.listener({
                    kind: 'failed',
                    error: new InternalError('NetInstall data called too early.', [
                        pending === null ? 'no request is pending' : `request for ${handle.url.href} is unfinished`,
                    ]),
                });
                return;
            }

            const payload: Uint8Array = handle.payload_read();
            this.logger.debug(`NetInstall group data received ${payload.byteLength} bytes from ${handle.url.href}`);

            const errorText: string | null = handle.error_get();
            if (errorText !== null) {
                this.listener({
                    kind: 'failed',
                    error: new TransportError('unable to fetch netinstall package lists.', [
                        `Request for url: ${handle.url.href} failed with: ${errorText}`,
                    ]),
                });
                return;
            }

            this.listener({ kind: 'payload', url: handle.url, payload });
        } finally {
            handle.release();
        }
    }

    /**
     * Abort and release the outstanding request. Nothing is delivered for it.
     */
    cancel(): void {
        const pending: TransferHandle | null = this.pending;
        if (!pending) return;
        this.pending = null;
        pending.abort();
        pending.release();
    }
}
