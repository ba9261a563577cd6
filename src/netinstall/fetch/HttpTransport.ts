/**
 * @file HTTP Transport
 *
 * `Transport` over the global `fetch` for `http:` and `https:` URLs,
 * and over `fs/promises` for `file:` URLs (a groups file shipped on the
 * installation medium). Timeouts abort the request through the same
 * `AbortController` that cancellation uses.
 *
 * @module netinstall/fetch/HttpTransport
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { Logger } from '../../logging/logger.js';
import type { FetchOptions, TransferCallback, TransferHandle, Transport } from './types.js';

type TransferState = 'running' | 'finished' | 'aborted' | 'released';

const SUPPORTED_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:', 'file:']);

/**
 * A transfer started by `HttpTransport`.
 */
export class HttpTransfer implements TransferHandle {
    private state: TransferState = 'running';
    private payload: Uint8Array = new Uint8Array(0);
    private errorText: string | null = null;
    private timeoutFired: boolean = false;
    private timer: NodeJS.Timeout | null = null;
    private readonly controller: AbortController = new AbortController();

    constructor(public readonly url: URL) {}

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    finished_is(): boolean {
        return this.state === 'finished';
    }

    aborted_is(): boolean {
        return this.state === 'aborted' || this.state === 'released';
    }

    timedOut_is(): boolean {
        return this.timeoutFired;
    }

    error_get(): string | null {
        return this.errorText;
    }

    payload_read(): Uint8Array {
        return this.payload;
    }

    timeout_arm(timeoutMs: number): void {
        this.timer = setTimeout((): void => {
            this.timeoutFired = true;
            this.controller.abort();
        }, timeoutMs);
    }

    complete_succeed(payload: Uint8Array): void {
        if (this.state !== 'running') return;
        this.timer_clear();
        this.payload = payload;
        this.state = 'finished';
    }

    complete_fail(errorText: string): void {
        if (this.state !== 'running') return;
        this.timer_clear();
        this.errorText = errorText;
        this.state = 'finished';
    }

    abort(): void {
        if (this.state !== 'running') return;
        this.state = 'aborted';
        this.timer_clear();
        this.controller.abort();
    }

    release(): void {
        this.abort();
        this.timer_clear();
        this.payload = new Uint8Array(0);
        this.state = 'released';
    }

    private timer_clear(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}

/**
 * Transport backed by Node's `fetch` and file system.
 */
export class HttpTransport implements Transport {
    constructor(private readonly logger: Logger) {}

    request_start(url: URL, options: FetchOptions, onFinished: TransferCallback): TransferHandle | null {
        if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
            return null;
        }

        const transfer = new HttpTransfer(url);
        transfer.timeout_arm(options.timeoutMs);
        // transfer_run settles every failure on the transfer itself; only the
        // completion handler can reject here.
        this.transfer_run(transfer, options)
            .then((): void => {
                if (!transfer.aborted_is()) onFinished(transfer);
            })
            .catch((error: unknown): void => {
                this.logger.error(
                    `Completion handler failed for ${url.href}`,
                    error instanceof Error ? error.message : String(error)
                );
            });
        return transfer;
    }

    private async transfer_run(transfer: HttpTransfer, options: FetchOptions): Promise<void> {
        try {
            if (transfer.url.protocol === 'file:') {
                const data: Buffer = await readFile(fileURLToPath(transfer.url), { signal: transfer.signal });
                transfer.complete_succeed(new Uint8Array(data));
                return;
            }

            const response: Response = await fetch(transfer.url, {
                method: 'GET',
                headers: { ...options.headers, 'User-Agent': options.userAgent },
                redirect: options.followRedirects ? 'follow' : 'manual',
                signal: transfer.signal,
            });
            if (!response.ok) {
                await response.body?.cancel();
                transfer.complete_fail(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`);
                return;
            }
            transfer.complete_succeed(new Uint8Array(await response.arrayBuffer()));
        } catch (e: unknown) {
            if (transfer.timedOut_is()) {
                transfer.complete_fail(`Request timed out after ${options.timeoutMs}ms`);
                return;
            }
            transfer.complete_fail(e instanceof Error ? e.message : String(e));
        }
    }
}
