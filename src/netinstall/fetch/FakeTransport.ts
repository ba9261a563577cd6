/**
 * @file Fake Transport
 *
 * In-process `Transport` for tests. Requests never complete on their own;
 * the test decides when and how each one finishes.
 *
 * @module netinstall/fetch/FakeTransport
 */

import type { FetchOptions, TransferCallback, TransferHandle, Transport } from './types.js';

export class FakeTransfer implements TransferHandle {
    finished: boolean = false;
    aborted: boolean = false;
    released: boolean = false;
    errorText: string | null = null;
    payload: Uint8Array = new Uint8Array(0);

    constructor(
        public readonly url: URL,
        public readonly options: FetchOptions,
        private readonly onFinished: TransferCallback
    ) {}

    finished_is(): boolean {
        return this.finished;
    }

    error_get(): string | null {
        return this.errorText;
    }

    payload_read(): Uint8Array {
        return this.payload;
    }

    abort(): void {
        this.aborted = true;
    }

    release(): void {
        this.released = true;
    }

    /** Finish with a body and deliver, as the transport would. */
    succeed(body: string): void {
        this.payload = new TextEncoder().encode(body);
        this.finished = true;
        this.deliver();
    }

    /** Finish with a transport error and deliver. */
    fail(errorText: string): void {
        this.errorText = errorText;
        this.finished = true;
        this.deliver();
    }

    /** Deliver in the current state, finished or not. Aborted transfers stay silent. */
    deliver(): void {
        if (this.aborted) return;
        this.onFinished(this);
    }
}

export class FakeTransport implements Transport {
    readonly requests: FakeTransfer[] = [];
    /** Protocols the fake refuses to start, like an unsupported scheme. */
    refused: Set<string> = new Set(['ftp:']);

    request_start(url: URL, options: FetchOptions, onFinished: TransferCallback): TransferHandle | null {
        if (this.refused.has(url.protocol)) return null;
        const transfer = new FakeTransfer(url, options, onFinished);
        this.requests.push(transfer);
        return transfer;
    }

    last(): FakeTransfer {
        const transfer: FakeTransfer | undefined = this.requests[this.requests.length - 1];
        if (!transfer) throw new Error('no request was started');
        return transfer;
    }
}
