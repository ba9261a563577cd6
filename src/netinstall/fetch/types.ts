/**
 * @file Fetch Layer Types
 *
 * The loader never touches the network directly; it asks a `Transport`
 * to start a transfer and gets back a `TransferHandle`. The transport
 * reports completion by calling back, asynchronously, with that handle.
 *
 * Methods follow the project's naming convention (subject_verb).
 *
 * @module netinstall/fetch
 */

/**
 * Request options. Fixed for the lifetime of a fetcher.
 */
export interface FetchOptions {
    /** Sent as `User-Agent`; some mirrors reject unknown clients. */
    userAgent: string;
    followRedirects: boolean;
    timeoutMs: number;
    /** Static extra request headers. */
    headers: Readonly<Record<string, string>>;
}

/**
 * One in-flight or completed transfer.
 */
export interface TransferHandle {
    readonly url: URL;

    /** True once the transfer has succeeded or failed. */
    finished_is(): boolean;

    /** Transport error text, or null when the transfer succeeded. */
    error_get(): string | null;

    /** Received body; empty until finished, and after release. */
    payload_read(): Uint8Array;

    /** Stop the transfer. An aborted transfer never completes. */
    abort(): void;

    /** Drop buffers and timers. Implies abort when still running. */
    release(): void;
}

export type TransferCallback = (handle: TransferHandle) => void;

/**
 * Starts transfers.
 */
export interface Transport {
    /**
     * Start a GET for `url`.
     *
     * @param onFinished - Called once, never synchronously from this call.
     * @returns null when the request cannot be started at all.
     */
    request_start(url: URL, options: FetchOptions, onFinished: TransferCallback): TransferHandle | null;
}
