/**
 * @file HttpTransport Tests
 *
 * Request options, error mapping, timeout and abort behaviour, and
 * `file:` URLs. The global `fetch` is stubbed; nothing leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { HttpTransport } from './HttpTransport.js';
import type { FetchOptions, TransferHandle } from './types.js';
import { MemoryLogger } from '../../logging/logger.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const OPTIONS: FetchOptions = {
    userAgent: 'test-agent',
    followRedirects: true,
    timeoutMs: 30000,
    headers: { 'X-Mirror': 'primary' },
};

const GROUPS_URL: URL = new URL('https://mirror.example/groups.yaml');

function transfer_await(url: URL, options: FetchOptions = OPTIONS): Promise<TransferHandle> {
    return new Promise((resolve, reject): void => {
        const handle = new HttpTransport(new MemoryLogger()).request_start(url, options, resolve);
        if (!handle) reject(new Error('request did not start'));
    });
}

/** A fetch that only settles when its signal aborts. */
function fetch_hanging(): FetchFn {
    return (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
        new Promise((_resolve, reject): void => {
            init?.signal?.addEventListener('abort', (): void => reject(new Error('This operation was aborted')));
        });
}

function sleep_ms(ms: number): Promise<void> {
    return new Promise((resolve): void => { setTimeout(resolve, ms); });
}

describe('HttpTransport', (): void => {
    afterEach((): void => {
        vi.unstubAllGlobals();
    });

    it('refuses unsupported protocols', (): void => {
        const handle = new HttpTransport(new MemoryLogger()).request_start(new URL('ftp://mirror.example/g.yaml'), OPTIONS, (): void => {});
        expect(handle).toBeNull();
    });

    it('fetches with the fixed request options and delivers the body', async (): Promise<void> => {
        const fetchMock = vi.fn<FetchFn>(async (): Promise<Response> => new Response('- name: A\n', { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        const handle = await transfer_await(GROUPS_URL);

        expect(handle.finished_is()).toBe(true);
        expect(handle.error_get()).toBeNull();
        expect(new TextDecoder().decode(handle.payload_read())).toBe('- name: A\n');
        expect(fetchMock).toHaveBeenCalledWith(GROUPS_URL, expect.objectContaining({
            method: 'GET',
            redirect: 'follow',
            headers: { 'X-Mirror': 'primary', 'User-Agent': 'test-agent' },
        }));
    });

    it('does not follow redirects when told not to', async (): Promise<void> => {
        const fetchMock = vi.fn<FetchFn>(async (): Promise<Response> => new Response('[]', { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        await transfer_await(GROUPS_URL, { ...OPTIONS, followRedirects: false });

        expect(fetchMock).toHaveBeenCalledWith(GROUPS_URL, expect.objectContaining({ redirect: 'manual' }));
    });

    it('reports an HTTP error status as a transfer error', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(async (): Promise<Response> =>
            new Response('missing', { status: 404, statusText: 'Not Found' })));

        const handle = await transfer_await(GROUPS_URL);

        expect(handle.finished_is()).toBe(true);
        expect(handle.error_get()).toBe('HTTP 404 Not Found');
    });

    it('cancels the unread body of an error response', async (): Promise<void> => {
        let bodyCancelled: boolean = false;
        const body = new ReadableStream<Uint8Array>({
            cancel(): void {
                bodyCancelled = true;
            },
        });
        vi.stubGlobal('fetch', vi.fn<FetchFn>(async (): Promise<Response> =>
            new Response(body, { status: 500, statusText: 'Oops' })));

        const handle = await transfer_await(GROUPS_URL);

        expect(handle.error_get()).toBe('HTTP 500 Oops');
        expect(bodyCancelled).toBe(true);
    });

    it('reports a rejected fetch as a transfer error', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(async (): Promise<Response> => {
            throw new TypeError('fetch failed');
        }));

        const handle = await transfer_await(GROUPS_URL);

        expect(handle.error_get()).toBe('fetch failed');
    });

    it('times out through the abort signal', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(fetch_hanging()));

        const handle = await transfer_await(GROUPS_URL, { ...OPTIONS, timeoutMs: 20 });

        expect(handle.finished_is()).toBe(true);
        expect(handle.error_get()).toBe('Request timed out after 20ms');
    });

    it('never calls back for an aborted transfer', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(fetch_hanging()));
        const onFinished = vi.fn();

        const handle = new HttpTransport(new MemoryLogger()).request_start(GROUPS_URL, OPTIONS, onFinished);
        handle?.abort();
        handle?.release();
        await sleep_ms(20);

        expect(onFinished).not.toHaveBeenCalled();
        expect(handle?.finished_is()).toBe(false);
    });

    it('reads file: URLs from disk', async (): Promise<void> => {
        const dir: string = fs.mkdtempSync(path.join(os.tmpdir(), 'netinstall-'));
        const file: string = path.join(dir, 'groups.yaml');
        fs.writeFileSync(file, 'groups:\n  - name: Local\n');

        try {
            const handle = await transfer_await(pathToFileURL(file));
            expect(handle.error_get()).toBeNull();
            expect(new TextDecoder().decode(handle.payload_read())).toBe('groups:\n  - name: Local\n');
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('reports a missing file as a transfer error', async (): Promise<void> => {
        const handle = await transfer_await(pathToFileURL(path.join(os.tmpdir(), 'netinstall-missing', 'groups.yaml')));

        expect(handle.finished_is()).toBe(true);
        expect(handle.error_get()).toMatch(/^ENOENT/);
    });

    it('logs a completion handler that throws', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(async (): Promise<Response> => new Response('[]', { status: 200 })));
        const logger = new MemoryLogger();

        await new Promise<void>((resolve): void => {
            new HttpTransport(logger).request_start(GROUPS_URL, OPTIONS, (): void => {
                resolve();
                throw new Error('handler broke');
            });
        });
        await sleep_ms(0);

        expect(logger.entries).toEqual([{
            level: 'error',
            message: 'Completion handler failed for https://mirror.example/groups.yaml',
            details: ['handler broke'],
        }]);
    });

    it('drops the payload on release', async (): Promise<void> => {
        vi.stubGlobal('fetch', vi.fn<FetchFn>(async (): Promise<Response> => new Response('[]', { status: 200 })));

        const handle = await transfer_await(GROUPS_URL);
        handle.release();

        expect(handle.payload_read().byteLength).toBe(0);
        expect(handle.finished_is()).toBe(false);
    });
});
