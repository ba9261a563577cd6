/**
 * @file NetInstall Configuration
 *
 * Loads the package groups offered by a network installation step.
 *
 * `configure` validates the module's configuration map, records the
 * configured sources and labels, and starts exactly one load:
 *
 *   - `groupsUrl: local` publishes the embedded `groups` list at once;
 *   - any other single URL is fetched, and the reply parsed as a groups
 *     document when it arrives.
 *
 * Why a load failed is reported through the status (and its description);
 * `status_ready` fires only when usable data, possibly empty, was
 * published. A list-valued `groupsUrl` fills the source list but does not
 * trigger a load.
 *
 * @module netinstall/NetInstallConfig
 */

import type { Logger } from '../logging/logger.js';
import type { NetInstallError } from './errors.js';
import { AsyncFetcher, type FetchOutcome, type FetchStart } from './fetch/AsyncFetcher.js';
import type { FetchOptions, Transport } from './fetch/types.js';
import { TranslatedString } from './labels.js';
import { NetInstallBus } from './NetInstallBus.js';
import { configuration_parse, type ConfigurationParseResult, type NetInstallConfiguration } from './parser/configuration.js';
import { groupsDocument_parse, type GroupsDocumentResult } from './parser/document.js';
import { source_resolve } from './source.js';
import { StatusMachine, type Status } from './status.js';
import {
    LOCAL_SOURCE,
    translator_identity,
    type GlobalStorage,
    type GroupModel,
    type GroupRecord,
    type NetInstallObserver,
    type Source,
    type Translator,
} from './types.js';

export interface NetInstallDeps {
    model: GroupModel;
    storage: GlobalStorage;
    transport: Transport;
    fetchOptions: FetchOptions;
    logger: Logger;
    translate?: Translator;
    locale?: string;
}

const DEFAULT_SIDEBAR_LABEL: string = 'Package selection';

export class NetInstallConfig {
    private readonly bus = new NetInstallBus();
    private readonly status: StatusMachine;
    private readonly fetcher: AsyncFetcher;
    private readonly model: GroupModel;
    private readonly storage: GlobalStorage;
    private readonly logger: Logger;
    private readonly translate: Translator;
    private locale: string;

    private required: boolean = false;
    private sidebarLabel: TranslatedString | null = null;
    private titleLabel: TranslatedString | null = null;
    private sources: Source[] = [];

    constructor(deps: NetInstallDeps) {
        this.model = deps.model;
        this.storage = deps.storage;
        this.logger = deps.logger;
        this.translate = deps.translate ?? translator_identity;
        this.locale = deps.locale ?? 'en';
        this.status = new StatusMachine((): void => this.statusChanged_emit());
        this.fetcher = new AsyncFetcher(
            deps.transport,
            deps.fetchOptions,
            deps.logger,
            (outcome: FetchOutcome): void => this.fetch_complete(outcome)
        );
    }

    // ─── Observation ────────────────────────────────────────────────

    subscribe(observer: NetInstallObserver): () => void {
        return this.bus.subscribe(observer);
    }

    status_get(): Status {
        return this.status.current_get();
    }

    /** True once the current attempt has ended in a failure. */
    failed_is(): boolean {
        return this.status.failed_is();
    }

    /** Translated description of the status; empty while `Ok`. */
    statusDescription_get(): string {
        return this.status.description_get(this.translate, this.locale);
    }

    sidebarLabel_get(): string {
        return this.sidebarLabel ? this.sidebarLabel.get(this.locale) : this.translate(DEFAULT_SIDEBAR_LABEL, this.locale);
    }

    titleLabel_get(): string {
        return this.titleLabel ? this.titleLabel.get(this.locale) : '';
    }

    /**
     * Whether the configuration marks the step as required. Stored only;
     * the loader reports the same status either way.
     */
    required_is(): boolean {
        return this.required;
    }

    sources_get(): readonly Source[] {
        return this.sources;
    }

    loading_is(): boolean {
        return this.fetcher.pending_get() !== null;
    }

    // ─── Lifecycle ──────────────────────────────────────────────────

    /**
     * Apply a configuration map and start loading the groups.
     *
     * @param configMap - The module configuration, as read from YAML.
     */
    configure(configMap: unknown): void {
        this.fetcher.cancel();
        this.sources = [];
        this.sidebarLabel = null;
        this.titleLabel = null;
        this.required = false;
        this.status.reset();

        const parsed: ConfigurationParseResult = configuration_parse(configMap);
        if (!parsed.ok) {
            this.failure_record(parsed.error);
            return;
        }
        const config: NetInstallConfiguration = parsed.value;

        this.required = config.required;
        this.labels_apply(config.labels);

        for (const entry of config.groupsUrls) {
            this.sources.push(source_resolve(config, entry));
        }

        const groupsUrl: string | null = config.groupsUrl;
        if (groupsUrl === null) return;

        // Still published for other modules that read it.
        if (groupsUrl !== '') {
            this.storage.value_put('groupsUrl', groupsUrl);
        }
        if (groupsUrl === LOCAL_SOURCE) {
            this.groups_load(config.groups);
        } else {
            this.url_load(groupsUrl);
        }
    }

    /**
     * Switch locale and re-announce every translated string.
     */
    retranslate(locale: string): void {
        this.locale = locale;
        this.statusChanged_emit();
        this.bus.emit({ type: 'sidebar_label_changed', label: this.sidebarLabel_get() });
        this.bus.emit({ type: 'title_label_changed', label: this.titleLabel_get() });
    }

    /**
     * Cancel any outstanding request and drop all subscribers.
     */
    teardown(): void {
        this.fetcher.cancel();
        this.bus.clear();
    }

    // ─── Loading ────────────────────────────────────────────────────

    private url_load(url: string): void {
        const started: FetchStart = this.fetcher.fetch(url);
        if (!started.ok) {
            this.failure_record(started.error);
        }
    }

    private fetch_complete(outcome: FetchOutcome): void {
        switch (outcome.kind) {
            case 'failed':
                this.failure_record(outcome.error);
                return;
            case 'payload':
                this.payload_ingest(outcome.payload);
                return;
        }
    }

    private payload_ingest(payload: Uint8Array): void {
        const result: GroupsDocumentResult = groupsDocument_parse(payload);
        switch (result.kind) {
            case 'malformed':
                this.failure_record(result.error);
                return;
            case 'unusable':
                this.logger.warn('NetInstall groups data does not form a sequence.', `document is a ${result.shape}`);
                return;
            case 'groups':
                this.groups_load(result.records);
                if (result.records.length < 1) {
                    this.logger.warn('NetInstall groups data was empty.');
                }
                return;
        }
    }

    private groups_load(records: GroupRecord[]): void {
        this.model.groups_publish(records);
        this.bus.emit({ type: 'status_ready' });
    }

    // ─── Status & Labels ────────────────────────────────────────────

    private failure_record(error: NetInstallError): void {
        this.logger.warn(error.message, ...error.details);
        this.status.transition(error.status);
    }

    private statusChanged_emit(): void {
        this.bus.emit({
            type: 'status_changed',
            status: this.status.current_get(),
            description: this.statusDescription_get(),
        });
    }

    private labels_apply(labels: Record<string, string>): void {
        this.sidebarLabel = TranslatedString.label_create(labels, 'sidebar', this.translate);
        this.titleLabel = TranslatedString.label_create(labels, 'title', this.translate);
        if (this.sidebarLabel) {
            this.bus.emit({ type: 'sidebar_label_changed', label: this.sidebarLabel_get() });
        }
        if (this.titleLabel) {
            this.bus.emit({ type: 'title_label_changed', label: this.titleLabel_get() });
        }
    }
}
