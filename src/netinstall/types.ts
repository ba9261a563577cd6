/**
 * @file NetInstall Type Definitions
 *
 * Shared types for the package-group loader: the records it publishes,
 * the sources it can load them from, and the collaborator interfaces it
 * publishes into. Collaborators are injected, never looked up globally.
 *
 * @module netinstall
 */

import type { Status } from './status.js';

// ─── Records & Sources ──────────────────────────────────────────

/**
 * One package-group entry. Opaque to the loader beyond being a mapping;
 * ownership passes to the group model on publication.
 */
export type GroupRecord = Record<string, unknown>;

/** Sentinel `groupsUrl` value selecting the embedded `groups` list. */
export const LOCAL_SOURCE: 'local' = 'local';

/**
 * A configured origin for group data.
 */
export type Source =
    | { kind: 'local'; groups: GroupRecord[] }
    | { kind: 'remote'; url: string };

// ─── Collaborators ──────────────────────────────────────────────

/**
 * Sink for parsed group records (the selectable package list).
 */
export interface GroupModel {
    groups_publish(records: GroupRecord[]): void;
}

/**
 * Process-wide key/value store shared between installer modules.
 */
export interface GlobalStorage {
    value_put(key: string, value: string): void;
}

/**
 * Maps an English UI string to the given locale.
 */
export type Translator = (text: string, locale: string) => string;

/** Translator that returns its input unchanged. */
export const translator_identity: Translator = (text: string): string => text;

// ─── Notifications ──────────────────────────────────────────────

export type NetInstallEvent =
    | { type: 'status_changed'; status: Status; description: string }
    | { type: 'status_ready' }
    | { type: 'sidebar_label_changed'; label: string }
    | { type: 'title_label_changed'; label: string };

export type NetInstallObserver = (event: NetInstallEvent) => void;
