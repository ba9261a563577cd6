/**
 * @file In-Memory Collaborators
 *
 * Minimal group model and global storage used by the CLI and tests.
 * An installer host supplies its own implementations.
 *
 * @module netinstall/collaborators
 */

import type { GlobalStorage, GroupModel, GroupRecord } from './types.js';

/**
 * Holds the most recently published group list.
 */
export class GroupListModel implements GroupModel {
    private records: GroupRecord[] = [];
    private publications: number = 0;

    groups_publish(records: GroupRecord[]): void {
        this.records = records;
        this.publications += 1;
    }

    groups_get(): readonly GroupRecord[] {
        return this.records;
    }

    rowCount(): number {
        return this.records.length;
    }

    publishCount_get(): number {
        return this.publications;
    }

    /**
     * Display names of the top-level groups; unnamed groups are skipped.
     */
    names_list(): string[] {
        return this.records
            .map((record: GroupRecord): unknown => record['name'])
            .filter((name: unknown): name is string => typeof name === 'string');
    }
}

/**
 * Map-backed global storage.
 */
export class MemoryStorage implements GlobalStorage {
    private readonly values = new Map<string, string>();

    value_put(key: string, value: string): void {
        this.values.set(key, value);
    }

    value_get(key: string): string | null {
        return this.values.get(key) ?? null;
    }

    keys_list(): string[] {
        return Array.from(this.values.keys());
    }
}
