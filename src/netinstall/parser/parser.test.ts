/**
 * @file NetInstall Parser Tests
 *
 * Configuration map validation, source resolution, and groups document
 * parsing.
 */

import { describe, it, expect } from 'vitest';
import { configuration_parse } from './configuration.js';
import { groupsDocument_parse, yamlError_explain } from './document.js';
import { source_resolve } from '../source.js';
import { ConfigurationError, DataError } from '../errors.js';

// ═══════════════════════════════════════════════════════════════════
// configuration_parse
// ═══════════════════════════════════════════════════════════════════

describe('configuration_parse', (): void => {
    it('defaults every field for an empty map', (): void => {
        const result = configuration_parse({});
        expect(result).toEqual({
            ok: true,
            value: { required: false, labels: {}, groupsUrls: [], groupsUrl: null, groups: [] },
        });
    });

    it('treats a missing map like an empty one', (): void => {
        expect(configuration_parse(undefined).ok).toBe(true);
        expect(configuration_parse(null).ok).toBe(true);
    });

    it('reads a scalar groupsUrl as both the trigger and the only source', (): void => {
        const result = configuration_parse({ groupsUrl: 'https://mirror.example/groups.yaml', required: true });
        if (!result.ok) throw result.error;

        expect(result.value.groupsUrl).toBe('https://mirror.example/groups.yaml');
        expect(result.value.groupsUrls).toEqual(['https://mirror.example/groups.yaml']);
        expect(result.value.required).toBe(true);
    });

    it('reads a list-valued groupsUrl as sources without a trigger', (): void => {
        const result = configuration_parse({ groupsUrl: ['https://a.example/g.yaml', 'local'] });
        if (!result.ok) throw result.error;

        expect(result.value.groupsUrl).toBeNull();
        expect(result.value.groupsUrls).toEqual(['https://a.example/g.yaml', 'local']);
    });

    it('treats null values as absent', (): void => {
        const result = configuration_parse({ groupsUrl: null, groups: null, label: null, required: null });
        expect(result).toEqual({
            ok: true,
            value: { required: false, labels: {}, groupsUrls: [], groupsUrl: null, groups: [] },
        });
    });

    it('coerces scalar label values to strings and ignores unknown keys', (): void => {
        const result = configuration_parse({ label: { sidebar: 42, 'sidebar[de]': 'Pakete' }, extra: 'ignored' });
        if (!result.ok) throw result.error;

        expect(result.value.labels).toEqual({ sidebar: '42', 'sidebar[de]': 'Pakete' });
    });

    it('rejects a groupsUrl of the wrong type', (): void => {
        const result = configuration_parse({ groupsUrl: 42 });
        expect(result.ok).toBe(false);
        if (result.ok) return;

        expect(result.error).toBeInstanceOf(ConfigurationError);
        expect(result.error.status).toBe('FailedBadConfiguration');
        expect(result.error.details).toHaveLength(1);
        expect(result.error.details[0].startsWith('[groupsUrl] ')).toBe(true);
    });

    it('rejects embedded groups that are not mappings', (): void => {
        const result = configuration_parse({ groupsUrl: 'local', groups: ['Desktop'] });
        expect(result.ok).toBe(false);
        if (result.ok) return;

        expect(result.error.details[0].startsWith('[groups.0] ')).toBe(true);
    });

    it('does not read embedded groups unless a groupsUrl entry is local', (): void => {
        const result = configuration_parse({ groupsUrl: 'https://mirror.example/g.yaml', groups: 'not a list' });
        if (!result.ok) throw result.error;

        expect(result.value.groups).toEqual([]);
    });

    it('reads embedded groups for a local entry in a groupsUrl list', (): void => {
        const result = configuration_parse({ groupsUrl: ['https://a.example/g.yaml', 'local'], groups: [{ name: 'A' }] });
        if (!result.ok) throw result.error;

        expect(result.value.groups).toEqual([{ name: 'A' }]);
    });

    it('rejects a non-boolean required flag', (): void => {
        expect(configuration_parse({ required: 'yes' }).ok).toBe(false);
    });

    it('rejects a map that is not a mapping', (): void => {
        const result = configuration_parse('groupsUrl: local');
        expect(result.ok).toBe(false);
        if (result.ok) return;

        expect(result.error.details).toEqual(['[(root)] Expected object, received string']);
    });
});

// ═══════════════════════════════════════════════════════════════════
// source_resolve
// ═══════════════════════════════════════════════════════════════════

describe('source_resolve', (): void => {
    const groups = [{ name: 'Desktop' }];

    it('resolves the local sentinel to the embedded groups', (): void => {
        expect(source_resolve({ groups }, 'local')).toEqual({ kind: 'local', groups });
    });

    it('resolves anything else to a remote source without validating it', (): void => {
        expect(source_resolve({ groups }, 'https://mirror.example/g.yaml')).toEqual({
            kind: 'remote',
            url: 'https://mirror.example/g.yaml',
        });
        expect(source_resolve({ groups }, 'not a url')).toEqual({ kind: 'remote', url: 'not a url' });
    });
});

// ═══════════════════════════════════════════════════════════════════
// groupsDocument_parse
// ═══════════════════════════════════════════════════════════════════

describe('groupsDocument_parse', (): void => {
    it('takes the records of a top-level sequence', (): void => {
        const result = groupsDocument_parse('- name: A\n- name: B\n');
        expect(result).toEqual({ kind: 'groups', records: [{ name: 'A' }, { name: 'B' }] });
    });

    it('takes the groups sequence of a top-level mapping', (): void => {
        const result = groupsDocument_parse('groups:\n  - name: A\n    packages:\n      - vim\n');
        expect(result).toEqual({ kind: 'groups', records: [{ name: 'A', packages: ['vim'] }] });
    });

    it('accepts JSON and raw bytes', (): void => {
        const bytes: Uint8Array = new TextEncoder().encode('[{"name": "A", "hidden": true}]');
        expect(groupsDocument_parse(bytes)).toEqual({ kind: 'groups', records: [{ name: 'A', hidden: true }] });
    });

    it('returns an empty record list for an empty sequence', (): void => {
        expect(groupsDocument_parse('[]')).toEqual({ kind: 'groups', records: [] });
    });

    it('reports a scalar document as unusable', (): void => {
        expect(groupsDocument_parse('42')).toEqual({ kind: 'unusable', shape: 'scalar (number)' });
    });

    it('reports a mapping without a groups sequence as unusable', (): void => {
        expect(groupsDocument_parse('name: A')).toEqual({ kind: 'unusable', shape: 'mapping without a groups sequence' });
        expect(groupsDocument_parse('groups: none')).toEqual({ kind: 'unusable', shape: 'mapping without a groups sequence' });
    });

    it('reports an empty payload as unusable', (): void => {
        expect(groupsDocument_parse('')).toEqual({ kind: 'unusable', shape: 'empty document' });
    });

    it('explains a YAML syntax error as bad data', (): void => {
        const result = groupsDocument_parse('- name: "unterminated');
        expect(result.kind).toBe('malformed');
        if (result.kind !== 'malformed') return;

        expect(result.error).toBeInstanceOf(DataError);
        expect(result.error.status).toBe('FailedBadData');
        expect(result.error.message).toBe('YAML error in netinstall groups data');
        expect(result.error.details[0].startsWith('reason: ')).toBe(true);
        expect(result.error.details.some((line: string): boolean => line.startsWith('at line '))).toBe(true);
        expect(result.error.details[result.error.details.length - 1]).toBe('payload: "- name: \\"unterminated"');
    });

    it('treats entries that are not mappings as bad data', (): void => {
        const result = groupsDocument_parse('- Desktop\n- Office\n');
        expect(result.kind).toBe('malformed');
        if (result.kind !== 'malformed') return;

        expect(result.error.message).toBe('netinstall groups data contains entries that are not mappings');
        expect(result.error.details[0].startsWith('[0] ')).toBe(true);
    });
});

describe('yamlError_explain', (): void => {
    it('explains a non-YAML error by its message', (): void => {
        const error = yamlError_explain(new Error('stack overflow'), 'x', 'test data');
        expect(error.message).toBe('YAML error in test data');
        expect(error.details).toEqual(['reason: stack overflow', 'payload: "x"']);
    });

    it('truncates long payloads', (): void => {
        const error = yamlError_explain(new Error('bad'), 'a'.repeat(4100), 'test data');
        expect(error.details[1]).toBe(`payload: "${'a'.repeat(4096)}" (4 more characters)`);
    });
});
