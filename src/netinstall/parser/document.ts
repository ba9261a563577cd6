/**
 * @file Groups Document Parser
 *
 * Parses the payload of a remote groups document. The document is YAML
 * (JSON parses too) in one of two shapes:
 *
 *   - a top-level sequence of group mappings, or
 *   - a mapping whose `groups` key holds that sequence.
 *
 * The result distinguishes a document that failed to parse (`malformed`,
 * a data error) from one that parsed but has no usable shape (`unusable`,
 * which leaves the load status alone).
 *
 * @module netinstall/parser
 */

import yaml from 'js-yaml';
import { DataError } from '../errors.js';
import type { GroupRecord } from '../types.js';
import { GroupListSchema, GroupsDocumentMapSchema, issues_format } from './schemas.js';

export type GroupsDocumentResult =
    | { kind: 'groups'; records: GroupRecord[] }
    | { kind: 'unusable'; shape: string }
    | { kind: 'malformed'; error: DataError };

/** Longest stretch of raw payload copied into an error explanation. */
const PAYLOAD_EXCERPT_LIMIT: number = 4096;

/**
 * Parse a groups document payload.
 *
 * @param payload - Raw bytes as received, or already-decoded text.
 */
export function groupsDocument_parse(payload: Uint8Array | string): GroupsDocumentResult {
    const text: string = typeof payload === 'string' ? payload : new TextDecoder('utf-8').decode(payload);

    let document: unknown;
    try {
        document = yaml.load(text);
    } catch (e: unknown) {
        return { kind: 'malformed', error: yamlError_explain(e, text, 'netinstall groups data') };
    }

    let entries: unknown[];
    if (Array.isArray(document)) {
        entries = document;
    } else {
        const asMap = GroupsDocumentMapSchema.safeParse(document);
        if (!asMap.success) {
            return { kind: 'unusable', shape: shape_describe(document) };
        }
        entries = asMap.data.groups;
    }

    const records = GroupListSchema.safeParse(entries);
    if (!records.success) {
        return {
            kind: 'malformed',
            error: new DataError('netinstall groups data contains entries that are not mappings', issues_format(records.error)),
        };
    }
    return { kind: 'groups', records: records.data };
}

/**
 * Build a DataError explaining a YAML failure: the parser's reason, where
 * it stopped, the snippet around that point, and the raw payload.
 *
 * @param label - What was being parsed, for the headline.
 */
export function yamlError_explain(error: unknown, text: string, label: string): DataError {
    const details: string[] = [];

    if (error instanceof yaml.YAMLException) {
        details.push(`reason: ${error.reason}`);
        if (error.mark) {
            details.push(`at line ${error.mark.line + 1}, column ${error.mark.column + 1}`);
            if (error.mark.snippet) {
                details.push(...error.mark.snippet.split('\n'));
            }
        }
    } else {
        details.push(`reason: ${error instanceof Error ? error.message : String(error)}`);
    }

    details.push(`payload: ${payload_excerpt(text)}`);
    return new DataError(`YAML error in ${label}`, details);
}

function payload_excerpt(text: string): string {
    if (text.length <= PAYLOAD_EXCERPT_LIMIT) return JSON.stringify(text);
    const rest: number = text.length - PAYLOAD_EXCERPT_LIMIT;
    return `${JSON.stringify(text.slice(0, PAYLOAD_EXCERPT_LIMIT))} (${rest} more characters)`;
}

function shape_describe(document: unknown): string {
    if (document === null || document === undefined) return 'empty document';
    if (typeof document === 'object') return 'mapping without a groups sequence';
    return `scalar (${typeof document})`;
}
