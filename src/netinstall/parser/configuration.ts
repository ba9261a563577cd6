/**
 * @file Configuration Parser
 *
 * Turns the module's raw configuration map into a validated,
 * strongly-typed `NetInstallConfiguration`.
 *
 * @module netinstall/parser
 */

import { ConfigurationError } from '../errors.js';
import { LOCAL_SOURCE, type GroupRecord } from '../types.js';
import { EmbeddedGroupsSchema, NetInstallConfigSchema, issues_format } from './schemas.js';

export interface NetInstallConfiguration {
    required: boolean;
    /** The `label` sub-map, base keys and `key[locale]` variants. */
    labels: Record<string, string>;
    /** Every `groupsUrl` entry, in order (one when scalar, none when absent). */
    groupsUrls: string[];
    /** `groupsUrl` when it is a single string; drives the actual load. */
    groupsUrl: string | null;
    /** Embedded records; empty unless a `groupsUrl` entry is `local`. */
    groups: GroupRecord[];
}

export type ConfigurationParseResult =
    | { ok: true; value: NetInstallConfiguration }
    | { ok: false; error: ConfigurationError };

/**
 * Validate a configuration map.
 *
 * @param configMap - Map as read from the module's YAML configuration.
 */
export function configuration_parse(configMap: unknown): ConfigurationParseResult {
    const result = NetInstallConfigSchema.safeParse(configMap ?? {});
    if (!result.success) {
        return {
            ok: false,
            error: new ConfigurationError('Invalid netinstall configuration', issues_format(result.error)),
        };
    }

    const raw = result.data;
    const groupsUrl: string | null = typeof raw.groupsUrl === 'string' ? raw.groupsUrl : null;
    const groupsUrls: string[] =
        raw.groupsUrl === null ? [] : typeof raw.groupsUrl === 'string' ? [raw.groupsUrl] : raw.groupsUrl;

    let groups: GroupRecord[] = [];
    if (groupsUrls.includes(LOCAL_SOURCE)) {
        const embedded = EmbeddedGroupsSchema.safeParse({ groups: raw.groups });
        if (!embedded.success) {
            return {
                ok: false,
                error: new ConfigurationError('Invalid netinstall configuration', issues_format(embedded.error)),
            };
        }
        groups = embedded.data.groups;
    }

    return {
        ok: true,
        value: {
            required: raw.required,
            labels: raw.label,
            groupsUrls,
            groupsUrl,
            groups,
        },
    };
}
