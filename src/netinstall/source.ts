/**
 * @file Source Resolver
 *
 * @module netinstall/source
 */

import type { NetInstallConfiguration } from './parser/configuration.js';
import { LOCAL_SOURCE, type Source } from './types.js';

/**
 * Resolve one `groupsUrl` entry. The `local` sentinel selects the embedded
 * `groups` list; anything else is a remote URL, validated only when fetched.
 */
export function source_resolve(config: Pick<NetInstallConfiguration, 'groups'>, urlOrSentinel: string): Source {
    if (urlOrSentinel === LOCAL_SOURCE) {
        return { kind: 'local', groups: config.groups };
    }
    return { kind: 'remote', url: urlOrSentinel };
}
