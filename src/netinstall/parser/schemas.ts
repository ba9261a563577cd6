/**
 * @file NetInstall Schemas
 *
 * Zod runtime schemas for the module configuration map and the remote
 * groups document. Both arrive as loosely-typed YAML; they are validated
 * here, at the boundary, before any field access.
 *
 * `null` is accepted wherever a key is optional (`groupsUrl: ~` in YAML)
 * and treated like an absent key. Unknown keys are passed through and
 * ignored: the same map also configures the host module.
 *
 * @module netinstall/parser/schemas
 */

import { z } from 'zod';

// ─── Group Records ────────────────────────────────────────────────────────────

/** A group is any mapping; its fields belong to the group model. */
export const GroupRecordSchema = z.record(z.string(), z.unknown());

export const GroupListSchema = z.array(GroupRecordSchema);

// ─── Configuration Map ────────────────────────────────────────────────────────

/**
 * `groupsUrl` is a single URL (or `local`) or a list of them.
 */
const GroupsUrlSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Label map: `sidebar`, `title`, and `key[locale]` variants.
 * YAML may type a bare word or number as non-string; coerce scalars.
 */
const LabelSchema = z.record(
    z.string(),
    z.union([z.string(), z.number(), z.boolean()]).transform((value): string => String(value))
);

export const NetInstallConfigSchema = z
    .object({
        required:  z.boolean().nullish().transform((value): boolean => value ?? false),
        label:     LabelSchema.nullish().transform((value): Record<string, string> => value ?? {}),
        groupsUrl: GroupsUrlSchema.nullish().transform((value): string | string[] | null => value ?? null),
        // Checked by configuration_parse, and only when `local` selects it.
        groups:    z.unknown(),
    })
    .passthrough();

/**
 * The embedded `groups` list, validated on its own so a remote-only
 * configuration is not rejected for a list it never reads.
 */
export const EmbeddedGroupsSchema = z.object({
    groups: GroupListSchema.nullish().transform((value): Record<string, unknown>[] => value ?? []),
});

export type RawNetInstallConfig = z.infer<typeof NetInstallConfigSchema>;

// ─── Groups Document ──────────────────────────────────────────────────────────

/** Top-level mapping form of the document: `{ groups: [...] }`. */
export const GroupsDocumentMapSchema = z
    .object({
        groups: z.array(z.unknown()),
    })
    .passthrough();

/**
 * Flatten zod issues into `[path] message` lines for logging.
 */
export function issues_format(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue): string => {
        const path: string = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `[${path}] ${issue.message}`;
    });
}
