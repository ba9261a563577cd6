/**
 * @file Translated Labels
 *
 * A label configured as a base string plus optional per-locale variants
 * in the same map, keyed `key[locale]`:
 *
 *   label:
 *     sidebar: Extra software
 *     sidebar[de]: Zusätzliche Software
 *     sidebar[pt_BR]: Programas extras
 *
 * @module netinstall/labels
 */

import type { Translator } from './types.js';

export class TranslatedString {
    private constructor(
        private readonly base: string,
        private readonly variants: ReadonlyMap<string, string>,
        private readonly translate: Translator
    ) {}

    /**
     * Build the label for `key` from a label map.
     *
     * @returns null when the map has no base entry for `key`.
     */
    static label_create(
        entries: Readonly<Record<string, string>>,
        key: string,
        translate: Translator
    ): TranslatedString | null {
        const base: string | undefined = entries[key];
        if (base === undefined) return null;

        const variants = new Map<string, string>();
        const prefix: string = `${key}[`;
        for (const [entryKey, value] of Object.entries(entries)) {
            if (entryKey.startsWith(prefix) && entryKey.endsWith(']')) {
                variants.set(entryKey.slice(prefix.length, -1), value);
            }
        }
        return new TranslatedString(base, variants, translate);
    }

    /**
     * Exact locale, then its language part, then the translated base string.
     */
    get(locale: string): string {
        const exact: string | undefined = this.variants.get(locale);
        if (exact !== undefined) return exact;

        const language: string = locale.split(/[_@.-]/)[0];
        const byLanguage: string | undefined = this.variants.get(language);
        if (byLanguage !== undefined) return byLanguage;

        return this.translate(this.base, locale);
    }
}
