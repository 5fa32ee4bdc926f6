// src/services/collector/i18n/index.ts

import messages from './messages.json';
import phrases from './phrases.json';
import localeNames from './locales.json';

export const DEFAULT_LOCALE = 'en';

export type MessageKey = keyof typeof messages.en;
export type MessageParams = Record<string, string | number>;

type Catalog = Record<MessageKey, string>;

const catalogs: Record<string, Catalog> = messages;
const names: Record<string, string> = localeNames;

export const CANCEL_PHRASES: readonly string[] = phrases.cancel;
export const CONFIRM_WORDS: readonly string[] = phrases.confirm;
export const REJECT_WORDS: readonly string[] = phrases.reject;
export const COMPLETION_PHRASES: readonly string[] = phrases.completion;

/**
 * Looks up a user-facing message. Locales without a catalog fall back to
 * English; `{name}` placeholders without a matching param are left as is.
 */
export function translate(locale: string, key: MessageKey, params: MessageParams = {}): string {
    const catalog = catalogs[locale] ?? catalogs[DEFAULT_LOCALE];
    return catalog[key].replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
        name in params ? String(params[name]) : placeholder,
    );
}

export function localeName(locale: string): string {
    return names[locale] ?? locale;
}

export function hasCatalog(locale: string): boolean {
    return locale in catalogs;
}
