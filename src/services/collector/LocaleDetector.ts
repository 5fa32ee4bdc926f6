// src/services/collector/LocaleDetector.ts

import { DEFAULT_LOCALE } from './i18n';

// Checked in order; the first script found in the message wins.
const SCRIPT_RANGES: ReadonlyArray<{ locale: string; pattern: RegExp }> = [
    { locale: 'ar', pattern: /[\u0600-\u06FF\u0750-\u077F\uFB50-\uFDFF\uFE70-\uFEFC]/ },
    { locale: 'zh', pattern: /[\u4E00-\u9FFF\u3400-\u4DBF]/ },
    { locale: 'ja', pattern: /[\u3040-\u309F\u30A0-\u30FF]/ },
    { locale: 'ko', pattern: /[\uAC00-\uD7AF\u1100-\u11FF]/ },
    { locale: 'ru', pattern: /[\u0400-\u04FF]/ },
    { locale: 'el', pattern: /[\u0370-\u03FF]/ },
    { locale: 'he', pattern: /[\u0590-\u05FF]/ },
    { locale: 'th', pattern: /[\u0E00-\u0E7F]/ },
    { locale: 'hi', pattern: /[\u0900-\u097F]/ },
];

export function detectLocale(message: string): string {
    for (const { locale, pattern } of SCRIPT_RANGES) {
        if (pattern.test(message)) return locale;
    }
    return DEFAULT_LOCALE;
}

/**
 * Decides the session locale after a user message. A detected non-default
 * locale sticks unless `redetect` is on, in which case every message decides.
 */
export function nextSessionLocale(current: string | undefined, message: string, redetect: boolean): string | undefined {
    if (redetect) return detectLocale(message);
    if (current) return current;
    const detected = detectLocale(message);
    return detected === DEFAULT_LOCALE ? undefined : detected;
}

export function effectiveLocale(configLocale: string | undefined, detectedLocale: string | undefined): string {
    return configLocale ?? detectedLocale ?? DEFAULT_LOCALE;
}
