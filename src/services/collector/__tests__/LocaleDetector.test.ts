/**
 * Locale Detector Tests
 */

import { detectLocale, effectiveLocale, nextSessionLocale } from '../LocaleDetector';

describe('detectLocale', () => {
    test.each([
        ['مرحبا بك', 'ar'],
        ['你好', 'zh'],
        ['こんにちは', 'ja'],
        ['안녕하세요', 'ko'],
        ['Привет', 'ru'],
        ['Καλημέρα', 'el'],
        ['שלום', 'he'],
        ['สวัสดี', 'th'],
        ['नमस्ते', 'hi'],
    ])('%s is %s', (message, locale) => {
        expect(detectLocale(message)).toBe(locale);
    });

    test('latin text, digits and punctuation fall back to English', () => {
        expect(detectLocale('Bonjour tout le monde')).toBe('en');
        expect(detectLocale('12345 !?')).toBe('en');
    });

    test('any Arabic character marks the message as Arabic', () => {
        expect(detectLocale('Python للمبتدئين')).toBe('ar');
    });
});

describe('nextSessionLocale', () => {
    test('an English message leaves the locale unset', () => {
        expect(nextSessionLocale(undefined, 'hello', false)).toBeUndefined();
    });

    test('a detected locale sticks', () => {
        expect(nextSessionLocale(undefined, 'مرحبا', false)).toBe('ar');
        expect(nextSessionLocale('ar', 'hello', false)).toBe('ar');
    });

    test('re-detection follows every message', () => {
        expect(nextSessionLocale('ar', 'hello', true)).toBe('en');
        expect(nextSessionLocale('en', 'Привет', true)).toBe('ru');
    });
});

describe('effectiveLocale', () => {
    test('configured locale wins over the detected one', () => {
        expect(effectiveLocale('fr', 'ar')).toBe('fr');
        expect(effectiveLocale(undefined, 'ar')).toBe('ar');
        expect(effectiveLocale(undefined, undefined)).toBe('en');
    });
});
