import { Injectable, Logger } from '@nestjs/common';
import en from './locales/en.json';
import tr from './locales/tr.json';

export interface Messages {
    [key: string]: string | Messages;
}

export type TranslationVars = Record<string, string | number>;

export const DEFAULT_LOCALE = 'en';

const BUNDLES: Record<string, Messages> = { en, tr };

@Injectable()
export class I18nService {
    private readonly logger = new Logger(I18nService.name);

    /**
     * Looks up a dotted key such as `stock.insufficient`, falling back to English
     * and then to the key itself. `{{name}}` placeholders are filled from `vars`.
     */
    t(key: string, locale = DEFAULT_LOCALE, vars?: TranslationVars): string {
        const template = lookup(this.bundleFor(locale), key) ?? lookup(BUNDLES[DEFAULT_LOCALE], key) ?? key;
        if (!vars) return template;
        return template.replace(/\{\{(\w+)\}\}/g, (_, name: string) => String(vars[name] ?? ''));
    }

    private bundleFor(locale: string): Messages {
        const bundle = BUNDLES[locale];
        if (!bundle) {
            this.logger.debug(`No messages for locale ${locale}, fallback to ${DEFAULT_LOCALE}`);
            return BUNDLES[DEFAULT_LOCALE];
        }
        return bundle;
    }
}

function lookup(messages: Messages, key: string): string | null {
    let current: string | Messages | undefined = messages;
    for (const part of key.split('.')) {
        if (current === undefined || typeof current === 'string') return null;
        current = current[part];
    }
    return typeof current === 'string' ? current : null;
}
