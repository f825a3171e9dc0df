import { findPhoneNumbersInText } from 'libphonenumber-js';
import type { FetchedPage } from '../../types';

export interface ContactSettings {
    role_email_prefixes: string[];
    preferred_email_prefixes: string[];
    placeholder_email_domains: string[];
    free_mail_domains: string[];
}

export interface ExtractedContacts {
    emails: string[];
    phones: string[];
}

const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;
const ASSET_SUFFIX = /\.(png|jpe?g|gif|svg|webp|css|js)$/i;
const MAX_EMAILS = 5;
const MAX_PHONES = 5;

function domainMatches(domain: string, blocked: string): boolean {
    return domain === blocked || domain.endsWith(`.${blocked}`);
}

/**
 * 📇 CONTACT EXTRACTOR
 * Role mailboxes and phone numbers from pages of a verified site.
 */
export class ContactExtractor {
    constructor(
        private readonly settings: ContactSettings,
        private readonly includePersonalEmails = false
    ) { }

    isRoleAddress(email: string): boolean {
        const local = email.split('@')[0] ?? '';
        return this.settings.role_email_prefixes.some((p) => local === p || new RegExp(`^${p}[._-]`).test(local));
    }

    rankEmail(email: string, siteHost: string): number {
        const [local = '', domain = ''] = email.split('@');
        let score = 0;
        const idx = this.settings.preferred_email_prefixes.findIndex((p) => local === p || local.startsWith(`${p}.`) || local.startsWith(`${p}-`));
        if (idx >= 0) score += 100 - idx * 5;
        if (siteHost && (domain === siteHost || siteHost.endsWith(`.${domain}`) || domain.endsWith(`.${siteHost}`))) score += 25;
        if (this.settings.free_mail_domains.includes(domain)) score -= 10;
        return score;
    }

    extractEmails(text: string, siteHost = ''): string[] {
        const found: string[] = [];
        for (const match of text.match(EMAIL_PATTERN) ?? []) {
            const email = match.toLowerCase().replace(/\.+$/, '');
            const domain = email.split('@')[1] ?? '';
            if (!domain || ASSET_SUFFIX.test(email)) continue;
            if (this.settings.placeholder_email_domains.some((d) => domainMatches(domain, d))) continue;
            if (!this.includePersonalEmails && !this.isRoleAddress(email)) continue;
            if (!found.includes(email)) found.push(email);
        }

        return found
            .map((email, order) => ({ email, order, score: this.rankEmail(email, siteHost) }))
            .sort((a, b) => b.score - a.score || a.order - b.order)
            .slice(0, MAX_EMAILS)
            .map((e) => e.email);
    }

    /**
     * UK-default parsing; numbers are returned in E.164.
     */
    extractPhones(text: string): string[] {
        const phones: string[] = [];
        for (const hit of findPhoneNumbersInText(text, 'GB')) {
            const e164 = hit.number.number;
            if (!phones.includes(e164)) phones.push(e164);
            if (phones.length >= MAX_PHONES) break;
        }
        return phones;
    }

    extract(pages: FetchedPage[], siteHost: string): ExtractedContacts {
        const text = pages.map((p) => p.text).join('\n');
        return {
            emails: this.extractEmails(text, siteHost),
            phones: this.extractPhones(text),
        };
    }
}
