import levenshtein from 'fast-levenshtein';
import { tokenize } from '../core/normalizer/text_normalizer';

/**
 * Normalized edit similarity on a 0-100 scale.
 */
export function ratio(a: string, b: string): number {
    if (!a && !b) return 100;
    if (!a || !b) return 0;
    const distance = levenshtein.get(a, b);
    return Math.round((1 - distance / Math.max(a.length, b.length)) * 100);
}

/**
 * Token-set similarity (0-100): compares the shared tokens against each side's
 * remainder, so word order and one-sided extra words do not hurt the score.
 */
export function tokenSetRatio(a: string, b: string): number {
    const left = new Set(tokenize(a));
    const right = new Set(tokenize(b));
    if (left.size === 0 || right.size === 0) return 0;

    const shared = [...left].filter((t) => right.has(t)).sort();
    const onlyLeft = [...left].filter((t) => !right.has(t)).sort();
    const onlyRight = [...right].filter((t) => !left.has(t)).sort();

    if (shared.length > 0 && (onlyLeft.length === 0 || onlyRight.length === 0)) {
        return 100;
    }

    const t0 = shared.join(' ');
    const t1 = [t0, onlyLeft.join(' ')].filter(Boolean).join(' ');
    const t2 = [t0, onlyRight.join(' ')].filter(Boolean).join(' ');

    return Math.max(
        t0 ? ratio(t0, t1) : 0,
        t0 ? ratio(t0, t2) : 0,
        ratio(t1, t2),
    );
}

/**
 * Share (0-100) of the needle's tokens that occur in the haystack, a token
 * counting as present when some haystack token is at least `tokenThreshold`
 * similar to it. Suited to long page texts where a full edit distance is too costly.
 */
export function tokenCoverage(needle: string, haystack: string, tokenThreshold = 85): number {
    const wanted = [...new Set(tokenize(needle))];
    if (wanted.length === 0) return 0;
    const available = new Set(tokenize(haystack));
    if (available.size === 0) return 0;

    let found = 0;
    for (const token of wanted) {
        if (available.has(token)) {
            found++;
            continue;
        }
        if (token.length < 4) continue;
        for (const candidate of available) {
            if (Math.abs(candidate.length - token.length) > 2) continue;
            if (ratio(token, candidate) >= tokenThreshold) {
                found++;
                break;
            }
        }
    }
    return Math.round((found / wanted.length) * 100);
}
