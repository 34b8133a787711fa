/**
 * Token-set name similarity.
 *
 * Both sides are reduced to sets of upper-cased words so word order,
 * repeated words and extra words on one side do not count against a match.
 * Strings are compared by Indel similarity: the share of characters kept
 * when one string is turned into the other by insertions and deletions only.
 */

import natural from 'natural';
import { nameTokens } from '../utils/normalize.js';

// A substitution counts as one deletion plus one insertion
const INDEL_COSTS = { insertion_cost: 1, deletion_cost: 1, substitution_cost: 2 };

/**
 * Indel similarity of two strings, 0-100. Two empty strings are identical.
 */
export function indelRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) {
        return 100;
    }
    return 100 - (100 * natural.LevenshteinDistance(a, b, INDEL_COSTS)) / total;
}

function joinWords(...parts: string[]): string {
    return parts.filter(part => part !== '').join(' ');
}

/**
 * Case-insensitive token-set similarity, 0-100.
 *
 * - Either side without words: 0
 * - Words shared and all words of one side found in the other: 100
 * - Otherwise the best Indel similarity among the sorted shared words
 *   against each side's shared-plus-remaining words, and the two
 *   shared-plus-remaining strings against each other. With no shared word
 *   only the last comparison counts.
 *
 * @example
 * nameSimilarity('ACH CREDIT ACME CORP INV 1001', 'Acme Corp') // 100
 * nameSimilarity('ACMECORP', 'Acme Corp')                      // 94.11...
 * nameSimilarity('PAYMENT ACME', 'Acme Industries LLC')        // 50
 */
export function nameSimilarity(a: string, b: string): number {
    const tokensA = nameTokens(a);
    const tokensB = nameTokens(b);
    if (tokensA.length === 0 || tokensB.length === 0) {
        return 0;
    }

    const setA = new Set(tokensA);
    const setB = new Set(tokensB);
    const shared = tokensA.filter(t => setB.has(t)).sort();
    const restA = tokensA.filter(t => !setB.has(t)).sort();
    const restB = tokensB.filter(t => !setA.has(t)).sort();

    if (shared.length > 0 && (restA.length === 0 || restB.length === 0)) {
        return 100;
    }

    const sect = shared.join(' ');
    const combinedA = joinWords(sect, restA.join(' '));
    const combinedB = joinWords(sect, restB.join(' '));

    const combined = indelRatio(combinedA, combinedB);
    if (sect === '') {
        return combined;
    }
    return Math.max(combined, indelRatio(sect, combinedA), indelRatio(sect, combinedB));
}
