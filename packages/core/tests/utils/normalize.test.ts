import { describe, it, expect } from 'vitest';
import { nameTokens, normalizeName } from '../../src/utils/normalize.js';

describe('normalizeName', () => {
    it('converts to uppercase', () => {
        expect(normalizeName('acme corp')).toBe('ACME CORP');
    });

    it('keeps punctuation', () => {
        expect(normalizeName('ACME*CORP,INC.')).toBe('ACME*CORP,INC.');
    });

    it('collapses runs of whitespace', () => {
        expect(normalizeName('ACME \t  CORP')).toBe('ACME CORP');
    });

    it('trims leading and trailing whitespace', () => {
        expect(normalizeName('  ACME CORP  ')).toBe('ACME CORP');
    });

    it('keeps letters outside ASCII', () => {
        expect(normalizeName('Müller GmbH')).toBe('MÜLLER GMBH');
    });

    it('handles empty string', () => {
        expect(normalizeName('')).toBe('');
    });

    it('handles string with only whitespace', () => {
        expect(normalizeName(' \t ')).toBe('');
    });
});

describe('nameTokens', () => {
    it('returns distinct tokens in first-seen order', () => {
        expect(nameTokens('Acme acme Corp ACME')).toEqual(['ACME', 'CORP']);
    });

    it('returns no tokens for blank input', () => {
        expect(nameTokens('   ')).toEqual([]);
    });
});
