import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { findSemesterBounds, termPatterns } from '../semester-bounds';

function textOf($: CheerioAPI, element: Element | null): string | null {
  return element ? $(element).text() : null;
}

function header(text: string): string {
  return `<div class="Leistungen_Inhalt">${text}</div>`;
}

describe('termPatterns', () => {
  it('puts the exact term before the generic pattern', () => {
    const [exact, generic] = termPatterns('Wintersemester 2025/26');

    expect(exact.test('wintersemester   2025/26')).toBe(true);
    expect(exact.test('Wintersemester 2024/25')).toBe(false);
    expect(generic.test('Sommersemester 2025')).toBe(true);
  });

  it('escapes regular expression characters in the term', () => {
    const [exact] = termPatterns('WS (2025)');

    expect(exact.test('WS (2025)')).toBe(true);
    expect(exact.test('WS 2025')).toBe(false);
  });

  it('falls back to the generic pattern alone for a blank term', () => {
    expect(termPatterns('   ')).toHaveLength(1);
  });
});

describe('findSemesterBounds', () => {
  it('prefers the exact term over an earlier generic match', () => {
    const $ = cheerio.load(`${header('Sommersemester 2025')}${header(' Wintersemester\n 2025/26 ')}<a>x</a>`);

    const lookup = findSemesterBounds($);

    expect(lookup.found).toBe(true);
    if (lookup.found) {
      expect(lookup.bounds.term).toBe('Wintersemester 2025/26');
      expect(lookup.bounds.end).toBeNull();
    }
  });

  it('uses the first generic match when the exact term is absent', () => {
    const $ = cheerio.load(`${header('Hinweise')}${header('Sommersemester 2026')}${header('Wintersemester 2025/26')}`);

    const lookup = findSemesterBounds($, { term: 'Wintersemester 2026/27' });

    expect(lookup.found).toBe(true);
    if (lookup.found) {
      expect(lookup.bounds.term).toBe('Sommersemester 2026');
      expect(textOf($, lookup.bounds.end)).toBe('Wintersemester 2025/26');
    }
  });

  it('ends at the next header after the matched one', () => {
    const $ = cheerio.load(`${header('Übersicht')}${header('Wintersemester 2025/26')}${header('Sommersemester 2025')}`);

    const lookup = findSemesterBounds($);

    expect(lookup.found).toBe(true);
    if (lookup.found) {
      expect($(lookup.bounds.start).text()).toBe('Wintersemester 2025/26');
      expect(textOf($, lookup.bounds.end)).toBe('Sommersemester 2025');
    }
  });

  it('ignores term names outside header elements', () => {
    const $ = cheerio.load('<p>Wintersemester 2025/26</p><a>Algorithmen 12345</a>');

    expect(findSemesterBounds($)).toEqual({ found: false, legacyMarker: false });
  });

  it('reports the legacy marker when no header matches', () => {
    const $ = cheerio.load('<h2>Aktuelle   Veranstaltungen:</h2><a>Algorithmen 12345</a>');

    expect(findSemesterBounds($)).toEqual({ found: false, legacyMarker: true });
  });

  it('honours a custom header class', () => {
    const $ = cheerio.load('<div class="term">Sommersemester 2025</div>');

    const lookup = findSemesterBounds($, { headerClass: 'term' });

    expect(lookup.found).toBe(true);
  });
});
