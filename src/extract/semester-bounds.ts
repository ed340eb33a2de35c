import type { CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { normalizeText } from './normalize';

export const DEFAULT_HEADER_CLASS = 'Leistungen_Inhalt';
export const DEFAULT_TERM = 'Wintersemester 2025/26';

const GENERIC_TERM_PATTERN = /(Wintersemester|Sommersemester)\s*\d{4}(\/\d{2})?/i;

export const LEGACY_START_MARKER = 'Aktuelle Veranstaltungen';
export const LEGACY_END_MARKER = 'Absolvierte Veranstaltungen';

export interface BoundsOptions {
  term?: string;
  headerClass?: string;
}

export interface SemesterBounds {
  start: Element;
  /** `null` when the section runs to the end of the document. */
  end: Element | null;
  term: string;
}

export type BoundsLookup =
  | { found: true; bounds: SemesterBounds }
  | { found: false; legacyMarker: boolean };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Exact configured term first, then any winter or summer term. */
export function termPatterns(term: string): RegExp[] {
  const words = normalizeText(term).split(' ').filter(Boolean).map(escapeRegExp);
  const patterns: RegExp[] = [];
  if (words.length > 0) {
    patterns.push(new RegExp(words.join('\\s*'), 'i'));
  }
  patterns.push(GENERIC_TERM_PATTERN);
  return patterns;
}

export function isHeader($: CheerioAPI, element: Element, headerClass: string): boolean {
  return element.tagName === 'div' && $(element).hasClass(headerClass);
}

/**
 * Locates the header of the active term and the header that closes its section.
 * Headers partition the document in document order.
 */
export function findSemesterBounds($: CheerioAPI, options: BoundsOptions = {}): BoundsLookup {
  const headerClass = options.headerClass ?? DEFAULT_HEADER_CLASS;
  const headers = $(`div.${headerClass}`).toArray().filter(isTag);

  let start: Element | undefined;
  let term = '';

  for (const pattern of termPatterns(options.term ?? DEFAULT_TERM)) {
    for (const header of headers) {
      const text = normalizeText($(header).text());
      if (pattern.test(text)) {
        start = header;
        term = text;
        break;
      }
    }
    if (start) {
      break;
    }
  }

  if (!start) {
    const pageText = normalizeText($.root().text());
    return { found: false, legacyMarker: pageText.includes(LEGACY_START_MARKER) };
  }

  const elements = $('*').toArray().filter(isTag);
  const startIndex = elements.indexOf(start);
  const end = elements.slice(startIndex + 1).find((element) => isHeader($, element, headerClass)) ?? null;

  return { found: true, bounds: { start, end, term } };
}
