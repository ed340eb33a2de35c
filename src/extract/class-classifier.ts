import type { CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { normalizeText } from './normalize';
import { SemesterBounds } from './semester-bounds';

// Course numbers in the lecture list carry 4-6 digits.
const COURSE_NUMBER_PATTERN = /\d{4,6}/;
const MIN_NAME_LENGTH = 5;

export const NOISE_TOKENS = [
  'Tag',
  'Zeit',
  'Rhythmus',
  'Dauer',
  'Raum',
  'Lehrperson',
  'Hinweis',
  'Belegungsinformation',
  'findet statt',
  'Belegungs-',
  'PDF',
  'Stundenplan',
  'Anmelden',
  'Login',
  'Abmelden',
];

const LOWERED_NOISE_TOKENS = NOISE_TOKENS.map((token) => token.toLowerCase());

export function isNoise(text: string): boolean {
  const lowered = text.toLowerCase();
  return LOWERED_NOISE_TOKENS.some((token) => lowered.includes(token));
}

/** Expects normalized link text. */
export function isClassEntry(text: string): boolean {
  if (text.length < MIN_NAME_LENGTH) {
    return false;
  }
  if (isNoise(text)) {
    return false;
  }
  return COURSE_NUMBER_PATTERN.test(text);
}

/** Anchors strictly after `bounds.start` and before `bounds.end`, in document order. */
export function collectCandidateLinks($: CheerioAPI, bounds: SemesterBounds): Element[] {
  const elements = $('*').toArray().filter(isTag);
  const startIndex = elements.indexOf(bounds.start);
  const links: Element[] = [];

  for (const element of elements.slice(startIndex + 1)) {
    if (element === bounds.end) {
      break;
    }
    if (element.tagName === 'a') {
      links.push(element);
    }
  }

  return links;
}

export function classifyCandidates($: CheerioAPI, bounds: SemesterBounds): string[] {
  const seen = new Set<string>();
  const classes: string[] = [];

  for (const link of collectCandidateLinks($, bounds)) {
    const text = normalizeText($(link).text());
    if (!isClassEntry(text) || seen.has(text)) {
      continue;
    }
    seen.add(text);
    classes.push(text);
  }

  return classes;
}
