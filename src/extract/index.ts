import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { classifyCandidates } from './class-classifier';
import { BoundsOptions, findSemesterBounds } from './semester-bounds';

export { normalizeText } from './normalize';
export { findSemesterBounds, termPatterns, DEFAULT_TERM, DEFAULT_HEADER_CLASS } from './semester-bounds';
export { classifyCandidates, isClassEntry, isNoise, NOISE_TOKENS } from './class-classifier';

export interface ExtractionResult {
  classes: string[];
  term: string | null;
  source: 'semester' | 'legacy' | 'none';
}

/**
 * Class names listed under the active term of a "my lectures" page.
 * Pages without a matching term header yield an empty list.
 */
export function extractCurrentClasses(
  html: string,
  options: BoundsOptions,
  logger: Logger
): ExtractionResult {
  const $ = cheerio.load(html);
  const lookup = findSemesterBounds($, options);

  if (!lookup.found) {
    logger.warn({ term: options.term }, 'No semester header found');
    if (lookup.legacyMarker) {
      // The old "Aktuelle Veranstaltungen" layout is recognised but not parsed.
      logger.info('Legacy lecture list marker present; no entries extracted from it');
      return { classes: [], term: null, source: 'legacy' };
    }
    return { classes: [], term: null, source: 'none' };
  }

  const { bounds } = lookup;
  logger.info({ term: bounds.term, bounded: bounds.end !== null }, 'Found semester header');

  const classes = classifyCandidates($, bounds);
  for (const name of classes) {
    logger.debug({ name }, 'Found class');
  }
  logger.info({ count: classes.length, term: bounds.term }, 'Extracted classes for semester');

  return { classes, term: bounds.term, source: 'semester' };
}
