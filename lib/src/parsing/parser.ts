/**
 * Incident Parser
 *
 * Dispatches to one strategy per format tag. Each strategy is a generator,
 * so incidents are produced lazily and only once their block is complete.
 */

import { getGlobalLogger, type Logger } from '../logging/index.js';
import { loadDefaultParserConfig } from './config.js';
import { detectCounty, detectFormatDetailed } from './detector.js';
import { parseGcso } from './formats/gcso.js';
import { parseGeneric } from './formats/generic.js';
import { parseHavre } from './formats/havre.js';
import { parseHelena } from './formats/helena.js';
import type { FormatParser, FormatTag, ParsedBlotter, ParsedIncident, ParserConfig } from './types.js';

const FORMAT_PARSERS: Record<FormatTag, FormatParser> = {
  gcso: parseGcso,
  helena: parseHelena,
  havre: parseHavre,
  generic: parseGeneric,
};

/**
 * Lazy, finite and restartable: every iteration re-scans the text from the
 * top, so the same sequence can be consumed more than once.
 */
export class IncidentSequence implements Iterable<ParsedIncident> {
  private readonly lines: readonly string[];

  constructor(
    text: string,
    readonly format: FormatTag,
    private readonly config: ParserConfig
  ) {
    this.lines = text.trim() ? text.split(/\r?\n/) : [];
  }

  [Symbol.iterator](): Iterator<ParsedIncident> {
    return FORMAT_PARSERS[this.format](this.lines, this.config);
  }

  toArray(): ParsedIncident[] {
    return [...this];
  }
}

/**
 * Split text into incidents using the strategy for `format`
 *
 * @example
 * ```typescript
 * const config = loadDefaultParserConfig();
 * for (const incident of parseIncidents(text, detectFormat(text, config), config)) {
 *   console.log(incident.cfsNumber, incident.incidentType);
 * }
 * ```
 */
export function parseIncidents(text: string, format: FormatTag, config: ParserConfig): IncidentSequence {
  return new IncidentSequence(text, format, config);
}

/**
 * Detect, parse and collect in one call. Used for plain-text blotters and
 * by the CLI.
 */
export function parseBlotterText(
  text: string,
  config: ParserConfig = loadDefaultParserConfig(),
  logger: Logger = getGlobalLogger().child('parser')
): ParsedBlotter {
  const detection = detectFormatDetailed(text, config);

  if (detection.matched.length > 1) {
    logger.warn('Format detection ambiguity; using priority order', {
      selected: detection.format,
      matched: detection.matched,
    });
  }

  const incidents = parseIncidents(text, detection.format, config).toArray();
  logger.debug('Parsed blotter text', { format: detection.format, incidentCount: incidents.length });

  return {
    format: detection.format,
    county: detectCounty(text, config, detection.format),
    incidents,
    totalCount: incidents.length,
    ambiguousFormats: detection.matched.slice(1),
  };
}
