/**
 * Format Detection
 *
 * Anchor presence tests over the full extracted text. Known formats are
 * evaluated in `config.priority` order and the first hit wins, so text that
 * carries anchors of two departments resolves deterministically.
 */

import { compilePatterns } from './config.js';
import type { FormatDetection, FormatTag, KnownFormatTag, ParserConfig } from './types.js';

/**
 * Every known format whose anchors match, plus the winning tag
 */
export function detectFormatDetailed(text: string, config: ParserConfig): FormatDetection {
  const { anchors } = compilePatterns(config);
  const matched: KnownFormatTag[] = config.priority.filter((tag) =>
    anchors[tag].some((anchor) => anchor.test(text))
  );

  return {
    format: matched[0] ?? 'generic',
    matched,
  };
}

export function detectFormat(text: string, config: ParserConfig): FormatTag {
  return detectFormatDetailed(text, config).format;
}

/**
 * County the blotter belongs to: the department's county for a known
 * format, otherwise the earliest `<Name> County` mention of a configured
 * county name.
 */
export function detectCounty(text: string, config: ParserConfig, format?: FormatTag): string | null {
  const tag = format ?? detectFormat(text, config);
  if (tag !== 'generic') {
    const county = config.formats[tag].county;
    if (county) {
      return county;
    }
  }

  let best: { county: string; index: number } | null = null;
  for (const { county, pattern } of compilePatterns(config).countyHeaders) {
    const match = pattern.exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { county, index: match.index };
    }
  }

  return best?.county ?? null;
}
