/**
 * Parser Configuration
 *
 * Loads the bundled `formats.json` and compiles its regex sources. The
 * configuration is always passed explicitly; the cache below only avoids
 * re-reading and re-compiling the same value.
 */

import { readFileSync } from 'node:fs';
import { ParserConfigSchema, type KnownFormatTag, type ParserConfig } from './types.js';

let defaultConfig: ParserConfig | null = null;

/**
 * Validate a parser configuration
 *
 * @throws {z.ZodError} When the value does not match `ParserConfigSchema`
 */
export function parseParserConfig(value: unknown): ParserConfig {
  return ParserConfigSchema.parse(value);
}

/**
 * The configuration shipped with the library (GCSO, Helena and Havre
 * anchors, Montana county names, street suffixes)
 */
export function loadDefaultParserConfig(): ParserConfig {
  if (!defaultConfig) {
    const raw = readFileSync(new URL('./formats.json', import.meta.url), 'utf-8');
    defaultConfig = parseParserConfig(JSON.parse(raw));
  }
  return defaultConfig;
}

// =============================================================================
// Compiled Patterns
// =============================================================================

export interface CompiledPatterns {
  anchors: Record<KnownFormatTag, RegExp[]>;
  /** `<County> County`, longest names first */
  countyHeaders: Array<{ county: string; pattern: RegExp }>;
  /** Alternation of street suffixes, for embedding in larger patterns */
  streetSuffixAlternation: string;
  streetSuffixes: Set<string>;
  gcsoSkipLines: RegExp[];
  /** Incident types, longest first so the most specific suffix wins */
  gcsoIncidentTypes: string[];
  gcsoDispatchNoise: RegExp[];
}

const compiledCache = new WeakMap<ParserConfig, CompiledPatterns>();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile (once per config object) every regex source the parsers need
 */
export function compilePatterns(config: ParserConfig): CompiledPatterns {
  const cached = compiledCache.get(config);
  if (cached) {
    return cached;
  }

  const anchorsFor = (tag: KnownFormatTag): RegExp[] =>
    config.formats[tag].anchors.map((source) => new RegExp(source, 'im'));

  const byLengthDesc = (a: string, b: string): number => b.length - a.length;

  const compiled: CompiledPatterns = {
    anchors: {
      gcso: anchorsFor('gcso'),
      helena: anchorsFor('helena'),
      havre: anchorsFor('havre'),
    },
    countyHeaders: [...config.counties].sort(byLengthDesc).map((county) => ({
      county,
      pattern: new RegExp(`\\b${escapeRegExp(county).replace(/ /g, '\\s+')}\\s+County\\b`, 'i'),
    })),
    streetSuffixAlternation: [...config.streetSuffixes].sort(byLengthDesc).map(escapeRegExp).join('|'),
    streetSuffixes: new Set(config.streetSuffixes.map((suffix) => suffix.toUpperCase())),
    gcsoSkipLines: config.gcso.skipLinePatterns.map((source) => new RegExp(source, 'i')),
    gcsoIncidentTypes: [...config.gcso.incidentTypes].map((type) => type.toUpperCase()).sort(byLengthDesc),
    gcsoDispatchNoise: config.gcso.dispatchNoise.map((token) => new RegExp(`\\b${escapeRegExp(token)}\\b`, 'i')),
  };

  compiledCache.set(config, compiled);
  return compiled;
}
