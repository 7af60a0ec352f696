/**
 * Format detection and incident parsing
 */

export {
  FormatTagSchema,
  KnownFormatTagSchema,
  FormatAnchorsSchema,
  ParserConfigSchema,
  type FormatTag,
  type KnownFormatTag,
  type CommandLogEntry,
  type ParsedIncident,
  type FormatDetection,
  type ParsedBlotter,
  type ParserConfig,
  type FormatParser,
} from './types.js';

export { loadDefaultParserConfig, parseParserConfig, compilePatterns, escapeRegExp, type CompiledPatterns } from './config.js';

export { detectFormat, detectFormatDetailed, detectCounty } from './detector.js';

export { IncidentSequence, parseIncidents, parseBlotterText } from './parser.js';

export { renderBlotterText, formatParsedBlotter, type FormatParsedBlotterOptions } from './render.js';

export { parseGcso, splitLocationAndType } from './formats/gcso.js';
export { parseHelena, classifyIncident, militaryToClock, formatShortDate } from './formats/helena.js';
export { parseHavre, cleanOcrArtifacts, titleCase } from './formats/havre.js';
export { parseGeneric } from './formats/generic.js';
