/**
 * Tests for the incident parser: GCSO and generic strategies, the
 * incident sequence and parseBlotterText
 */

import { describe, it, expect } from 'vitest';
import {
  compilePatterns,
  loadDefaultParserConfig,
  parseBlotterText,
  parseIncidents,
  splitLocationAndType,
  type FormatTag,
} from '../../lib/src/parsing/index.js';
import { Logger } from '../../lib/src/logging/index.js';

const config = loadDefaultParserConfig();

const SCENARIO_ONE =
  '02/11/26 01:00:00 CFS26-020475 GALLATIN RD 911 HANG UP\n02/11/26 01:34:33 - Alexander, Logan - Deputies responded.';

const GCSO_LOG = [
  "Gallatin County Sheriff's Office",
  'CFS Date/Time      CFS Number     Location     Type',
  '02/11/26 01:00:00 CFS26-020475 GALLATIN RD 911 HANG UP',
  '02/11/26 01:34:33 - Alexander, Logan - Deputies responded.',
  '02/11/26 02:15:10 CFS26-020476 100 MAIN ST TRAFFIC STOP',
  '02/11/26 02:16:00 - CB1',
  '02/11/26 02:20:45 - Smith, Jane - Stopped vehicle for expired registration; driver given a verbal warning and released.',
  'Page 1 of 2',
  'Driver cooperative.',
  '02/11/26 03:05:00 cfs26-020477 BRIDGER CANYON RD ELK IN ROAD',
].join('\n');

const GENERIC_LOG = [
  'Town of Example daily log',
  '02/10/2026 14:05 Noise complaint - Loud music reported at apartment complex.',
  'Officer advised residents.',
  '',
  '2026-02-11 Found property - Wallet turned in at front desk.',
  'Not a dated line',
].join('\n');

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    timestamps: false,
    output: (line) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

// =============================================================================
// GCSO
// =============================================================================

describe('GCSO parser', () => {
  it('should parse a call line and its command log', () => {
    const incidents = parseIncidents(SCENARIO_ONE, 'gcso', config).toArray();

    expect(incidents).toEqual([
      {
        cfsNumber: 'CFS26-020475',
        date: '02/11/26',
        time: '01:00:00',
        incidentType: '911 HANG UP',
        location: 'GALLATIN RD',
        details: 'Deputies responded.',
        officer: 'Alexander, Logan',
        commandLogs: [{ timestamp: '02/11/26 01:34:33', officer: 'Alexander, Logan', entry: 'Deputies responded.' }],
        freeText: [],
      },
    ]);
  });

  it('should skip headers and page markers and keep free text as details', () => {
    const incidents = parseIncidents(GCSO_LOG, 'gcso', config).toArray();

    expect(incidents.map((incident) => incident.cfsNumber)).toEqual(['CFS26-020475', 'CFS26-020476', 'CFS26-020477']);

    const stop = incidents[1];
    expect(stop?.location).toBe('100 MAIN ST');
    expect(stop?.incidentType).toBe('TRAFFIC STOP');
    expect(stop?.officer).toBe('Smith, Jane');
    expect(stop?.commandLogs).toEqual([
      { timestamp: '02/11/26 02:16:00', officer: null, entry: 'CB1' },
      {
        timestamp: '02/11/26 02:20:45',
        officer: 'Smith, Jane',
        entry: 'Stopped vehicle for expired registration; driver given a verbal warning and released.',
      },
    ]);
    expect(stop?.freeText).toEqual(['Driver cooperative.']);
    expect(stop?.details).toBe(
      'Driver cooperative. Stopped vehicle for expired registration; driver given a verbal warning and released.'
    );
  });

  it('should leave details and officer null for a call without log lines', () => {
    const last = parseIncidents(GCSO_LOG, 'gcso', config).toArray()[2];

    expect(last).toEqual({
      cfsNumber: 'CFS26-020477',
      date: '02/11/26',
      time: '03:05:00',
      incidentType: 'ELK IN ROAD',
      location: 'BRIDGER CANYON RD',
      details: null,
      officer: null,
      commandLogs: [],
      freeText: [],
    });
  });

  it('should fall back to the last entry when every entry is dispatcher shorthand', () => {
    const text = [
      '02/11/26 04:00:00 CFS26-020478 200 OAK ST WELFARE CHECK',
      '02/11/26 04:01:00 - Left VM for reporting party, will attempt another callback later today.',
      '02/11/26 04:30:00 - Closed.',
    ].join('\n');

    const [incident] = parseIncidents(text, 'gcso', config).toArray();

    expect(incident?.details).toBe('Closed.');
    expect(incident?.commandLogs).toHaveLength(2);
  });

  it('should produce exactly K incidents in source order for K call lines', () => {
    const count = 12;
    const lines: string[] = [];
    const expected: string[] = [];

    for (let i = 0; i < count; i++) {
      const seconds = String(i).padStart(2, '0');
      const cfs = `CFS26-${String(i + 1).padStart(6, '0')}`;
      expected.push(cfs);
      lines.push(`02/11/26 01:00:${seconds} ${cfs} ${i + 1} MAIN ST WELFARE CHECK`);
      lines.push(`02/11/26 01:05:${seconds} - Checked on resident.`);
    }

    const incidents = parseIncidents(lines.join('\n'), 'gcso', config).toArray();

    expect(incidents.map((incident) => incident.cfsNumber)).toEqual(expected);
    expect(incidents.every((incident) => incident.commandLogs.length === 1)).toBe(true);
  });

  it('should keep command logs in source order when timestamps go backwards', () => {
    const text = [
      '02/11/26 04:00:00 CFS26-020480 100 MAIN ST TRAFFIC STOP',
      '02/11/26 04:20:00 - Smith, Jane - Citation issued for speeding.',
      '02/11/26 04:05:00 - Doe, John - Backup arrived on scene.',
      '02/11/26 04:10:00 - Driver identified.',
    ].join('\n');

    const [incident] = parseIncidents(text, 'gcso', config).toArray();

    expect(incident?.commandLogs).toEqual([
      { timestamp: '02/11/26 04:20:00', officer: 'Smith, Jane', entry: 'Citation issued for speeding.' },
      { timestamp: '02/11/26 04:05:00', officer: 'Doe, John', entry: 'Backup arrived on scene.' },
      { timestamp: '02/11/26 04:10:00', officer: null, entry: 'Driver identified.' },
    ]);
  });

  it('should accept CRLF line endings', () => {
    const incidents = parseIncidents(SCENARIO_ONE.replace(/\n/g, '\r\n'), 'gcso', config).toArray();

    expect(incidents[0]?.incidentType).toBe('911 HANG UP');
    expect(incidents[0]?.commandLogs[0]?.entry).toBe('Deputies responded.');
  });
});

describe('splitLocationAndType', () => {
  const patterns = compilePatterns(config);

  it('should treat a bare incident type as having no location', () => {
    expect(splitLocationAndType('TRAFFIC STOP', patterns)).toEqual({ location: null, incidentType: 'TRAFFIC STOP' });
  });

  it('should match known types case-insensitively and keep the source casing', () => {
    expect(splitLocationAndType('100 MAIN ST Traffic stop', patterns)).toEqual({
      location: '100 MAIN ST',
      incidentType: 'Traffic stop',
    });
  });

  it('should split after the last street suffix for unknown types', () => {
    expect(splitLocationAndType('400 W MAIN ST LOST DOG', patterns)).toEqual({
      location: '400 W MAIN ST',
      incidentType: 'LOST DOG',
    });
  });

  it('should take the last two words as the type when nothing else applies', () => {
    expect(splitLocationAndType('SOMEWHERE ODD THING HAPPENED', patterns)).toEqual({
      location: 'SOMEWHERE ODD',
      incidentType: 'THING HAPPENED',
    });
    expect(splitLocationAndType('HOUSE FIRE', patterns)).toEqual({ location: 'HOUSE', incidentType: 'FIRE' });
    expect(splitLocationAndType('FIRE', patterns)).toEqual({ location: null, incidentType: 'FIRE' });
  });
});

// =============================================================================
// Generic
// =============================================================================

describe('generic parser', () => {
  it('should open an incident on each dated line with empty command logs', () => {
    const incidents = parseIncidents(GENERIC_LOG, 'generic', config).toArray();

    expect(incidents).toEqual([
      {
        cfsNumber: null,
        date: '02/10/2026',
        time: '14:05',
        incidentType: 'Noise complaint',
        location: null,
        details: 'Loud music reported at apartment complex. Officer advised residents.',
        officer: null,
        commandLogs: [],
        freeText: [],
      },
      {
        cfsNumber: null,
        date: '2026-02-11',
        time: null,
        incidentType: 'Found property',
        location: null,
        details: 'Wallet turned in at front desk. Not a dated line',
        officer: null,
        commandLogs: [],
        freeText: [],
      },
    ]);
  });

  it('should keep a dated line without a separator as details only', () => {
    const [incident] = parseIncidents('3/4/26 9:15 PM Loose horses on the highway', 'generic', config).toArray();

    expect(incident?.time).toBe('9:15 PM');
    expect(incident?.incidentType).toBeNull();
    expect(incident?.details).toBe('Loose horses on the highway');
  });

  it('should not read the dash after the time as part of the type', () => {
    const [incident] = parseIncidents('02/10/2026 14:05 - Theft - Bike stolen from rack.', 'generic', config).toArray();

    expect(incident?.time).toBe('14:05');
    expect(incident?.incidentType).toBe('Theft');
    expect(incident?.details).toBe('Bike stolen from rack.');
  });

  it('should treat a single dash after the time as introducing details', () => {
    const [incident] = parseIncidents('02/10/2026 14:05 - Bike stolen from rack.', 'generic', config).toArray();

    expect(incident?.incidentType).toBeNull();
    expect(incident?.details).toBe('Bike stolen from rack.');
  });

  it('should ignore text that never starts with a date', () => {
    expect(parseIncidents('Nothing to report today.\nHave a good weekend.', 'generic', config).toArray()).toEqual([]);
  });
});

// =============================================================================
// Incident Sequence
// =============================================================================

describe('IncidentSequence', () => {
  const formats: FormatTag[] = ['gcso', 'helena', 'havre', 'generic'];

  it.each(formats)('should yield nothing for empty or blank text (%s)', (format) => {
    expect(parseIncidents('', format, config).toArray()).toEqual([]);
    expect(parseIncidents('   \n\t\n  ', format, config).toArray()).toEqual([]);
  });

  it('should be restartable', () => {
    const sequence = parseIncidents(GCSO_LOG, 'gcso', config);

    const first = [...sequence];
    const second = [...sequence];

    expect(first).toHaveLength(3);
    expect(second).toEqual(first);
  });

  it('should produce incidents lazily', () => {
    const iterator = parseIncidents(GCSO_LOG, 'gcso', config)[Symbol.iterator]();

    expect(iterator.next().value?.cfsNumber).toBe('CFS26-020475');
    expect(iterator.next().value?.cfsNumber).toBe('CFS26-020476');
  });

  it('should expose its format tag', () => {
    expect(parseIncidents(GENERIC_LOG, 'generic', config).format).toBe('generic');
  });
});

// =============================================================================
// parseBlotterText
// =============================================================================

describe('parseBlotterText', () => {
  it('should detect, parse and count in one call', () => {
    const { logger } = captureLogger();
    const parsed = parseBlotterText(GCSO_LOG, config, logger);

    expect(parsed.format).toBe('gcso');
    expect(parsed.county).toBe('Gallatin');
    expect(parsed.totalCount).toBe(3);
    expect(parsed.incidents).toHaveLength(3);
    expect(parsed.ambiguousFormats).toEqual([]);
  });

  it('should use the generic strategy for unrecognised text', () => {
    const { logger } = captureLogger();
    const parsed = parseBlotterText(GENERIC_LOG, config, logger);

    expect(parsed.format).toBe('generic');
    expect(parsed.county).toBeNull();
    expect(parsed.incidents.every((incident) => incident.commandLogs.length === 0)).toBe(true);
  });

  it('should warn when more than one format matches', () => {
    const { logger, lines } = captureLogger();
    const parsed = parseBlotterText(`Helena Police Department copy\n${SCENARIO_ONE}`, config, logger);

    expect(parsed.format).toBe('gcso');
    expect(parsed.ambiguousFormats).toEqual(['helena']);
    expect(lines).toEqual([
      'WARN  Format detection ambiguity; using priority order {"selected":"gcso","matched":["gcso","helena"]}',
    ]);
  });

  it('should return zero incidents for empty text', () => {
    const { logger } = captureLogger();
    const parsed = parseBlotterText('', config, logger);

    expect(parsed).toEqual({ format: 'generic', county: null, incidents: [], totalCount: 0, ambiguousFormats: [] });
  });
});
