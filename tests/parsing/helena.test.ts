/**
 * Tests for the Helena press-release parser
 */

import { describe, it, expect } from 'vitest';
import {
  classifyIncident,
  formatShortDate,
  loadDefaultParserConfig,
  militaryToClock,
  parseIncidents,
} from '../../lib/src/parsing/index.js';

const config = loadDefaultParserConfig();

describe('Helena parser', () => {
  describe('clock-time releases', () => {
    const text = [
      'Helena Police Department',
      'Daily Activity Report for February 11, 2026',
      '8:20 AM – A theft was reported near the 3100 block of N Montana Ave.',
      '11:45 PM - Officers responded to a disturbance at the 600 block of Fuller Ave.',
      'This line is ignored',
    ].join('\n');

    it('should produce one incident per timed line', () => {
      const incidents = parseIncidents(text, 'helena', config).toArray();

      expect(incidents).toEqual([
        {
          cfsNumber: null,
          date: '02/11/26',
          time: '8:20 AM',
          incidentType: 'Theft',
          location: '3100 block of N Montana Ave',
          details: 'A theft was reported near the 3100 block of N Montana Ave.',
          officer: null,
          commandLogs: [],
          freeText: [],
        },
        {
          cfsNumber: null,
          date: '02/11/26',
          time: '11:45 PM',
          incidentType: 'Disturbance',
          location: '600 block of Fuller Ave',
          details: 'Officers responded to a disturbance at the 600 block of Fuller Ave.',
          officer: null,
          commandLogs: [],
          freeText: [],
        },
      ]);
    });
  });

  describe('military-time releases', () => {
    const text = [
      'HPD Officers responded to the following calls 2/9/2026',
      '1008 hours, an Officer responded to the 1800 block of Lyndale Ave for a welfare check.',
      '0737 hours, a two vehicle crash was reported.',
      '2500 hours, bogus.',
    ].join('\n');

    it('should convert times and read the slash date', () => {
      const incidents = parseIncidents(text, 'helena', config).toArray();

      expect(incidents.map((incident) => [incident.date, incident.time, incident.incidentType])).toEqual([
        ['02/09/26', '10:08 AM', 'Welfare Check'],
        ['02/09/26', '7:37 AM', 'Accident'],
        ['02/09/26', '2500', null],
      ]);
      expect(incidents[0]?.location).toBe('1800 block of Lyndale Ave');
      expect(incidents[1]?.location).toBeNull();
    });
  });

  it('should leave the date null when the release has none', () => {
    const [incident] = parseIncidents('Helena Police\n9:05 AM - Fraud report taken.', 'helena', config).toArray();

    expect(incident?.date).toBeNull();
    expect(incident?.incidentType).toBe('Fraud');
  });
});

describe('classifyIncident', () => {
  it('should take the first keyword group in configured order', () => {
    expect(classifyIncident('Stolen bicycle reported after a vehicle break-in', config)).toBe('Theft');
    expect(classifyIncident('Two-car collision, no injuries', config)).toBe('Accident');
  });

  it('should return null when no keyword matches', () => {
    expect(classifyIncident('Lost dog returned to owner', config)).toBeNull();
  });
});

describe('militaryToClock', () => {
  it('should convert 24-hour times', () => {
    expect(militaryToClock('0000')).toBe('12:00 AM');
    expect(militaryToClock('1008')).toBe('10:08 AM');
    expect(militaryToClock('1200')).toBe('12:00 PM');
    expect(militaryToClock('2359')).toBe('11:59 PM');
    expect(militaryToClock('915')).toBe('9:15 AM');
  });

  it('should return invalid values unchanged', () => {
    expect(militaryToClock('2460')).toBe('2460');
    expect(militaryToClock('noon')).toBe('noon');
  });
});

describe('formatShortDate', () => {
  it('should format real dates as MM/DD/YY', () => {
    expect(formatShortDate(2026, 2, 9)).toBe('02/09/26');
  });

  it('should reject impossible dates', () => {
    expect(formatShortDate(2026, 2, 30)).toBeNull();
    expect(formatShortDate(2026, 13, 1)).toBeNull();
  });
});
