/**
 * CLI command tests.
 */

import { describe, it, expect } from 'vitest';
import {
  isOutputFormat,
  runCalc,
  runCompare,
  runConvert,
  runEdl,
} from '../src/commands.js';
import { parseClipList, parseConfig } from '../src/core/config/schema.js';

const config = parseConfig({});

describe('runCalc', () => {
  it('prints the result in each format', () => {
    expect(runCalc('00:00:00:20 * 2', config, 'timecode')).toBe('00:00:01:16');
    expect(runCalc('00:00:00:20 * 2', config, 'frames')).toBe('40');
    expect(runCalc('00:00:00:20 * 2', config, 'json')).toBe(
      '{"timecode":"00:00:01:16","frameRate":24,"totalFrames":40}'
    );
  });

  it('uses the configured default rate', () => {
    const pal = parseConfig({ timecode: { frameRate: 25 } });
    expect(runCalc('00:00:00:20 * 2', pal, 'timecode')).toBe('00:00:01:15');
  });
});

describe('runConvert', () => {
  it('keeps the real-time position', () => {
    expect(runConvert('01:00:00:00', 25, 24, 'timecode')).toBe('01:00:00:00');
    expect(runConvert('00:00:00:01', 24, 48, 'frames')).toBe('2');
  });

  it('prefers a rate written on the timecode', () => {
    expect(runConvert('00:00:02:00@16', 25, 24, 'frames')).toBe('48');
  });
});

describe('runCompare', () => {
  it('compares by real time', () => {
    expect(runCompare('00:00:01:00@24', '00:00:01:00@25', config)).toBe('=');
    expect(runCompare('00:00:00:01@24', '00:00:00:01@16', config)).toBe('<');
    expect(runCompare('00:00:02:00', '00:00:01:23', config)).toBe('>');
  });
});

describe('runEdl', () => {
  it('uses the clip list title over the configured one', () => {
    const clipList = parseClipList({
      title: 'SAMPLE',
      clips: [{ tape: 'A001', sourceIn: '10:00:00:00', sourceOut: '10:00:05:00' }],
    });

    expect(runEdl(clipList, config).split('\n').slice(0, 5)).toEqual([
      'TITLE: SAMPLE',
      '',
      'FCM: NON-DROP FRAME',
      '',
      '001  A001     V     C        10:00:00:00 10:00:05:00 01:00:00:00 01:00:05:00',
    ]);
  });

  it('falls back to the configured title and start', () => {
    const custom = parseConfig({ edl: { title: 'SHOW' }, timecode: { startTimecode: '00:00:10:00' } });
    const clipList = parseClipList({
      clips: [{ tape: 'A001', sourceIn: '10:00:00:00', sourceOut: '10:00:05:00' }],
    });

    const lines = runEdl(clipList, custom).split('\n');
    expect(lines[0]).toBe('TITLE: SHOW');
    expect(lines[4]).toBe(
      '001  A001     V     C        10:00:00:00 10:00:05:00 00:00:10:00 00:00:15:00'
    );
  });
});

describe('isOutputFormat', () => {
  it('accepts known formats only', () => {
    expect(isOutputFormat('frames')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });
});
