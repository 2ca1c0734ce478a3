import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import {
  loadAgentConfig,
  parseAgentConfig,
  publicInterestKeyword,
} from '../src/util/agent-config.js';

describe('agent config', () => {
  it('fills defaults around the tracked assets', () => {
    const config = parseAgentConfig({ trackedAssets: ['solana'] });
    expect(config.referenceAssets).toEqual(['bitcoin', 'ethereum']);
    expect(config.runEveryHours).toBe(6);
    expect(config.alertScoreThreshold).toBe(80);
    expect(config.scoringWeights.emaCrossover).toBe(0.2);
    expect(config.summaryReportTime).toBe('22:00');
    expect(config.cooldownHours).toEqual({
      signal: 6,
      price: 6,
      portfolio: 12,
      profitTaking: 24,
      trailingStop: 48,
    });
  });

  it('reports every invalid field by path', () => {
    expect(() =>
      parseAgentConfig({
        trackedAssets: [],
        summaryReportTime: '25:00',
      }),
    ).toThrowError(
      'invalid agent config: trackedAssets: Array must contain at least 1 element(s); summaryReportTime: expected HH:MM (24h, UTC)',
    );
  });

  it('rejects cadences that cannot run at even intervals', () => {
    expect(() => parseAgentConfig({ trackedAssets: ['sui'], runEveryHours: 13 })).toThrowError(
      'invalid agent config: runEveryHours: must divide 24 (1, 2, 3, 4, 6, 8, 12 or 24)',
    );
    expect(() =>
      parseAgentConfig({ trackedAssets: ['sui'], priceCheckIntervalSeconds: 2700 }),
    ).toThrowError(
      'invalid agent config: priceCheckIntervalSeconds: must divide a minute, an hour in whole minutes, or a day in whole hours',
    );
    expect(parseAgentConfig({ trackedAssets: ['sui'], runEveryHours: 8 }).runEveryHours).toBe(8);
  });

  it('rejects unknown keys', () => {
    expect(() => parseAgentConfig({ trackedAssets: ['sui'], trackedAsset: 'sui' })).toThrowError(
      /invalid agent config: <root>: Unrecognized key\(s\) in object: 'trackedAsset'/,
    );
  });

  it('loads the bundled config', () => {
    const file = fileURLToPath(new URL('../config/agent.json', import.meta.url));
    const config = loadAgentConfig(file);
    expect(config.trackedAssets).toEqual(['solana', 'chainlink', 'sui', 'sei-network']);
    expect(config.trailingStopAlerts['sei-network']).toEqual({
      percentDropFromAth: 30,
      closeBelowEma50: true,
    });
  });

  it('names the file it could not parse', () => {
    const dir = mkdtempSync(join(tmpdir(), 'agent-config-'));
    try {
      const file = join(dir, 'agent.json');
      writeFileSync(file, '{ not json', 'utf8');
      expect(() => loadAgentConfig(file)).toThrowError(`failed to read agent config ${file}`);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('derives a search keyword unless one is configured', () => {
    const config = parseAgentConfig({
      trackedAssets: ['sei-network', 'sui'],
      publicInterestKeywords: { sui: 'sui blockchain' },
    });
    expect(publicInterestKeyword(config, 'sei-network')).toBe('sei network coin');
    expect(publicInterestKeyword(config, 'sui')).toBe('sui blockchain');
  });
});
