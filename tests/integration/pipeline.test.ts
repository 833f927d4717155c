/**
 * Integration Tests for the Commands
 *
 * Runs harvest, clean and run through executeCommand against temporary
 * directories. Network access is mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeCommand, cleanRecords } from '../../src/cli/index.js';
import { writeBatch } from '../../src/utils/fileWriter.js';
import { parseTable } from '../../src/utils/tableLoader.js';
import type { HarvestedRecord } from '../../src/schemas/index.js';
import { createMockResponse } from '../helpers/http.js';

vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

vi.mock('../../src/utils/logger.js', () => ({
  setVerbose: vi.fn(),
  sanitize: vi.fn((text: string) => text),
  logConfig: vi.fn(),
  logPipelineResult: vi.fn(),
  logStage: vi.fn(),
  logProgress: vi.fn(),
  logSuccess: vi.fn(),
  logWarning: vi.fn(),
  logError: vi.fn(),
  logInfo: vi.fn(),
  logVerbose: vi.fn(),
  logNewline: vi.fn(),
}));

// ============================================
// Fixtures
// ============================================

const NOW = new Date('2025-01-15T12:00:00.000Z');

function createHarvested(
  titre: string | null,
  lien: string,
  date: string | null
): HarvestedRecord {
  return {
    date_pub: date,
    type_source: 'Presse',
    titre,
    lien,
    langue: 'en',
    mots_cles: null,
    extrait_citation: null,
    source_name: null,
    source_type: 'rss',
    source_country: null,
  };
}

/** Three records: B near-duplicates A on the same domain, C is unrelated */
const SCENARIO = [
  createHarvested('AI bias in hiring tools', 'https://x.example/a', '2024-03-01T00:00:00.000Z'),
  createHarvested('AI bias in hiring tools today', 'https://x.example/b', '2024-03-02T00:00:00.000Z'),
  createHarvested('Unrelated topic', 'https://y.example/c', '2024-02-01T00:00:00.000Z'),
];

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

// ============================================
// cleanRecords
// ============================================

describe('cleanRecords', () => {
  it('counts every stage', () => {
    const result = cleanRecords(
      [...SCENARIO, createHarvested(null, 'https://z.example/d', null)],
      90
    );

    expect(result.rows.map((row) => [row.id, row.titre])).toEqual([
      [1, 'AI bias in hiring tools today'],
      [2, 'Unrelated topic'],
    ]);
    expect(result.counts).toEqual({
      inputRows: 4,
      droppedUntitled: 1,
      duplicatesRemoved: 1,
      outputRows: 2,
    });
  });
});

// ============================================
// executeCommand
// ============================================

describe('executeCommand', () => {
  let dir: string;
  let rawDir: string;
  let outPath: string;
  let statusPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'corpus-pipeline-'));
    rawDir = join(dir, 'raw');
    outPath = join(dir, 'clean', 'corpus.csv');
    statusPath = join(dir, 'clean', 'pipeline_status.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('clean', () => {
    it('writes the deduplicated corpus and a success status', async () => {
      await writeBatch(rawDir, 'rss-news', SCENARIO);

      const code = await executeCommand('clean', { rawDir, out: outPath }, {}, NOW);

      expect(code).toBe(0);
      const rows = parseTable(await readFile(outPath));
      expect(rows.map((row) => [row.id, row.titre, row.lien])).toEqual([
        ['1', 'AI bias in hiring tools today', 'https://x.example/b'],
        ['2', 'Unrelated topic', 'https://y.example/c'],
      ]);
      expect(rows[0]).toMatchObject({
        date_pub: '2024-03-02T00:00:00.000Z',
        type_source: 'Presse',
        langue: 'en',
        controverse: null,
        source_type: 'rss',
      });
      expect(Object.hasOwn(rows[0], 'fulltext')).toBe(false);

      expect(await readJson(statusPath)).toMatchObject({
        command: 'clean',
        success: true,
        threshold: 90,
        extractText: false,
        counts: { inputRows: 3, droppedUntitled: 0, duplicatesRemoved: 1, outputRows: 2 },
      });
    });

    it('merges tables from several batches', async () => {
      await writeBatch(rawDir, 'rss-news', SCENARIO.slice(0, 1));
      await writeBatch(rawDir, 'gdelt', SCENARIO.slice(1));

      expect(await executeCommand('clean', { rawDir, out: outPath }, {}, NOW)).toBe(0);
      expect(parseTable(await readFile(outPath))).toHaveLength(2);
    });

    it('adds article text with --extract-text', async () => {
      await writeBatch(rawDir, 'rss-news', SCENARIO);
      const extractor = vi.fn(async (url: string) => (url.endsWith('/b') ? 'Body of B' : null));

      const code = await executeCommand(
        'clean',
        { rawDir, out: outPath, extractText: true },
        { extractor },
        NOW
      );

      expect(code).toBe(0);
      const rows = parseTable(await readFile(outPath));
      expect(rows.map((row) => row.fulltext)).toEqual(['Body of B', null]);
      expect(extractor).toHaveBeenCalledTimes(2);
      expect(await readJson(statusPath)).toMatchObject({ counts: { enriched: 1 } });
    });

    it('fails with exit code 1 and a status file when there are no tables', async () => {
      const code = await executeCommand('clean', { rawDir, out: outPath }, {}, NOW);

      expect(code).toBe(1);
      expect(await exists(outPath)).toBe(false);
      expect(await readJson(statusPath)).toMatchObject({
        command: 'clean',
        success: false,
        stage: 'load',
        error: `No input tables found in ${rawDir}`,
      });
    });

    it('validates without writing on --dry-run', async () => {
      await writeBatch(rawDir, 'rss-news', SCENARIO);

      const code = await executeCommand('clean', { rawDir, out: outPath, dryRun: true }, {}, NOW);

      expect(code).toBe(0);
      expect(await exists(outPath)).toBe(false);
      expect(await exists(statusPath)).toBe(false);
    });
  });

  describe('configuration errors', () => {
    it('exits with code 2 when since is after until', async () => {
      const code = await executeCommand(
        'clean',
        { rawDir, out: outPath, since: '2024-03-02', until: '2024-03-01' },
        {},
        NOW
      );

      expect(code).toBe(2);
      expect(await exists(statusPath)).toBe(false);
    });

    it('exits with code 2 when the config file is missing', async () => {
      const code = await executeCommand(
        'harvest',
        { rawDir, config: join(dir, 'missing.yaml') },
        {},
        NOW
      );

      expect(code).toBe(2);
    });

    it('exits with code 2 when the config file is invalid', async () => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(configPath, 'rate_limit:\n  sleep_seconds: fast\n', 'utf-8');

      expect(await executeCommand('run', { rawDir, out: outPath, config: configPath }, {}, NOW)).toBe(
        2
      );
    });
  });

  describe('run', () => {
    it('harvests the configured feeds then cleans', async () => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        'sources:\n  rss:\n    - https://news.example.org/feed\nrate_limit:\n  sleep_seconds: 0\n',
        'utf-8'
      );
      mockedAxios.get.mockResolvedValueOnce(
        createMockResponse(`<rss><channel>
          <item><title>Reservoir levels fall</title><link>https://news.example.org/1</link>
            <pubDate>2024-06-02T08:00:00Z</pubDate></item>
          <item><title>Reservoir levels fall!</title><link>https://news.example.org/2</link>
            <pubDate>2024-06-01T08:00:00Z</pubDate></item>
          <item><title>Out of window</title><link>https://news.example.org/3</link>
            <pubDate>2023-06-01T08:00:00Z</pubDate></item>
        </channel></rss>`)
      );

      const code = await executeCommand(
        'run',
        { rawDir, out: outPath, config: configPath, since: '2024-01-01', until: '2024-12-31' },
        {},
        NOW
      );

      expect(code).toBe(0);
      const rows = parseTable(await readFile(outPath));
      expect(rows.map((row) => [row.id, row.titre, row.lien])).toEqual([
        ['1', 'Reservoir levels fall', 'https://news.example.org/1'],
      ]);
      expect(await readJson(statusPath)).toMatchObject({
        command: 'run',
        success: true,
        harvestedRows: 2,
        window: { since: '2024-01-01T00:00:00.000Z', until: '2024-12-31T23:59:59.999Z' },
        counts: { inputRows: 2, duplicatesRemoved: 1, outputRows: 1 },
      });
    });

    it('harvest alone writes batches but no corpus', async () => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(configPath, 'sources: {}\n', 'utf-8');

      expect(await executeCommand('harvest', { rawDir, config: configPath }, {}, NOW)).toBe(0);
      expect(await exists(outPath)).toBe(false);
    });
  });
});
