/**
 * Unit Tests for the OpenAlex Adapter
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import {
  mapWork,
  buildWorksParams,
  createOpenAlexAdapter,
  OpenAlexWorkSchema,
  OPENALEX_WORKS_URL,
  type OpenAlexWork,
} from '../../src/collectors/openalex.js';
import type { HarvestedRecord } from '../../src/schemas/index.js';
import { logWarning } from '../../src/utils/logger.js';
import { createMockResponse, createTimeoutError } from '../helpers/http.js';

vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

vi.mock('../../src/utils/logger.js', () => ({
  logVerbose: vi.fn(),
  logWarning: vi.fn(),
}));

// ============================================
// Fixtures
// ============================================

const WINDOW = {
  since: new Date('2024-01-01T00:00:00.000Z'),
  until: new Date('2024-12-31T23:59:59.999Z'),
};

const CONFIG = { query: 'water governance', per_page: 2, mailto: '' };

function createWork(overrides: Partial<OpenAlexWork> = {}): OpenAlexWork {
  return {
    id: 'https://openalex.org/W100',
    title: 'Governing shared water',
    display_name: 'Governing shared water',
    doi: 'https://doi.org/10.1234/example.1',
    publication_date: '2024-02-10',
    language: 'en',
    primary_location: {
      source: { display_name: 'Journal of Examples', homepage_url: 'https://journal.example.org' },
    },
    concepts: [{ display_name: 'Water' }, { display_name: 'Governance' }],
    ...overrides,
  };
}

async function collect(iterable: AsyncIterable<HarvestedRecord>): Promise<HarvestedRecord[]> {
  const records: HarvestedRecord[] = [];
  for await (const record of iterable) {
    records.push(record);
  }
  return records;
}

// ============================================
// mapWork
// ============================================

describe('mapWork', () => {
  it('maps a work to an academic record', () => {
    expect(mapWork(createWork(), WINDOW)).toEqual({
      date_pub: '2024-02-10T00:00:00.000Z',
      type_source: 'Académique',
      titre: 'Governing shared water',
      lien: 'https://doi.org/10.1234/example.1',
      langue: 'en',
      mots_cles: 'Water,Governance',
      extrait_citation: null,
      source_name: 'Journal of Examples',
      source_type: 'openalex',
      source_country: null,
    });
  });

  it('falls back from doi to the source homepage to the work id', () => {
    expect(mapWork(createWork({ doi: null }), WINDOW)?.lien).toBe('https://journal.example.org');
    expect(mapWork(createWork({ doi: '', primary_location: null }), WINDOW)?.lien).toBe(
      'https://openalex.org/W100'
    );
  });

  it('uses display_name when title is missing', () => {
    expect(
      mapWork(createWork({ title: null, display_name: 'Display name' }), WINDOW)?.titre
    ).toBe('Display name');
  });

  it('uses keywords when there are no concepts, capped at ten', () => {
    const keywords = Array.from({ length: 12 }, (_, i) => ({ display_name: `k${i + 1}` }));

    expect(mapWork(createWork({ concepts: [], keywords }), WINDOW)?.mots_cles).toBe(
      'k1,k2,k3,k4,k5,k6,k7,k8,k9,k10'
    );
    expect(mapWork(createWork({ concepts: null, keywords: null }), WINDOW)?.mots_cles).toBeNull();
  });

  it('falls back to the indexed date', () => {
    const work = createWork({ publication_date: null, from_indexed_date: '2024-07-01T12:00:00' });
    expect(mapWork(work, WINDOW)?.date_pub).toBe('2024-07-01T00:00:00.000Z');
  });

  it('drops works dated outside the window', () => {
    expect(mapWork(createWork({ publication_date: '2023-12-31' }), WINDOW)).toBeNull();
  });

  it('accepts responses with extra and missing fields', () => {
    const parsed = OpenAlexWorkSchema.safeParse({ id: 'https://openalex.org/W1', cited_by_count: 3 });
    expect(parsed.success).toBe(true);
  });
});

// ============================================
// buildWorksParams
// ============================================

describe('buildWorksParams', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('filters by publication date and omits empty options', () => {
    vi.stubEnv('OPENALEX_API_KEY', '');

    expect(buildWorksParams(CONFIG, WINDOW, 3)).toEqual({
      search: 'water governance',
      filter: 'from_publication_date:2024-01-01,to_publication_date:2024-12-31',
      'per-page': 2,
      page: 3,
      mailto: undefined,
      api_key: undefined,
    });
  });

  it('adds mailto and the API key when configured', () => {
    vi.stubEnv('OPENALEX_API_KEY', 'test-openalex-key');

    const params = buildWorksParams({ ...CONFIG, mailto: 'research@example.org' }, WINDOW, 1);

    expect(params.mailto).toBe('research@example.org');
    expect(params.api_key).toBe('test-openalex-key');
  });
});

// ============================================
// Adapter
// ============================================

describe('createOpenAlexAdapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('OPENALEX_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('pages until the reported count is reached', async () => {
    mockedAxios.get
      .mockResolvedValueOnce(
        createMockResponse({
          meta: { count: 3 },
          results: [createWork({ title: 'First' }), createWork({ title: 'Second' })],
        })
      )
      .mockResolvedValueOnce(
        createMockResponse({ meta: { count: 3 }, results: [createWork({ title: 'Third' })] })
      );

    const adapter = createOpenAlexAdapter(CONFIG);
    const records = await collect(adapter.harvest({ window: WINDOW, sleepMs: 0, timeoutMs: 1000 }));

    expect(adapter.label).toBe('openalex');
    expect(records.map((record) => record.titre)).toEqual(['First', 'Second', 'Third']);
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    expect(mockedAxios.get).toHaveBeenLastCalledWith(
      OPENALEX_WORKS_URL,
      expect.objectContaining({
        params: expect.objectContaining({ page: 2, 'per-page': 2 }),
        timeout: 1000,
      })
    );
  });

  it('stops on an empty page', async () => {
    mockedAxios.get.mockResolvedValueOnce(createMockResponse({ meta: { count: 50 }, results: [] }));

    const records = await collect(
      createOpenAlexAdapter(CONFIG).harvest({ window: WINDOW, sleepMs: 0, timeoutMs: 1000 })
    );

    expect(records).toEqual([]);
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
  });

  it('keeps earlier pages when a later one fails', async () => {
    mockedAxios.get
      .mockResolvedValueOnce(
        createMockResponse({ meta: { count: 10 }, results: [createWork(), createWork()] })
      )
      .mockRejectedValueOnce(createTimeoutError(1000));

    const records = await collect(
      createOpenAlexAdapter(CONFIG).harvest({ window: WINDOW, sleepMs: 0, timeoutMs: 1000 })
    );

    expect(records).toHaveLength(2);
    expect(logWarning).toHaveBeenCalledWith(
      'OpenAlex page 2 failed (timeout): timeout of 1000ms exceeded'
    );
  });

  it('skips malformed works and stops on malformed pages', async () => {
    mockedAxios.get
      .mockResolvedValueOnce(
        createMockResponse({ meta: { count: 10 }, results: [{ title: 42 }, createWork()] })
      )
      .mockResolvedValueOnce(createMockResponse({ results: 'nope' }));

    const records = await collect(
      createOpenAlexAdapter(CONFIG).harvest({ window: WINDOW, sleepMs: 0, timeoutMs: 1000 })
    );

    expect(records).toHaveLength(1);
    expect(logWarning).toHaveBeenCalledWith(
      'OpenAlex page 2 failed (parse): unexpected response shape'
    );
  });
});
