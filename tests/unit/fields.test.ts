/**
 * Unit Tests for Field Access Helpers
 */

import { describe, it, expect } from 'vitest';
import { pickField, cleanText, asArray, clampToWindow } from '../../src/collectors/fields.js';

describe('pickField', () => {
  it('returns the first present field in priority order', () => {
    const entry = { summary: 'Summary text', description: 'Description text' };

    expect(pickField(entry, ['description', 'summary'])).toEqual({
      found: true,
      key: 'description',
      value: 'Description text',
    });
  });

  it('skips blank strings, nulls and empty arrays', () => {
    const entry = { a: '   ', b: null, c: [], d: 'value' };

    expect(pickField(entry, ['a', 'b', 'c', 'd'])).toEqual({ found: true, key: 'd', value: 'value' });
  });

  it('reports none found explicitly', () => {
    expect(pickField({ other: 'x' }, ['title'])).toEqual({ found: false });
    expect(pickField('not an object', ['title'])).toEqual({ found: false });
    expect(pickField(null, ['title'])).toEqual({ found: false });
  });

  it('ignores inherited properties', () => {
    const entry: Record<string, unknown> = Object.create({ title: 'inherited' });
    expect(pickField(entry, ['title'])).toEqual({ found: false });
  });
});

describe('cleanText', () => {
  it('strips tags and collapses whitespace', () => {
    expect(cleanText('<p>Hello   <b>world</b></p>\n')).toBe('Hello world');
  });

  it('decodes bytes as UTF-8', () => {
    expect(cleanText(new TextEncoder().encode('Énergie'))).toBe('Énergie');
  });

  it('reads text out of objects', () => {
    expect(cleanText({ '#text': 'Feed title', '@_type': 'html' })).toBe('Feed title');
    expect(cleanText({ name: 'Agence Exemple' })).toBe('Agence Exemple');
  });

  it('stringifies numbers', () => {
    expect(cleanText(2024)).toBe('2024');
  });

  it('returns null when nothing textual remains', () => {
    expect(cleanText('<br/>')).toBeNull();
    expect(cleanText({ href: 'https://example.org' })).toBeNull();
    expect(cleanText(undefined)).toBeNull();
  });
});

describe('asArray', () => {
  it('wraps single values and drops missing ones', () => {
    expect(asArray('x')).toEqual(['x']);
    expect(asArray(['x', 'y'])).toEqual(['x', 'y']);
    expect(asArray(undefined)).toEqual([]);
  });
});

describe('clampToWindow', () => {
  const window = {
    since: new Date('2024-01-01T00:00:00.000Z'),
    until: new Date('2024-12-31T23:59:59.999Z'),
  };

  it('keeps dates inside the window, bounds included', () => {
    expect(clampToWindow(window.since, window)).toEqual({ keep: true, date: window.since });
    expect(clampToWindow(window.until, window)).toEqual({ keep: true, date: window.until });
  });

  it('drops dates outside the window', () => {
    expect(clampToWindow(new Date('2023-12-31T23:59:59.999Z'), window)).toEqual({ keep: false });
    expect(clampToWindow(new Date('2025-01-01T00:00:00.000Z'), window)).toEqual({ keep: false });
  });

  it('keeps undated records', () => {
    expect(clampToWindow(null, window)).toEqual({ keep: true, date: null });
  });
});
