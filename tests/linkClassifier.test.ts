import { describe, expect, it } from 'vitest';
import { classifyLink, toNavigationTarget } from '../src/scrapers';

const BASE = 'https://research.example.test';

describe('classifyLink', () => {
  it('sends pick-list pages down the direct path', () => {
    expect(classifyLink(`${BASE}/pick-lists/wide-moat-stocks`)).toBe('direct');
  });

  it('sends model portfolios down the indirect path', () => {
    expect(classifyLink(`${BASE}/model-portfolios/dividend-growth`)).toBe('indirect');
  });

  it('prefers direct when both markers appear', () => {
    expect(classifyLink(`${BASE}/model-portfolio/pick-list/1`)).toBe('direct');
  });

  it('drops any other link shape', () => {
    expect(classifyLink(`${BASE}/screens/undervalued`)).toBe('unsupported');
    expect(classifyLink(`${BASE}/stocks`)).toBe('unsupported');
  });

  it('looks at the path only', () => {
    expect(classifyLink(`${BASE}/screens/1?from=pick-list`)).toBe('unsupported');
    expect(classifyLink(`${BASE}/screens/1#model-portfolio`)).toBe('unsupported');
  });

  it('treats strings that are not absolute URLs as unsupported', () => {
    expect(classifyLink('/pick-lists/relative')).toBe('unsupported');
    expect(classifyLink('')).toBe('unsupported');
  });

  it('returns the same answer on every call', () => {
    const url = `${BASE}/model-portfolios/core`;
    const answers = [classifyLink(url), classifyLink(url), classifyLink(url)];
    expect(new Set(answers)).toEqual(new Set(['indirect']));
  });
});

describe('toNavigationTarget', () => {
  it('pairs the URL with its strategy', () => {
    const url = `${BASE}/pick-lists/a`;
    expect(toNavigationTarget(url)).toEqual({ url, strategy: 'direct' });
  });
});
