import { describe, it, expect } from 'vitest';
import { parseDomains } from './domains.ts';

describe('parseDomains', () => {
  it('parses bare domains without runbooks', () => {
    expect(parseDomains('example.com,test.com')).toEqual([
      { domain: 'example.com', runbookUrl: null },
      { domain: 'test.com', runbookUrl: null },
    ]);
  });

  it('parses domains with runbook URLs', () => {
    expect(parseDomains('example.com:https://runbook.com/fix,test.com')).toEqual([
      { domain: 'example.com', runbookUrl: 'https://runbook.com/fix' },
      { domain: 'test.com', runbookUrl: null },
    ]);
  });

  it('parses a mix of domains with and without runbooks', () => {
    expect(parseDomains('example.com:https://wiki.com/ssl,test.com,another.com:https://runbook.io')).toEqual([
      { domain: 'example.com', runbookUrl: 'https://wiki.com/ssl' },
      { domain: 'test.com', runbookUrl: null },
      { domain: 'another.com', runbookUrl: 'https://runbook.io' },
    ]);
  });

  it('returns nothing for an empty string', () => {
    expect(parseDomains('')).toEqual([]);
  });

  it('trims whitespace around hosts and URLs', () => {
    expect(parseDomains('  example.com  ,  test.com : https://runbook.com  ')).toEqual([
      { domain: 'example.com', runbookUrl: null },
      { domain: 'test.com', runbookUrl: 'https://runbook.com' },
    ]);
  });

  it('keeps every colon after the first in the URL', () => {
    const [target] = parseDomains('example.com:https://runbook.com:8080/fix');
    expect(target).toEqual({ domain: 'example.com', runbookUrl: 'https://runbook.com:8080/fix' });
  });

  it('keeps query parameters in the URL', () => {
    const [target] = parseDomains('example.com:https://wiki.com/fix?env=prod&team=ops');
    expect(target.runbookUrl).toBe('https://wiki.com/fix?env=prod&team=ops');
  });

  it('parses subdomains', () => {
    expect(parseDomains('api.example.com,www.test.com:https://runbook.com')).toEqual([
      { domain: 'api.example.com', runbookUrl: null },
      { domain: 'www.test.com', runbookUrl: 'https://runbook.com' },
    ]);
  });

  it('drops empty entries and entries without a host', () => {
    expect(parseDomains('a.com,, ,:https://orphan.io,b.com')).toEqual([
      { domain: 'a.com', runbookUrl: null },
      { domain: 'b.com', runbookUrl: null },
    ]);
  });

  it('treats a trailing colon as no runbook', () => {
    expect(parseDomains('a.com:')).toEqual([{ domain: 'a.com', runbookUrl: null }]);
  });
});
