/**
 * Message Search Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { matchingLines, messageCount, messageSearch } from '../src/analyzer/message-search.js';

const text = [
  '2026-03-02 10:00:01,000 [virtwho.main DEBUG] Thread started',
  '2026-03-02 10:00:02,000 [virtwho.main INFO] Sending update',
  '2026-03-02 10:00:03,000 [virtwho.main INFO] sending update again',
].join('\n');

describe('messageCount', () => {
  it('should count matches case-insensitively', () => {
    expect(messageCount(text, 'Sending update')).toBe(2);
  });

  it('should count non-overlapping matches', () => {
    expect(messageCount('aaaa', 'aa')).toBe(2);
  });

  it('should treat the pattern as a regular expression', () => {
    expect(messageCount(text, '\\[.*DEBUG\\]')).toBe(1);
  });

  it('should count an invalid pattern as zero', () => {
    expect(messageCount(text, '(unclosed')).toBe(0);
  });
});

describe('messageSearch', () => {
  it('should find a single message', () => {
    expect(messageSearch(text, 'Thread started')).toBe(true);
    expect(messageSearch(text, 'Thread stopped')).toBe(false);
  });

  it('should require every message of a list', () => {
    expect(messageSearch(text, ['Thread started', 'again'])).toBe(true);
    expect(messageSearch(text, ['Thread started', 'missing'])).toBe(false);
  });

  it('should accept any alternative separated by a pipe', () => {
    expect(messageSearch(text, 'missing|again')).toBe(true);
    expect(messageSearch(text, 'missing|absent')).toBe(false);
  });
});

describe('matchingLines', () => {
  it('should return matching lines sorted', () => {
    const lines = matchingLines('b [X ERROR]\nplain\na [y error]', '\\[.*ERROR.*\\]');
    expect(lines).toEqual(['a [y error]', 'b [X ERROR]']);
  });

  it('should strip carriage returns from CRLF logs', () => {
    const lines = matchingLines('2026-01-01 10:00:00,000 [ERROR] boom\r\nplain\r\n', 'ERROR');
    expect(lines).toEqual(['2026-01-01 10:00:00,000 [ERROR] boom']);
  });

  it('should return nothing for an invalid pattern', () => {
    expect(matchingLines(text, '[')).toEqual([]);
  });
});
