import { createLogger } from '../utils/logger.js';

const log = createLogger('message-search');

/**
 * Count non-overlapping, case-insensitive matches of a pattern.
 * An invalid pattern counts as zero matches.
 */
export function messageCount(text: string, pattern: string): number {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'gi');
  } catch (error) {
    log.warn({ pattern, err: error }, 'Invalid search pattern');
    return 0;
  }

  const count = Array.from(text.matchAll(regex)).length;
  log.debug({ pattern, count }, 'Message search');
  return count;
}

/**
 * True when every message is found. Within one message, `|` separates
 * alternatives of which any one suffices.
 */
export function messageSearch(text: string, messages: string | readonly string[]): boolean {
  const list = typeof messages === 'string' ? [messages] : messages;
  return list.every((message) =>
    message.split('|').some((alternative) => messageCount(text, alternative) > 0)
  );
}

/**
 * Lines matching a pattern case-insensitively, in sorted order.
 */
export function matchingLines(text: string, pattern: string): string[] {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'i');
  } catch (error) {
    log.warn({ pattern, err: error }, 'Invalid line pattern');
    return [];
  }
  return text
    .split(/\r?\n/)
    .filter((line) => regex.test(line))
    .sort();
}
