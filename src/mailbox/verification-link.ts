import type { IMailboxMessage } from './index.js';

export interface IMessageCriteria {
  senderPattern: RegExp;
  subjectPattern: RegExp;
}

const URL_PATTERN = /https?:\/\/[^\s"'<>()[\]{}]+/gi;

/**
 * First absolute http(s) link in `text` matching `linkPattern`.
 * Scheme-less hosts are not links; trailing sentence punctuation is dropped.
 */
export function extractVerificationLink(text: string, linkPattern: RegExp): string | null {
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(/[.,;:!?]+$/, '');
    if (/unsubscribe/i.test(url)) continue;
    if (linkPattern.test(url)) {
      return url;
    }
  }
  return null;
}

/**
 * Messages that may carry the link for `address`, newest first.
 * A message matches on sender or subject; one whose recipient is shown and
 * differs from `address` is dropped. Undated messages sort last, and equal
 * timestamps keep list order.
 */
export function rankMatchingMessages(
  messages: IMailboxMessage[],
  address: string,
  criteria: IMessageCriteria
): IMailboxMessage[] {
  const wanted = address.toLowerCase();

  return messages
    .map((message, index) => ({ message, index }))
    .filter(({ message }) => {
      if (message.recipient && !message.recipient.toLowerCase().includes(wanted)) {
        return false;
      }
      return criteria.senderPattern.test(message.sender) || criteria.subjectPattern.test(message.subject);
    })
    .sort((a, b) => {
      const at = a.message.receivedAt ?? Number.NEGATIVE_INFINITY;
      const bt = b.message.receivedAt ?? Number.NEGATIVE_INFINITY;
      if (at !== bt) return bt - at;
      return a.index - b.index;
    })
    .map(({ message }) => message);
}

/**
 * Parse the time column of a webmail list row.
 * Understands `YYYY-MM-DD HH:mm[:ss]`, `MM-DD HH:mm`, `HH:mm` (today),
 * `M月D日`, `刚刚` (just now) and `N分钟前` / `N minutes ago`.
 */
export function parseReceivedAt(text: string, now = Date.now()): number | null {
  const value = text.trim();
  if (value.length === 0) return null;

  const today = new Date(now);

  if (/^(刚刚|just now)$/i.test(value)) {
    return now;
  }

  const minutesAgo = value.match(/^(\d+)\s*(分钟前|minutes? ago)$/i);
  if (minutesAgo) {
    return now - Number(minutesAgo[1]) * 60_000;
  }

  const full = value.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/);
  if (full) {
    const [, y, mo, d, h = '0', mi = '0', s = '0'] = full;
    return new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)).getTime();
  }

  const monthDay = value.match(/^(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{2})$/);
  if (monthDay) {
    const [, mo, d, h, mi] = monthDay;
    return new Date(today.getFullYear(), Number(mo) - 1, Number(d), Number(h), Number(mi)).getTime();
  }

  const chinese = value.match(/^(\d{1,2})月(\d{1,2})日$/);
  if (chinese) {
    const [, mo, d] = chinese;
    return new Date(today.getFullYear(), Number(mo) - 1, Number(d)).getTime();
  }

  const clock = value.match(/^(\d{1,2}):(\d{2})$/);
  if (clock) {
    const [, h, mi] = clock;
    return new Date(today.getFullYear(), today.getMonth(), today.getDate(), Number(h), Number(mi)).getTime();
  }

  return null;
}
