import { createHash } from 'crypto';
import type { IDocumentSnapshot } from '../types/index.js';

/**
 * Digest of what a user could see change on the page: the set of extracted
 * elements with their state, the title and the body text.
 */
export function documentSignature(snapshot: IDocumentSnapshot): string {
  const elements = snapshot.elements
    .map(el =>
      [
        el.tag,
        el.type ?? '',
        el.id ?? '',
        el.name ?? '',
        el.visible ? 'v' : 'h',
        el.disabled ? 'd' : 'e',
        el.text ?? '',
      ].join('|')
    )
    .join('\n');

  return createHash('sha256')
    .update(snapshot.title)
    .update('\0')
    .update(snapshot.bodyText)
    .update('\0')
    .update(elements)
    .digest('hex');
}
