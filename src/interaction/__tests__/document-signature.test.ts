import { describe, it, expect } from 'vitest';
import { documentSignature } from '../document-signature.js';
import { documentOf, element } from '../../__tests__/fixtures/snapshots.js';

describe('documentSignature', () => {
  const base = documentOf([element({ ref: 0, tag: 'input', type: 'email', id: 'email' })], { bodyText: 'Sign up' });

  it('should be stable for the same document', () => {
    expect(documentSignature(base)).toBe(documentSignature({ ...base, elements: [...base.elements] }));
  });

  it('should ignore typed values', () => {
    const typed = { ...base, elements: base.elements.map(el => ({ ...el, value: 'typed' })) };

    expect(documentSignature(typed)).toBe(documentSignature(base));
  });

  it('should change with the text, title or element state', () => {
    const signature = documentSignature(base);

    expect(documentSignature({ ...base, bodyText: 'Check your inbox' })).not.toBe(signature);
    expect(documentSignature({ ...base, title: 'Other' })).not.toBe(signature);
    expect(documentSignature({ ...base, elements: base.elements.map(el => ({ ...el, disabled: true })) })).not.toBe(signature);
  });
});
