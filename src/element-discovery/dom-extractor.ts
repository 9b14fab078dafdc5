/**
 * DOM snapshot extraction
 * Reads the live page once into a plain IDocumentSnapshot so that every
 * locator strategy can work on data instead of on browser handles.
 */

import { randomUUID } from 'crypto';
import type { Page } from 'playwright-core';
import type { ILogger } from '../infra/logger.js';
import type { IDocumentSnapshot, IElementSnapshot } from '../types/index.js';

/**
 * Elements that make it into a snapshot.
 */
const EXTRACTION_SELECTOR = [
  'input',
  'textarea',
  'select',
  'button',
  'a[href]',
  '[role="button"]',
  '[role="link"]',
  'code',
  'pre',
  'kbd',
  'samp',
  'output',
  '[id*="key"]',
  '[id*="token"]',
  '[class*="key"]',
  '[class*="token"]',
].join(', ');

export interface DOMExtractionOptions {
  maxElements?: number;
  maxBodyText?: number;
}

/**
 * Attribute written on every extracted node. Its value is
 * `<snapshot nonce>:<ref>`, so an element stamped by an older snapshot
 * never answers for a newer one.
 */
export const REF_ATTRIBUTE = 'data-regflow-ref';

/**
 * CSS selector for the node a snapshot entry was stamped on.
 */
export function refSelector(stamp: string): string {
  return `[${REF_ATTRIBUTE}="${stamp.replace(/["\\]/g, '\\$&')}"]`;
}

export class DOMExtractor {
  constructor(private logger?: ILogger) {}

  async extract(page: Page, options: DOMExtractionOptions = {}): Promise<IDocumentSnapshot> {
    const { maxElements = 500, maxBodyText = 20000 } = options;
    const nonce = randomUUID().slice(0, 8);

    try {
      return await page.evaluate(
        ({ selector, attribute, nonce, maxElements, maxBodyText }) => {
          const clean = (value: string | null | undefined): string | undefined => {
            const text = (value ?? '').replace(/\s+/g, ' ').trim();
            return text.length > 0 ? text.slice(0, 200) : undefined;
          };

          const forms = Array.from(document.forms);
          const modal = document.querySelector('dialog[open], [aria-modal="true"]');

          const isVisible = (el: Element): boolean => {
            const rect = el.getBoundingClientRect();
            if (rect.width === 0 || rect.height === 0) return false;
            const style = window.getComputedStyle(el);
            return style.visibility !== 'hidden' && style.display !== 'none' && style.opacity !== '0';
          };

          const labelFor = (el: Element): string | undefined => {
            if (
              el instanceof HTMLInputElement ||
              el instanceof HTMLTextAreaElement ||
              el instanceof HTMLSelectElement
            ) {
              const labels = el.labels ? Array.from(el.labels).map(l => l.textContent ?? '') : [];
              const joined = clean(labels.join(' '));
              if (joined) return joined;
            }
            const labelledBy = el.getAttribute('aria-labelledby');
            if (labelledBy) {
              const text = clean(
                labelledBy
                  .split(/\s+/)
                  .map(id => document.getElementById(id)?.textContent ?? '')
                  .join(' ')
              );
              if (text) return text;
            }
            // <label>Email</label><div><input></div>
            const previous = el.previousElementSibling ?? el.parentElement?.previousElementSibling;
            if (previous && previous.tagName === 'LABEL') {
              return clean(previous.textContent);
            }
            return undefined;
          };

          const nodes = Array.from(document.querySelectorAll(selector)).slice(0, maxElements);

          const elements = nodes.map((el, ref): IElementSnapshot => {
            const isField =
              el instanceof HTMLInputElement ||
              el instanceof HTMLTextAreaElement ||
              el instanceof HTMLSelectElement;
            const form = el.closest('form');
            const stamp = `${nonce}:${ref}`;
            el.setAttribute(attribute, stamp);

            return {
              ref,
              stamp,
              tag: el.tagName.toLowerCase(),
              type: el.getAttribute('type')?.toLowerCase() ?? undefined,
              id: el.id || undefined,
              name: el.getAttribute('name') ?? undefined,
              autocomplete: el.getAttribute('autocomplete') ?? undefined,
              placeholder: el.getAttribute('placeholder') ?? undefined,
              ariaLabel: el.getAttribute('aria-label') ?? undefined,
              labelText: labelFor(el),
              text: isField ? undefined : clean(el.textContent),
              href: el.getAttribute('href') ?? undefined,
              value: isField ? el.value : undefined,
              role: el.getAttribute('role') ?? undefined,
              classes: Array.from(el.classList),
              visible: isVisible(el),
              disabled: el.matches(':disabled') || el.getAttribute('aria-disabled') === 'true',
              readOnly: (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) && el.readOnly,
              ariaHidden: el.closest('[aria-hidden="true"], [inert]') !== null,
              outsideModal: modal !== null && !modal.contains(el),
              formIndex: form ? forms.indexOf(form) : null,
            };
          });

          let activeFormIndex: number | null = null;
          const focusedForm = document.activeElement?.closest('form') ?? null;
          if (focusedForm) {
            activeFormIndex = forms.indexOf(focusedForm);
          } else {
            const firstWithField = forms.findIndex(f =>
              Array.from(f.querySelectorAll('input, textarea')).some(isVisible)
            );
            activeFormIndex = firstWithField >= 0 ? firstWithField : null;
          }

          return {
            url: window.location.href,
            title: document.title,
            bodyText: (document.body?.innerText ?? '').slice(0, maxBodyText),
            elements,
            activeFormIndex,
          };
        },
        { selector: EXTRACTION_SELECTOR, attribute: REF_ATTRIBUTE, nonce, maxElements, maxBodyText }
      );
    } catch (error) {
      this.logger?.debug('DOM extraction failed', {
        url: page.url(),
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
