import type { IPageDriver } from '../browser/index.js';
import type { ILogger } from '../infra/logger.js';
import { toError } from '../infra/retry-utils.js';
import type { IDiagnostic } from '../types/index.js';
import type { ICaptureOptions } from './index.js';

/**
 * Snapshot the page for a diagnostic. Never throws: a page that cannot be
 * read still yields a diagnostic with the note and whatever was captured.
 */
export async function captureDiagnostic(
  page: IPageDriver | null,
  note: string,
  options: ICaptureOptions,
  logger: ILogger
): Promise<IDiagnostic> {
  const diagnostic: IDiagnostic = { capturedAt: new Date().toISOString(), note };
  if (!page) {
    return diagnostic;
  }

  try {
    diagnostic.url = page.url();
    if (options.htmlSnapshots) {
      diagnostic.html = await page.content();
    }
    if (options.screenshots) {
      diagnostic.screenshot = (await page.screenshot()) ?? undefined;
    }
  } catch (error) {
    logger.debug('Partial diagnostic capture', { error: toError(error).message });
  }

  return diagnostic;
}
