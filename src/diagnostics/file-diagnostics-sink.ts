import fs from 'fs';
import path from 'path';
import type { Phase } from '../constants/index.js';
import type { ILogger } from '../infra/logger.js';
import type { IDiagnostic } from '../types/index.js';
import type { IDiagnosticsSink } from './index.js';

/**
 * Writes each diagnostic under `<dir>/<sessionId>/` as
 * `<seq>-<phase>.json` plus `.html` / `.png` siblings when present.
 * The reference is the path without extension. The sequence comes from
 * the files already in the session directory.
 */
export class FileDiagnosticsSink implements IDiagnosticsSink {
  constructor(
    private baseDir: string,
    private logger?: ILogger
  ) {}

  async record(sessionId: string, phase: Phase, diagnostic: IDiagnostic): Promise<string> {
    const sessionDir = path.join(this.baseDir, sessionId);
    await fs.promises.mkdir(sessionDir, { recursive: true });
    const recorded = await fs.promises.readdir(sessionDir);
    const seq = recorded.filter(name => name.endsWith('.json')).length + 1;

    const stem = path.join(sessionDir, `${String(seq).padStart(2, '0')}-${phase}`);
    const meta = {
      capturedAt: diagnostic.capturedAt,
      phase,
      url: diagnostic.url,
      note: diagnostic.note,
      html: diagnostic.html !== undefined,
      screenshot: diagnostic.screenshot !== undefined,
    };

    await fs.promises.writeFile(`${stem}.json`, JSON.stringify(meta, null, 2), 'utf8');
    if (diagnostic.html !== undefined) {
      await fs.promises.writeFile(`${stem}.html`, diagnostic.html, 'utf8');
    }
    if (diagnostic.screenshot !== undefined) {
      await fs.promises.writeFile(`${stem}.png`, diagnostic.screenshot);
    }

    this.logger?.debug('Diagnostic written', { sessionId, phase, reference: stem });
    return stem;
  }
}
