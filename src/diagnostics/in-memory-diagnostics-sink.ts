import type { Phase } from '../constants/index.js';
import type { IDiagnostic } from '../types/index.js';
import type { IDiagnosticsSink } from './index.js';

export interface IRecordedDiagnostic {
  sessionId: string;
  phase: Phase;
  diagnostic: IDiagnostic;
  reference: string;
}

export class InMemoryDiagnosticsSink implements IDiagnosticsSink {
  readonly entries: IRecordedDiagnostic[] = [];

  async record(sessionId: string, phase: Phase, diagnostic: IDiagnostic): Promise<string> {
    const reference = `memory://${sessionId}/${this.entries.length + 1}-${phase}`;
    this.entries.push({ sessionId, phase, diagnostic, reference });
    return reference;
  }
}
