import type { Phase } from '../constants/index.js';
import type { IDiagnostic } from '../types/index.js';

/**
 * Where failed and retried phases leave their evidence.
 * `record` resolves to a reference the report can point at; callers treat a
 * rejection as non-fatal.
 */
export interface IDiagnosticsSink {
  record(sessionId: string, phase: Phase, diagnostic: IDiagnostic): Promise<string>;
}

export interface ICaptureOptions {
  screenshots: boolean;
  htmlSnapshots: boolean;
}
