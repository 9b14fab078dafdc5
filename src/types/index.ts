/**
 * Core domain types for regflow.
 * These types are shared across the system to maintain a common language.
 */

import type { FailureKind, Intent, Outcome, Phase, StrategyName } from '../constants/index.js';

export interface IIdentity {
  readonly address: string;
  readonly secret: string;
}

/**
 * One interactive (or token-bearing) element as seen in a document snapshot.
 * `ref` is the element's position in document order among extracted elements
 * and is how the browser port finds it again.
 */
export interface IElementSnapshot {
  ref: number;
  // Value of the ref attribute the extractor wrote on the live node
  stamp?: string;
  tag: string;
  type?: string;
  id?: string;
  name?: string;
  autocomplete?: string;
  placeholder?: string;
  ariaLabel?: string;
  labelText?: string;
  text?: string;
  href?: string;
  value?: string;
  role?: string;
  classes: string[];
  visible: boolean;
  disabled: boolean;
  readOnly: boolean;
  ariaHidden: boolean;
  outsideModal: boolean;
  formIndex: number | null;
}

export interface IDocumentSnapshot {
  url: string;
  title: string;
  bodyText: string;
  elements: IElementSnapshot[];
  // Form holding focus, or the first form with a visible field
  activeFormIndex: number | null;
}

export interface IElementCandidate {
  ref: number;
  intent: Intent;
  confidence: number; // 0-1
  strategy: StrategyName;
  element: IElementSnapshot;
}

export interface IDiagnostic {
  capturedAt: string;
  url?: string;
  html?: string;
  screenshot?: Buffer;
  note?: string;
  // Where the sink stored it, filled in once recorded
  reference?: string;
}

export interface IPhaseResult<T = string> {
  phase: Phase;
  outcome: Outcome;
  value?: T;
  reason?: string;
  diagnostic?: IDiagnostic;
  failureKind?: FailureKind;
}

export interface IRecord {
  readonly address: string;
  readonly secret: string;
  readonly token: string;
  readonly completedAt: string; // ISO-8601
}

export interface ISessionFailure {
  kind: FailureKind;
  phase: Phase;
  reason: string;
  diagnosticRef?: string;
}

export interface ISessionOutcome {
  sessionId: string;
  status: 'done' | 'failed';
  phase: Phase;
  identity: IIdentity;
  startedAt: number;
  endedAt: number;
  token?: string;
  record?: IRecord;
  persistenceError?: string;
  failure?: ISessionFailure;
  // PhaseResults in the order they were produced, attempts included
  history: IPhaseResult[];
}

export interface IBatchSummary {
  total: number;
  succeeded: number;
  outcomes: ISessionOutcome[];
}
