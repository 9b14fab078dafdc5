/**
 * Centralized constants for regflow
 * Intent names, phase names and outcome labels live here so that log lines,
 * diagnostics keys and reports all use the same strings.
 */

// Semantic UI roles the locator can resolve
export const INTENTS = {
  EMAIL_FIELD: 'email-field',
  PASSWORD_FIELD: 'password-field',
  CONFIRM_FIELD: 'confirm-field',
  SUBMIT_BUTTON: 'submit-button',
  VERIFICATION_LINK: 'verification-link',
  TOKEN_DISPLAY: 'token-display',
  SIGNUP_LINK: 'signup-link',
  TOKEN_REVEAL: 'token-reveal',
} as const;

export type Intent = (typeof INTENTS)[keyof typeof INTENTS];

export const ALL_INTENTS: readonly Intent[] = Object.values(INTENTS);

// Phase state machine states
export const PHASES = {
  INIT: 'Init',
  REGISTERING: 'Registering',
  AWAITING_VERIFICATION: 'AwaitingVerification',
  LOGGING_IN: 'LoggingIn',
  EXTRACTING_TOKEN: 'ExtractingToken',
  PERSISTING: 'Persisting',
  DONE: 'Done',
  FAILED: 'Failed',
} as const;

export type Phase = (typeof PHASES)[keyof typeof PHASES];

// Order in which the non-terminal phases run
export const PHASE_SEQUENCE = [
  PHASES.INIT,
  PHASES.REGISTERING,
  PHASES.AWAITING_VERIFICATION,
  PHASES.LOGGING_IN,
  PHASES.EXTRACTING_TOKEN,
  PHASES.PERSISTING,
] as const;

// PhaseResult / interaction outcome labels
export const OUTCOMES = {
  SUCCESS: 'success',
  RETRY: 'retry',
  FATAL: 'fatal',
} as const;

export type Outcome = (typeof OUTCOMES)[keyof typeof OUTCOMES];

// Why a session ended in Failed
export const FAILURE_KINDS = {
  PHASE: 'phase',
  MAILBOX_AUTH: 'mailbox-auth',
  INFRASTRUCTURE: 'infrastructure',
  CANCELLED: 'cancelled',
} as const;

export type FailureKind = (typeof FAILURE_KINDS)[keyof typeof FAILURE_KINDS];

// Locator strategy names, in rank order
export const STRATEGY_NAMES = {
  ATTRIBUTE: 'ATTRIBUTE_MATCH',
  LABEL: 'LABEL_ASSOCIATION',
  STRUCTURAL: 'STRUCTURAL',
  VISIBLE_TEXT: 'VISIBLE_TEXT',
} as const;

export type StrategyName = (typeof STRATEGY_NAMES)[keyof typeof STRATEGY_NAMES];

// Confidence band per strategy: [min, max). Bands never overlap, so a
// stronger strategy always outranks a weaker one.
export const CONFIDENCE_BANDS: Record<StrategyName, { min: number; max: number }> = {
  [STRATEGY_NAMES.ATTRIBUTE]: { min: 0.8, max: 1.0 },
  [STRATEGY_NAMES.LABEL]: { min: 0.6, max: 0.8 },
  [STRATEGY_NAMES.STRUCTURAL]: { min: 0.4, max: 0.6 },
  [STRATEGY_NAMES.VISIBLE_TEXT]: { min: 0.2, max: 0.4 },
};

// Result log format
export const RECORD_FORMAT = {
  DELIMITER: ',',
  TERMINATOR: ';',
  LINE_END: '\n',
} as const;

// Dialog messages the webmail accepts (third-party redirect / leaving-site notices)
export const ACCEPTED_DIALOG_PATTERNS: readonly RegExp[] = [
  /第三方网站跳转/,
  /即将离开/,
  /leaving (this|the) site/i,
  /third[- ]party (site|website)/i,
  /external (site|link)/i,
];

// Error messages
export const ERROR_MESSAGES = {
  SESSION_ALREADY_ACTIVE: 'A session is already running on this engine instance',
  BROWSER_LAUNCH_FAILED: (engine: string, reason: string) =>
    `Browser engine "${engine}" failed to start: ${reason}`,
  ELEMENT_NOT_LOCATED: (intent: string) => `Could not locate ${intent}`,
  STALE_REFERENCE: (tag: string, ref: number) => `stale element reference: ${tag}#${ref} is no longer on the page`,
  READ_BACK_MISMATCH: (intent: string, attempts: number) =>
    `Value read back from ${intent} did not match after ${attempts} attempts`,
  NO_OBSERVABLE_EFFECT: (intent: string) => `Activating ${intent} produced no observable change`,
  CANCELLED: 'Session cancelled',
  PHASE_TIMEOUT: (phase: string, ms: number) => `${phase} exceeded its ${ms}ms budget`,
  MAILBOX_NOT_AUTHENTICATED: 'Mailbox session state is absent or expired; run the interactive mailbox login',
  NO_VERIFICATION_LINK: (address: string) => `No verification message for ${address} before the deadline`,
  MALFORMED_TOKEN: (value: string) => `Extracted token "${value}" does not match the expected format`,
  SIGNUP_NOT_CONFIRMED: 'Signup did not reach the post-signup page',
  DASHBOARD_NOT_REACHED: 'Login did not reach the dashboard',
} as const;
