import type { Intent, StrategyName } from '../constants/index.js';
import type { IDocumentSnapshot, IElementCandidate } from '../types/index.js';
import type { IIntentProfile } from './intent-profiles.js';

export interface ILocateContext {
  /** Shape a token-display value must have to count as a text match */
  textPattern?: RegExp;
}

/**
 * Strategy interface for element discovery.
 * Implementations are pure: same snapshot in, same candidates out.
 */
export interface IElementDiscoveryStrategy {
  name: StrategyName;
  discover(
    snapshot: IDocumentSnapshot,
    profile: IIntentProfile,
    context: ILocateContext
  ): IElementCandidate[];
}

export type ILocateResult =
  | { found: true; candidate: IElementCandidate; considered: number }
  | { found: false; intent: Intent; tried: StrategyName[] };

/**
 * Element locator interface
 */
export interface IElementLocator {
  /**
   * Resolve an intent against a snapshot. Never throws for "not found".
   */
  locate(intent: Intent, snapshot: IDocumentSnapshot, context?: ILocateContext): ILocateResult;
}
