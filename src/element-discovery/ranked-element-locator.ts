import type { Intent } from '../constants/index.js';
import type { IDocumentSnapshot } from '../types/index.js';
import type { ILogger } from '../infra/logger.js';
import type { IElementDiscoveryStrategy, IElementLocator, ILocateContext, ILocateResult } from './index.js';
import { INTENT_PROFILES } from './intent-profiles.js';
import { AttributeMatchStrategy } from './strategies/attribute-strategy.js';
import { LabelAssociationStrategy } from './strategies/label-strategy.js';
import { StructuralStrategy } from './strategies/structural-strategy.js';
import { VisibleTextStrategy } from './strategies/visible-text-strategy.js';

export function createDefaultStrategies(): IElementDiscoveryStrategy[] {
  return [
    new AttributeMatchStrategy(),
    new LabelAssociationStrategy(),
    new StructuralStrategy(),
    new VisibleTextStrategy(),
  ];
}

/**
 * Ranked-pipeline element locator
 * Runs strategies in order and stops at the first one that yields anything;
 * within that strategy the highest confidence wins, then document order.
 */
export class RankedElementLocator implements IElementLocator {
  constructor(
    private strategies: IElementDiscoveryStrategy[] = createDefaultStrategies(),
    private logger?: ILogger
  ) {
    if (strategies.length === 0) {
      throw new Error('At least one discovery strategy is required');
    }
  }

  locate(intent: Intent, snapshot: IDocumentSnapshot, context: ILocateContext = {}): ILocateResult {
    const profile = INTENT_PROFILES[intent];
    const tried: IElementDiscoveryStrategy['name'][] = [];

    for (const strategy of this.strategies) {
      tried.push(strategy.name);
      const candidates = strategy.discover(snapshot, profile, context);
      if (candidates.length === 0) continue;

      const ranked = [...candidates].sort((a, b) => b.confidence - a.confidence || a.ref - b.ref);
      const best = ranked[0];

      this.logger?.debug(`Located ${intent}`, {
        strategy: strategy.name,
        ref: best.ref,
        tag: best.element.tag,
        confidence: best.confidence,
        considered: candidates.length,
      });

      return { found: true, candidate: best, considered: candidates.length };
    }

    this.logger?.debug(`No element for ${intent}`, { url: snapshot.url, tried });
    return { found: false, intent, tried };
  }
}
