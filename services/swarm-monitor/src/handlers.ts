/**
 * Paper Handlers
 *
 * Handlers that only account an opportunity's net estimated value. They
 * build, sign and send nothing.
 */

import { OPPORTUNITY_CATEGORIES } from '@swarmwatch/types';
import type { HandlerRegistry, Opportunity, OpportunityCategory, OpportunityHandler } from '@swarmwatch/types';
import { NullLogger } from '@swarmwatch/core';
import type { ILogger } from '@swarmwatch/core';

export interface PaperHandlerOptions {
  /** Categories to register (default: all) */
  categories?: readonly OpportunityCategory[];
  logger?: ILogger;
}

export function paperHandler(logger: ILogger = new NullLogger()): OpportunityHandler {
  return async (opportunity: Opportunity): Promise<number> => {
    const profit = opportunity.estimatedValue - opportunity.cost;
    logger.debug('Paper execution', {
      opportunityId: opportunity.id,
      category: opportunity.category,
      profit,
    });
    return profit;
  };
}

export function createPaperHandlers(options: PaperHandlerOptions = {}): HandlerRegistry {
  const registry: HandlerRegistry = {};
  const handler = paperHandler(options.logger);
  for (const category of options.categories ?? OPPORTUNITY_CATEGORIES) {
    registry[category] = handler;
  }
  return registry;
}
