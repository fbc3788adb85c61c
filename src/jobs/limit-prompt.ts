import { DecisionChannel } from '../utils/decision-channel.js';
import type { LimitContext, LimitDecision, LimitDecisionPrompt, LimitKind } from './download.types.js';

/**
 * Limit decisions answered through a channel. Aborting the signal withdraws
 * the request.
 */
export class ChannelLimitPrompt implements LimitDecisionPrompt {
  readonly channel = new DecisionChannel<LimitContext, LimitDecision>('limit-decision');

  ask(_kind: LimitKind, context: LimitContext, signal?: AbortSignal): Promise<LimitDecision> {
    return this.channel.request(context, signal);
  }
}
