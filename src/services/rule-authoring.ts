import { DecisionChannel } from '../utils/decision-channel.js';
import type { RuleAuthoring, RuleAuthoringAnswer, RuleAuthoringRequest } from './classifier.service.js';

/**
 * Rule authoring answered by whoever reads the channel, typically an operator
 * through the control API.
 */
export class ChannelRuleAuthoring implements RuleAuthoring {
  readonly channel = new DecisionChannel<RuleAuthoringRequest, RuleAuthoringAnswer>('rule-authoring');

  requestNewFilter(request: RuleAuthoringRequest): Promise<RuleAuthoringAnswer> {
    return this.channel.request(request);
  }
}
