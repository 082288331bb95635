export { classifyQuery, entitySubject, findLocations, layerOf, parseLocationRequest } from './intent.js';
export type { Classification, ClassifierSources, LocationMatch, LocationRequest, QueryIntent } from './intent.js';
export {
  RoutingPolicy,
  describeLocations,
  locationSegments,
  loreSegments,
  isRepeatedWalkthrough,
  walkthroughTopic,
  LORE_NOT_FOUND,
  WALKTHROUGH_ENCOURAGEMENT,
} from './routing-policy.js';
export type { AnswerOptions, AnswerSource, ConversationTurn, RoutedAnswer, RoutingSources } from './routing-policy.js';
