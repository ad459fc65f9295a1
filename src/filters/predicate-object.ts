import { combine } from './combine.js';
import { between } from './range.js';
import { anyPropertyContainsText } from './text.js';

/**
 * Predicate builders, for callers that want the composed tree itself rather
 * than a filtered data source.
 *
 * @example
 * predicates.combine('or', [isJohn, isOnion])
 */
export const predicates = {
  combine,
  between,
  anyPropertyContainsText,
};
