/**
 * Policy module
 * Statement evaluation with deny-overrides-allow and tagged conditions.
 */

export { PolicyEvaluator, type EvaluationRequest, type EvaluationResult } from './evaluator';
export {
  evaluateCondition,
  evaluateConditions,
  validateCondition,
  REQUEST_TIME_KEY,
} from './conditions';
