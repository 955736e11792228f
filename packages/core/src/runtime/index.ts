export { TraversalBudget, unboundedBudget, type Clock, type TraversalBudgetOptions } from './budget';
export { MemoCache, type MemoCacheStats } from './memo-cache';
export { runPool, type PoolOptions } from './pool';
