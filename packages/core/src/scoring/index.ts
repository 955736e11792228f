export { CriticalityScorer, roundScore, type CriticalityBreakdown } from './criticality-scorer';
export { PermissionStrength } from './permission-strength';
