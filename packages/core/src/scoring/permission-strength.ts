import type { PermissionStrengthConfig } from '../config/schema';
import {
  compilePattern,
  matchesCompiled,
  type CompiledPattern,
} from '../utils/pattern-matching';

/**
 * Weighs actions by how much damage they allow.
 * The first rule whose pattern matches an action decides its weight.
 */
export class PermissionStrength {
  private readonly rules: Array<{ pattern: CompiledPattern; weight: number }>;
  private readonly defaultWeight: number;

  constructor(config: PermissionStrengthConfig) {
    this.rules = config.rules.map(rule => ({ pattern: compilePattern(rule.pattern), weight: rule.weight }));
    this.defaultWeight = config.defaultWeight;
  }

  weigh(action: string): number {
    const rule = this.rules.find(candidate => matchesCompiled(candidate.pattern, action));
    return rule ? rule.weight : this.defaultWeight;
  }

  /** Strongest weight among `actions`, 0 for none */
  strength(actions: readonly string[]): number {
    return actions.reduce((max, action) => Math.max(max, this.weigh(action)), 0);
  }

  /**
   * One concrete action per rule: the rule's pattern with its wildcards
   * stripped (`admin*` gives `admin`). A bare `*` rule has none.
   */
  representativeActions(): string[] {
    const actions = new Set<string>();
    for (const { pattern } of this.rules) {
      if (pattern.literal !== '') actions.add(pattern.literal);
    }
    return [...actions];
  }
}
