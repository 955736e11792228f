import { z } from 'zod';
import type { Condition } from '../types';

/**
 * Zod schemas for graph snapshots
 * A snapshot lists nodes first, then edges; JSON, YAML and NDJSON share them.
 */

// =============================================================================
// Base Schemas
// =============================================================================

const IdSchema = z.string().min(1, 'Id cannot be empty');

const ContextValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

const NodeKindSchema = z.enum(['Identity', 'Group', 'Role', 'Resource', 'Boundary']);

const EffectSchema = z.preprocess(
  value => (typeof value === 'string' ? value.toUpperCase() : value),
  z.enum(['ALLOW', 'DENY']),
);

// =============================================================================
// Conditions
// =============================================================================

const TaggedConditionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('equals'), key: IdSchema, value: ContextValueSchema }),
  z.object({ kind: z.literal('notEquals'), key: IdSchema, value: ContextValueSchema }),
  z.object({ kind: z.literal('in'), key: IdSchema, values: z.array(ContextValueSchema) }),
  z.object({ kind: z.literal('prefix'), key: IdSchema, prefix: z.string() }),
  z.object({ kind: z.literal('exists'), key: IdSchema }),
  z.object({
    kind: z.literal('timeWindow'),
    key: IdSchema.optional(),
    notBefore: z.string().optional(),
    notAfter: z.string().optional(),
  }),
]);

/**
 * `{ "principal.boundary": "prod" }` is shorthand for an equals condition;
 * an array value becomes an `in` condition.
 */
const ShorthandConditionsSchema = z
  .record(z.union([ContextValueSchema, z.array(ContextValueSchema)]))
  .transform((entries): Condition[] =>
    Object.entries(entries).map(([key, value]): Condition =>
      Array.isArray(value) ? { kind: 'in', key, values: value } : { kind: 'equals', key, value },
    ),
  );

export const ConditionsSchema = z.union([z.array(TaggedConditionSchema), ShorthandConditionsSchema]);

// =============================================================================
// Nodes and Edges
// =============================================================================

export const PolicyStatementSchema = z.object({
  id: z.string().optional(),
  effect: EffectSchema,
  actions: z.array(z.string()).min(1, 'At least one action is required'),
  // Pattern syntax is checked at resolution time, where a bad statement is skipped
  resource: z.string(),
  conditions: ConditionsSchema.optional(),
});

export const SnapshotNodeSchema = z.object({
  id: IdSchema,
  kind: NodeKindSchema,
  attributes: z.record(AttributeValueSchema).optional(),
});

export const SnapshotEdgeSchema = z.discriminatedUnion('type', [
  z.object({ id: z.string().optional(), type: z.literal('MEMBER_OF'), from: IdSchema, to: IdSchema }),
  z.object({ id: z.string().optional(), type: z.literal('CONTAINS'), from: IdSchema, to: IdSchema }),
  z.object({
    id: z.string().optional(),
    type: z.literal('TRUSTS'),
    from: IdSchema,
    to: IdSchema,
    conditions: ConditionsSchema.optional(),
    assumeRole: IdSchema.optional(),
  }),
  z.object({
    id: z.string().optional(),
    type: z.literal('GRANTS'),
    from: IdSchema,
    statement: PolicyStatementSchema,
  }),
]);

export const SnapshotSchema = z.object({
  version: z.literal(1).default(1),
  nodes: z.array(SnapshotNodeSchema).default([]),
  edges: z.array(SnapshotEdgeSchema).default([]),
});

// =============================================================================
// Type Inference
// =============================================================================

export type Snapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotNode = z.infer<typeof SnapshotNodeSchema>;
export type SnapshotEdge = z.infer<typeof SnapshotEdgeSchema>;
