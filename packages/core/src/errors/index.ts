/**
 * @fileoverview Error classes for the blast radius engine
 */

export type BlastRadiusErrorCode =
  | 'DUPLICATE_NODE'
  | 'DANGLING_EDGE'
  | 'INVALID_EDGE'
  | 'GRAPH_SEALED'
  | 'NOT_FOUND'
  | 'RESOLUTION'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'CONFIG_LOAD'
  | 'CONFIG_VALIDATION'
  | 'SNAPSHOT_PARSE';

/**
 * Base error class for the engine
 */
export class BlastRadiusError extends Error {
  constructor(
    message: string,
    public readonly code: BlastRadiusErrorCode,
  ) {
    super(message);
    this.name = 'BlastRadiusError';
  }
}

// =============================================================================
// Graph construction (fatal)
// =============================================================================

export class DuplicateNodeError extends BlastRadiusError {
  constructor(public readonly nodeId: string) {
    super(`Node already exists: ${nodeId}`, 'DUPLICATE_NODE');
    this.name = 'DuplicateNodeError';
  }
}

export class DanglingEdgeError extends BlastRadiusError {
  constructor(
    public readonly edgeType: string,
    public readonly missingNodeId: string,
  ) {
    super(`${edgeType} edge references unknown node: ${missingNodeId}`, 'DANGLING_EDGE');
    this.name = 'DanglingEdgeError';
  }
}

/**
 * Edge endpoints exist but have kinds the edge type does not connect
 */
export class InvalidEdgeError extends BlastRadiusError {
  constructor(
    public readonly edgeType: string,
    message: string,
  ) {
    super(`Invalid ${edgeType} edge: ${message}`, 'INVALID_EDGE');
    this.name = 'InvalidEdgeError';
  }
}

export class GraphSealedError extends BlastRadiusError {
  constructor() {
    super('Graph is sealed and cannot be modified', 'GRAPH_SEALED');
    this.name = 'GraphSealedError';
  }
}

// =============================================================================
// Per-identity (isolated)
// =============================================================================

export class NotFoundError extends BlastRadiusError {
  constructor(
    public readonly nodeId: string,
    public readonly expectedKind?: string,
  ) {
    super(
      expectedKind ? `${expectedKind} not found: ${nodeId}` : `Node not found: ${nodeId}`,
      'NOT_FOUND',
    );
    this.name = 'NotFoundError';
  }
}

export type ResolutionFailure = 'PRINCIPAL_NOT_FOUND' | 'MALFORMED_STATEMENT';

export class ResolutionError extends BlastRadiusError {
  constructor(
    message: string,
    public readonly reason: ResolutionFailure,
    public readonly statementId?: string,
  ) {
    super(message, 'RESOLUTION');
    this.name = 'ResolutionError';
  }
}

/**
 * Per-identity time budget exceeded
 */
export class TimeoutError extends BlastRadiusError {
  constructor(
    public readonly identityId: string,
    public readonly budgetMs: number,
  ) {
    super(`Resolution of ${identityId} exceeded ${budgetMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends BlastRadiusError {
  constructor(message = 'Run cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

// =============================================================================
// Configuration and snapshot input
// =============================================================================

export class ConfigLoadError extends BlastRadiusError {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message, 'CONFIG_LOAD');
    this.name = 'ConfigLoadError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends BlastRadiusError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[],
  ) {
    super(message, 'CONFIG_VALIDATION');
    this.name = 'ConfigValidationError';
  }
}

export class SnapshotParseError extends BlastRadiusError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[],
  ) {
    super(message, 'SNAPSHOT_PARSE');
    this.name = 'SnapshotParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
