/**
 * Graph module
 * In-memory permission graph with typed adjacency and resource lookup.
 */

export { GraphStore, boundaryOf, type EdgeByType, type GraphStats } from './graph-store';
export { ResourceIndex, DEFAULT_BOUNDARY, compareIds, type ResourceIndexStats } from './resource-index';
