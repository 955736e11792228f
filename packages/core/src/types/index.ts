export * from './graph.types';
