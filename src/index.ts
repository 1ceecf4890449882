/**
 * statechart-runtime
 * Hierarchical, concurrent state machines with UML statechart semantics
 *
 * @packageDocumentation
 */

export * from './types';
export * from './errors';
export * from './event';
export * from './context';
export * from './transition';
export * from './state';
export * from './composite-state';
export * from './history-state';
export * from './pseudostates';
export * from './resolution';
export * from './defer-state';
export * from './timeout-state';
export * from './parallel-state';
export * from './submachine-state';
export * from './event-deferrer';
export * from './event-queue';
export * from './timer-wheel';
export * from './config';
export * from './logger';
export * from './monitoring';
export * from './observers';
export * from './builder';
export * from './workflow-builder';
export * from './conditions';
export * from './mermaid-generator';

// Main exports
export * from './state-machine';
