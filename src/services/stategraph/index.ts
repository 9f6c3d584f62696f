export * from './types';
export * from './errors';
export { FieldMapping, clampedNumber, confidenceSchema } from './fieldMapping';
export type { FieldSpec, FieldMappingInput, MappedFields } from './fieldMapping';
export { parseNodeOutput, isPlainRecord } from './outputParser';
export type { ParsedOutput } from './outputParser';
export { StateStore, deepFreeze } from './stateStore';
export type { StoreSnapshot, StateStoreOptions } from './stateStore';
export { NodeRegistry, invokeNode } from './nodeRegistry';
export * from './conditions';
export { StateGraph, toEdgeRef } from './graph';
export { GraphBuilder } from './graphBuilder';
export type { EdgeOptions, GraphBuilderOptions, NodeRef } from './graphBuilder';
export { GraphEngine } from './engine';
export type { EngineOptions, RunOptions } from './engine';
export { createInteractionRequest, driveExecution, firstOptionResponder } from './interaction';
export type { DriveOptions, InteractionResponder } from './interaction';
export {
  InMemorySessionStore,
  executionSnapshotSchema,
  parseExecutionSnapshot,
} from './sessionStore';
export type { ExecutionSnapshot, SessionStore } from './sessionStore';
export { PostgresSessionStore } from './pgSessionStore';
export type { PostgresSessionStoreOptions, Queryable } from './pgSessionStore';
export { buildCustomerServiceGraph, CUSTOMER_SERVICE_GRAPH } from './flows/customerServiceGraph';
