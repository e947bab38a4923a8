export { JoinGraphBuilder, buildJoinPlan } from './join-graph-builder.js';
export type { JoinGraphOptions } from './join-graph-builder.js';
export { extractTableReferences } from './on-clause.js';
