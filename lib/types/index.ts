export type * from './ImageUnit.js';
export type * from './BuildRecord.js';
export type * from './BuildPlan.js';
export type * from './BuildInfo.js';
export type * from './RunSummary.js';
