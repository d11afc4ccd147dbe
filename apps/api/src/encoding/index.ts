// apps/api/src/encoding/index.ts
export * from './candidates';
export * from './charsets';
export * from './codec';
export * from './decode';
export * from './errors';
export * from './heuristics';
export * from './plausibility';
