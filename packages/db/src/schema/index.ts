export * from './spatial';
export * from './facts';
export * from './insights';
export * from './query-mapping';
export * from './distributed-locks';
