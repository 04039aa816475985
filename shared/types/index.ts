export * from './snapshot';
export * from './fragmentation';
export * from './loadBalance';
export * from './settings';
