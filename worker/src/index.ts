export * from './types';
export * from './judge';
export * from './pipeline';
export * from './batch';
export * from './sources';
export * from './providers/openaiClient';
export * from './providers/salesforceClient';
export * from './providers/mongoSource';
