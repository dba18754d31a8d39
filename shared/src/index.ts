export * from './config';
export * from './logger';
export * from './models';
export * from './mongo';
export * from './ids';
export * from './normalize';
export * from './domains';
export * from './badDomains';
export * from './similarity';
export * from './scoring';
export * from './soql';
