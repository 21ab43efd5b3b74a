export * from './args';
export * from './errors';
export * from './request';
export * from './scanner';
export * from './tree';
