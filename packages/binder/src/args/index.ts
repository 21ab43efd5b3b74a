export * from './argument-multimap';
export * from './args-parser';
export * from './constants';
export * from './interfaces';
export * from './types';
