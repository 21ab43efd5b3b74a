export * from './coercion';
export * from './constants';
export * from './enums';
export * from './field.decorator';
export * from './interfaces';
export * from './metadata-storage';
export * from './scan-args';
export * from './types';
