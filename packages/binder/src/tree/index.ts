export * from './bracket-key';
export * from './canonical-tree';
export * from './constants';
export * from './interfaces';
export * from './serializer';
export * from './tree-builder';
export * from './types';
export * from './unmarshal-args';
