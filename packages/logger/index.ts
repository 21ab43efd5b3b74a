export * from './src/constants';
export * from './src/interfaces';
export * from './src/types';
export * from './src/env';
export * from './src/helpers';
export * from './src/request-context';
export * from './src/transports/console';
export * from './src/logger';
