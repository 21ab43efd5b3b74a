export * from './src/errors/errors';
