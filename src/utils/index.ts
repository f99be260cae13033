export * from './constants';
export * from './error-factory';
