export * from './types';
export * from './core/errors';
export * from './core/logger';
export * from './core/ron';
export * from './core/ronWriter';
export * from './core/schema';
export * from './core/codec';
export * from './core/tree';
export * from './core/validate';
export * from './io/loadLayout';
export * from './state/store';
