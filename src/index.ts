export * from './core/index';
export { default } from './core/index';
export type * from './types/Types';
