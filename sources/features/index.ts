/**
 * Feature facades built on the mutation coordinator
 */

export * from './notifications';
export * from './feed';
export * from './reviews';
export * from './profile';
