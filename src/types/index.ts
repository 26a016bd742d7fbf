export * from './event.js';
export * from './scalar.js';
export * from './predicate.js';
