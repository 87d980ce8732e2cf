export * from './contact.js';
export * from './dedup.js';
export * from './merge.js';
export * from './effect.js';
export * from './store.js';
