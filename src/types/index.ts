export * from './records.js';
export * from './model.js';
