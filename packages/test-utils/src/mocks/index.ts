export * from './logger.js';
export * from './commandRunner.js';
