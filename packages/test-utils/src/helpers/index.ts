export * from './project.js';
export * from './sleep.js';
export * from './setup.js';
