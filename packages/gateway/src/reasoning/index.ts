export * from './reasoning.js';
