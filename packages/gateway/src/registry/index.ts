export { ModelRegistry } from './registry.js';
