export {
  Dispatcher,
  type DispatcherOptions,
  type DispatchOptions,
  type ReasoningRequest,
} from './dispatcher.js';
