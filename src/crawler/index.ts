export { FrontierDispatcher } from './dispatcher.js';
export type { DispatcherConfig, DispatchResult, VisitFn } from './dispatcher.js';
