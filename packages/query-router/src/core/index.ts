export {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';
export { TextLLMComponent } from './text-llm-component';
export {
  QueryRouter,
  type BackendHealth,
  type QueryRequest,
  type QueryRouterOptions,
} from './query-router';
export {
  createQueryRouter,
  type QueryRouterDependencies,
} from './create-query-router';
