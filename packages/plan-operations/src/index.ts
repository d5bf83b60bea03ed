export * from './types/index.js';
export { PlanBuilder, summarize } from './builder.js';
export type { ChangeOptions, PlanBuilderOptions } from './builder.js';
export {
  REF_PLACEHOLDER_PREFIX,
  formatRefPlaceholder,
  isRefPlaceholder,
  parseRefPlaceholder,
} from './refs.js';
export type { ParsedRefPlaceholder } from './refs.js';
