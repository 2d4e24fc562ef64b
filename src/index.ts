// Library entry point. The MCP server lives in ./cli.ts.

export * from './hyperedge/index.js';
export * from './storage/index.js';

export { LayerRegistry } from './layers/layer-registry.js';

export {
  validate,
  evaluateEdge,
  isBlockingRule,
  type ValidateOptions,
  type ValidatorConfig,
  type Proposal,
} from './validation/validator.js';
export {
  CONTEXT_SUBJECT,
  collectActiveRules,
  collectContextConcepts,
  ruleLayers,
  type RuleSelection,
} from './validation/rule-index.js';
export * from './validation/types.js';

export {
  reason,
  DEFAULT_HOPS,
  DEFAULT_LIMIT,
  type ReasonOptions,
  type ReasoningResult,
} from './reasoning/multi-hop.js';

export {
  DEFAULT_REASONING_CONFIG,
  loadReasoningConfig,
  resolveReasoningConfig,
  type ReasoningConfig,
} from './config/reasoning-config.js';

export {
  FoundationPackSchema,
  loadFoundationPack,
  loadPack,
  PACK_FORMATS,
  parseFoundationPack,
  resolvePackFormat,
  type FoundationPack,
  type PackFormat,
  type PackLoadResult,
} from './ingestion/foundation-pack.js';
export { planToEdges, PLAN_LAYER } from './ingestion/plan.js';

export { KnowledgeBase, USER_LAYER, type OpenOptions } from './knowledge-base.js';

export {
  HyperlayerError,
  ParseError,
  InvalidArgumentError,
  StoreError,
} from './shared/errors.js';
export {
  AttributesSchema,
  DEFAULT_CONFIDENCE,
  RESERVED_ATTRIBUTE_KEYS,
  type Attributes,
  type AttributeValue,
  type DatabaseConfig,
  type RuleAttributes,
} from './shared/types.js';
