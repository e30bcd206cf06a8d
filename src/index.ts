export type * from "./types/contracts.js";
export type * from "./types/llm.js";
export type * from "./types/artifacts.js";

export { resolveReferences, type ResolvedRequest } from "./prompt/resolver.js";
export { coerceResponse, balanceJson, isTextResult, resultToJson, resultToString } from "./prompt/coerce.js";
export { extractRole, snakeCase, stepName } from "./prompt/role.js";

export {
  openArtifactStore,
  saveArtifact,
  getArtifact,
  getArtifactByKey,
  getArtifactMetadata,
  queryArtifacts,
  listTopics,
  listNames,
  deleteArtifact,
  artifactLookup,
  describeStore,
  exportStore,
  normalizeTopic,
  namespaceOf,
  artifactKey,
  type StoreExport,
} from "./blackboard/index.js";

export { compileChain, mentionsJson } from "./orchestrator/compiler.js";
export { withRetry, DEFAULT_RETRY_POLICY, RetriesExhaustedError, type RetryPolicy, type RetryHooks } from "./orchestrator/retry.js";
export { runChain, type RunChainOptions } from "./orchestrator/run.js";
export { runFanOut, lengthEvaluator, type Evaluator, type Evaluation, type FanOutOptions, type FanOutResult } from "./orchestrator/fanout.js";
export { settleWithLimit, type Settled } from "./orchestrator/pool.js";
export { tallyUsage, estimateCost, DEFAULT_PRICING, type UsageTally, type Pricing } from "./orchestrator/budget.js";
export { formatDelimited, writeDelimitedFile, renderMarkdownLog, writeMarkdownLog } from "./orchestrator/materialize.js";

export { createProviderBackend, createProviderBackends, type ProviderBackendConfig } from "./llm/backend.js";
export { createMockProvider, type MockReply } from "./llm/mock.js";

export { loadConfig, loadConfigFromDotenv, type PromptlinkConfig } from "./config/index.js";
export { ChainStoppedError, StepFailedError, PersistFailedError, ArtifactStoreError, type PartialChain } from "./errors.js";
