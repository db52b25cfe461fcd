export type { InvocationConfig, InvocationInput, Environment } from "./config/schema.js";
export { DEFAULT_MODEL, DEFAULT_MAX_TOKENS, invocationSchema } from "./config/schema.js";
export { loadEnvironment, resolveInvocation } from "./config/loader.js";
export { mutateProject, type MutatorDependencies } from "./mutator/index.js";
export {
  MutatorError,
  ConfigurationError,
  ExternalToolError,
  StreamError,
  GitCommandError,
  formatMutatorError,
} from "./mutator/errors.js";
export type {
  CompletionSource,
  CompletionOptions,
  FileTask,
  GeneratedFile,
  GitRunner,
  MutationResult,
  MutationSummary,
  ProgressEvent,
  ProgressSink,
} from "./mutator/types.js";
export { AnthropicCompletionSource } from "./utils/claude.js";
export { runGit } from "./utils/git.js";

