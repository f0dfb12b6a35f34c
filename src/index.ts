// src/index.ts

export { RepoWatcher } from './watcher';
export type { RepoWatcherOverrides } from './watcher';
export { main } from './cli';
export { loadSettings, validateSettings, SettingsSchema } from './config/ConfigValidator';
export type { Settings, SettingsOverrides } from './config/ConfigValidator';

export { CheckpointStore, DEFAULT_STATE_PATH } from './core/checkpoint/CheckpointStore';
export type { CheckpointFileSystem } from './core/checkpoint/CheckpointStore';
export { selectUnseen, compareItems } from './core/checkpoint/WatermarkSelector';
export { advanceLane, withLane } from './core/checkpoint/CheckpointAdvancer';
export { isBootstrapPending, bootstrapLane } from './core/checkpoint/BootstrapPolicy';
export { parseInstant, formatInstant } from './core/checkpoint/instant';
export { emptyCheckpoint, emptyLane } from './core/checkpoint/types';
export type { Checkpoint, LaneCheckpoint, LaneName } from './core/checkpoint/types';
export type {
  TimestampedItem,
  WatchedItem,
  PullRequest,
  PullRequestDetail,
  Release,
} from './core/normalizer/types';

export { DeliveryPipeline } from './pipeline/DeliveryPipeline';
export type { PipelineDeps } from './pipeline/DeliveryPipeline';
export { pullRequestLane, releaseLane } from './pipeline/lanes';
export {
  renderNotification,
  buildPullRequestMessage,
  buildReleaseMessage,
} from './pipeline/messages';
export type {
  Lane,
  RunResult,
  RunOutcome,
  CheckpointRepository,
  PipelineOptions,
} from './pipeline/types';

export { GitHubSource } from './connectors/github/GitHubSource';
export { DiscordNotifier } from './connectors/discord/DiscordNotifier';
export {
  OpenAISummarizer,
  FALLBACK_PULL_REQUEST_SUMMARY,
  FALLBACK_RELEASE_SUMMARY,
} from './connectors/openai/OpenAISummarizer';
export type { ItemSource, Summarizer, Notifier, ItemSummary } from './connectors/types';

// Export error classes for error handling
export {
  WatchError,
  ConfigError,
  CorruptStateError,
  PersistenceError,
  SourceFetchError,
  SummarizeError,
  DeliveryError,
  UnexpectedPayloadError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
} from './utils/errors';
