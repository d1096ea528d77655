export { isPdfBytes, isPdfLikeResponse, isPdfLikeUrl, PDF_CONTENT_TYPES } from './classifier.js';
export { CaptureSink, type SinkWriter } from './sink.js';
export { EpisodeHistory, pickRecoveryUrl, type HistoryEntry, type HistorySource } from './history.js';
export { attachInterceptor, type InterceptorHandle, type InterceptorOptions } from './interceptor.js';
export { STRATEGY_NAMES, type StrategyName } from './strategies.js';
export {
  runActiveStrategies,
  runActiveStrategyChain,
  runStrategyChain,
  type ActiveStrategyOptions,
  type ChainReport,
  type ChainStep,
} from './chain.js';
export { forceRecover, harvestAndRecover, harvestOpenPages, type RecoveryOptions } from './recovery.js';
export { CaptureEpisode, type CaptureEpisodeOptions, type CaptureOutcome } from './episode.js';
