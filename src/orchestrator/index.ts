/**
 * TubeBrief — Orchestrator Module
 */

export {
  FeedOrchestrator,
  type DiscoveryClient,
  type FeedOrchestratorDeps,
  type FeedOrchestratorOptions,
  type RunCycleOptions,
} from './feed-orchestrator';

export { sortCandidates, computeWatermarkTargets } from './selection';
