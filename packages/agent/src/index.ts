export { validateScenarioConfig, formatValidationErrors } from './schema.js';
export type { ScenarioFile } from './schema.js';
export { loadScenario } from './config-loader.js';
export { BeliefStore } from './belief-store.js';
export { spiralOffset, spiralRing, SpiralSearch } from './spiral-search.js';
export type { Offset } from './spiral-search.js';
export { HonestClaimPolicy, OffsetClaimPolicy, SwapClaimPolicy, createClaimPolicy } from './claim-policy.js';
export { bucketClaims, tallyVotes, ConsensusEngine } from './consensus.js';
export type { ConsensusOptions } from './consensus.js';
export { SearchAgent } from './agent.js';
export type { SearchAgentOptions } from './agent.js';
export { MetricsEvaluator, distanceRatio } from './metrics.js';
export type { MetricsOptions } from './metrics.js';
export { buildAgentSnapshot, buildTickSnapshot, toBeliefView, toTargetSnapshots } from './snapshot.js';
export type { AgentSnapshotInput } from './snapshot.js';
export { Simulation } from './simulation.js';
export type {
  Claim,
  Belief,
  BeliefProvenance,
  Observation,
  BeliefEntry,
  BeliefChange,
  BeliefChangeKind,
  ClaimBucket,
  VoteDecision,
  VoteResult,
  CommunicationLink,
  VoteRecord,
  ConsensusRoundReport,
  ConsensusParticipant,
  ClaimContext,
  ClaimPolicy,
  AgentMode,
  BeliefView,
  AgentSnapshot,
  TargetSnapshot,
  TickSnapshot,
  TargetMetric,
  MetricsReport,
  TargetLocatedEvent,
  SimulationLifecycleEvent,
  SimulationOptions,
  Scenario,
} from './types.js';
export { DEFAULT_TICK_INTERVAL_MS, MIN_TICK_INTERVAL_MS, MAX_SNAPSHOT_HISTORY } from './constants.js';
