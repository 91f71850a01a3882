import type { Bounds, Position, SimulationConfig } from '@swarmgrid/core';

/** One agent's reported position for one target, sent during a consensus exchange. */
export interface Claim {
  readonly targetId: number;
  readonly position: Position;
  readonly reporterId: number;
  /** Tick at which the claim was exchanged. */
  readonly tick: number;
}

/** Whether a trusted belief's winning bucket contained the agent's own observation. */
export type BeliefProvenance = 'observed' | 'received';

/** An agent's currently trusted position estimate for a target. */
export interface Belief {
  readonly targetId: number;
  readonly position: Position;
  /** Size of the bucket that won the last vote for this belief. */
  readonly confidence: number;
  readonly updatedTick: number;
  readonly provenance: BeliefProvenance;
}

/** The latest direct sensor reading of a target. May be stale. */
export interface Observation {
  readonly targetId: number;
  readonly position: Position;
  readonly tick: number;
}

/** Structural per-target slot of a Belief Store; both halves may be unset. */
export interface BeliefEntry {
  readonly targetId: number;
  readonly trusted: Belief | null;
  readonly observation: Observation | null;
}

/** How a vote changed the receiver's belief. */
export type BeliefChangeKind = 'adopted' | 'reinforced' | 'replaced';

/** Record of a belief update produced by a consensus vote. */
export interface BeliefChange {
  readonly agentId: number;
  readonly targetId: number;
  readonly kind: BeliefChangeKind;
  readonly previous: Position | null;
  readonly current: Position;
  readonly confidence: number;
  readonly tick: number;
}

/** Group of claims within tolerance of the bucket's seed claim. */
export interface ClaimBucket {
  /** Position of the seed claim. */
  readonly position: Position;
  readonly votes: number;
  readonly reporters: readonly number[];
}

/** Outcome of one receiver's majority vote for one target. */
export type VoteDecision = 'winner' | 'tie' | 'no-quorum';

export interface VoteResult {
  readonly targetId: number;
  readonly decision: VoteDecision;
  /** Winning bucket; null on a tie or below quorum. */
  readonly winner: ClaimBucket | null;
  /** All buckets, largest first. */
  readonly buckets: readonly ClaimBucket[];
  /** Whether the receiver's own observation sits in the winning bucket. */
  readonly includesSelf: boolean;
}

/** Two agents that exchanged claims this tick. `a < b`. */
export interface CommunicationLink {
  readonly a: number;
  readonly b: number;
}

/** Flattened vote outcome recorded in a round report. */
export interface VoteRecord {
  readonly agentId: number;
  readonly targetId: number;
  readonly decision: VoteDecision;
  /** Votes in the top bucket. */
  readonly topVotes: number;
  readonly bucketCount: number;
}

/** Everything observable about one consensus phase. */
export interface ConsensusRoundReport {
  readonly tick: number;
  readonly links: readonly CommunicationLink[];
  readonly votes: readonly VoteRecord[];
  readonly changes: readonly BeliefChange[];
}

/**
 * What the consensus engine needs from an agent. Claims are the only thing
 * that crosses between participants.
 */
export interface ConsensusParticipant {
  readonly id: number;
  getPosition(): Position;
  /** Outgoing claims, one per target the participant has any belief for. */
  composeClaims(tick: number): readonly Claim[];
  /** The participant's own observation memory, as one vote per observed target. */
  selfClaims(tick: number): readonly Claim[];
  /** Apply every vote outcome, won or not, to the participant's own state. */
  applyVote(result: VoteResult, tick: number): BeliefChange | null;
}

/** Context a claim policy may consult when fabricating a position. */
export interface ClaimContext {
  readonly bounds: Bounds;
  /** The sender's own claimable positions, by target id. */
  readonly known: ReadonlyMap<number, Position>;
}

/**
 * Decides the position an agent reports for a target. Honest agents report
 * what they hold; a Byzantine agent substitutes a fabricated position.
 */
export interface ClaimPolicy {
  readonly fabricates: boolean;
  report(targetId: number, believed: Position, context: ClaimContext): Position;
}

/**
 * What drives an agent's next move: its home sweep, a walk to a target it
 * trusts or has seen, or a detour around an unconfirmed lead.
 */
export type AgentMode = 'search' | 'pursuit' | 'detour';

/** Display view of one belief slot. */
export interface BeliefView {
  readonly targetId: number;
  readonly position: Position | null;
  readonly confidence: number;
  readonly updatedTick: number | null;
  readonly provenance: BeliefProvenance | null;
}

/** Frozen per-tick view of one agent. */
export interface AgentSnapshot {
  readonly agentId: number;
  readonly position: Position;
  readonly start: Position;
  readonly isByzantine: boolean;
  readonly mode: AgentMode;
  readonly pursuedTargetId: number | null;
  readonly beliefs: readonly BeliefView[];
  readonly recentPositions: readonly Position[];
  /** Cells moved since the start of the run. */
  readonly pathLength: number;
}

/** Frozen per-tick view of one target. */
export interface TargetSnapshot {
  readonly targetId: number;
  readonly position: Position;
}

/** Read-only snapshot handed to display, reporting and metrics consumers. */
export interface TickSnapshot {
  readonly tick: number;
  readonly stepBudget: number;
  readonly complete: boolean;
  readonly bounds: Bounds;
  readonly agents: readonly AgentSnapshot[];
  readonly targets: readonly TargetSnapshot[];
  /** Running competitive ratio; null until it is defined. */
  readonly competitiveRatio: number | null;
}

/** Search-efficiency record for one target. */
export interface TargetMetric {
  readonly targetId: number;
  readonly locatedTick: number | null;
  readonly locatedBy: number | null;
  readonly findPoint: Position | null;
  /** Cells moved by the whole fleet when the target was first reached. */
  readonly actualDistance: number | null;
  /** Shortest start-to-find-point distance over the whole fleet. */
  readonly optimalDistance: number | null;
  readonly ratio: number | null;
  /** Honest agents holding any trusted belief for this target. */
  readonly honestHolders: number;
  /** Honest agents whose trusted belief lies within tolerance of the truth. */
  readonly accurateHolders: number;
  /** First tick at which at least `quorum` honest agents held an accurate belief. */
  readonly convergedTick: number | null;
}

export interface MetricsReport {
  readonly tick: number;
  readonly competitiveRatio: number | null;
  readonly locatedCount: number;
  readonly targetCount: number;
  /** Cells moved by the whole fleet so far. */
  readonly fleetDistance: number;
  readonly targets: readonly TargetMetric[];
}

/** Emitted when a target is reached for the first time. */
export interface TargetLocatedEvent {
  readonly targetId: number;
  readonly agentId: number;
  readonly tick: number;
  readonly position: Position;
}

/** Emitted on simulation lifecycle transitions. */
export interface SimulationLifecycleEvent {
  readonly event: 'started' | 'paused' | 'completed' | 'reset' | 'error';
  readonly tick: number;
  readonly timestamp: number;
  readonly reason?: string;
}

/** Options for constructing a Simulation. */
export interface SimulationOptions {
  /** Snapshots retained in the history ring buffer. */
  readonly historySize?: number;
}

/** A loaded scenario file. */
export interface Scenario {
  readonly name: string;
  readonly description?: string;
  readonly config: SimulationConfig;
}
