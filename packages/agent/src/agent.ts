import { distance, findTargetsWithin, isInBounds, samePosition, stepToward } from '@swarmgrid/core';
import type { Bounds, Position, Target, WorldSnapshot } from '@swarmgrid/core';
import { BeliefStore } from './belief-store.js';
import { buildAgentSnapshot } from './snapshot.js';
import { SpiralSearch } from './spiral-search.js';
import type {
  AgentMode,
  AgentSnapshot,
  Belief,
  BeliefChange,
  Claim,
  ClaimPolicy,
  ConsensusParticipant,
  VoteResult,
} from './types.js';

export interface SearchAgentOptions {
  readonly id: number;
  readonly start: Position;
  readonly bounds: Bounds;
  readonly targetIds: readonly number[];
  /** Decides what this agent reports; a fabricating policy makes it Byzantine. */
  readonly claimPolicy: ClaimPolicy;
  /** A vote winner within this distance of the current belief reinforces it. */
  readonly tolerance: number;
  /** Recent positions kept for display. */
  readonly pathHistoryLength: number;
  /** Cells between the rings of the home sweep. */
  readonly sweepSpacing: number;
}

/** A target and the cell the agent is walking to for it. */
interface Heading {
  readonly targetId: number;
  readonly position: Position;
}

function leadKey(targetId: number, position: Position): string {
  return `${String(targetId)}@${String(position.x)},${String(position.y)}`;
}

/**
 * One fleet member: observes, takes part in consensus, then moves.
 *
 * Each move takes the first of:
 * - the nearest trusted belief not yet reached;
 * - the nearest target it has seen but does not yet trust, where it then
 *   waits so peers in range hear its claim;
 * - a detour spiral around the nearest lead, a claimed cell that missed
 *   quorum for a target it has no belief for;
 * - its home sweep, a spaced spiral around the start that passes over
 *   cells it has already sensed.
 *
 * Its position and Belief Store are mutated only by its own methods.
 *
 * @param options - Identity, start cell, grid bounds and claim policy.
 */
export class SearchAgent implements ConsensusParticipant {
  readonly id: number;
  readonly isByzantine: boolean;
  private readonly start: Position;
  private readonly bounds: Bounds;
  private readonly beliefs: BeliefStore;
  private readonly spiral: SpiralSearch;
  private detour: SpiralSearch | null = null;
  private readonly claimPolicy: ClaimPolicy;
  private readonly tolerance: number;
  private readonly pathHistoryLength: number;

  private position: Position;
  private recentPositions: Position[];
  private pathLength = 0;
  private pursuedTargetId: number | null = null;
  /** Cell at which each target was last reached. */
  private readonly reached: Map<number, Position> = new Map();
  /** Unconfirmed claimed cell per target, followed while nothing is trusted. */
  private readonly leads: Map<number, Position> = new Map();
  /** Leads sensed empty; never followed again. */
  private readonly refuted: Set<string> = new Set();
  /** Cells that have been within sensor range, row-major. */
  private readonly swept: boolean[];

  constructor(options: SearchAgentOptions) {
    this.id = options.id;
    this.start = options.start;
    this.bounds = options.bounds;
    this.claimPolicy = options.claimPolicy;
    this.isByzantine = options.claimPolicy.fabricates;
    this.tolerance = options.tolerance;
    this.pathHistoryLength = options.pathHistoryLength;
    this.beliefs = new BeliefStore(options.targetIds);
    this.swept = new Array<boolean>(options.bounds.width * options.bounds.height).fill(false);
    this.spiral = new SpiralSearch(options.start, options.bounds, {
      spacing: options.sweepSpacing,
      isSwept: (cell) => this.isSwept(cell),
    });
    this.position = options.start;
    this.recentPositions = [options.start];
  }

  getPosition(): Position {
    return this.position;
  }

  getPathLength(): number {
    return this.pathLength;
  }

  getBelief(targetId: number): Belief | null {
    return this.beliefs.getBelief(targetId);
  }

  getMode(): AgentMode {
    if (this.pursuedTargetId !== null) {
      return 'pursuit';
    }
    return this.detour === null ? 'search' : 'detour';
  }

  getLead(targetId: number): Position | null {
    return this.leads.get(targetId) ?? null;
  }

  /**
   * Record every target within sensor range of the frozen world snapshot
   * into observation memory and mark the sensed cells swept. A lead in
   * range with no target on it is dropped for good. Trusted beliefs are
   * left to consensus.
   *
   * @returns The targets seen this tick.
   */
  observe(world: WorldSnapshot, sensorRange: number): readonly Target[] {
    this.sweepAround(sensorRange);
    const seen = findTargetsWithin(world.targets, this.position, sensorRange);
    for (const target of seen) {
      this.beliefs.recordObservation(target.id, target.position, world.tick);
    }
    for (const [targetId, lead] of this.leads) {
      if (!seen.some((target) => target.id === targetId) && distance(lead, this.position) <= sensorRange) {
        this.refuted.add(leadKey(targetId, lead));
        this.leads.delete(targetId);
      }
    }
    return seen;
  }

  /**
   * One claim per target the agent holds anything for, passed through its
   * claim policy. Honest agents report their freshest position.
   */
  composeClaims(tick: number): readonly Claim[] {
    const known = new Map<number, Position>();
    for (const targetId of this.beliefs.targetIds()) {
      const position = this.beliefs.claimablePosition(targetId);
      if (position !== null) {
        known.set(targetId, position);
      }
    }
    const context = { bounds: this.bounds, known };
    return Object.freeze(
      Array.from(known.entries()).map(([targetId, believed]) =>
        Object.freeze({
          targetId,
          position: this.claimPolicy.report(targetId, believed, context),
          reporterId: this.id,
          tick,
        }),
      ),
    );
  }

  /** The agent's own vote: its observation memory, never fabricated. */
  selfClaims(tick: number): readonly Claim[] {
    const claims: Claim[] = [];
    for (const entry of this.beliefs.entries()) {
      if (entry.observation !== null) {
        claims.push(
          Object.freeze({ targetId: entry.targetId, position: entry.observation.position, reporterId: this.id, tick }),
        );
      }
    }
    return Object.freeze(claims);
  }

  /**
   * Install a winning bucket as the trusted belief. A replacement of the
   * belief being pursued restarts the spiral at the current cell. A vote
   * without a winner leaves beliefs alone but may give a lead.
   *
   * @returns The change made, or null when the vote decided nothing.
   */
  applyVote(result: VoteResult, tick: number): BeliefChange | null {
    const { winner } = result;
    if (result.decision !== 'winner' || winner === null) {
      this.takeLead(result);
      return null;
    }
    const provenance = result.includesSelf ? 'observed' : 'received';
    const { kind, previous } = this.beliefs.applyWinner(
      result.targetId,
      winner.position,
      winner.votes,
      tick,
      provenance,
      this.tolerance,
    );
    this.leads.delete(result.targetId);
    if (kind === 'replaced' && this.pursuedTargetId === result.targetId) {
      this.spiral.reset(this.position);
      this.pursuedTargetId = null;
    }
    return Object.freeze({
      agentId: this.id,
      targetId: result.targetId,
      kind,
      previous,
      current: winner.position,
      confidence: winner.votes,
      tick,
    });
  }

  /**
   * Move one cell toward whatever currently drives the agent (see the class
   * comment). Arriving at a trusted cell marks it reached; the home sweep
   * carries on from where it left off.
   */
  move(): Position {
    this.markReachedHere();

    const heading = this.choosePursuit() ?? this.chooseSighting();
    let next: Position;
    if (heading !== null) {
      this.pursuedTargetId = heading.targetId;
      next = stepToward(this.position, heading.position);
    } else {
      this.pursuedTargetId = null;
      const lead = this.nearestLead();
      if (lead === null) {
        this.detour = null;
        next = this.spiral.nextMove(this.position);
      } else {
        if (this.detour === null || !samePosition(this.detour.getAnchor(), lead)) {
          this.detour = new SpiralSearch(lead, this.bounds, { isSwept: (cell) => this.isSwept(cell) });
        }
        next = this.detour.nextMove(this.position);
      }
    }

    this.pathLength += distance(this.position, next);
    this.position = next;
    this.recentPositions.push(next);
    if (this.recentPositions.length > this.pathHistoryLength) {
      this.recentPositions = this.recentPositions.slice(-this.pathHistoryLength);
    }

    if (
      heading !== null &&
      samePosition(next, heading.position) &&
      this.beliefs.getBelief(heading.targetId) !== null
    ) {
      this.reached.set(heading.targetId, next);
      this.pursuedTargetId = null;
    }
    return next;
  }

  /**
   * Return a frozen snapshot of the agent's current state.
   */
  getSnapshot(): AgentSnapshot {
    return buildAgentSnapshot({
      agentId: this.id,
      position: this.position,
      start: this.start,
      isByzantine: this.isByzantine,
      mode: this.getMode(),
      pursuedTargetId: this.pursuedTargetId,
      beliefs: this.beliefs.entries(),
      recentPositions: this.recentPositions,
      pathLength: this.pathLength,
    });
  }

  private markReachedHere(): void {
    for (const targetId of this.beliefs.targetIds()) {
      const belief = this.beliefs.getBelief(targetId);
      if (belief !== null && samePosition(belief.position, this.position)) {
        this.reached.set(targetId, this.position);
      }
    }
  }

  /** Nearest pursuable belief; lower target id on equal distance. */
  private choosePursuit(): Heading | null {
    let best: Heading | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const targetId of this.sortedTargetIds()) {
      const belief = this.beliefs.getBelief(targetId);
      if (belief === null) {
        continue;
      }
      const reachedAt = this.reached.get(targetId);
      if (reachedAt !== undefined && samePosition(reachedAt, belief.position)) {
        continue;
      }
      const gap = distance(this.position, belief.position);
      if (gap < bestDistance) {
        best = belief;
        bestDistance = gap;
      }
    }
    return best;
  }

  /** Nearest observed target with no trusted belief yet. */
  private chooseSighting(): Heading | null {
    let best: Heading | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const targetId of this.sortedTargetIds()) {
      const observation = this.beliefs.getObservation(targetId);
      if (observation === null || this.beliefs.getBelief(targetId) !== null) {
        continue;
      }
      const gap = distance(this.position, observation.position);
      if (gap < bestDistance) {
        best = observation;
        bestDistance = gap;
      }
    }
    return best;
  }

  private nearestLead(): Position | null {
    let best: Position | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const targetId of this.sortedTargetIds()) {
      const lead = this.leads.get(targetId);
      if (lead === undefined) {
        continue;
      }
      const gap = distance(this.position, lead);
      if (gap < bestDistance) {
        best = lead;
        bestDistance = gap;
      }
    }
    return best;
  }

  /** Follow the strongest bucket not already sensed empty, unless the target is trusted. */
  private takeLead(result: VoteResult): void {
    if (this.beliefs.getBelief(result.targetId) !== null) {
      return;
    }
    const bucket = result.buckets.find((candidate) => !this.refuted.has(leadKey(result.targetId, candidate.position)));
    if (bucket !== undefined) {
      this.leads.set(result.targetId, bucket.position);
    }
  }

  private sweepAround(sensorRange: number): void {
    const reach = Math.floor(sensorRange);
    for (let dx = -reach; dx <= reach; dx++) {
      const rest = Math.floor(sensorRange - Math.abs(dx));
      for (let dy = -rest; dy <= rest; dy++) {
        const cell = { x: this.position.x + dx, y: this.position.y + dy };
        if (isInBounds(cell, this.bounds)) {
          this.swept[cell.y * this.bounds.width + cell.x] = true;
        }
      }
    }
  }

  private isSwept(cell: Position): boolean {
    return this.swept[cell.y * this.bounds.width + cell.x] === true;
  }

  private sortedTargetIds(): number[] {
    return [...this.beliefs.targetIds()].sort((a, b) => a - b);
  }
}
