import type { Bounds, Position, Target } from '@swarmgrid/core';
import type { AgentMode, AgentSnapshot, BeliefEntry, BeliefView, TargetSnapshot, TickSnapshot } from './types.js';

function freezePosition(position: Position): Position {
  return Object.freeze({ x: position.x, y: position.y });
}

/**
 * Display view of one Belief Store slot. Only the trusted half is shown;
 * an unset slot has a null position and zero confidence.
 */
export function toBeliefView(entry: BeliefEntry): BeliefView {
  const { trusted } = entry;
  return Object.freeze({
    targetId: entry.targetId,
    position: trusted === null ? null : freezePosition(trusted.position),
    confidence: trusted?.confidence ?? 0,
    updatedTick: trusted?.updatedTick ?? null,
    provenance: trusted?.provenance ?? null,
  });
}

export interface AgentSnapshotInput {
  readonly agentId: number;
  readonly position: Position;
  readonly start: Position;
  readonly isByzantine: boolean;
  readonly mode: AgentMode;
  readonly pursuedTargetId: number | null;
  readonly beliefs: readonly BeliefEntry[];
  readonly recentPositions: readonly Position[];
  readonly pathLength: number;
}

/**
 * Builds a deeply frozen AgentSnapshot. Positions and belief views are
 * copied so later moves of the agent cannot show through.
 */
export function buildAgentSnapshot(input: AgentSnapshotInput): AgentSnapshot {
  return Object.freeze({
    agentId: input.agentId,
    position: freezePosition(input.position),
    start: freezePosition(input.start),
    isByzantine: input.isByzantine,
    mode: input.mode,
    pursuedTargetId: input.pursuedTargetId,
    beliefs: Object.freeze(input.beliefs.map(toBeliefView)),
    recentPositions: Object.freeze(input.recentPositions.map(freezePosition)),
    pathLength: input.pathLength,
  });
}

/** Frozen ground-truth target views, in id order. */
export function toTargetSnapshots(targets: readonly Target[]): readonly TargetSnapshot[] {
  return Object.freeze(
    [...targets]
      .sort((a, b) => a.id - b.id)
      .map((target) => Object.freeze({ targetId: target.id, position: freezePosition(target.position) })),
  );
}

/**
 * Builds the read-only TickSnapshot handed to display, reporting and metrics
 * consumers after a tick completes.
 *
 * @param competitiveRatio - Running ratio, or null while undefined.
 */
export function buildTickSnapshot(
  tick: number,
  stepBudget: number,
  bounds: Bounds,
  agents: readonly AgentSnapshot[],
  targets: readonly TargetSnapshot[],
  competitiveRatio: number | null,
): TickSnapshot {
  const snapshot: TickSnapshot = {
    tick,
    stepBudget,
    complete: tick >= stepBudget,
    bounds: Object.freeze({ width: bounds.width, height: bounds.height }),
    agents: Object.freeze([...agents]),
    targets: Object.freeze([...targets]),
    competitiveRatio,
  };
  return Object.freeze(snapshot);
}
