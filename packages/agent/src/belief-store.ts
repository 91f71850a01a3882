import { distance } from '@swarmgrid/core';
import type { Position } from '@swarmgrid/core';
import type { Belief, BeliefChangeKind, BeliefEntry, BeliefProvenance, Observation } from './types.js';

interface Slot {
  trusted: Belief | null;
  observation: Observation | null;
}

/**
 * Per-agent mapping from target id to trusted belief and observation memory.
 * Holds a slot for every target from construction, so "knows about target X"
 * is a lookup, never a missing key.
 *
 * Only the owning agent mutates a store. Trusted beliefs change solely
 * through `applyWinner`, which the agent calls with a majority-vote winner.
 */
export class BeliefStore {
  private readonly slots: Map<number, Slot> = new Map();

  constructor(targetIds: readonly number[]) {
    for (const targetId of targetIds) {
      this.slots.set(targetId, { trusted: null, observation: null });
    }
  }

  /**
   * Remember a direct sensor reading. Does not touch the trusted belief.
   *
   * @throws RangeError for a target id the store was not built with.
   */
  recordObservation(targetId: number, position: Position, tick: number): void {
    this.slot(targetId).observation = Object.freeze({
      targetId,
      position: Object.freeze({ x: position.x, y: position.y }),
      tick,
    });
  }

  getObservation(targetId: number): Observation | null {
    return this.slot(targetId).observation;
  }

  getBelief(targetId: number): Belief | null {
    return this.slot(targetId).trusted;
  }

  /**
   * Position this agent would report for a target: the fresher of its
   * observation memory and its trusted belief (observation on equal ticks).
   *
   * @returns null when the agent holds nothing for the target.
   */
  claimablePosition(targetId: number): Position | null {
    const { trusted, observation } = this.slot(targetId);
    if (observation !== null && (trusted === null || observation.tick >= trusted.updatedTick)) {
      return observation.position;
    }
    return trusted?.position ?? null;
  }

  /**
   * Install a majority-vote winner as the trusted belief.
   *
   * @param tolerance - A winner within this distance of the current belief reinforces it.
   * @returns How the belief changed, with the previous position.
   */
  applyWinner(
    targetId: number,
    position: Position,
    confidence: number,
    tick: number,
    provenance: BeliefProvenance,
    tolerance: number,
  ): { kind: BeliefChangeKind; previous: Position | null } {
    const slot = this.slot(targetId);
    const previous = slot.trusted?.position ?? null;
    let kind: BeliefChangeKind;
    if (previous === null) {
      kind = 'adopted';
    } else if (distance(previous, position) <= tolerance) {
      kind = 'reinforced';
    } else {
      kind = 'replaced';
    }
    slot.trusted = Object.freeze({
      targetId,
      position: Object.freeze({ x: position.x, y: position.y }),
      confidence,
      updatedTick: tick,
      provenance,
    });
    return { kind, previous };
  }

  targetIds(): number[] {
    return Array.from(this.slots.keys());
  }

  /** Frozen copy of every slot, in target id order. */
  entries(): readonly BeliefEntry[] {
    return Object.freeze(
      Array.from(this.slots.entries())
        .sort(([a], [b]) => a - b)
        .map(([targetId, slot]) =>
          Object.freeze({ targetId, trusted: slot.trusted, observation: slot.observation }),
        ),
    );
  }

  private slot(targetId: number): Slot {
    const slot = this.slots.get(targetId);
    if (slot === undefined) {
      throw new RangeError(`Unknown target id ${String(targetId)}`);
    }
    return slot;
  }
}
