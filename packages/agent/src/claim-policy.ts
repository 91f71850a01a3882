import { DEFAULT_BYZANTINE_OFFSET, clampToBounds, samePosition } from '@swarmgrid/core';
import type { ByzantineStrategy, Position } from '@swarmgrid/core';
import type { ClaimContext, ClaimPolicy } from './types.js';

/** Reports exactly what the agent holds. */
export class HonestClaimPolicy implements ClaimPolicy {
  readonly fabricates = false;

  report(_targetId: number, believed: Position, _context: ClaimContext): Position {
    return believed;
  }
}

/**
 * Choose between the clamped forward and backward shifts of one coordinate.
 * Forward wins unless the grid edge swallowed part of it and backward moves further.
 */
function pickAxis(value: number, delta: number, forward: number, backward: number): number {
  if (Math.abs(forward - value) >= Math.abs(delta)) {
    return forward;
  }
  return Math.abs(backward - value) > Math.abs(forward - value) ? backward : forward;
}

/**
 * Shifts every reported position by a fixed vector. Near an edge the
 * shift is mirrored on that axis so the report never collapses onto the
 * believed cell.
 */
export class OffsetClaimPolicy implements ClaimPolicy {
  readonly fabricates = true;
  private readonly dx: number;
  private readonly dy: number;

  constructor(dx: number, dy: number) {
    this.dx = dx;
    this.dy = dy;
  }

  report(_targetId: number, believed: Position, context: ClaimContext): Position {
    const forward = clampToBounds({ x: believed.x + this.dx, y: believed.y + this.dy }, context.bounds);
    const backward = clampToBounds({ x: believed.x - this.dx, y: believed.y - this.dy }, context.bounds);
    return {
      x: pickAxis(believed.x, this.dx, forward.x, backward.x),
      y: pickAxis(believed.y, this.dy, forward.y, backward.y),
    };
  }
}

/**
 * Reports a position the agent holds for a different target: the next
 * known target id after this one, wrapping around. With nothing else known
 * it reports the cell mirrored through the grid centre, or for the centre
 * cell itself the default offset.
 */
export class SwapClaimPolicy implements ClaimPolicy {
  readonly fabricates = true;
  private readonly fallback = new OffsetClaimPolicy(DEFAULT_BYZANTINE_OFFSET.dx, DEFAULT_BYZANTINE_OFFSET.dy);

  report(targetId: number, believed: Position, context: ClaimContext): Position {
    const others = Array.from(context.known.entries())
      .filter(([id, position]) => id !== targetId && !samePosition(position, believed))
      .sort(([a], [b]) => a - b);
    if (others.length > 0) {
      const after = others.find(([id]) => id > targetId) ?? others[0];
      return after[1];
    }
    const mirrored = {
      x: context.bounds.width - 1 - believed.x,
      y: context.bounds.height - 1 - believed.y,
    };
    return samePosition(mirrored, believed) ? this.fallback.report(targetId, believed, context) : mirrored;
  }
}

/**
 * Build the claim policy for a Byzantine strategy.
 *
 * @example
 * ```typescript
 * const policy = createClaimPolicy({ kind: 'offset', dx: 3, dy: 3 });
 * policy.report(0, { x: 18, y: 4 }, { bounds: { width: 20, height: 20 }, known: new Map() });
 * // { x: 15, y: 7 }
 * ```
 */
export function createClaimPolicy(strategy: ByzantineStrategy): ClaimPolicy {
  switch (strategy.kind) {
    case 'offset':
      return new OffsetClaimPolicy(strategy.dx, strategy.dy);
    case 'swap':
      return new SwapClaimPolicy();
  }
}
