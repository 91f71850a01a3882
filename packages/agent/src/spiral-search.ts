import { clampToBounds, samePosition, stepToward } from '@swarmgrid/core';
import type { Bounds, Position } from '@swarmgrid/core';

/** Displacement from a spiral's anchor. */
export interface Offset {
  readonly dx: number;
  readonly dy: number;
}

/**
 * Ring of spiral step `n`: the Chebyshev radius of its offset.
 * Ring r holds steps (2r-1)² … (2r+1)²-1.
 */
export function spiralRing(step: number): number {
  if (!Number.isInteger(step) || step < 0) {
    throw new RangeError(`spiral step must be a non-negative integer, got ${String(step)}`);
  }
  return Math.ceil((Math.sqrt(step + 1) - 1) / 2);
}

/**
 * Offset of spiral step `n` from the anchor. The walk goes left 1, up 1,
 * right 2, down 2, left 3, … so consecutive steps are 4-adjacent, and steps
 * 0 … (2r+1)²-1 cover every cell of rings 0 … r exactly once.
 *
 * @example
 * ```typescript
 * spiralOffset(0); // { dx: 0, dy: 0 }
 * spiralOffset(1); // { dx: -1, dy: 0 }
 * spiralOffset(9); // { dx: -2, dy: 1 }  first cell of ring 2
 * ```
 */
export function spiralOffset(step: number): Offset {
  const ring = spiralRing(step);
  if (ring === 0) {
    return { dx: 0, dy: 0 };
  }
  const side = 2 * ring;
  const i = step - (2 * ring - 1) ** 2;
  if (i < side) {
    // left edge, heading up
    return { dx: -ring, dy: ring - 1 - i };
  }
  if (i < 2 * side) {
    // top edge, heading right
    return { dx: -(ring - 1) + (i - side), dy: -ring };
  }
  if (i < 3 * side) {
    // right edge, heading down
    return { dx: ring, dy: -(ring - 1) + (i - 2 * side) };
  }
  // bottom edge, heading left
  return { dx: ring - 1 - (i - 3 * side), dy: ring };
}

export interface SpiralSearchOptions {
  /** Cells between consecutive rings; 1 walks every cell. */
  readonly spacing?: number;
  /** Waypoints this accepts are passed over, e.g. cells already sensed. */
  readonly isSwept?: (cell: Position) => boolean;
}

/**
 * Outward spiral cursor for an agent with nothing trusted to pursue.
 * The cursor is a plain step counter, so equal counters give equal cells.
 * Ring cells off the grid are clamped onto its edge; once every ring that
 * can touch the grid is spent the spiral restarts at ring 0.
 */
export class SpiralSearch {
  private anchor: Position;
  private step = 0;
  private readonly bounds: Bounds;
  private readonly spacing: number;
  private readonly isSwept: (cell: Position) => boolean;
  private readonly maxRing: number;

  constructor(anchor: Position, bounds: Bounds, options: SpiralSearchOptions = {}) {
    this.anchor = anchor;
    this.bounds = bounds;
    this.spacing = options.spacing ?? 1;
    this.isSwept = options.isSwept ?? (() => false);
    this.maxRing = Math.ceil(Math.max(bounds.width, bounds.height) / this.spacing);
  }

  getAnchor(): Position {
    return this.anchor;
  }

  getStep(): number {
    return this.step;
  }

  /** Restart from ring 0 around a new anchor. */
  reset(anchor: Position): void {
    this.anchor = anchor;
    this.step = 0;
  }

  /**
   * Current spiral waypoint. Swept cells and a clamped cell repeating the
   * one before it are passed over.
   */
  currentWaypoint(): Position {
    const sweep = (2 * this.maxRing + 1) ** 2;
    let previous: Position | null = null;
    for (let skipped = 0; skipped <= sweep; skipped++) {
      if (spiralRing(this.step) > this.maxRing) {
        this.step = 0;
      }
      const offset = spiralOffset(this.step);
      const cell = clampToBounds(
        { x: this.anchor.x + offset.dx * this.spacing, y: this.anchor.y + offset.dy * this.spacing },
        this.bounds,
      );
      if (!this.isSwept(cell) && (previous === null || !samePosition(cell, previous))) {
        return cell;
      }
      previous = cell;
      this.step++;
    }
    return this.anchor;
  }

  /**
   * Next cell for an agent at `from`: one Manhattan-greedy step toward the
   * current waypoint, advancing the cursor past waypoints already reached.
   */
  nextMove(from: Position): Position {
    const cells = this.bounds.width * this.bounds.height;
    let waypoint = this.currentWaypoint();
    for (let advanced = 0; samePosition(waypoint, from) && advanced < cells; advanced++) {
      this.step++;
      waypoint = this.currentWaypoint();
    }
    return stepToward(from, waypoint);
  }
}
