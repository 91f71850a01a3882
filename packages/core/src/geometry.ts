import type { Bounds, Position } from './types.js';

/**
 * Manhattan distance between two cells. This is the single metric used for
 * sensing, communication, vote tolerance and travel cost.
 */
export function distance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** Whether `b` lies within `range` of `a` (inclusive). */
export function isWithinRange(a: Position, b: Position, range: number): boolean {
  return distance(a, b) <= range;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isInBounds(position: Position, bounds: Bounds): boolean {
  return (
    Number.isInteger(position.x) &&
    Number.isInteger(position.y) &&
    position.x >= 0 &&
    position.y >= 0 &&
    position.x < bounds.width &&
    position.y < bounds.height
  );
}

function clampAxis(value: number, size: number): number {
  return Math.max(0, Math.min(size - 1, value));
}

/** Pin a position to the nearest in-grid cell. */
export function clampToBounds(position: Position, bounds: Bounds): Position {
  return { x: clampAxis(position.x, bounds.width), y: clampAxis(position.y, bounds.height) };
}

function reflectAxis(value: number, size: number): number {
  if (size <= 1) {
    return 0;
  }
  let reflected = value;
  if (reflected < 0) {
    reflected = -reflected;
  }
  if (reflected > size - 1) {
    reflected = 2 * (size - 1) - reflected;
  }
  return clampAxis(reflected, size);
}

/**
 * Mirror a position that stepped off the grid back inside, e.g. x = -1 → 1
 * and x = width → width - 2.
 */
export function reflectIntoBounds(position: Position, bounds: Bounds): Position {
  return { x: reflectAxis(position.x, bounds.width), y: reflectAxis(position.y, bounds.height) };
}

/**
 * One Manhattan-greedy step from `from` toward `to`: the axis with the larger
 * remaining delta moves first, x on ties. Returns `from` when already there.
 */
export function stepToward(from: Position, to: Position): Position {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (dx === 0 && dy === 0) {
    return from;
  }
  if (Math.abs(dx) >= Math.abs(dy)) {
    return { x: from.x + Math.sign(dx), y: from.y };
  }
  return { x: from.x, y: from.y + Math.sign(dy) };
}

export function formatPosition(position: Position): string {
  return `(${String(position.x)}, ${String(position.y)})`;
}
