import { isWithinRange, reflectIntoBounds, samePosition, stepToward } from './geometry.js';
import type { RandomSource } from './random.js';
import type { Bounds, Position, Target, TargetMotion, TargetSpec, WorldSnapshot } from './types.js';

interface TargetState {
  readonly id: number;
  readonly motion: TargetMotion;
  position: Position;
  /** Index of the next waypoint for `waypoints` motion. */
  waypointIndex: number;
}

/**
 * Return the targets within Manhattan `radius` of `position`, in id order.
 *
 * @param targets - Ground-truth targets (typically from a WorldSnapshot).
 * @param position - Observer cell.
 * @param radius - Inclusive sensing radius.
 */
export function findTargetsWithin(
  targets: readonly Target[],
  position: Position,
  radius: number,
): readonly Target[] {
  return targets.filter((target) => isWithinRange(target.position, position, radius));
}

/**
 * Owns cell geometry and target motion. Knows nothing about agents.
 * Mutated once per tick by `advance()`; everything handed out is frozen.
 */
export class GridWorld {
  private readonly bounds: Bounds;
  private readonly random: RandomSource;
  private readonly targets: TargetState[];
  private tick = 0;

  constructor(bounds: Bounds, specs: readonly TargetSpec[], random: RandomSource) {
    this.bounds = Object.freeze({ width: bounds.width, height: bounds.height });
    this.random = random;
    this.targets = specs.map((spec, id) => ({
      id,
      motion: spec.motion,
      position: { ...spec.position },
      waypointIndex: 0,
    }));
  }

  /** Move every target by one rule-defined step. Total: never fails. */
  advance(): void {
    this.tick++;
    for (const target of this.targets) {
      target.position = this.nextPosition(target);
    }
  }

  /**
   * Ground-truth targets an agent at `position` can observe directly.
   *
   * @param position - Observer cell.
   * @param sensorRadius - Inclusive Manhattan sensing radius.
   */
  targetsWithin(position: Position, sensorRadius: number): readonly Target[] {
    return findTargetsWithin(this.getTargets(), position, sensorRadius);
  }

  getTargets(): readonly Target[] {
    return Object.freeze(
      this.targets.map((target) =>
        Object.freeze({ id: target.id, position: Object.freeze({ ...target.position }) }),
      ),
    );
  }

  getBounds(): Bounds {
    return this.bounds;
  }

  getTick(): number {
    return this.tick;
  }

  /** Immutable view of the world for the current tick. */
  snapshot(): WorldSnapshot {
    return Object.freeze({
      tick: this.tick,
      bounds: this.bounds,
      targets: this.getTargets(),
    });
  }

  private nextPosition(target: TargetState): Position {
    const { motion } = target;
    switch (motion.kind) {
      case 'stationary':
        return target.position;
      case 'random-walk': {
        if (this.tick % motion.period !== 0) {
          return target.position;
        }
        const dx = this.random.integer(-1, 1);
        const dy = this.random.integer(-1, 1);
        return reflectIntoBounds({ x: target.position.x + dx, y: target.position.y + dy }, this.bounds);
      }
      case 'waypoints': {
        if (this.tick % motion.period !== 0 || motion.waypoints.length === 0) {
          return target.position;
        }
        let waypoint = motion.waypoints[target.waypointIndex];
        if (samePosition(waypoint, target.position)) {
          target.waypointIndex = (target.waypointIndex + 1) % motion.waypoints.length;
          waypoint = motion.waypoints[target.waypointIndex];
        }
        return stepToward(target.position, waypoint);
      }
    }
  }
}
