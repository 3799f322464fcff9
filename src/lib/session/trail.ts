import type { Position } from '../core/position.js';

/**
 * Record a player move on a breadcrumb trail, in place.
 *
 * Stepping back onto the previous crumb is treated as backtracking and
 * removes the current one; any other new position is appended. An empty
 * trail has no anchor and stays empty.
 */
export function updateTrail(trail: Position[], position: Position): void {
  if (trail.length === 0) {
    return;
  }
  if (trail[trail.length - 1].equals(position)) {
    return;
  }
  if (trail.length >= 2 && trail[trail.length - 2].equals(position)) {
    trail.pop();
    return;
  }
  trail.push(position);
}
