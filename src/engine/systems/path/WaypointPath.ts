// ─────────────────────────────────────────────
//  Waypoint Path — progress lookup along a city path
//  Pure functions, no side effects.
//
//  attacker: waypoints[0] … waypoints[n-1] → objective
//  defender: waypoints[n-1] … waypoints[0] → rally
// ─────────────────────────────────────────────

import type { CityData, Vec3, WaypointPath } from '@/engine/data/types/City';
import type { PathProgress, SiegeSide } from '@/engine/data/types/Siege';

export function startProgress(role: SiegeSide, path: WaypointPath): PathProgress {
  return { role, index: role === 'attacker' ? 0 : path.length, arrived: false };
}

/** The terminal anchor for a side */
export function terminalAnchor(role: SiegeSide, city: CityData): Vec3 {
  return role === 'attacker' ? city.objective : city.rally;
}

export function resolveTarget(progress: PathProgress, city: CityData): Vec3 {
  const path = city.waypoints;
  if (progress.role === 'attacker') {
    return path[progress.index] ?? city.objective;
  }
  if (progress.index <= 0) return city.rally;
  return path[progress.index - 1] ?? city.rally;
}

/** One step in the travel direction; returns the same object at the terminal */
export function advanceProgress(progress: PathProgress, path: WaypointPath): PathProgress {
  if (progress.arrived) return progress;
  if (progress.role === 'attacker') {
    if (progress.index < path.length) return { ...progress, index: progress.index + 1 };
    return { ...progress, arrived: true };
  }
  if (progress.index > 0) return { ...progress, index: progress.index - 1 };
  return { ...progress, arrived: true };
}
