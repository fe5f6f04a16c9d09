// ─────────────────────────────────────────────
//  City — static siege target
//  Anchors and waypoints are read-only while a siege runs.
// ─────────────────────────────────────────────

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export type CityFaction = 'alliance' | 'horde';

/** Ordered intermediate points from the rally anchor toward the objective anchor. May be empty. */
export type WaypointPath = readonly Vec3[];

export interface CityData {
  id: string;
  name: string;
  regionId: number;
  /** Faction that owns the city, i.e. the defending side */
  faction: CityFaction;
  /** Audience scoping point for announcements, rewards and ambience */
  center: Vec3;
  /** Where attackers form up and defenders fall back to */
  rally: Vec3;
  /** Where the defended leader stands */
  objective: Vec3;
  waypoints: WaypointPath;
  objectiveTemplateId: number;
  enabled: boolean;
}

export function opposingFaction(faction: CityFaction): CityFaction {
  return faction === 'alliance' ? 'horde' : 'alliance';
}

export function factionLabel(faction: CityFaction): string {
  return faction === 'alliance' ? 'Alliance' : 'Horde';
}
