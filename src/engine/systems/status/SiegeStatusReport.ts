// ─────────────────────────────────────────────
//  Siege Status Report — countdown milestones and
//  periodic status lines
// ─────────────────────────────────────────────

import type { CountdownMilestone } from '@/engine/data/types/Siege';

export type HealthBand = 'high' | 'moderate' | 'low' | 'critical';

export const COUNTDOWN_MILESTONES: readonly CountdownMilestone[] = [75, 50, 25];

export function percentRemaining(elapsed: number, duration: number): number {
  if (duration <= 0) return 0;
  const remaining = Math.max(0, duration - elapsed);
  return (remaining / duration) * 100;
}

/**
 * The milestone to announce this tick, if any.
 * At most one per call, highest first.
 */
export function dueMilestone(
  percent: number,
  announced: Readonly<Record<CountdownMilestone, boolean>>,
): CountdownMilestone | null {
  for (const milestone of COUNTDOWN_MILESTONES) {
    if (announced[milestone]) continue;
    return percent <= milestone ? milestone : null;
  }
  return null;
}

export function healthBand(pct: number): HealthBand {
  if (pct > 75) return 'high';
  if (pct > 50) return 'moderate';
  if (pct > 25) return 'low';
  return 'critical';
}

/** Leader part of a status line; `healthPct` is null when the leader cannot be read */
export function describeLeader(healthPct: number | null, minutesLeft: number): string {
  let text: string;
  if (healthPct === null) {
    text = 'Leader status: Unknown (not in combat yet)';
  } else {
    const pct = Math.floor(healthPct);
    text = `Leader health: ${pct}% (${healthBand(pct)})`;
    if (pct <= 25) text += ' CRITICAL! The city leader is in grave danger!';
    else if (pct <= 50) text += ' The city leader is under heavy assault!';
  }
  if (minutesLeft > 0 && minutesLeft <= 5) text += ' FINAL MINUTES!';
  return text;
}
