// ─────────────────────────────────────────────
//  SiegeDialogue
//  Narrative scripts and yell pools for siege speakers.
//  Option format: scripts separated by '|', lines by ';'.
// ─────────────────────────────────────────────

import { TextTemplate } from '@/engine/utils/TextTemplate';
import { MathUtils } from '@/engine/utils/MathUtils';
import type { Rng } from '@/engine/utils/MathUtils';

const LEADER_FALLBACK = 'the leader';

export interface DialogueCursor {
  script: string[];
  cursor: number;
}

export const SiegeDialogue = {
  parseLines(raw: string): string[] {
    return raw.split(';').map(l => l.trim()).filter(l => l.length > 0);
  },

  parseScripts(raw: string): string[][] {
    return raw.split('|')
      .map(s => SiegeDialogue.parseLines(s))
      .filter(lines => lines.length > 0);
  },

  /** Picks one script and fills in {CITY} and {LEADER} */
  prepareScript(scripts: readonly string[][], cityName: string, leaderName: string | null, rng: Rng): string[] {
    const chosen = MathUtils.pick(scripts, rng);
    if (!chosen) return [];
    return chosen.map(line =>
      TextTemplate.render(line, { CITY: cityName, LEADER: leaderName }, { LEADER: LEADER_FALLBACK }),
    );
  },

  /** Next narrative line, or null once the script is exhausted */
  nextLine(state: DialogueCursor): { line: string; cursor: number } | null {
    const line = state.script[state.cursor];
    if (line === undefined) return null;
    return { line, cursor: state.cursor + 1 };
  },

  randomLine(pool: readonly string[], rng: Rng): string | null {
    return MathUtils.pick(pool, rng) ?? null;
  },
};
