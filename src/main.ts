// ─────────────────────────────────────────────
//  Entry point — headless siege simulation
//
//  Runs one Stormwind siege against the in-memory world on a
//  manual clock, killing attackers along the way, and prints the
//  lifecycle events and what a defender standing in the city heard.
//
//  Options may be given as `Key=Value` arguments, e.g.
//    npm run sim -- CitySiege.EventDuration=10 CitySiege.DebugMode=1
// ─────────────────────────────────────────────

import { loadSiegeConfig, parseOptionText } from '@/engine/loader/SiegeConfigLoader';
import { SiegeOrchestrator } from '@/engine/siege/SiegeOrchestrator';
import { SiegeCommandCoordinator } from '@/engine/coordinator/SiegeCommandCoordinator';
import { InMemoryWorld } from '@/engine/world/InMemoryWorld';
import { InMemoryAudience, RewardLedger } from '@/engine/world/InMemoryAudience';
import { NullAmbience } from '@/engine/world/NullAmbience';
import { NullBotIntegration } from '@/engine/world/NullBotIntegration';
import { ManualClock } from '@/engine/utils/Clock';
import { SiegeEventBus } from '@/engine/utils/EventBus';

const TICK_SECONDS = 5;

const options = parseOptionText(process.argv.slice(2).join('\n'));
const config = loadSiegeConfig(options);
const city = config.cities.find(c => c.id === 'stormwind');
if (!city) throw new Error('Stormwind is missing from the city table');

const world = new InMemoryWorld();
const scene = world.addScene(city.regionId);
scene.place(city.objectiveTemplateId, 'King Varian Wrynn', city.objective);

const audience = new InMemoryAudience();
const defender = audience.join({
  id: 'player-1', faction: 'alliance', level: 80, regionId: city.regionId, position: city.center,
});
const rewards = new RewardLedger();
const clock = new ManualClock(0);

const orchestrator = new SiegeOrchestrator(config, {
  world,
  audience,
  ambience: new NullAmbience(),
  rewards,
  bots: new NullBotIntegration(),
  clock,
  rng: Math.random,
});
const commands = new SiegeCommandCoordinator(orchestrator, world, () => options);

SiegeEventBus.on('phaseChanged', e => console.log(`t=${clock.now()}s phase ${e.from} → ${e.to}`));
SiegeEventBus.on('actorRespawned', e => console.log(`t=${clock.now()}s ${e.previousId} respawned as ${e.actorId}`));
SiegeEventBus.on('siegeEnded', e => console.log(`t=${clock.now()}s ended: ${e.outcome.winner ?? 'none'} (${e.outcome.reason})`));

for (const line of commands.execute('start stormwind')) console.log(line);

const siege = orchestrator.runningIn(city.id);
while (siege && !siege.isEnded()) {
  clock.advance(TICK_SECONDS);
  orchestrator.tick();

  // every minute of combat, one attacking minion falls
  if (siege.phase === 'combat' && clock.now() % 60 === 0) {
    const victim = scene.allActors().find(a => {
      const entry = siege.findEntry(a.id);
      return entry?.tier === 'minion' && a.isAlive();
    });
    victim?.kill();
  }
  if (clock.now() % 300 === 0) for (const line of commands.execute('status')) console.log(line);
}

console.log('\nMessages received by player-1:');
for (const message of defender.inbox) console.log(`  ${message}`);
console.log(`Honor: ${rewards.honor.get(defender.id) ?? 0}, copper: ${rewards.money.get(defender.id) ?? 0}`);
