import { describe, it, expect, beforeEach } from 'vitest';
import { SiegeAnnouncer, localizedText } from '@/engine/systems/announce/SiegeAnnouncer';
import { InMemoryAudience } from '@/engine/world/InMemoryAudience';
import { makeCity } from '../integration/helpers';

let audience: InMemoryAudience;

beforeEach(() => {
  audience = new InMemoryAudience();
});

describe('localizedText', () => {
  it('renders the enUS text', () => {
    expect(localizedText('enUS', 'siegeStart', { CITY: 'Testhold' }))
      .toBe('[City Siege] The city of Testhold is under attack! Defenders are needed!');
  });

  it('renders the frFR text when one exists', () => {
    expect(localizedText('frFR', 'winDefenders', { FACTION: 'Alliance', CITY: 'Testhold' }))
      .toBe('[Siège de Cité] Les Alliance ont réussi à défendre Testhold !');
  });

  it('falls back to enUS for unknown locales and missing entries', () => {
    expect(localizedText('deDE', 'siegeEnd', { CITY: 'Testhold' }))
      .toBe('[City Siege] The siege of Testhold has ended!');
    expect(localizedText('frFR', 'battleStart', { CITY: 'Testhold' }))
      .toBe('[City Siege] THE BATTLE HAS BEGUN! The siege of Testhold is now underway! Defenders, to arms!');
  });
});

describe('SiegeAnnouncer', () => {
  const city = makeCity();

  function seed(): void {
    audience.join({ id: 'near', faction: 'alliance', regionId: 7, position: { x: 100, y: 0, z: 0 } });
    audience.join({ id: 'far', faction: 'alliance', regionId: 7, position: { x: 2000, y: 0, z: 0 } });
    audience.join({ id: 'elsewhere', faction: 'horde', regionId: 1, position: { x: 0, y: 0, z: 0 } });
  }

  it('announces to sessions within the radius of the city center', () => {
    seed();
    const announcer = new SiegeAnnouncer(audience, 1500);
    expect(announcer.announce(city, 'siegeEnd', { CITY: 'Testhold' })).toBe(1);
    expect(audience.all().map(s => s.inbox.length)).toEqual([1, 0, 0]);
  });

  it('announces to every session when the radius is 0', () => {
    seed();
    const announcer = new SiegeAnnouncer(audience, 0);
    expect(announcer.announce(city, 'siegeEnd', { CITY: 'Testhold' })).toBe(3);
  });

  it('limits local sessions to the region when the radius is 0', () => {
    seed();
    expect(new SiegeAnnouncer(audience, 0).localSessions(city).map(s => s.id)).toEqual(['near', 'far']);
    expect(new SiegeAnnouncer(audience, 1500).localSessions(city).map(s => s.id)).toEqual(['near']);
  });

  it('broadcasts to everyone regardless of radius', () => {
    seed();
    expect(new SiegeAnnouncer(audience, 10).broadcast('battleStart', { CITY: 'Testhold' })).toBe(3);
  });

  it('sends each session its own locale', () => {
    const fr = audience.join({ id: 'fr', locale: 'frFR', faction: 'alliance', regionId: 7, position: { x: 0, y: 0, z: 0 } });
    new SiegeAnnouncer(audience, 0).announce(city, 'siegeEnd', { CITY: 'Testhold' });
    expect(fr.inbox).toEqual(['[Siège de Cité] Le siège de Testhold est terminé !']);
  });
});
