import { describe, it, expect, beforeEach } from 'vitest';
import { createDefaultRegistry, createFamilyRegistry, type FamilyRegistry } from '../registry.js';
import { createSimulatedBinding } from '../simulation/index.js';
import { highperfFamily, highperfTiming } from '../families/highperf.js';
import type { DigitizerFamily } from '../types.js';

describe('Family Registry', () => {
  let registry: FamilyRegistry;

  beforeEach(() => {
    registry = createDefaultRegistry();
  });

  it('registers every built-in family', () => {
    expect(registry.getFamilies().map(f => f.id)).toEqual([
      'legacy-entry',
      'legacy-mainstream',
      'precision',
      'flexres',
      'highperf',
    ]);
  });

  it('matches models by prefix, case-insensitively', () => {
    expect(registry.matchModel('E2206B')?.id).toBe('legacy-entry');
    expect(registry.matchModel('M3406DMSO')?.id).toBe('legacy-mainstream');
    expect(registry.matchModel('p4262')?.id).toBe('precision');
    expect(registry.matchModel('F5242D')?.id).toBe('flexres');
    expect(registry.matchModel('H6424E')?.id).toBe('highperf');
  });

  it('returns undefined for unknown models', () => {
    expect(registry.matchModel('X9999')).toBeUndefined();
    expect(registry.matchModel('H6')).toBeUndefined();
  });

  it('prefers the more specific family', () => {
    const special: DigitizerFamily = { ...highperfFamily, id: 'highperf-special', specificity: 10 };
    registry.registerFamily(special);
    expect(registry.matchModel('H6424E')?.id).toBe('highperf-special');
  });

  it('opens an adapter for the binding model', () => {
    const binding = createSimulatedBinding({ model: 'H6424E', timing: highperfTiming, adcBits: 8, analogChannels: 4 });
    const adapter = registry.openAdapter(binding);

    expect(adapter.ok).toBe(true);
    if (adapter.ok) {
      expect(adapter.value.info).toEqual({
        make: 'Lab Digitizer',
        model: 'H6424E',
        serial: 'SIM000001',
        firmware: '1.0.0-sim',
        family: 'highperf',
      });
    }
  });

  it('refuses bindings no family supports', () => {
    const empty = createFamilyRegistry();
    const binding = createSimulatedBinding({ model: 'H6424E', timing: highperfTiming, adcBits: 8, analogChannels: 4 });
    expect(empty.openAdapter(binding)).toEqual({ ok: false, error: 'no family supports model "H6424E"' });
  });
});
