/**
 * Simulation Module
 * Builds a simulated digitizer: the real family adapter over a simulated binding
 *
 * Usage:
 *   const sim = createSimulatedInstrument(createDefaultRegistry(), { model: 'H6424E' });
 *   if (sim.ok) { const { adapter, binding } = sim.value; }
 */

import { Ok, Err, type Result } from '../../../shared/types.js';
import type { FamilyRegistry } from '../registry.js';
import type { DigitizerAdapter } from '../types.js';
import { channelCountFromModel } from '../families/common.js';
import { createSimulatedBinding, type SimulatedBinding, type SimulatedBindingConfig } from './simulated-binding.js';

export interface SimulatedInstrumentConfig
  extends Partial<Omit<SimulatedBindingConfig, 'timing' | 'adcBits' | 'analogChannels'>> {
  model: string;
}

export interface SimulatedInstrument {
  adapter: DigitizerAdapter;
  binding: SimulatedBinding;
}

export function createSimulatedInstrument(
  registry: FamilyRegistry,
  config: SimulatedInstrumentConfig
): Result<SimulatedInstrument, string> {
  const family = registry.matchModel(config.model);
  if (!family) {
    return Err(`no family supports model "${config.model}"`);
  }

  const binding = createSimulatedBinding({
    ...config,
    timing: family.timing,
    adcBits: family.defaultResolution(config.model),
    analogChannels: channelCountFromModel(config.model),
  });

  const adapter = registry.openAdapter(binding);
  if (!adapter.ok) return adapter;

  return Ok({ adapter: adapter.value, binding });
}

export { createSimulatedBinding, maximumAdcValue } from './simulated-binding.js';
export type { SimulatedBinding, SimulatedOperation } from './simulated-binding.js';
