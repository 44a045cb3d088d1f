/**
 * Family Registry
 * Maps a detected model string to the hardware family that drives it
 */

import { Ok, Err, type Result } from '../../shared/types.js';
import type { DriverBinding } from './binding.js';
import type { DigitizerAdapter, DigitizerFamily } from './types.js';
import { legacyEntryFamily, legacyMainstreamFamily } from './families/legacy.js';
import { precisionFamily } from './families/precision.js';
import { flexresFamily } from './families/flexres.js';
import { highperfFamily } from './families/highperf.js';
import { createLogger } from '../logger.js';

const log = createLogger('Registry');

export interface FamilyRegistry {
  registerFamily(family: DigitizerFamily): void;
  getFamilies(): DigitizerFamily[];
  matchModel(model: string): DigitizerFamily | undefined;
  /** Pick the family for the binding's model and build its adapter */
  openAdapter(binding: DriverBinding): Result<DigitizerAdapter, string>;
}

export function createFamilyRegistry(): FamilyRegistry {
  const families: DigitizerFamily[] = [];

  return {
    registerFamily(family: DigitizerFamily): void {
      families.push(family);
    },

    getFamilies(): DigitizerFamily[] {
      return [...families];
    },

    // Most specific match wins
    matchModel(model: string): DigitizerFamily | undefined {
      const matches = families.filter(f => f.match.model.test(model));
      if (matches.length === 0) return undefined;
      matches.sort((a, b) => (b.specificity ?? 0) - (a.specificity ?? 0));
      return matches[0];
    },

    openAdapter(binding: DriverBinding): Result<DigitizerAdapter, string> {
      const family = this.matchModel(binding.identity.model);
      if (!family) {
        return Err(`no family supports model "${binding.identity.model}"`);
      }
      log.info(`${binding.identity.model} -> ${family.displayName}`);
      return Ok(family.create(binding));
    },
  };
}

/** Registry with every built-in family registered. */
export function createDefaultRegistry(): FamilyRegistry {
  const registry = createFamilyRegistry();
  registry.registerFamily(legacyEntryFamily);
  registry.registerFamily(legacyMainstreamFamily);
  registry.registerFamily(precisionFamily);
  registry.registerFamily(flexresFamily);
  registry.registerFamily(highperfFamily);
  return registry;
}
