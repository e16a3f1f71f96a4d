import { KNOWN_SPACE_X, KNOWN_SPACE_Y, NUMBER_OF_COMBATANTS } from "../../config/balance/battlefield.ts";
import {
  COMBATANT_ANTIMATTER,
  COMBATANT_KINETICS,
  COMBATANT_SHIELDS,
  COMBATANT_TORPEDOS,
} from "../../config/balance/combatant.ts";
import { randomBelow, randomInt, type RandomSource } from "../../core/rng/seeded-rng.ts";
import { ZERO } from "../../simulation/physics/vector-math.ts";
import type { Combatant } from "../../types.ts";

export function spawn(x: number, y: number): Combatant {
  return {
    x,
    y,
    shields: COMBATANT_SHIELDS,
    antimatter: COMBATANT_ANTIMATTER,
    kinetics: COMBATANT_KINETICS,
    torpedos: COMBATANT_TORPEDOS,
    weaponCharge: 0,
    velocity: ZERO,
    thrust: ZERO,
    battleStateAge: 0,
    battleState: "no-battle",
  };
}

export function makeRandomCombatant(rng: RandomSource): Combatant {
  return {
    x: randomInt(rng, KNOWN_SPACE_X),
    y: randomInt(rng, KNOWN_SPACE_Y),
    shields: COMBATANT_SHIELDS,
    antimatter: randomBelow(rng, COMBATANT_ANTIMATTER),
    kinetics: randomInt(rng, COMBATANT_KINETICS),
    torpedos: randomInt(rng, COMBATANT_TORPEDOS),
    weaponCharge: 0,
    velocity: { x: 2 - randomBelow(rng, 4), y: 2 - randomBelow(rng, 4) },
    thrust: ZERO,
    battleStateAge: 0,
    battleState: "no-battle",
  };
}

export function initialize(rng: RandomSource, count: number = NUMBER_OF_COMBATANTS): Combatant[] {
  const roster: Combatant[] = [];
  for (let i = 0; i < count; i += 1) {
    roster.push(makeRandomCombatant(rng));
  }
  return roster;
}
