import type { CombatantWeapon, CombatantWeaponStats } from "../../types.ts";

export const COMBATANT_WEAPONS: Readonly<Record<CombatantWeapon, CombatantWeaponStats>> = {
  kinetic: {
    shotSpeed: 15,
    threshold: 1_000,
    power: 2,
    inventory: "kinetics",
  },
  phaser: {
    shotSpeed: 40,
    threshold: 2_000,
    power: 20,
    inventory: null,
  },
  torpedo: {
    shotSpeed: 10,
    threshold: 5_000,
    power: 50,
    inventory: "torpedos",
  },
};

// Evaluated in this order; the first ready weapon fires.
export const WEAPON_PRIORITY: ReadonlyArray<CombatantWeapon> = ["torpedo", "phaser", "kinetic"];

export const COMBATANT_KINETIC_FIRING_DISTANCE = 40_000;
export const COMBATANT_PHASER_FIRING_DISTANCE = 20_000;
export const COMBATANT_TORPEDO_FIRING_DISTANCE = 30_000;

// Player phasers, as seen by whoever they hit.
export const PHASER_DAMAGE = 50;
export const PHASER_RANGE = 10_000;
