import { SHIP_TURN_TOLERANCE_DEG } from "../../config/balance/battlefield.ts";
import {
  COMBATANT_PHASER_FIRING_DISTANCE,
  COMBATANT_TORPEDO_FIRING_DISTANCE,
  COMBATANT_WEAPONS,
  WEAPON_PRIORITY,
} from "../../config/balance/weapons.ts";
import { distance } from "../../simulation/physics/geometry.ts";
import type { Combatant, CombatantWeapon, Ship } from "../../types.ts";

export function isShipTurning(ship: Ship): boolean {
  return Math.abs(ship.heading - ship.headingSetting) > SHIP_TURN_TOLERANCE_DEG;
}

function isCharged(combatant: Combatant, weapon: CombatantWeapon): boolean {
  const stats = COMBATANT_WEAPONS[weapon];
  return combatant.weaponCharge >= stats.threshold && combatant.antimatter > stats.power;
}

export function readyToFireTorpedo(combatant: Combatant, ship: Ship): boolean {
  return !isShipTurning(ship)
    && combatant.torpedos > 0
    && distance(combatant, ship) <= COMBATANT_TORPEDO_FIRING_DISTANCE
    && isCharged(combatant, "torpedo");
}

export function readyToFirePhaser(combatant: Combatant, ship: Ship): boolean {
  return distance(combatant, ship) <= COMBATANT_PHASER_FIRING_DISTANCE && isCharged(combatant, "phaser");
}

// Kinetics reach any range once charged.
export function readyToFireKinetic(combatant: Combatant): boolean {
  return combatant.kinetics > 0 && isCharged(combatant, "kinetic");
}

const READINESS: Readonly<Record<CombatantWeapon, (combatant: Combatant, ship: Ship) => boolean>> = {
  torpedo: readyToFireTorpedo,
  phaser: readyToFirePhaser,
  kinetic: readyToFireKinetic,
};

export function selectReadyWeapon(combatant: Combatant, ship: Ship): CombatantWeapon | null {
  for (const weapon of WEAPON_PRIORITY) {
    if (READINESS[weapon](combatant, ship)) {
      return weapon;
    }
  }
  return null;
}
