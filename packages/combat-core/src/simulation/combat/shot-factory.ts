import { COMBATANT_WEAPONS } from "../../config/balance/weapons.ts";
import { toRadians } from "../physics/geometry.ts";
import { fromAngular } from "../physics/vector-math.ts";
import type { CombatantWeapon, Shot } from "../../types.ts";

export function makeShot(x: number, y: number, bearing: number, weapon: CombatantWeapon): Shot {
  return {
    x,
    y,
    bearing,
    velocity: fromAngular(COMBATANT_WEAPONS[weapon].shotSpeed, toRadians(bearing)),
    weapon,
    source: "combatant",
  };
}
