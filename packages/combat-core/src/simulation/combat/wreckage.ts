import type { Combatant, DebrisCloud, Explosion } from "../../types.ts";

export function makeCombatantExplosion(combatant: Combatant): Explosion {
  return { x: combatant.x, y: combatant.y, age: 0, kind: "combatant" };
}

export function makeDebrisCloud(x: number, y: number, concentration: number): DebrisCloud {
  return { x, y, concentration };
}
