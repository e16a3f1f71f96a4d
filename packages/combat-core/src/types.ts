export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export type BattleState = "no-battle" | "flank-left" | "flank-right" | "advancing" | "retreating";

export type CombatantWeapon = "kinetic" | "phaser" | "torpedo";

export type AmmoSlot = "kinetics" | "torpedos";

export type Hit =
  | { readonly weapon: "kinetic"; readonly damage: number }
  | { readonly weapon: "torpedo"; readonly damage: number }
  | { readonly weapon: "phaser"; readonly ranges: ReadonlyArray<number> };

export interface Combatant {
  readonly x: number;
  readonly y: number;
  readonly shields: number;
  readonly antimatter: number;
  readonly kinetics: number;
  readonly torpedos: number;
  readonly weaponCharge: number;
  readonly velocity: Vec2;
  readonly thrust: Vec2;
  readonly battleStateAge: number;
  readonly battleState: BattleState;
  // Attached by the combat-resolution collaborator, consumed by the defense stage.
  readonly hit?: Hit;
}

export interface Ship {
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly headingSetting: number;
  readonly velocity: Vec2;
}

export interface Base {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly antimatter: number;
}

export interface Shot {
  readonly x: number;
  readonly y: number;
  readonly bearing: number;
  readonly velocity: Vec2;
  readonly weapon: CombatantWeapon;
  readonly source: "combatant";
}

export interface Explosion {
  readonly x: number;
  readonly y: number;
  readonly age: number;
  readonly kind: "combatant";
}

export interface DebrisCloud {
  readonly x: number;
  readonly y: number;
  readonly concentration: number;
}

export interface World {
  readonly combatants: ReadonlyArray<Combatant>;
  readonly ship: Ship;
  readonly bases: ReadonlyArray<Base>;
  readonly shots: ReadonlyArray<Shot>;
  readonly explosions: ReadonlyArray<Explosion>;
  readonly clouds: ReadonlyArray<DebrisCloud>;
  readonly gameOver: boolean;
}

export interface CombatantWeaponStats {
  readonly shotSpeed: number;
  readonly threshold: number;
  readonly power: number;
  readonly inventory: AmmoSlot | null;
}

export type TheftPolicy = "exclusive" | "cumulative";
