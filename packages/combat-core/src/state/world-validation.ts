import { BATTLE_STATES, COMBATANT_SHIELDS } from "../config/balance/combatant.ts";
import type { BattleState, World } from "../types.ts";

export type WorldValidationResult = {
  errors: string[];
  warnings: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isBattleState(value: unknown): value is BattleState {
  return typeof value === "string" && BATTLE_STATES.some((state) => state === value);
}

function checkNumbers(record: Record<string, unknown>, keys: ReadonlyArray<string>, path: string, errors: string[]): void {
  for (const key of keys) {
    if (!isFiniteNumber(record[key])) {
      errors.push(`${path}.${key} must be a finite number`);
    }
  }
}

function checkVector(value: unknown, path: string, errors: string[]): void {
  if (!isRecord(value)) {
    errors.push(`${path} must be an {x, y} vector`);
    return;
  }
  checkNumbers(value, ["x", "y"], path, errors);
}

function checkHit(value: unknown, path: string, errors: string[]): void {
  if (!isRecord(value)) {
    errors.push(`${path} must be an object`);
    return;
  }
  const weapon = value.weapon;
  if (weapon === "kinetic" || weapon === "torpedo") {
    checkNumbers(value, ["damage"], path, errors);
    return;
  }
  if (weapon === "phaser") {
    const ranges: unknown = value.ranges;
    if (!Array.isArray(ranges) || !ranges.every((range: unknown) => isFiniteNumber(range))) {
      errors.push(`${path}.ranges must be a list of finite numbers`);
    }
    return;
  }
  errors.push(`${path}.weapon must be kinetic, torpedo or phaser`);
}

function collectCombatant(value: unknown, path: string, result: WorldValidationResult): void {
  if (!isRecord(value)) {
    result.errors.push(`${path} must be an object`);
    return;
  }
  checkNumbers(value, ["x", "y", "shields", "antimatter", "kinetics", "torpedos", "weaponCharge", "battleStateAge"], path, result.errors);
  checkVector(value.velocity, `${path}.velocity`, result.errors);
  checkVector(value.thrust, `${path}.thrust`, result.errors);
  if (!isBattleState(value.battleState)) {
    result.errors.push(`${path}.battleState must be one of ${BATTLE_STATES.join(", ")}`);
  }
  if (value.hit !== undefined) {
    checkHit(value.hit, `${path}.hit`, result.errors);
  }

  if (isFiniteNumber(value.antimatter) && value.antimatter < 0) {
    result.warnings.push(`${path}.antimatter is negative`);
  }
  if (isFiniteNumber(value.shields) && value.shields > COMBATANT_SHIELDS) {
    result.warnings.push(`${path}.shields exceeds ${COMBATANT_SHIELDS}`);
  }
  for (const slot of ["kinetics", "torpedos"]) {
    const count = value[slot];
    if (isFiniteNumber(count) && count < 0) {
      result.warnings.push(`${path}.${slot} is negative`);
    }
  }
}

export function validateCombatant(value: unknown): WorldValidationResult {
  const result: WorldValidationResult = { errors: [], warnings: [] };
  collectCombatant(value, "combatant", result);
  return result;
}

export function validateWorld(value: unknown): WorldValidationResult {
  const result: WorldValidationResult = { errors: [], warnings: [] };
  if (!isRecord(value)) {
    result.errors.push("world must be an object");
    return result;
  }

  if (Array.isArray(value.combatants)) {
    const combatants: unknown[] = value.combatants;
    combatants.forEach((combatant, index) => collectCombatant(combatant, `combatants[${index}]`, result));
  } else {
    result.errors.push("combatants must be a list");
  }

  const ship = value.ship;
  if (isRecord(ship)) {
    checkNumbers(ship, ["x", "y", "heading", "headingSetting"], "ship", result.errors);
    checkVector(ship.velocity, "ship.velocity", result.errors);
  } else {
    result.errors.push("ship must be an object");
  }

  if (Array.isArray(value.bases)) {
    const bases: unknown[] = value.bases;
    bases.forEach((base, index) => {
      const path = `bases[${index}]`;
      if (!isRecord(base)) {
        result.errors.push(`${path} must be an object`);
        return;
      }
      if (typeof base.id !== "string") {
        result.errors.push(`${path}.id must be a string`);
      }
      checkNumbers(base, ["x", "y", "antimatter"], path, result.errors);
    });
  } else {
    result.errors.push("bases must be a list");
  }

  for (const key of ["shots", "explosions", "clouds"]) {
    if (!Array.isArray(value[key])) {
      result.errors.push(`${key} must be a list`);
    }
  }
  if (typeof value.gameOver !== "boolean") {
    result.errors.push("gameOver must be a boolean");
  }
  return result;
}

export function isWorld(value: unknown): value is World {
  return validateWorld(value).errors.length === 0;
}
