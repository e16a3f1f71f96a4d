import type { CombatantWeapon, TheftPolicy } from "../../../packages/combat-core/src/types.ts";

export type GunnerySpec = {
  cadenceMs: number;
  range: number;
};

export type PatrolSpec = {
  speed: number;
  turnRateDegPerMs: number;
};

export type MatchSpec = {
  seed: number;
  maxSimSeconds: number;
  tickMs: number;
  combatantCount: number;
  baseCount: number;
  baseAntimatter: number;
  theftPolicy: TheftPolicy;
  gunnery: GunnerySpec;
  patrol: PatrolSpec;
};

export type BaseOutcome = {
  id: string;
  antimatterStart: number;
  antimatterEnd: number;
};

export type MatchResult = {
  spec: MatchSpec;
  simSecondsElapsed: number;
  outcome: {
    cleared: boolean;
    reason: string;
  };
  combatants: {
    start: number;
    destroyed: number;
    remaining: number;
  };
  shotsFired: Record<CombatantWeapon, number>;
  hitsLanded: number;
  antimatterStolen: number;
  bases: BaseOutcome[];
  logs: string[];
};
