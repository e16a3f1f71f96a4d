export const KNOWN_SPACE_X = 500_000;
export const KNOWN_SPACE_Y = 500_000;

export const NUMBER_OF_COMBATANTS = 50;

// Bases
export const SHIP_DOCKING_DISTANCE = 4_000;

// Player ship
export const SHIP_TURN_TOLERANCE_DEG = 0.5;
