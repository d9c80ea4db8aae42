import type { Enemy, Player } from "../types";

/**
 * Creates a test player with sensible defaults
 */
export function makeTestPlayer(overrides?: Partial<Player>): Player {
  const defaultPlayer: Player = {
    name: "Test Player",
    health: 100,
    maxHealth: 100,
    attack: 20,
    level: 1,
    experience: 0,
    inventory: { medkit: 1 },
    skillPoints: 0,
  };

  return {
    ...defaultPlayer,
    ...overrides,
    inventory: {
      ...defaultPlayer.inventory,
      ...(overrides?.inventory || {}),
    },
  };
}

export function makeTestEnemy(overrides?: Partial<Enemy>): Enemy {
  return {
    name: "Test Enemy",
    health: 50,
    maxHealth: 50,
    attack: 10,
    expReward: 15,
    ...overrides,
  };
}
