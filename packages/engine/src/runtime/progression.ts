import type { Consumable, ItemId, Player, ProgressionRules } from "./types";
import { DEFAULT_RULES } from "./rules";
import { heal, toWholeAmount } from "./character";

/**
 * Experience needed to leave the given level.
 * Depends on the level only; callers recompute it after every level gained.
 */
export function expToNextLevel(level: number, rules: ProgressionRules = DEFAULT_RULES.progression): number {
  return rules.baseExp + (level - 1) * rules.expStep;
}

/**
 * Adds experience and resolves every level-up it pays for, in order.
 * Log: one line for the gain, then one line per level reached.
 */
export function addExperience(
  player: Player,
  amount: number,
  rules: ProgressionRules = DEFAULT_RULES.progression
): { player: Player; log: string[] } {
  const gained = toWholeAmount(amount);
  const log: string[] = [`${player.name} gains ${gained} experience.`];

  let current: Player = { ...player, experience: player.experience + gained };

  // a threshold below 1 would never drain the pool
  let threshold = Math.max(1, expToNextLevel(current.level, rules));
  while (current.experience >= threshold) {
    const maxHealth = current.maxHealth + rules.healthPerLevel;
    current = {
      ...current,
      experience: current.experience - threshold,
      level: current.level + 1,
      skillPoints: current.skillPoints + rules.skillPointsPerLevel,
      maxHealth,
      health: maxHealth,
      attack: current.attack + rules.attackPerLevel,
    };
    log.push(
      `Level up! ${current.name} is now level ${current.level} (max health ${current.maxHealth}, attack ${current.attack}).`
    );
    threshold = Math.max(1, expToNextLevel(current.level, rules));
  }

  return { player: current, log };
}

export function addItem(player: Player, itemId: ItemId, count: number): Player {
  const amount = toWholeAmount(count);
  return {
    ...player,
    inventory: {
      ...player.inventory,
      [itemId]: (player.inventory[itemId] ?? 0) + amount,
    },
  };
}

export function boostAttack(player: Player, amount: number): Player {
  return { ...player, attack: player.attack + toWholeAmount(amount) };
}

export function itemName(itemId: ItemId, catalog: Consumable[]): string {
  return catalog.find((item) => item.id === itemId)?.name ?? itemId;
}

/**
 * Uses one unit of a consumable.
 * An empty stack (or an item the catalog does not know) is reported, never thrown.
 */
export function useConsumable(
  player: Player,
  itemId: ItemId,
  catalog: Consumable[]
): { player: Player; message: string; used: boolean } {
  const item = catalog.find((i) => i.id === itemId);
  const count = player.inventory[itemId] ?? 0;

  if (!item || count <= 0) {
    return {
      player,
      message: `You have no ${itemName(itemId, catalog)} left.`,
      used: false,
    };
  }

  const withoutItem: Player = {
    ...player,
    inventory: { ...player.inventory, [itemId]: count - 1 },
  };

  switch (item.effect.op) {
    case "heal": {
      const { character, applied } = heal(withoutItem, item.effect.amount);
      return {
        player: character,
        message: `You use a ${item.name} and recover ${applied} health.`,
        used: true,
      };
    }
  }
}
