import type { Character } from "./types";

/**
 * Coerces a damage/heal amount to a non-negative integer.
 * Non-finite input counts as 0; fractions are truncated.
 */
export function toWholeAmount(amount: number): number {
  if (!Number.isFinite(amount) || amount <= 0) {
    return 0;
  }
  return Math.trunc(amount);
}

/**
 * Applies damage (immutably). `applied` is the health actually lost,
 * which is what narration should report.
 */
export function takeDamage<T extends Character>(character: T, amount: number): { character: T; applied: number } {
  const damage = toWholeAmount(amount);
  const health = Math.max(0, character.health - damage);
  return {
    character: { ...character, health },
    applied: character.health - health,
  };
}

/**
 * Restores health up to maxHealth (immutably). `applied` is the health actually restored.
 */
export function heal<T extends Character>(character: T, amount: number): { character: T; applied: number } {
  const restore = toWholeAmount(amount);
  const health = Math.min(character.maxHealth, character.health + restore);
  return {
    character: { ...character, health },
    applied: Math.max(0, health - character.health),
  };
}

export function isAlive(character: Character): boolean {
  return character.health > 0;
}
