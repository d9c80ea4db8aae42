import type { CombatAction, CombatRules, Consumable, Enemy, ItemId, Player } from "../types";
import type { IRNG } from "../rng";
import { takeDamage } from "../character";
import { useConsumable } from "../progression";

export type PlayerActionContext = {
  player: Player;
  enemy: Enemy;
  items: Consumable[];
  rules: CombatRules;
  rng: IRNG;
};

/**
 * turnUsed = false means the action was refused: nothing changed and the
 * enemy does not get to answer it.
 */
export type PlayerActionResult = {
  player: Player;
  enemy: Enemy;
  log: string[];
  turnUsed: boolean;
};

type PlayerActionHandler = (ctx: PlayerActionContext) => PlayerActionResult;

export function quickAttackRange(attack: number, rules: CombatRules): [number, number] {
  return [attack - rules.quickSpread, attack + rules.quickSpread];
}

/**
 * The multiplied attack is truncated before the spread is applied
 */
export function heavyAttackRange(attack: number, rules: CombatRules): [number, number] {
  const base = Math.trunc(attack * rules.heavyMultiplier);
  return [base - rules.heavySpread, base + rules.heavySpread];
}

/**
 * The consumable a "use item" action reaches for: the first catalog item the
 * player still holds, else the first catalog item (reported as empty)
 */
export function defaultConsumableId(player: Player, items: Consumable[]): ItemId | undefined {
  const held = items.find((item) => (player.inventory[item.id] ?? 0) > 0);
  return held?.id ?? items[0]?.id;
}

function quickAttack({ player, enemy, rules, rng }: PlayerActionContext): PlayerActionResult {
  const [min, max] = quickAttackRange(player.attack, rules);
  const { character, applied } = takeDamage(enemy, rng.nextInt(min, max));
  return {
    player,
    enemy: character,
    log: [`You strike ${enemy.name} for ${applied} damage.`],
    turnUsed: true,
  };
}

function heavyAttack({ player, enemy, rules, rng }: PlayerActionContext): PlayerActionResult {
  if (rng.next() >= rules.heavyHitChance) {
    return {
      player,
      enemy,
      log: [`You wind up a heavy blow, but ${enemy.name} dodges it!`],
      turnUsed: true,
    };
  }

  const [min, max] = heavyAttackRange(player.attack, rules);
  const { character, applied } = takeDamage(enemy, rng.nextInt(min, max));
  return {
    player,
    enemy: character,
    log: [`Your heavy blow lands on ${enemy.name} for ${applied} damage!`],
    turnUsed: true,
  };
}

function consumable({ player, enemy, items }: PlayerActionContext): PlayerActionResult {
  const itemId = defaultConsumableId(player, items);
  if (!itemId) {
    return { player, enemy, log: ["You have nothing to use."], turnUsed: false };
  }

  const result = useConsumable(player, itemId, items);
  return {
    player: result.player,
    enemy,
    log: [result.message],
    turnUsed: result.used,
  };
}

function wastedTurn({ player, enemy }: PlayerActionContext): PlayerActionResult {
  return {
    player,
    enemy,
    log: ["You hesitate and waste your turn."],
    turnUsed: true,
  };
}

/**
 * Registry of player actions by kind
 */
export const playerActions: Record<CombatAction, PlayerActionHandler> = {
  quick: quickAttack,
  heavy: heavyAttack,
  consumable,
  other: wastedTurn,
};

export function isCombatAction(value: string): value is CombatAction {
  return Object.prototype.hasOwnProperty.call(playerActions, value);
}

/**
 * Resolves one player action. Anything that is not a known action kind is a wasted turn.
 */
export function resolvePlayerAction(action: string, ctx: PlayerActionContext): PlayerActionResult {
  const handler = isCombatAction(action) ? playerActions[action] : wastedTurn;
  return handler(ctx);
}
