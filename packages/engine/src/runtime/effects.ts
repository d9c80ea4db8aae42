import type { Consumable, NodeEffect, Player, Rules } from "./types";
import { heal, takeDamage, toWholeAmount } from "./character";
import { addExperience, addItem, boostAttack, itemName } from "./progression";

export type EffectContext = {
  items: Consumable[];
  rules: Rules;
};

export type EffectResult = { player: Player; log: string[] };

type EffectByOp = { [E in NodeEffect as E["op"]]: E };

/**
 * Effect handler function type
 */
type EffectHandler<E extends NodeEffect> = (effect: E, player: Player, ctx: EffectContext) => EffectResult;

type EffectHandlers = { [Op in keyof EffectByOp]: EffectHandler<EffectByOp[Op]> };

/**
 * Registry of effect handlers by operation type
 */
const effectHandlers: EffectHandlers = {
  heal: (effect, player) => {
    const { character, applied } = heal(player, effect.amount);
    return { player: character, log: [`You recover ${applied} health.`] };
  },
  damage: (effect, player) => {
    // story hazards hurt but never finish the player off; only combat can
    const amount = Math.min(toWholeAmount(effect.amount), Math.max(0, player.health - 1));
    const { character, applied } = takeDamage(player, amount);
    return { player: character, log: [`You lose ${applied} health.`] };
  },
  addItem: (effect, player, ctx) => {
    const count = toWholeAmount(effect.count);
    return {
      player: addItem(player, effect.itemId, count),
      log: [`You found ${itemName(effect.itemId, ctx.items)} x${count}.`],
    };
  },
  addExperience: (effect, player, ctx) => addExperience(player, effect.amount, ctx.rules.progression),
  boostAttack: (effect, player) => {
    const boosted = boostAttack(player, effect.amount);
    return { player: boosted, log: [`Your attack rises to ${boosted.attack}.`] };
  },
};

function runHandler<Op extends keyof EffectByOp>(
  op: Op,
  effect: EffectByOp[Op],
  player: Player,
  ctx: EffectContext
): EffectResult {
  const handler: EffectHandlers[Op] = effectHandlers[op];
  return handler(effect, player, ctx);
}

/**
 * Applies a single effect to the player (immutably)
 */
export function applyEffect(effect: NodeEffect, player: Player, ctx: EffectContext): EffectResult {
  return runHandler(effect.op, effect, player, ctx);
}

/**
 * Applies multiple effects in sequence, collecting their log lines in order
 */
export function applyEffects(effects: NodeEffect[], player: Player, ctx: EffectContext): EffectResult {
  let current = player;
  const log: string[] = [];
  for (const effect of effects) {
    const result = applyEffect(effect, current, ctx);
    current = result.player;
    log.push(...result.log);
  }
  return { player: current, log };
}
