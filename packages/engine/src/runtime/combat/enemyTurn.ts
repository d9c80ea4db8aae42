import type { CombatRules, GameSession, StoryPack } from "../types";
import type { IRNG } from "../rng";
import { isAlive, takeDamage } from "../character";
import { resolveRules } from "../rules";
import { appendCombatLog } from "./narration";

export const TURN_PROMPT = "Your turn. What will you do?";

export function enemyAttackRange(attack: number, rules: CombatRules): [number, number] {
  return [attack - rules.enemySpread, attack + rules.enemySpread];
}

/**
 * Resolves the enemy's automatic answer to a player action.
 * Only runs in the "enemyTurn" phase; any other phase leaves the session untouched.
 */
export function runEnemyTurn(storyPack: StoryPack, session: GameSession, rng: IRNG): GameSession {
  const combat = session.runtime.combat;
  if (!combat || combat.phase !== "enemyTurn" || !combat.enemy) {
    return session;
  }

  const enemy = combat.enemy;
  const [min, max] = enemyAttackRange(enemy.attack, resolveRules(storyPack).combat);
  const { character: player, applied } = takeDamage(session.player, rng.nextInt(min, max));

  let updated: GameSession = appendCombatLog(
    { ...session, player },
    `${enemy.name} attacks you for ${applied} damage.`
  );

  if (!isAlive(player)) {
    const defeat = `You have been defeated by ${enemy.name}. Your journey ends here.`;
    updated = appendCombatLog(updated, defeat);
    return {
      ...updated,
      runtime: {
        ...updated.runtime,
        status: "lost",
        ending: defeat,
        combat: { ...combat, phase: "lost", enemy: undefined },
      },
    };
  }

  updated = appendCombatLog(updated, TURN_PROMPT);
  return {
    ...updated,
    runtime: {
      ...updated.runtime,
      combat: { ...combat, phase: "awaitingPlayerAction", round: combat.round + 1 },
    },
  };
}
