import type { BattleOption, CombatPhase, Enemy, EnemyDescriptor, GameSession, StoryPack } from "../types";
import { type IRNG, rngForSession } from "../rng";
import { isAlive } from "../character";
import { addExperience } from "../progression";
import { resolveRules } from "../rules";
import { enterNode } from "../story";
import { appendCombatLog, appendNarration } from "./narration";
import { resolvePlayerAction } from "./actions";
import { runEnemyTurn, TURN_PROMPT } from "./enemyTurn";

/**
 * Builds a fresh enemy from its descriptor (never shared between fights)
 */
export function instantiateEnemy(descriptor: EnemyDescriptor): Enemy {
  const health = Math.max(1, Math.trunc(descriptor.health));
  return {
    name: descriptor.name,
    health,
    maxHealth: health,
    attack: descriptor.attack,
    expReward: descriptor.expReward,
  };
}

/**
 * Starts a battle from a battle option; the player acts first
 */
export function startBattle(session: GameSession, option: BattleOption): GameSession {
  const enemy = instantiateEnemy(option.enemy);

  return {
    ...session,
    runtime: {
      ...session.runtime,
      status: "combat",
      combat: {
        phase: "awaitingPlayerAction",
        enemy,
        enemyName: enemy.name,
        returnTo: option.returnTo,
        startedByNodeId: session.runtime.currentNodeId,
        round: 1,
      },
      combatLog: [`${enemy.name} blocks your way!`, TURN_PROMPT],
    },
  };
}

/**
 * Gets the current combat phase, or null when no battle is on
 */
export function getCombatPhase(session: GameSession): CombatPhase | null {
  return session.runtime.combat?.phase ?? null;
}

/**
 * True only while the battle waits for the player and both sides still stand
 */
export function canAct(session: GameSession): boolean {
  const combat = session.runtime.combat;
  return (
    session.runtime.status === "combat" &&
    combat?.phase === "awaitingPlayerAction" &&
    combat.enemy !== undefined &&
    isAlive(combat.enemy) &&
    isAlive(session.player)
  );
}

/**
 * Victory: the enemy is discarded and its reward paid out
 */
function resolveVictory(storyPack: StoryPack, session: GameSession, enemy: Enemy): GameSession {
  const reward = addExperience(session.player, enemy.expReward, resolveRules(storyPack).progression);
  const updated = appendCombatLog(
    { ...session, player: reward.player },
    `${enemy.name} has been defeated!`,
    ...reward.log
  );

  return {
    ...updated,
    runtime: {
      ...updated.runtime,
      combat: updated.runtime.combat && { ...updated.runtime.combat, phase: "won", enemy: undefined },
      history: {
        ...updated.runtime.history,
        battlesWon: updated.runtime.history.battlesWon + 1,
      },
    },
  };
}

/**
 * Resolves one player action and, if the enemy survives it, the enemy's answer.
 * Refused actions (wrong phase, a side already down, nothing to use) only add a log line.
 */
export function applyCombatAction(
  storyPack: StoryPack,
  session: GameSession,
  action: string,
  rng: IRNG = rngForSession(session)
): GameSession {
  const status = session.runtime.status;
  if (status === "lost" || status === "ended") {
    return session;
  }

  const combat = session.runtime.combat;
  if (!combat) {
    return appendNarration(session, "There is nothing to fight here.");
  }
  if (!canAct(session) || !combat.enemy) {
    return appendCombatLog(session, "You cannot act right now.");
  }

  const result = resolvePlayerAction(action, {
    player: session.player,
    enemy: combat.enemy,
    items: storyPack.items,
    rules: resolveRules(storyPack).combat,
    rng,
  });

  let updated: GameSession = appendCombatLog(
    {
      ...session,
      player: result.player,
      runtime: {
        ...session.runtime,
        combat: { ...combat, enemy: result.enemy },
      },
    },
    ...result.log
  );

  if (!result.turnUsed) {
    return { ...updated, runtime: { ...updated.runtime, rngCounter: rng.getCounter() } };
  }

  if (!isAlive(result.enemy)) {
    updated = resolveVictory(storyPack, updated, result.enemy);
  } else {
    updated = runEnemyTurn(
      storyPack,
      {
        ...updated,
        runtime: { ...updated.runtime, combat: { ...combat, enemy: result.enemy, phase: "enemyTurn" } },
      },
      rng
    );
  }

  return { ...updated, runtime: { ...updated.runtime, rngCounter: rng.getCounter() } };
}

/**
 * Leaves a won battle for the node recorded when it started
 */
export function continueAfterVictory(storyPack: StoryPack, session: GameSession): GameSession {
  const combat = session.runtime.combat;
  if (!combat || combat.phase !== "won") {
    return session;
  }
  return enterNode(storyPack, session, combat.returnTo);
}
