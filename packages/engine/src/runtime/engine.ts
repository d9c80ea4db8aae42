import type { CombatAction, GameSession, Player, PlayerTemplate, StoryPack } from "./types";
import { MAX_OPTIONS } from "./types";
import { type IRNG, rngForSession } from "./rng";
import { enterNode, getNode } from "./story";
import { handleOption } from "./choices/handlers";
import { appendCombatLog, appendNarration } from "./combat/narration";
import { applyCombatAction, continueAfterVictory } from "./combat/combat";
import { battleSlots, getCurrentScene } from "./selectors";

// Re-export for callers that only import the engine entry points
export { applyCombatAction, getCurrentScene };

export const UNAVAILABLE_OPTION_TEXT = "That option is not available.";

/** Battle slot index -> combat action */
const BATTLE_SLOT_ACTIONS: readonly CombatAction[] = ["quick", "heavy", "consumable"];

function createPlayer(template: PlayerTemplate): Player {
  return {
    name: template.name,
    health: template.health,
    maxHealth: template.health,
    attack: template.attack,
    level: 1,
    experience: 0,
    inventory: { ...template.inventory },
    skillPoints: 0,
  };
}

function isSlotIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < MAX_OPTIONS;
}

/**
 * Creates a new session positioned at the story's start node
 * (the start node's one-time effects are applied)
 */
export function createNewGame(storyPack: StoryPack, seed: number): GameSession {
  const session: GameSession = {
    story: {
      id: storyPack.id,
      version: storyPack.version,
    },
    player: createPlayer(storyPack.player),
    runtime: {
      status: "exploring",
      currentNodeId: storyPack.startNodeId,
      narration: [],
      combatLog: [],
      flags: {},
      rngSeed: seed,
      rngCounter: 0,
      history: {
        visitedNodes: [],
        chosenOptions: [],
        battlesWon: 0,
      },
    },
  };

  return enterNode(storyPack, session, storyPack.startNodeId);
}

/**
 * Applies the player's pick of slot `index` in the scene currently shown.
 *
 * In a battle the slots map to quick/heavy/consumable; after a victory slot 0
 * continues the story. Disabled or absent slots only add a notice line, and
 * terminal sessions are returned unchanged.
 */
export function applyOption(
  storyPack: StoryPack,
  session: GameSession,
  index: number,
  rng: IRNG = rngForSession(session)
): GameSession {
  const { runtime } = session;
  if (runtime.status === "lost" || runtime.status === "ended") {
    return session;
  }

  const combat = runtime.combat;
  if (runtime.status === "combat" && combat) {
    if (combat.phase === "won") {
      return index === 0 ? continueAfterVictory(storyPack, session) : appendCombatLog(session, UNAVAILABLE_OPTION_TEXT);
    }

    const slot = isSlotIndex(index) ? battleSlots(storyPack, session)[index] : undefined;
    const action = BATTLE_SLOT_ACTIONS[index];
    if (!slot?.enabled || !action) {
      return appendCombatLog(session, UNAVAILABLE_OPTION_TEXT);
    }
    return applyCombatAction(storyPack, session, action, rng);
  }

  const node = getNode(storyPack, runtime.currentNodeId);
  const option = isSlotIndex(index) ? node.options[index] : undefined;
  if (!option) {
    return appendNarration(session, UNAVAILABLE_OPTION_TEXT);
  }

  const withHistory: GameSession = {
    ...session,
    runtime: {
      ...runtime,
      history: {
        ...runtime.history,
        chosenOptions: [...runtime.history.chosenOptions, `${node.id}#${index}`],
      },
    },
  };

  return handleOption(option, storyPack, withHistory);
}
