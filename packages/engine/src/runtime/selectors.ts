import type {
  GameSession,
  OptionSlot,
  PlayerStatus,
  Scene,
  SceneDescriptor,
  StoryPack,
} from "./types";
import { MAX_OPTIONS } from "./types";
import { getNode } from "./story";
import { expToNextLevel, itemName } from "./progression";
import { resolveRules } from "./rules";
import { defaultConsumableId } from "./combat/actions";

export const EMPTY_SLOT: OptionSlot = { label: "", enabled: false };

export const QUICK_ATTACK_LABEL = "Quick Attack";
export const HEAVY_ATTACK_LABEL = "Heavy Attack";
export const CONTINUE_LABEL = "Continue";

/**
 * Always three slots: missing entries become disabled empty slots
 */
function toSlots(slots: OptionSlot[]): [OptionSlot, OptionSlot, OptionSlot] {
  const padded = [...slots.slice(0, MAX_OPTIONS)];
  while (padded.length < MAX_OPTIONS) {
    padded.push(EMPTY_SLOT);
  }
  return [padded[0], padded[1], padded[2]];
}

function playerStatus(storyPack: StoryPack, session: GameSession): PlayerStatus {
  const { player } = session;
  return {
    name: player.name,
    health: player.health,
    maxHealth: player.maxHealth,
    attack: player.attack,
    level: player.level,
    experience: player.experience,
    expToNextLevel: expToNextLevel(player.level, resolveRules(storyPack).progression),
    skillPoints: player.skillPoints,
    inventory: { ...player.inventory },
  };
}

/**
 * Slots offered during a battle: two attacks and the current consumable
 */
export function battleSlots(storyPack: StoryPack, session: GameSession): OptionSlot[] {
  const itemId = defaultConsumableId(session.player, storyPack.items);
  const itemSlot: OptionSlot = itemId
    ? {
        label: `Use ${itemName(itemId, storyPack.items)} (${session.player.inventory[itemId] ?? 0})`,
        enabled: (session.player.inventory[itemId] ?? 0) > 0,
      }
    : EMPTY_SLOT;

  return [
    { label: QUICK_ATTACK_LABEL, enabled: true },
    { label: HEAVY_ATTACK_LABEL, enabled: true },
    itemSlot,
  ];
}

/**
 * Builds the scene descriptor for whatever the session shows right now
 */
export function getCurrentScene(storyPack: StoryPack, session: GameSession): SceneDescriptor {
  const { runtime } = session;

  if (runtime.status === "lost") {
    return {
      kind: "gameOver",
      outcome: "defeat",
      narrationText: runtime.combatLog.join("\n"),
    };
  }

  if (runtime.status === "ended") {
    return {
      kind: "gameOver",
      outcome: "ending",
      narrationText: runtime.ending ?? "",
    };
  }

  const status = playerStatus(storyPack, session);
  const combat = runtime.combat;

  if (runtime.status === "combat" && combat) {
    const enemy = combat.enemy;
    const scene: Scene = {
      kind: "scene",
      mode: combat.phase === "won" ? "victory" : "battle",
      caption: combat.phase === "won" ? "Victory" : `Battle: ${combat.enemyName}`,
      narrationText: runtime.combatLog.join("\n"),
      options: toSlots(
        combat.phase === "won" ? [{ label: CONTINUE_LABEL, enabled: true }] : battleSlots(storyPack, session)
      ),
      status: enemy
        ? { player: status, enemy: { name: enemy.name, health: enemy.health, maxHealth: enemy.maxHealth } }
        : { player: status },
    };
    return scene;
  }

  const node = getNode(storyPack, runtime.currentNodeId);
  return {
    kind: "scene",
    mode: "story",
    caption: node.caption,
    narrationText: runtime.narration.join("\n"),
    options: toSlots(node.options.map((option) => ({ label: option.label, enabled: true }))),
    status: { player: status },
  };
}
