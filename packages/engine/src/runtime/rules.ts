import type { Rules, StoryPack } from "./types";

export const DEFAULT_RULES: Rules = {
  progression: {
    baseExp: 20,
    expStep: 10,
    healthPerLevel: 10,
    attackPerLevel: 2,
    skillPointsPerLevel: 1,
  },
  combat: {
    quickSpread: 5,
    // truncated before the damage range is built
    heavyMultiplier: 1.5,
    heavySpread: 5,
    heavyHitChance: 0.6,
    enemySpread: 3,
  },
};

/**
 * Merges the story's rule overrides over the defaults, section by section
 */
export function resolveRules(storyPack: Pick<StoryPack, "rules">): Rules {
  return {
    progression: {
      ...DEFAULT_RULES.progression,
      ...(storyPack.rules?.progression || {}),
    },
    combat: {
      ...DEFAULT_RULES.combat,
      ...(storyPack.rules?.combat || {}),
    },
  };
}
