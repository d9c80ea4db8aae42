import type { StoryPack } from "../types";

/**
 * Creates a minimal test StoryPack: a start node that leads to a fight,
 * a loot node, and an ending
 */
export function makeTestStoryPack(overrides?: Partial<StoryPack>): StoryPack {
  const defaultStoryPack: StoryPack = {
    id: "test_story",
    title: "Test Story",
    version: "1.0.0",
    startNodeId: "start",
    player: {
      name: "Test Player",
      health: 100,
      attack: 20,
      inventory: { medkit: 1 },
    },
    items: [{ id: "medkit", name: "Medkit", effect: { op: "heal", amount: 30 } }],
    nodes: [
      {
        id: "start",
        caption: "Start",
        text: ["You are at the start."],
        options: [
          { kind: "story", label: "Search the cave", target: "cave" },
          {
            kind: "battle",
            label: "Fight the frog",
            enemy: { name: "Tusked Frog", health: 50, attack: 10, expReward: 25 },
            returnTo: "after_fight",
          },
          { kind: "end", label: "Give up", ending: "You sit down and wait for rescue." },
        ],
      },
      {
        id: "cave",
        caption: "Cave",
        text: ["A damp cave."],
        onFirstVisit: [
          { op: "addItem", itemId: "medkit", count: 1 },
          { op: "heal", amount: 10 },
        ],
        options: [{ kind: "story", label: "Go back", target: "start" }],
      },
      {
        id: "after_fight",
        caption: "Clearing",
        text: ["The frog lies still."],
        options: [{ kind: "end", label: "Walk on", ending: "You walk on." }],
      },
    ],
  };

  return {
    ...defaultStoryPack,
    ...overrides,
    player: {
      ...defaultStoryPack.player,
      ...(overrides?.player || {}),
    },
  };
}
