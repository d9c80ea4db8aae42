import { describe, it, expect } from "vitest";
import { GameController } from "./controller";
import { ContentError } from "./errors";
import { FakeRng, rollFor } from "./test-helpers/fakeRng";
import { makeTestStoryPack } from "./test-helpers/makeTestStoryPack";
import type { BattleOption, SceneDescriptor, StoryPack } from "./types";

describe("GameController", () => {
  it("emits the start scene to subscribers", () => {
    const controller = new GameController(makeTestStoryPack(), { seed: 1 });
    const seen: SceneDescriptor[] = [];
    controller.onScene((scene) => seen.push(scene));

    const scene = controller.start();

    expect(seen).toEqual([scene]);
    expect(scene.kind === "scene" && scene.caption).toBe("Start");
    expect(controller.getSession().runtime.rngSeed).toBe(1);
  });

  it("stops notifying after unsubscribe", () => {
    const controller = new GameController(makeTestStoryPack(), { seed: 1 });
    const seen: SceneDescriptor[] = [];
    const unsubscribe = controller.onScene((scene) => seen.push(scene));

    controller.start();
    unsubscribe();
    controller.selectOption(0);

    expect(seen).toHaveLength(1);
  });

  it("refuses intents before start", () => {
    const controller = new GameController(makeTestStoryPack());

    expect(() => controller.selectOption(0)).toThrow("Game not started: call start() first");
    expect(() => controller.getScene()).toThrow("Game not started: call start() first");
  });

  it("ignores an intent raised while a transition is still in flight", () => {
    const controller = new GameController(makeTestStoryPack(), { seed: 1 });
    controller.start();
    controller.onScene(() => {
      controller.selectOption(0);
    });

    controller.selectOption(0);

    expect(controller.getSession().runtime.currentNodeId).toBe("cave");
    expect(controller.getSession().runtime.history.chosenOptions).toEqual(["start#0"]);
  });

  it("plays a whole battle through scenes with an injected generator", () => {
    const rng = new FakeRng([
      rollFor(15, 15, 25),
      rollFor(13, 7, 13),
      rollFor(25, 15, 25),
      rollFor(7, 7, 13),
      rollFor(20, 15, 25),
    ]);
    const controller = new GameController(makeTestStoryPack(), { seed: 1, rng });
    controller.start();

    const battle = controller.selectOption(1);
    expect(battle.kind === "scene" && battle.mode).toBe("battle");

    controller.selectOption(0);
    controller.selectCombatAction("quick");
    const victory = controller.selectOption(0);

    expect(victory.kind === "scene" && victory.mode).toBe("victory");
    expect(victory.kind === "scene" && victory.status.player).toMatchObject({ level: 2, health: 110, attack: 22 });

    const clearing = controller.selectOption(0);
    expect(clearing.kind === "scene" && clearing.caption).toBe("Clearing");
    expect(controller.getSession().runtime.rngCounter).toBe(5);
  });

  it("keeps returning the game-over scene once the story has ended", () => {
    const controller = new GameController(makeTestStoryPack(), { seed: 1 });
    controller.start();

    const ending = controller.selectOption(2);
    const session = controller.getSession();

    expect(ending).toEqual({ kind: "gameOver", outcome: "ending", narrationText: "You sit down and wait for rescue." });
    expect(controller.selectOption(0)).toEqual(ending);
    expect(controller.selectCombatAction("heavy")).toEqual(ending);
    expect(controller.getSession()).toBe(session);
  });

  it("refuses a story pack with more than three options on a node", () => {
    const base = makeTestStoryPack();
    const storyPack: StoryPack = {
      ...base,
      nodes: base.nodes.map((node) =>
        node.id === "start"
          ? { ...node, options: [...node.options, { kind: "story" as const, label: "Climb the tree", target: "cave" }] }
          : node
      ),
    };

    expect(() => new GameController(storyPack)).toThrow(ContentError);
    expect(() => new GameController(storyPack)).toThrow(
      'Invalid story pack: Node "start" has 4 options (max 3) (nodes[start].options)'
    );
  });

  it("refuses a battle option without an enemy", () => {
    const base = makeTestStoryPack();
    const fight: BattleOption = {
      kind: "battle",
      label: "Fight the frog",
      enemy: { name: "Tusked Frog", health: 50, attack: 10, expReward: 25 },
      returnTo: "after_fight",
    };
    Reflect.deleteProperty(fight, "enemy");
    const storyPack: StoryPack = {
      ...base,
      nodes: base.nodes.map((node) =>
        node.id === "start" ? { ...node, options: [node.options[0], fight, node.options[2]] } : node
      ),
    };

    expect(() => new GameController(storyPack)).toThrow(ContentError);
    expect(() => new GameController(storyPack)).toThrow(
      "Invalid story pack: Battle option needs an enemy with a name (nodes[start].options[1])"
    );
  });
});
