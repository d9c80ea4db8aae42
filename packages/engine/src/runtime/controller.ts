import type { CombatAction, GameSession, SceneDescriptor, StoryPack } from "./types";
import type { IRNG } from "./rng";
import { applyCombatAction, applyOption, createNewGame, getCurrentScene } from "./engine";
import { loadStoryPack } from "../content/load";

export type SceneListener = (scene: SceneDescriptor) => void;

export type GameControllerOptions = {
  seed?: number;
  /** Replaces the session's seeded generator for every draw (tests, replays) */
  rng?: IRNG;
};

/**
 * Owns one game session and turns player intents into scenes.
 *
 * Every intent runs to completion (player action plus the enemy's answer)
 * before the next is accepted: intents that arrive from a scene listener
 * while a transition is in flight are ignored.
 */
export class GameController {
  private readonly storyPack: StoryPack;
  private readonly options: GameControllerOptions;
  private readonly listeners = new Set<SceneListener>();
  private session: GameSession | null = null;
  private transitioning = false;

  /**
   * @throws ContentError when the story pack fails validation
   */
  constructor(storyPack: StoryPack, options: GameControllerOptions = {}) {
    this.storyPack = loadStoryPack(storyPack);
    this.options = options;
  }

  /**
   * Starts (or restarts) the session at the story's start node
   */
  start(): SceneDescriptor {
    return this.transition(() => createNewGame(this.storyPack, this.options.seed ?? Date.now()));
  }

  selectOption(index: number): SceneDescriptor {
    return this.transition(() => applyOption(this.storyPack, this.requireSession(), index, this.options.rng));
  }

  selectCombatAction(kind: CombatAction): SceneDescriptor {
    return this.transition(() => applyCombatAction(this.storyPack, this.requireSession(), kind, this.options.rng));
  }

  getScene(): SceneDescriptor {
    return getCurrentScene(this.storyPack, this.requireSession());
  }

  getSession(): GameSession {
    return this.requireSession();
  }

  /**
   * Subscribes to every scene emitted after a transition. Returns an unsubscribe function.
   */
  onScene(listener: SceneListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private requireSession(): GameSession {
    if (!this.session) {
      throw new Error("Game not started: call start() first");
    }
    return this.session;
  }

  private transition(next: () => GameSession): SceneDescriptor {
    if (this.transitioning) {
      return this.getScene();
    }

    this.transitioning = true;
    try {
      this.session = next();
      const scene = getCurrentScene(this.storyPack, this.session);
      for (const listener of this.listeners) {
        listener(scene);
      }
      return scene;
    } finally {
      this.transitioning = false;
    }
  }
}
