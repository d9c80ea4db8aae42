import type { GameSession, Player, StoryPack } from "../types";
import { createNewGame } from "../engine";

/**
 * Creates a test session at the story's start node, optionally with a custom player
 */
export function makeTestSession(storyPack: StoryPack, player?: Player, seed: number = 123456): GameSession {
  const session = createNewGame(storyPack, seed);
  return player ? { ...session, player } : session;
}
