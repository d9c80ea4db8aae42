import type { GameSession, Option, OptionKind, StoryPack } from "../types";
import type { OptionHandlers } from "./types";
import { handleStoryOption } from "./story";
import { handleBattleOption } from "./battle";
import { handleEndOption } from "./ending";

/**
 * Registry of option handlers by kind
 */
export const optionHandlers: OptionHandlers = {
  story: handleStoryOption,
  battle: handleBattleOption,
  end: handleEndOption,
};

function runHandler<K extends OptionKind>(
  kind: K,
  option: Extract<Option, { kind: K }>,
  storyPack: StoryPack,
  session: GameSession
): GameSession {
  const handler: OptionHandlers[K] = optionHandlers[kind];
  return handler(option, storyPack, session);
}

/**
 * Routes an option to the handler for its kind
 */
export function handleOption(option: Option, storyPack: StoryPack, session: GameSession): GameSession {
  return runHandler(option.kind, option, storyPack, session);
}
