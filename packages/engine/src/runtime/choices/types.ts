import type { GameSession, Option, OptionKind, StoryPack } from "../types";

/**
 * Option handler function type, one per option kind
 */
export type OptionHandler<K extends OptionKind> = (
  option: Extract<Option, { kind: K }>,
  storyPack: StoryPack,
  session: GameSession
) => GameSession;

export type OptionHandlers = { [K in OptionKind]: OptionHandler<K> };
