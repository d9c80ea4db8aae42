import type { OptionHandler } from "./types";
import { enterNode } from "../story";

export const handleStoryOption: OptionHandler<"story"> = (option, storyPack, session) =>
  enterNode(storyPack, session, option.target);
