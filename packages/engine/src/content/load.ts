import type { StoryPack } from "../runtime/types";
import { ContentError } from "../runtime/errors";
import { validateStoryPack } from "./validate";

/**
 * Checks a story pack before a session may use it.
 * Throws ContentError if any error-level issue is found; warnings pass.
 */
export function loadStoryPack(storyPack: StoryPack): StoryPack {
  const errors = validateStoryPack(storyPack).filter((issue) => issue.type === "error");
  if (errors.length > 0) {
    throw new ContentError(errors);
  }
  return storyPack;
}
