import type { OptionHandler } from "./types";
import { getNode } from "../story";
import { startBattle } from "../combat/combat";

/**
 * The return target is resolved up front so a broken pack fails when the
 * fight starts, not after the player has won it
 */
export const handleBattleOption: OptionHandler<"battle"> = (option, storyPack, session) => {
  getNode(storyPack, option.returnTo);
  return startBattle(session, option);
};
