import type { OptionHandler } from "./types";

export const handleEndOption: OptionHandler<"end"> = (option, _storyPack, session) => ({
  ...session,
  runtime: {
    ...session.runtime,
    status: "ended",
    ending: option.ending,
    narration: [option.ending],
    combat: undefined,
    combatLog: [],
  },
});
