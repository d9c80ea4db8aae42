import type { GameSession } from "../types";

const MAX_LOG_ENTRIES = 50;

/**
 * Helper to append a combat log entry (immutable)
 * Returns a NEW session with the log entry appended
 */
export function appendCombatLog(session: GameSession, ...entries: string[]): GameSession {
  const newLog = [...session.runtime.combatLog, ...entries];
  return {
    ...session,
    runtime: {
      ...session.runtime,
      combatLog: newLog.slice(-MAX_LOG_ENTRIES),
    },
  };
}

/**
 * Appends a line to the narration of the story scene on screen (same cap as the combat log)
 */
export function appendNarration(session: GameSession, ...lines: string[]): GameSession {
  return {
    ...session,
    runtime: {
      ...session.runtime,
      narration: [...session.runtime.narration, ...lines].slice(-MAX_LOG_ENTRIES),
    },
  };
}
