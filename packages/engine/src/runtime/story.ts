import type { GameSession, NodeId, StoryNode, StoryPack } from "./types";
import { UnknownNodeError } from "./errors";
import { applyEffects } from "./effects";
import { resolveRules } from "./rules";

export const DEFAULT_REVISIT_TEXT = "There is nothing new here.";

// Story packs are immutable once loaded, so their index can be shared
const nodeIndexCache = new WeakMap<StoryPack, Map<NodeId, StoryNode>>();

function indexNodes(storyPack: StoryPack): Map<NodeId, StoryNode> {
  const cached = nodeIndexCache.get(storyPack);
  if (cached) {
    return cached;
  }
  const index = new Map<NodeId, StoryNode>();
  for (const node of storyPack.nodes) {
    index.set(node.id, node);
  }
  nodeIndexCache.set(storyPack, index);
  return index;
}

/**
 * Looks a node up by id.
 * Throws UnknownNodeError when the story pack does not define it.
 */
export function getNode(storyPack: StoryPack, nodeId: NodeId): StoryNode {
  const node = indexNodes(storyPack).get(nodeId);
  if (!node) {
    throw new UnknownNodeError(nodeId);
  }
  return node;
}

export function hasNode(storyPack: StoryPack, nodeId: NodeId): boolean {
  return indexNodes(storyPack).has(nodeId);
}

/**
 * Moves the session to a node and resolves its one-time effects.
 *
 * The node's `onFirstVisit` effects run once per session, gated by
 * `runtime.flags[nodeId]`; any later visit gets the revisit line instead.
 * Leaving combat happens here too: combat state and its log are cleared.
 */
export function enterNode(storyPack: StoryPack, session: GameSession, nodeId: NodeId): GameSession {
  const node = getNode(storyPack, nodeId);
  const effects = node.onFirstVisit ?? [];

  let player = session.player;
  let flags = session.runtime.flags;
  const effectLines: string[] = [];

  if (effects.length > 0) {
    if (flags[nodeId] === true) {
      effectLines.push(node.revisitText ?? DEFAULT_REVISIT_TEXT);
    } else {
      const result = applyEffects(effects, player, { items: storyPack.items, rules: resolveRules(storyPack) });
      player = result.player;
      effectLines.push(...result.log);
      flags = { ...flags, [nodeId]: true };
    }
  }

  const visitedNodes = session.runtime.history.visitedNodes.includes(nodeId)
    ? session.runtime.history.visitedNodes
    : [...session.runtime.history.visitedNodes, nodeId];

  return {
    ...session,
    player,
    runtime: {
      ...session.runtime,
      status: "exploring",
      currentNodeId: nodeId,
      narration: [...node.text, ...effectLines],
      combat: undefined,
      combatLog: [],
      flags,
      history: {
        ...session.runtime.history,
        visitedNodes,
      },
    },
  };
}
