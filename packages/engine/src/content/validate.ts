import type { NodeEffect, NodeId, Option, StoryPack } from "../runtime/types";
import { MAX_OPTIONS } from "../runtime/types";
import type { ValidationIssue } from "../runtime/errors";
import { resolveRules } from "../runtime/rules";

/** Fields each option kind may carry; anything else belongs to another kind */
const OPTION_FIELDS: Record<Option["kind"], readonly string[]> = {
  story: ["kind", "label", "target"],
  battle: ["kind", "label", "enemy", "returnTo"],
  end: ["kind", "label", "ending"],
};

function isOptionKind(kind: string): kind is Option["kind"] {
  return Object.prototype.hasOwnProperty.call(OPTION_FIELDS, kind);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isWholeNumber(value: unknown, min: number): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= min;
}

function validateOption(
  option: Option,
  path: string,
  nodeIds: Set<NodeId>,
  issues: ValidationIssue[]
): void {
  const kind: string = option.kind;
  if (!isOptionKind(kind)) {
    issues.push({ type: "error", message: `Unknown option kind "${kind}"`, path });
    return;
  }

  if (!isNonEmptyString(option.label)) {
    issues.push({ type: "error", message: "Option label is missing", path });
  }

  const allowed = OPTION_FIELDS[kind];
  for (const field of Object.keys(option)) {
    if (!allowed.includes(field)) {
      issues.push({ type: "error", message: `Field "${field}" does not belong to a ${kind} option`, path });
    }
  }

  switch (option.kind) {
    case "story":
      if (!nodeIds.has(option.target)) {
        issues.push({ type: "error", message: `Option target "${option.target}" does not exist`, path });
      }
      break;

    case "battle": {
      const enemy = option.enemy;
      if (!enemy || !isNonEmptyString(enemy.name)) {
        issues.push({ type: "error", message: "Battle option needs an enemy with a name", path });
      } else {
        if (!isWholeNumber(enemy.health, 1)) {
          issues.push({ type: "error", message: `Enemy "${enemy.name}" needs a positive whole health`, path });
        }
        if (!isWholeNumber(enemy.attack, 0)) {
          issues.push({ type: "error", message: `Enemy "${enemy.name}" needs a non-negative whole attack`, path });
        }
        if (!isWholeNumber(enemy.expReward, 0)) {
          issues.push({ type: "error", message: `Enemy "${enemy.name}" needs a non-negative whole expReward`, path });
        }
      }
      if (!nodeIds.has(option.returnTo)) {
        issues.push({ type: "error", message: `Battle returnTo "${option.returnTo}" does not exist`, path });
      }
      break;
    }

    case "end":
      if (!isNonEmptyString(option.ending)) {
        issues.push({ type: "error", message: "End option needs ending text", path });
      }
      break;
  }
}

const EFFECT_OPS: readonly string[] = ["heal", "damage", "addItem", "addExperience", "boostAttack"];

function validateEffect(effect: NodeEffect, path: string, itemIds: Set<string>, issues: ValidationIssue[]): void {
  const op: string = effect.op;
  if (!EFFECT_OPS.includes(op)) {
    issues.push({ type: "error", message: `Unknown effect op "${op}"`, path });
    return;
  }

  switch (effect.op) {
    case "addItem":
      if (!itemIds.has(effect.itemId)) {
        issues.push({ type: "error", message: `Unknown item "${effect.itemId}"`, path });
      }
      if (!isWholeNumber(effect.count, 1)) {
        issues.push({ type: "error", message: "addItem count must be a positive whole number", path });
      }
      break;

    case "heal":
    case "damage":
    case "addExperience":
    case "boostAttack":
      if (!isWholeNumber(effect.amount, 0)) {
        issues.push({ type: "error", message: `${effect.op} amount must be a non-negative whole number`, path });
      }
      break;
  }
}

/**
 * Nodes reachable from the start node through story targets and battle return targets
 */
function findReachable(storyPack: StoryPack, nodeIds: Set<NodeId>): Set<NodeId> {
  const byId = new Map(storyPack.nodes.map((node) => [node.id, node]));
  const reached = new Set<NodeId>();
  const queue: NodeId[] = nodeIds.has(storyPack.startNodeId) ? [storyPack.startNodeId] : [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || reached.has(id)) continue;
    reached.add(id);

    for (const option of byId.get(id)?.options ?? []) {
      const next = option.kind === "story" ? option.target : option.kind === "battle" ? option.returnTo : null;
      if (next && nodeIds.has(next) && !reached.has(next)) {
        queue.push(next);
      }
    }
  }

  return reached;
}

function validateRules(storyPack: StoryPack, issues: ValidationIssue[]): void {
  const { progression, combat } = resolveRules(storyPack);

  if (!isWholeNumber(progression.baseExp, 1)) {
    issues.push({ type: "error", message: "rules.progression.baseExp must be a whole number >= 1", path: "rules" });
  }
  if (!isWholeNumber(progression.expStep, 0)) {
    issues.push({ type: "error", message: "rules.progression.expStep must be a whole number >= 0", path: "rules" });
  }
  for (const key of ["quickSpread", "heavySpread", "enemySpread"] as const) {
    if (!isWholeNumber(combat[key], 0)) {
      issues.push({ type: "error", message: `rules.combat.${key} must be a whole number >= 0`, path: "rules" });
    }
  }
  if (!(combat.heavyHitChance >= 0 && combat.heavyHitChance <= 1)) {
    issues.push({ type: "error", message: "rules.combat.heavyHitChance must be within [0, 1]", path: "rules" });
  }
  if (!(combat.heavyMultiplier > 0)) {
    issues.push({ type: "error", message: "rules.combat.heavyMultiplier must be positive", path: "rules" });
  }
}

/**
 * Performs semantic validation on a story pack
 */
export function validateStoryPack(storyPack: StoryPack): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  // Check unique node ids
  const nodeIds = new Set<NodeId>();
  for (const node of storyPack.nodes) {
    if (nodeIds.has(node.id)) {
      issues.push({ type: "error", message: `Duplicate node id: "${node.id}"`, path: "nodes[].id" });
    }
    nodeIds.add(node.id);
  }

  // Check startNodeId exists
  if (!nodeIds.has(storyPack.startNodeId)) {
    issues.push({
      type: "error",
      message: `startNodeId "${storyPack.startNodeId}" does not exist in nodes`,
      path: "startNodeId",
    });
  }

  // Check item catalog
  const itemIds = new Set<string>();
  for (const item of storyPack.items) {
    if (itemIds.has(item.id)) {
      issues.push({ type: "error", message: `Duplicate item id: "${item.id}"`, path: "items[].id" });
    }
    itemIds.add(item.id);
    if (!isWholeNumber(item.effect.amount, 0)) {
      issues.push({ type: "error", message: `Item "${item.id}" needs a non-negative whole effect amount`, path: "items" });
    }
  }

  // Check player template
  if (!isWholeNumber(storyPack.player.health, 1)) {
    issues.push({ type: "error", message: "Player needs a positive whole health", path: "player.health" });
  }
  if (!isWholeNumber(storyPack.player.attack, 0)) {
    issues.push({ type: "error", message: "Player needs a non-negative whole attack", path: "player.attack" });
  }
  for (const [itemId, count] of Object.entries(storyPack.player.inventory)) {
    if (!itemIds.has(itemId)) {
      issues.push({ type: "error", message: `Unknown starting item "${itemId}"`, path: "player.inventory" });
    }
    if (!isWholeNumber(count, 0)) {
      issues.push({ type: "error", message: `Starting count of "${itemId}" must be a whole number >= 0`, path: "player.inventory" });
    }
  }
  if (!Object.values(storyPack.player.inventory).some((count) => count > 0)) {
    issues.push({ type: "warning", message: "Player starts without any consumable", path: "player.inventory" });
  }

  validateRules(storyPack, issues);

  // Check nodes, options and one-time effects
  for (const node of storyPack.nodes) {
    const nodePath = `nodes[${node.id}]`;

    if (node.options.length > MAX_OPTIONS) {
      issues.push({
        type: "error",
        message: `Node "${node.id}" has ${node.options.length} options (max ${MAX_OPTIONS})`,
        path: `${nodePath}.options`,
      });
    }
    if (node.options.length === 0) {
      issues.push({ type: "warning", message: `Node "${node.id}" has no options (dead end)`, path: nodePath });
    }

    node.options.forEach((option, i) => validateOption(option, `${nodePath}.options[${i}]`, nodeIds, issues));
    (node.onFirstVisit ?? []).forEach((effect, i) =>
      validateEffect(effect, `${nodePath}.onFirstVisit[${i}]`, itemIds, issues)
    );
  }

  // Check reachability
  const reachable = findReachable(storyPack, nodeIds);
  for (const node of storyPack.nodes) {
    if (!reachable.has(node.id)) {
      issues.push({ type: "warning", message: `Node "${node.id}" is unreachable from the start node`, path: `nodes[${node.id}]` });
    }
  }

  return issues;
}
