// Runtime Types for the Stranded engine

/* ---------------------------------- */
/* ID Aliases                          */
/* ---------------------------------- */

export type StoryId = string;
export type StoryVersion = string;

export type NodeId = string;
export type ItemId = string;

/* ---------------------------------- */
/* Characters                          */
/* ---------------------------------- */

/**
 * Shared shape of every combatant.
 * Invariant: 0 <= health <= maxHealth
 */
export type Character = {
  name: string;
  health: number;
  maxHealth: number;
  attack: number;
};

export type Inventory = Record<ItemId, number>;

export type Player = Character & {
  level: number; // >= 1
  experience: number; // progress towards the next level, >= 0
  inventory: Inventory;
  skillPoints: number;
};

export type Enemy = Character & {
  expReward: number;
};

/**
 * Pure data recipe for a fresh Enemy.
 * Each battle option instantiates its own copy; nothing is shared between fights.
 */
export type EnemyDescriptor = {
  name: string;
  health: number;
  attack: number;
  expReward: number;
};

/* ---------------------------------- */
/* Items                               */
/* ---------------------------------- */

export type ItemEffect = { op: "heal"; amount: number };

export type Consumable = {
  id: ItemId;
  name: string;
  effect: ItemEffect;
};

/* ---------------------------------- */
/* StoryPack Types                     */
/* ---------------------------------- */

/* ---------- One-time node effects ---------- */

export type NodeEffect =
  | { op: "heal"; amount: number }
  | { op: "damage"; amount: number }
  | { op: "addItem"; itemId: ItemId; count: number }
  | { op: "addExperience"; amount: number }
  | { op: "boostAttack"; amount: number };

/* ---------- Options ---------- */

export type StoryOption = { kind: "story"; label: string; target: NodeId };
export type BattleOption = { kind: "battle"; label: string; enemy: EnemyDescriptor; returnTo: NodeId };
export type EndOption = { kind: "end"; label: string; ending: string };

export type Option = StoryOption | BattleOption | EndOption;
export type OptionKind = Option["kind"];

/* ---------- Nodes ---------- */

export type StoryNode = {
  id: NodeId;
  caption: string;
  text: string[];
  options: Option[]; // at most MAX_OPTIONS
  onFirstVisit?: NodeEffect[];
  /** Shown instead of the default line when the node's one-time effects were already used */
  revisitText?: string;
};

export const MAX_OPTIONS = 3;

/* ---------- Rules ---------- */

export type ProgressionRules = {
  baseExp: number;
  expStep: number;
  healthPerLevel: number;
  attackPerLevel: number;
  skillPointsPerLevel: number;
};

export type CombatRules = {
  quickSpread: number;
  heavyMultiplier: number;
  heavySpread: number;
  heavyHitChance: number; // probability in [0, 1]
  enemySpread: number;
};

export type Rules = {
  progression: ProgressionRules;
  combat: CombatRules;
};

export type PlayerTemplate = {
  name: string;
  health: number;
  attack: number;
  inventory: Inventory;
};

export type StoryPack = {
  id: StoryId;
  title: string;
  version: StoryVersion;

  startNodeId: NodeId;

  player: PlayerTemplate;
  items: Consumable[];

  rules?: {
    progression?: Partial<ProgressionRules>;
    combat?: Partial<CombatRules>;
  };

  nodes: StoryNode[];
};

/* ---------------------------------- */
/* Runtime: Combat                     */
/* ---------------------------------- */

export type CombatAction = "quick" | "heavy" | "consumable" | "other";

export type CombatPhase = "awaitingPlayerAction" | "enemyTurn" | "won" | "lost";

export type CombatState = {
  phase: CombatPhase;
  /** Absent once the fight is over: the enemy is discarded on victory or defeat */
  enemy?: Enemy;
  enemyName: string;
  returnTo: NodeId;
  startedByNodeId: NodeId;
  round: number;
};

/* ---------------------------------- */
/* Runtime: Session                    */
/* ---------------------------------- */

export type SessionStatus = "exploring" | "combat" | "lost" | "ended";

export type GameRuntime = {
  status: SessionStatus;
  currentNodeId: NodeId;

  /** Lines of the scene currently on screen */
  narration: string[];

  combat?: CombatState;
  combatLog: string[];

  /** One-time effect flags, keyed by node id */
  flags: Record<NodeId, boolean>;

  /** Terminal text once status is "ended" or "lost" */
  ending?: string;

  rngSeed: number;
  rngCounter: number;

  history: {
    visitedNodes: NodeId[];
    chosenOptions: string[];
    battlesWon: number;
  };
};

export type GameSession = {
  story: { id: StoryId; version: StoryVersion };
  player: Player;
  runtime: GameRuntime;
};

/* ---------------------------------- */
/* Scene descriptors                   */
/* ---------------------------------- */

export type OptionSlot = { label: string; enabled: boolean };

export type PlayerStatus = {
  name: string;
  health: number;
  maxHealth: number;
  attack: number;
  level: number;
  experience: number;
  expToNextLevel: number;
  skillPoints: number;
  inventory: Inventory;
};

export type EnemyStatus = {
  name: string;
  health: number;
  maxHealth: number;
};

export type SceneMode = "story" | "battle" | "victory";

export type SceneStatus = { player: PlayerStatus; enemy?: EnemyStatus };

export type Scene = {
  kind: "scene";
  mode: SceneMode;
  caption: string;
  narrationText: string;
  options: [OptionSlot, OptionSlot, OptionSlot];
  status: SceneStatus;
};

export type GameOverScene = {
  kind: "gameOver";
  outcome: "ending" | "defeat";
  narrationText: string;
};

export type SceneDescriptor = Scene | GameOverScene;
