import { itemName, type Consumable, type SceneDescriptor, type SceneStatus } from '@stranded/engine';

export type PlayArgs = {
  storyPath?: string;
  seed?: number;
};

/**
 * Parses `[path] [--seed n]`
 */
export function parsePlayArgs(argv: string[]): PlayArgs {
  const args: PlayArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--seed') {
      const value = argv[i + 1];
      const seed = value === undefined ? NaN : Number(value);
      if (!Number.isInteger(seed)) {
        throw new Error(`--seed needs an integer, got ${value ?? 'nothing'}`);
      }
      args.seed = seed;
      i++;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown flag ${arg}`);
    } else {
      args.storyPath = arg;
    }
  }

  return args;
}

function renderStatus(status: SceneStatus, items: Consumable[]): string[] {
  const { player, enemy } = status;
  const inventory = Object.entries(player.inventory)
    .map(([id, count]) => `${itemName(id, items)} x${count}`)
    .join(', ');

  const lines = [
    `${player.name}  HP ${player.health}/${player.maxHealth}  ATK ${player.attack}  ` +
      `LV ${player.level} (${player.experience}/${player.expToNextLevel} XP)  ${inventory || 'no items'}`,
  ];
  if (enemy) {
    lines.push(`${enemy.name}  HP ${enemy.health}/${enemy.maxHealth}`);
  }
  return lines;
}

/**
 * Text rendering of a scene descriptor for the console player
 */
export function renderScene(scene: SceneDescriptor, items: Consumable[]): string {
  if (scene.kind === 'gameOver') {
    const title = scene.outcome === 'ending' ? '== The End ==' : '== Game Over ==';
    return [title, scene.narrationText].join('\n');
  }

  const slots = scene.options.map((slot, i) => {
    if (!slot.label) return `  ${i + 1}) -`;
    return slot.enabled ? `  ${i + 1}) ${slot.label}` : `  ${i + 1}) ${slot.label} (unavailable)`;
  });

  return [`== ${scene.caption} ==`, scene.narrationText, '', ...renderStatus(scene.status, items), '', ...slots].join(
    '\n'
  );
}
