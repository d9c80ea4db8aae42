import { createInterface } from 'readline/promises';
import { GameController } from '@stranded/engine';
import { loadStoryFile, resolveStoryPath } from './storyFile.js';
import { parsePlayArgs, renderScene } from './consoleView.js';

/**
 * Console front end: renders each scene and reads the slot number to pick
 */
async function play(): Promise<void> {
  const args = parsePlayArgs(process.argv.slice(2));
  const storyPath = resolveStoryPath(args.storyPath);
  const storyPack = loadStoryFile(storyPath);
  const seed = args.seed ?? Date.now();

  console.log(`📖 ${storyPack.title} (seed ${seed})\n`);

  const controller = new GameController(storyPack, { seed });
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    let scene = controller.start();
    while (scene.kind === 'scene') {
      console.log(`${renderScene(scene, storyPack.items)}\n`);

      const answer = (await rl.question('> ')).trim().toLowerCase();
      if (answer === 'q') {
        console.log('Bye.');
        return;
      }

      const choice = Number(answer);
      if (!Number.isInteger(choice) || choice < 1) {
        console.warn('⚠️  Enter 1, 2 or 3 (q to quit).\n');
        continue;
      }
      scene = controller.selectOption(choice - 1);
    }

    console.log(renderScene(scene, storyPack.items));
  } finally {
    rl.close();
  }
}

play().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error('❌ Play error:', error.message);
  } else {
    console.error('❌ Play error:', error);
  }
  process.exit(1);
});
