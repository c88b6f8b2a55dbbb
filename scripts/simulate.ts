import 'dotenv/config';
import chalk from 'chalk';
import { loadPresetFromEnv } from '../src/config/env.js';
import { gridPositions } from '../src/layout/grid.js';
import { formatHud } from '../src/render/hud.js';
import { MetronomeEngine } from '../src/resonance/engine.js';

function main(): void {
  const preset = loadPresetFromEnv(process.env);
  const { config } = preset;
  const positions = gridPositions(config.count, config.rows, preset.layout);
  const engine = new MetronomeEngine(positions, config);

  console.log(chalk.cyan(`\n  ${preset.name}: ${preset.description}\n`));

  engine.on('locked', ({ time, orderParameter }) => {
    console.log(chalk.green(`  locked at t=${time.toFixed(2)}s (r=${orderParameter.toFixed(3)})`));
  });

  const summary = engine.run(snapshot => {
    if (snapshot.frame % config.fps !== 0) return;
    const clusters = snapshot.clusters.filter(c => c.qualified).length;
    const [line1, line2] = formatHud(snapshot, config, preset.swing);
    console.log(chalk.gray(`  ${line1}`));
    console.log(chalk.gray(`  ${line2}   clusters=${clusters}`));
  });

  console.log(chalk.white(`\n  ${summary.frames} frames, final r=${summary.finalOrderParameter.toFixed(3)}`));
  if (summary.lockedAtTime === null) {
    console.log(chalk.yellow('  never reached full lock'));
  }
}

try {
  main();
} catch (err) {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
}
