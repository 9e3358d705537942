import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs-extra';
import { createConfig } from '../pipeline/env';

/*
 * reset.ts - destructive cleanup utility.
 * By default does NOTHING unless flags provided.
 * Operations:
 *   --scratch : delete the scratch directory (normalized clips, list, run logs)
 *   --output  : delete the merged output file
 *   --all     : both
 * Safety:
 *   Requires --yes to perform deletions. Otherwise prints plan only.
 */
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('scratch', { type: 'boolean', default: false })
    .option('output', { type: 'boolean', default: false })
    .option('all', { type: 'boolean', default: false })
    .option('scratch-dir', { type: 'string', describe: 'Override SCRATCH_DIR' })
    .option('output-file', { type: 'string', describe: 'Override OUTPUT_FILE' })
    .option('yes', { type: 'boolean', default: false, describe: 'Confirm destructive actions' })
    .help()
    .parse();

  const config = createConfig({
    scratchDir: argv['scratch-dir'],
    outputFile: argv['output-file'],
  });
  const ops = {
    scratch: argv.all || argv.scratch,
    output: argv.all || argv.output,
  };

  const plan: string[] = [];
  if (ops.scratch) plan.push(`Delete scratch dir: ${config.scratchDir}`);
  if (ops.output) plan.push(`Delete merged output: ${config.outputFile}`);

  if (!plan.length) {
    console.log('Nothing selected. Use --all or specific flags (see --help).');
    return;
  }
  console.log('Reset plan:');
  for (const p of plan) console.log(' -', p);

  if (!argv.yes) {
    console.log('\nDry run only. Re-run with --yes to execute.');
    return;
  }

  if (ops.scratch) {
    await fs.remove(config.scratchDir);
    console.log('Scratch dir removed.');
  }
  if (ops.output) {
    await fs.remove(config.outputFile);
    console.log('Merged output removed.');
  }
  console.log('Reset complete.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
