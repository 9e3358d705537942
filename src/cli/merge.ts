import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createConfig, ENV } from '../pipeline/env';
import { ConcatError, ConfigError } from '../pipeline/errors';
import { error, info, isLogLevel, setLogLevel } from '../pipeline/log';
import { selectProfile } from '../pipeline/profiles';
import { runBatch } from '../pipeline/run';
import { askEncodeMode } from './prompt';

async function resolveModeInput(flag: string | undefined): Promise<string> {
  if (flag !== undefined) return flag;
  if (ENV.encodeMode) return ENV.encodeMode;
  return process.stdin.isTTY ? askEncodeMode() : '';
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('input', { type: 'string', describe: 'Directory scanned for clips (default INPUT_DIR)' })
    .option('scratch', { type: 'string', describe: 'Scratch directory, wiped every run (default SCRATCH_DIR)' })
    .option('output', { type: 'string', describe: 'Merged output file (default OUTPUT_FILE)' })
    .option('mode', { type: 'string', describe: 'Encoder: 1/software or 2/hardware; anything else is software' })
    .option('width', { type: 'number', describe: 'Canvas width (default TARGET_WIDTH)' })
    .option('height', { type: 'number', describe: 'Canvas height (default TARGET_HEIGHT)' })
    .option('ext', { type: 'string', array: true, describe: 'Recognised extension, repeatable (default VIDEO_EXTS)' })
    .option('concurrency', { type: 'number', describe: 'Parallel encodes (default NORMALIZE_CONCURRENCY)' })
    .option('log-level', { type: 'string', default: ENV.logLevel })
    .help()
    .parse();

  if (isLogLevel(argv['log-level'])) setLogLevel(argv['log-level']);

  const config = createConfig({
    inputDir: argv.input,
    scratchDir: argv.scratch,
    outputFile: argv.output,
    width: argv.width,
    height: argv.height,
    extensions: argv.ext,
    concurrency: argv.concurrency,
  });
  const profile = selectProfile(await resolveModeInput(argv.mode));
  info('profile.selected', { mode: profile.mode, label: profile.label });

  const outcome = await runBatch(config, profile);
  switch (outcome.status) {
    case 'no-input':
      console.log(`No video files found in ${config.inputDir}.`);
      return;
    case 'nothing-merged':
      console.log(`None of the ${outcome.candidates.length} file(s) could be normalized; nothing to merge.`);
      console.log(`Partial outputs and run log are in ${config.scratchDir}`);
      return;
    case 'merged': {
      const skipped = outcome.results.filter((r) => !r.ok);
      console.log(`Merged ${outcome.manifest.length} clip(s) into ${outcome.outputPath}`);
      for (const r of skipped) {
        console.log(` - skipped ${r.sourcePath}`);
      }
      console.log(`Scratch files kept in ${config.scratchDir}`);
      return;
    }
  }
}

main().catch((e) => {
  if (e instanceof ConcatError || e instanceof ConfigError) {
    error('merge.fail', { error: e.toString(), code: e.code });
    if (e instanceof ConcatError && e.stderrTail) console.error(e.stderrTail);
  } else {
    console.error(e);
  }
  process.exit(1);
});
