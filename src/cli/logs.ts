import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createConfig } from '../pipeline/env';
import { isLogLevel } from '../pipeline/log';
import { createLineBuffer, filterLogLines, latestRunLog, type LineBuffer } from '../pipeline/logfile';

function tailFile(file: string, buffer: LineBuffer, onLines: (lines: string[]) => void) {
  let size = fs.statSync(file).size;
  setInterval(() => {
    try {
      const stat = fs.statSync(file);
      if (stat.size > size) {
        const stream = fs.createReadStream(file, { start: size, end: stat.size - 1 });
        stream.on('data', (buf) => onLines(buffer.push(buf.toString())));
        size = stat.size;
      }
    } catch (e) {
      console.error('Stopped following', file, e);
      process.exit(1);
    }
  }, 1500);
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('scratch', { type: 'string', describe: 'Scratch directory holding run-*.log (default SCRATCH_DIR)' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .help()
    .parse();

  const min = isLogLevel(argv.level) ? argv.level : 'debug';
  const file = argv.file ?? (await latestRunLog(createConfig({ scratchDir: argv.scratch }).scratchDir));
  if (!file) {
    console.error('No run-*.log found; run a merge first or pass --file');
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }

  const print = (lines: string[]) => {
    for (const line of filterLogLines(lines, min)) {
      process.stdout.write(line + '\n');
    }
  };
  const buffer = createLineBuffer();
  print(buffer.push(fs.readFileSync(file, 'utf8')));
  if (argv.follow) {
    tailFile(file, buffer, print);
  } else {
    print(buffer.flush());
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
