import { createInterface } from 'node:readline';

export function ask(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function askEncodeMode(): Promise<string> {
  console.log('Select encoding mode:');
  console.log(' [1] CPU (libx264)    - default, most compatible, slower');
  console.log(' [2] GPU (h264_nvenc) - needs an NVIDIA card, much faster');
  return ask('\nMode (1 or 2, Enter for 1): ');
}
