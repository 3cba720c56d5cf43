/**
 * Download Command
 * 
 * Fetch a whole video, for videos without chapters.
 */

import ora from 'ora';
import { formatMegabytes } from '@chaptercut/utils';
import type { AppConfig } from '../config/index.js';
import { withSession } from '../lib/session.js';
import { formatProgress, printKeyValue, printSuccess } from '../lib/output.js';

interface DownloadOptions {
  output?: string;
}

export async function downloadCommand(
  config: AppConfig,
  url: string,
  options: DownloadOptions
): Promise<void> {
  const spinner = ora('Fetching video info...').start();

  await withSession(config, options.output, async ({ orchestrator }) => {
    const analysis = await orchestrator.analyze(url);
    if (!analysis.ok) {
      spinner.fail(analysis.error.message);
      process.exitCode = 1;
      return;
    }

    spinner.text = `Downloading ${analysis.metadata.title}...`;
    const result = await orchestrator.downloadFull({
      onProgress: (progress) => {
        spinner.text = formatProgress(progress);
      },
    });

    if (!result.ok) {
      spinner.fail(result.error.message);
      process.exitCode = 1;
      return;
    }

    spinner.stop();
    printSuccess('Complete video downloaded');
    printKeyValue('File', result.outputPath);
    printKeyValue('Size', formatMegabytes(result.sizeBytes));
  });
}
