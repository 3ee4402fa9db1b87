import { Args, Command, Flags } from '@oclif/core';
import { DebugLogger, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import * as path from 'path';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';

/**
 * Fetch command - copy a received file out of the local node
 */
export default class Fetch extends Command {
  static description = 'Download the bytes of a completed incoming transfer';

  static examples = [
    '<%= config.bin %> <%= command.id %> 6f1c2e40-5d3e-11ef-8a2b-0242ac120002',
    '<%= config.bin %> <%= command.id %> 6f1c2e40-5d3e-11ef-8a2b-0242ac120002 --out ./inbox',
  ];

  static flags = {
    ...clientFlags,
    out: Flags.string({
      char: 'o',
      description: 'Output directory',
      default: '.',
    }),
  };

  static args = {
    id: Args.string({
      description: 'Transfer id',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Fetch);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    const progressBar = new cliProgress.SingleBar(
      {
        format: 'Download |' + chalk.cyan('{bar}') + '| {percentage}% | {value}/{total} MB',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
      },
      cliProgress.Presets.shades_classic
    );
    let progressStarted = false;

    try {
      const outputPath = await new NodeApiClient(flags.api).download(args.id, path.resolve(flags.out), progress => {
        if (!progressStarted) {
          progressBar.start(Math.ceil(progress.total / 1024 / 1024), 0);
          progressStarted = true;
        }
        progressBar.update(Math.ceil(progress.received / 1024 / 1024));
      });
      progressBar.stop();
      this.log(chalk.green(`✓ Saved ${outputPath}`));
    } catch (error) {
      progressBar.stop();
      this.error(chalk.red(`✗ Download failed: ${errorMessage(error)}`));
    }
  }
}
