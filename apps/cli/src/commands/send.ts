import { Args, Command, Flags } from '@oclif/core';
import { DebugLogger, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import * as fs from 'fs';
import ora from 'ora';
import * as path from 'path';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';
import { CliUI } from '../utils/ui-helper.js';

/**
 * Send command - offer a file to a peer through the local node
 */
export default class Send extends Command {
  static description = 'Offer a file to a peer';

  static examples = [
    '<%= config.bin %> <%= command.id %> ./report.pdf --to alice@laptop',
    '<%= config.bin %> <%= command.id %> ./video.mkv --to 192.168.1.20:8080',
  ];

  static flags = {
    ...clientFlags,
    to: Flags.string({
      char: 't',
      description: 'Display name or host:port of the receiver',
      required: true,
    }),
  };

  static args = {
    file: Args.string({
      description: 'File path to send',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Send);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    const filePath = path.resolve(args.file);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      this.error(chalk.red(`Not a file: ${filePath}`));
    }

    const size = fs.statSync(filePath).size;
    const spinner = ora(`Offering ${path.basename(filePath)} (${CliUI.formatBytes(size)}) to ${flags.to}`).start();

    try {
      const { transfer, notifyError } = await new NodeApiClient(flags.api).send(filePath, flags.to);
      if (notifyError) {
        spinner.warn(`Staged as ${transfer.id}, but ${flags.to} was not told: ${notifyError}`);
        return;
      }
      spinner.succeed(`Offered as ${chalk.bold(transfer.id)}; waiting for ${flags.to} to accept`);
    } catch (error) {
      spinner.fail('Send failed');
      this.error(chalk.red(errorMessage(error)));
    }
  }
}
