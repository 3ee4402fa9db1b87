import { Args, Command } from '@oclif/core';
import { DebugLogger, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import ora from 'ora';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';

/**
 * Accept command - accept an incoming transfer
 */
export default class Accept extends Command {
  static description = 'Accept an incoming transfer; the sender then pushes the file';

  static examples = ['<%= config.bin %> <%= command.id %> 6f1c2e40-5d3e-11ef-8a2b-0242ac120002'];

  static flags = {
    ...clientFlags,
  };

  static args = {
    id: Args.string({
      description: 'Transfer id',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Accept);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    const spinner = ora(`Accepting ${args.id}`).start();
    try {
      const transfer = await new NodeApiClient(flags.api).accept(args.id);
      spinner.succeed(`Accepted ${chalk.bold(transfer.filename)} from ${transfer.senderName}`);
    } catch (error) {
      spinner.fail('Accept failed');
      this.error(chalk.red(errorMessage(error)));
    }
  }
}
