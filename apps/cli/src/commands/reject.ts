import { Args, Command } from '@oclif/core';
import { DebugLogger, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import ora from 'ora';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';

/**
 * Reject command - turn down an incoming transfer
 */
export default class Reject extends Command {
  static description = 'Reject an incoming transfer';

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
    const { args, flags } = await this.parse(Reject);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    const spinner = ora(`Rejecting ${args.id}`).start();
    try {
      const transfer = await new NodeApiClient(flags.api).reject(args.id);
      spinner.succeed(`Rejected ${chalk.bold(transfer.filename)}`);
    } catch (error) {
      spinner.fail('Reject failed');
      this.error(chalk.red(errorMessage(error)));
    }
  }
}
