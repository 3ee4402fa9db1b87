import { Command } from '@oclif/core';
import { DebugLogger, Transfer, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';
import { CliUI } from '../utils/ui-helper.js';

/**
 * Transfers command - list the local node's transfers, newest last
 */
export default class Transfers extends Command {
  static description = 'List transfers known to the local node';

  static examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> --json'];

  static enableJsonFlag = true;

  static flags = {
    ...clientFlags,
  };

  async run(): Promise<Transfer[]> {
    const { flags } = await this.parse(Transfers);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    let transfers: Transfer[];
    try {
      transfers = await new NodeApiClient(flags.api).transfers();
    } catch (error) {
      this.error(chalk.red(errorMessage(error)));
    }

    if (transfers.length === 0) {
      this.log(chalk.gray('No transfers yet'));
      return transfers;
    }

    for (const transfer of [...transfers].sort((a, b) => a.createdAt - b.createdAt)) {
      this.log(CliUI.formatTransfer(transfer));
    }
    return transfers;
  }
}
