import { Command } from '@oclif/core';
import { DebugLogger, Peer, errorMessage } from '@lanbeam/core';
import chalk from 'chalk';
import { NodeApiClient } from '../utils/api-client.js';
import { clientFlags } from '../utils/flags.js';
import { CliUI } from '../utils/ui-helper.js';

/**
 * Peers command - list the peers the local node sees online
 */
export default class Peers extends Command {
  static description = 'List peers currently online';

  static examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> --json'];

  static enableJsonFlag = true;

  static flags = {
    ...clientFlags,
  };

  async run(): Promise<Peer[]> {
    const { flags } = await this.parse(Peers);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    let peers: Peer[];
    try {
      peers = await new NodeApiClient(flags.api).peers();
    } catch (error) {
      this.error(chalk.red(errorMessage(error)));
    }

    if (peers.length === 0) {
      this.log(chalk.gray('No peers online'));
      return peers;
    }

    const now = Date.now();
    for (const peer of [...peers].sort((a, b) => a.displayName.localeCompare(b.displayName))) {
      this.log(CliUI.formatPeer(peer, now));
    }
    return peers;
  }
}
