import { Command, Flags } from '@oclif/core';
import {
  DEFAULT_PORT,
  DebugLogger,
  EventType,
  HubEvent,
  LanNode,
  Transfer,
  defaultDeviceName,
  errorMessage,
  getLocalIpAddresses,
} from '@lanbeam/core';
import chalk from 'chalk';
import * as path from 'path';
import prompts from 'prompts';
import { CliUI } from '../utils/ui-helper.js';

/**
 * Serve command - run a node until interrupted
 */
export default class Serve extends Command {
  static description = 'Run a node: discover peers and send or receive files';

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --name laptop --download-dir ./inbox',
    '<%= config.bin %> <%= command.id %> --interactive',
    '<%= config.bin %> <%= command.id %> --no-discovery --advertise 192.168.1.20',
  ];

  static flags = {
    name: Flags.string({
      description: 'Display name announced to peers (default: user@hostname)',
      env: 'LANBEAM_NAME',
    }),
    port: Flags.integer({
      description: 'Port this node listens on and probes peers at',
      env: 'LANBEAM_PORT',
      default: DEFAULT_PORT,
    }),
    host: Flags.string({
      description: 'Interface to bind',
      env: 'LANBEAM_HOST',
      default: '0.0.0.0',
    }),
    advertise: Flags.string({
      description: 'Address announced to peers (default: first physical IPv4)',
      env: 'LANBEAM_ADVERTISE',
    }),
    'download-dir': Flags.string({
      char: 'o',
      description: 'Where received files are saved',
      env: 'LANBEAM_DOWNLOAD_DIR',
      default: './downloads',
    }),
    'staging-dir': Flags.string({
      description: 'Where files wait between offer and delivery',
      env: 'LANBEAM_STAGING_DIR',
    }),
    discovery: Flags.boolean({
      description: 'Sweep the local subnets for peers',
      env: 'LANBEAM_DISCOVERY',
      default: true,
      allowNo: true,
    }),
    'sweep-interval': Flags.integer({
      description: 'Milliseconds between discovery sweeps',
      env: 'LANBEAM_SWEEP_INTERVAL',
      default: 5000,
    }),
    interactive: Flags.boolean({
      char: 'i',
      description: 'Ask whether to accept each incoming transfer',
      default: false,
    }),
    debug: Flags.boolean({
      description: 'Enable debug logging',
      default: false,
    }),
  };

  private prompting: Promise<void> = Promise.resolve();

  async run(): Promise<void> {
    const { flags } = await this.parse(Serve);

    if (flags.debug) {
      DebugLogger.setDebugMode(true);
    }

    const node = new LanNode({
      name: flags.name ?? defaultDeviceName(),
      port: flags.port,
      host: flags.host,
      advertiseAddress: flags.advertise,
      downloadDir: path.resolve(flags['download-dir']),
      ...(flags['staging-dir'] ? { stagingDir: path.resolve(flags['staging-dir']) } : {}),
      discovery: flags.discovery,
      sweepIntervalMs: flags['sweep-interval'],
    });

    CliUI.showBanner('📡 lanbeam');

    try {
      await node.start();
    } catch (error) {
      this.error(chalk.red(`Could not start node: ${errorMessage(error)}`));
    }

    CliUI.showNodeInfo({
      name: node.config.name,
      address: node.identity().address,
      downloadDir: node.config.downloadDir,
      discovery: node.config.discovery,
      localIPs: getLocalIpAddresses(),
    });

    node.hub.subscribe({
      send: (event: HubEvent) => {
        console.log(CliUI.describeEvent(event));
        if (flags.interactive && event.type === EventType.TRANSFER_REQUEST) {
          this.enqueuePrompt(node, event.payload);
        }
      },
    });

    console.log(chalk.gray(flags.interactive ? 'Waiting for transfers...' : 'Press Ctrl+C to exit'));
    console.log();

    await this.keepAlive(node);
  }

  /**
   * Ask about one incoming transfer at a time
   */
  private enqueuePrompt(node: LanNode, transfer: Readonly<Transfer>): void {
    this.prompting = this.prompting
      .then(async () => {
        const { accept } = await prompts({
          type: 'confirm',
          name: 'accept',
          message: `Accept ${transfer.filename} (${CliUI.formatBytes(transfer.sizeBytes)}) from ${transfer.senderName}?`,
          initial: true,
        });

        if (accept === true) {
          await node.transfers.accept(transfer.id);
        } else {
          await node.transfers.reject(transfer.id);
        }
      })
      .catch(error => {
        console.log(chalk.red(`✗ ${transfer.filename}: ${errorMessage(error)}`));
      });
  }

  private async keepAlive(node: LanNode): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = async () => {
        console.log(chalk.yellow('\n\nShutting down...'));
        try {
          await node.stop();
          resolve();
        } catch (error) {
          reject(error);
        }
      };

      process.once('SIGINT', cleanup);
      process.once('SIGTERM', cleanup);
    });
  }
}
