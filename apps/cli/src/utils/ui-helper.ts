import { EventType, HubEvent, Peer, Transfer, TransferStatus } from '@lanbeam/core';
import chalk from 'chalk';

const STATUS_COLORS: Record<TransferStatus, (text: string) => string> = {
  [TransferStatus.PENDING]: text => chalk.yellow(text),
  [TransferStatus.ACCEPTED]: text => chalk.cyan(text),
  [TransferStatus.REJECTED]: text => chalk.red(text),
  [TransferStatus.COMPLETED]: text => chalk.green(text),
};

/**
 * CLI UI Helper
 * Consistent formatting for the node and client commands
 */
export class CliUI {
  /**
   * Display app banner
   */
  static showBanner(title: string): void {
    console.log();
    console.log(chalk.cyan('╔' + '═'.repeat(58) + '╗'));
    console.log(chalk.cyan('║') + chalk.bold.cyan(`  ${title}`.padEnd(58)) + chalk.cyan('║'));
    console.log(chalk.cyan('╚' + '═'.repeat(58) + '╝'));
    console.log();
  }

  /**
   * Display the identity and directories of a running node
   */
  static showNodeInfo(config: {
    name: string;
    address: string;
    downloadDir: string;
    discovery: boolean;
    localIPs: string[];
  }): void {
    const { name, address, downloadDir, discovery, localIPs } = config;

    console.log(chalk.green('┌' + '─'.repeat(58) + '┐'));
    console.log(chalk.green('│') + chalk.bold.green('  ✓ Node Started'.padEnd(58)) + chalk.green('│'));
    console.log(chalk.green('├' + '─'.repeat(58) + '┤'));
    console.log(chalk.green('│') + chalk.white(`  Name:       ${chalk.bold(name)}`.padEnd(68)) + chalk.green('│'));
    console.log(chalk.green('│') + chalk.white(`  Address:    ${chalk.bold.cyan(address)}`.padEnd(78)) + chalk.green('│'));
    console.log(chalk.green('│') + chalk.white(`  Downloads:  ${downloadDir}`.padEnd(58)) + chalk.green('│'));
    if (!discovery) {
      console.log(chalk.green('│') + chalk.yellow('  Discovery:  off'.padEnd(58)) + chalk.green('│'));
    }
    console.log(chalk.green('└' + '─'.repeat(58) + '┘'));
    console.log();

    if (localIPs.length > 1) {
      console.log(chalk.gray('  Other local addresses:'));
      for (const ip of localIPs.slice(1, 3)) {
        console.log(chalk.gray(`    • ${ip}`));
      }
      console.log();
    }
  }

  static formatPeer(peer: Peer, now: number = Date.now()): string {
    const seen = Math.max(0, Math.round((now - peer.lastSeenAt) / 1000));
    const state = peer.online ? chalk.green('online') : chalk.gray('offline');
    return `${chalk.bold(peer.displayName)}  ${chalk.cyan(peer.address)}  ${state}  ${chalk.gray(`seen ${seen}s ago`)}`;
  }

  static formatTransfer(transfer: Transfer): string {
    const arrow = transfer.direction === 'outgoing' ? '→' : '←';
    const other = transfer.direction === 'outgoing' ? transfer.receiverAddress : transfer.senderName;
    const parts = [
      chalk.gray(transfer.id),
      STATUS_COLORS[transfer.status](transfer.status.padEnd(9)),
      `${arrow} ${other}`,
      `${chalk.bold(transfer.filename)} (${CliUI.formatBytes(transfer.sizeBytes)})`,
    ];
    if (transfer.error) {
      parts.push(chalk.red(`! ${transfer.error}`));
    }
    return parts.join('  ');
  }

  /**
   * One line per hub event, for the serve command's log
   */
  static describeEvent(event: HubEvent): string {
    switch (event.type) {
      case EventType.PEER_DISCOVERED:
        return chalk.green(`+ ${event.payload.displayName} (${event.payload.address})`);
      case EventType.PEER_OFFLINE:
        return chalk.gray(`- ${event.payload.displayName} (${event.payload.address}) went offline`);
      case EventType.TRANSFER_REQUEST:
        return chalk.cyan(
          `📥 ${event.payload.senderName} wants to send ${event.payload.filename} ` +
            `(${CliUI.formatBytes(event.payload.sizeBytes)}) [${event.payload.id}]`
        );
      case EventType.TRANSFER_ACCEPTED:
        return chalk.cyan(`✓ Accepted ${event.payload.filename} [${event.payload.id}]`);
      case EventType.TRANSFER_REJECTED:
        return chalk.yellow(`✗ Rejected ${event.payload.filename} [${event.payload.id}]`);
      case EventType.TRANSFER_COMPLETED:
        return event.payload.direction === 'outgoing'
          ? chalk.green(`✓ Sent ${event.payload.filename} to ${event.payload.receiverAddress}`)
          : chalk.green(`✓ Received ${event.payload.filename} from ${event.payload.senderName}`);
      case EventType.TRANSFER_FAILED:
        return chalk.red(`✗ ${event.payload.filename} failed: ${event.payload.error ?? 'unknown error'}`);
    }
  }

  /**
   * Format bytes to human readable
   */
  static formatBytes(bytes: number): string {
    if (bytes === 0) return '0 B';
    const k = 1024;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.floor(Math.log(bytes) / Math.log(k));
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
  }

  /**
   * Show progress status
   */
  static showProgressInfo(message: string, status: 'info' | 'success' | 'error' | 'warning' = 'info'): void {
    const icons = {
      info: 'ℹ️',
      success: '✅',
      error: '❌',
      warning: '⚠️',
    };

    const colors = {
      info: chalk.cyan,
      success: chalk.green,
      error: chalk.red,
      warning: chalk.yellow,
    };

    console.log(colors[status](`  ${icons[status]}  ${message}`));
  }
}
