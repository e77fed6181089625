import pc from 'picocolors';
import type { ScanIdentity, ScanRecord } from '@diffwatch/checkpoint';
import type { ScanResult } from '@diffwatch/core';

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderScan(result: ScanResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    const target = `${result.repository} (${result.branch})`;
    switch (result.outcome) {
      case 'notified':
        console.log(`\n${pc.green('✅ Scan complete.')} ${target}`);
        console.log(`  Commits: ${result.commitCount}, files: ${result.fileCount}`);
        console.log('  Analysis emailed.');
        break;
      case 'no-changes':
        console.log(`\n${pc.green('✅ No changes.')} ${target} since ${result.since.toISOString()}`);
        break;
      case 'dry-run':
        console.log(`\n${pc.yellow('Dry run:')} ${target}`);
        console.log(`  Commits: ${result.commitCount}, files: ${result.fileCount}`);
        console.log(pc.bold('\nPrompt:'));
        console.log(result.prompt ?? '');
        break;
    }

    console.log(pc.bold('\nRange:'));
    console.log(`  Since: ${result.since.toISOString()}`);
    console.log(`  Checkpoint: ${result.checkpoint ? result.checkpoint.toISOString() : pc.gray('not recorded')}`);
    console.log(`  Run ID: ${result.runId}`);
  }

  renderHistory(identity: ScanIdentity, records: ScanRecord[]): void {
    if (this.isJson) {
      console.log(JSON.stringify({ ...identity, scans: records }, null, 2));
      return;
    }

    if (records.length === 0) {
      console.log(`No scans recorded for ${identity.repository} (${identity.branch}).`);
      return;
    }

    console.log(pc.bold(`Scans for ${identity.repository} (${identity.branch}):`));
    for (const record of records) {
      console.log(`  #${record.id}  ${record.scannedAt.toISOString()}`);
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
