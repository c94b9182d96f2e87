/**
 * Progress Reporter for the Sales ETL Pipeline
 * Provides formatted console output for tracking an invocation
 */

import { FailureDisposition } from './error-handler';

export class ProgressReporter {
  private startTime: Date | null = null;

  constructor(private readonly debugMode: boolean = false) {}

  /**
   * Log the start of an invocation
   */
  logRunStart(source: string, messageId: string | null, totalSteps: number): void {
    this.startTime = new Date();
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Sales ETL Invocation Started                                  ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Source:      ${source}`);
    console.log(`  Message ID:  ${messageId ?? '(none)'}`);
    console.log(`  Total Steps: ${totalSteps}`);
    console.log(`  Started:     ${this.startTime.toISOString()}`);
    console.log('');
  }

  /**
   * Log the start of a step
   */
  logStep(step: string, currentStep: number, totalSteps: number): void {
    const percent = ((currentStep / totalSteps) * 100).toFixed(1);
    console.log(`  [${currentStep}/${totalSteps}] ${step} (${percent}%)`);
  }

  /**
   * Log step completion
   */
  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    console.log(message);
  }

  /**
   * Log step failure
   */
  logStepFailure(stepName: string, error: Error): void {
    console.log(`    ❌ ${stepName} FAILED`);
    console.log(`       ${error.name}: ${error.message}`);
  }

  /**
   * Log per-table row counts
   */
  logTableCounts(counts: Record<string, number>): void {
    for (const [table, count] of Object.entries(counts)) {
      console.log(`    ${table.padEnd(14)} ${this.formatNumber(count)} rows`);
    }
  }

  /**
   * Log invocation completion
   */
  logRunComplete(status: 'loaded' | 'duplicate', totalDuration: number): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Sales ETL Invocation Completed                                ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Status:          ${status}`);
    console.log(`  Total Duration:  ${this.formatDuration(totalDuration)}`);
    if (this.startTime) {
      console.log(`  Started:         ${this.startTime.toISOString()}`);
      console.log(`  Completed:       ${new Date().toISOString()}`);
    }
    console.log('');
  }

  /**
   * Log invocation failure
   */
  logRunFailure(error: Error, disposition: FailureDisposition): void {
    console.log('\n╔════════════════════════════════════════════════════════════════╗');
    console.log(`║  Sales ETL Invocation FAILED                                   ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log(`  Error:       ${error.message}`);
    console.log(`  Disposition: ${disposition === 'retry' ? 'RETRY (transient, safe to redeliver)' : 'DISCARD (poison message)'}`);
    console.log('');
  }

  /**
   * Log warning message
   */
  logWarning(message: string): void {
    console.log(`  ⚠️  ${message}`);
  }

  /**
   * Log info message
   */
  logInfo(message: string): void {
    console.log(`  ℹ️  ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string): void {
    if (this.debugMode) {
      console.log(`  🐛 DEBUG: ${message}`);
    }
  }

  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  private formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
