/**
 * Operator-facing run summary.
 *
 * Condenses a RunReport into what the operator needs after a run: the
 * exit code, the failing module and reason, and the rollback counts.
 */

import { ExitCode, ModuleRunStatus, RunReport, RunStatus } from '../domain/run';

export type SummarySeverity = 'info' | 'warning' | 'error';

export interface RollbackCounts {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  exitCode: ExitCode;
  severity: SummarySeverity;
  dryRun: boolean;
  title: string;
  failingModule?: string;
  reason?: string;
  errorCode?: string;
  rollback?: RollbackCounts;
  /** Commands that failed during rollback and may need manual attention. */
  unrevertedCommands: string[];
  counts: Record<ModuleRunStatus, number>;
  modules: Array<{ moduleId: string; status: ModuleRunStatus }>;
  suggestedActions: string[];
}

const TITLES: Record<ExitCode, string> = {
  [ExitCode.Success]: 'Provisioning complete',
  [ExitCode.ModuleFailure]: 'Provisioning failed; changes rolled back',
  [ExitCode.ConfigurationError]: 'Configuration error',
  [ExitCode.RollbackDegraded]: 'Provisioning failed; rollback incomplete',
  [ExitCode.StorageError]: 'State storage failure',
  [ExitCode.LockHeld]: 'Another provisioning run is active',
  [ExitCode.Declined]: 'Provisioning canceled',
};

function severityOf(exitCode: ExitCode): SummarySeverity {
  switch (exitCode) {
    case ExitCode.Success:
      return 'info';
    case ExitCode.Declined:
    case ExitCode.LockHeld:
      return 'warning';
    default:
      return 'error';
  }
}

function emptyCounts(): Record<ModuleRunStatus, number> {
  return {
    [ModuleRunStatus.Pending]: 0,
    [ModuleRunStatus.Skipped]: 0,
    [ModuleRunStatus.Checking]: 0,
    [ModuleRunStatus.Blocked]: 0,
    [ModuleRunStatus.Ready]: 0,
    [ModuleRunStatus.Running]: 0,
    [ModuleRunStatus.Completed]: 0,
    [ModuleRunStatus.Failed]: 0,
  };
}

export function summarizeRun(report: RunReport): RunSummary {
  const counts = emptyCounts();
  const modules = report.plan.order
    .filter((moduleId) => Object.prototype.hasOwnProperty.call(report.modules, moduleId))
    .map((moduleId) => ({ moduleId, status: report.modules[moduleId].status }));
  for (const m of modules) counts[m.status] += 1;

  const suggestedActions: string[] = [];
  const error = report.failure?.error;
  if (error) {
    for (const fix of error.suggestedFixes) {
      if (fix.description) suggestedActions.push(fix.description);
    }
  }
  const unrevertedCommands = report.rollback?.failed.map((f) => f.entry.rollbackCommand) ?? [];
  if (unrevertedCommands.length > 0) {
    suggestedActions.push('Run the failed rollback commands manually, then re-run provisioning');
  }

  const title = report.dryRun && report.exitCode === ExitCode.Success ? 'Dry run: all modules ready or already done' : TITLES[report.exitCode];

  return {
    runId: report.runId,
    status: report.status,
    exitCode: report.exitCode,
    severity: severityOf(report.exitCode),
    dryRun: report.dryRun,
    title,
    failingModule: report.failure?.moduleId,
    reason: error?.message,
    errorCode: error?.code,
    rollback: report.rollback
      ? { attempted: report.rollback.attempted, succeeded: report.rollback.succeeded, failed: report.rollback.failed.length }
      : undefined,
    unrevertedCommands,
    counts,
    modules,
    suggestedActions,
  };
}

/** Plain-text rendering, one line per item. */
export function describeRun(report: RunReport): string[] {
  const summary = summarizeRun(report);
  const lines = [`${summary.title} (exit ${summary.exitCode})`, `Run: ${summary.runId}`];
  if (summary.failingModule) lines.push(`Failing module: ${summary.failingModule}`);
  if (summary.reason) lines.push(`Reason: ${summary.reason}${summary.errorCode ? ` [${summary.errorCode}]` : ''}`);
  if (summary.rollback) {
    const r = summary.rollback;
    lines.push(`Rollback: attempted ${r.attempted}, succeeded ${r.succeeded}, failed ${r.failed}`);
  }
  for (const command of summary.unrevertedCommands) {
    lines.push(`Not reverted: ${command}`);
  }
  for (const m of summary.modules) {
    lines.push(`  ${m.moduleId}: ${m.status}`);
  }
  for (const action of summary.suggestedActions) {
    lines.push(`Suggested: ${action}`);
  }
  return lines;
}
