import type { InstallationRecord, Logger, VerifyReport } from './types.js'

const LABEL_WIDTH = 25
const GENERAL_HINT = "If commands are not found: restart the terminal or run 'source ~/.zshrc'"

function statusLabel(record: InstallationRecord): string {
  switch (record.status) {
    case 'planned':
      return '(would install)'
    case 'failed':
      return '(failed)'
    default:
      return record.path ?? 'installed'
  }
}

export function formatRecordLine(record: InstallationRecord): string {
  return `${`${record.displayName}:`.padEnd(LABEL_WIDTH)} ${statusLabel(record)}`
}

export function countInstalled(records: InstallationRecord[]): number {
  return records.filter((r) => r.status === 'installed' || r.status === 'already-present').length
}

export function printInstallSummary(logger: Logger, records: InstallationRecord[]): void {
  const failed = records.filter((r) => r.status === 'failed')
  logger.info('')
  logger.info('Installation summary')
  logger.info('────────────────────')
  logger.info(`Total tools installed: ${countInstalled(records)}`)
  logger.info('')
  for (const record of records) logger.info(formatRecordLine(record))
  logger.info('')
  if (failed.length > 0) {
    logger.warn(`${failed.length} tool(s) failed to install: ${failed.map((r) => r.displayName).join(', ')}`)
  }
}

export function printVerifyReport(logger: Logger, report: VerifyReport): void {
  logger.info('')
  logger.info('Installation verification')
  logger.info('─────────────────────────')
  for (const entry of report.entries) {
    const line = `${entry.displayName}: ${entry.detail}`
    if (entry.state === 'ok') logger.ok(line)
    else if (entry.state === 'missing') logger.err(line)
    else logger.warn(line)
  }
  logger.info('')
  if (report.errors > 0) {
    logger.warn(`${report.errors} critical check(s) failed`)
  } else {
    logger.ok('All critical tools found')
  }
  if (report.warnings > 0) logger.info(`${report.warnings} warning(s)`)
}

// Only hints for checks that actually failed, in report order, without repeats.
export function remediationHints(report: VerifyReport): string[] {
  const failing = report.entries.filter((e) => e.state !== 'ok')
  if (failing.length === 0) return []
  const hints = [GENERAL_HINT]
  for (const entry of failing) {
    if (entry.hint && !hints.includes(entry.hint)) hints.push(entry.hint)
  }
  return hints
}

export function printHints(logger: Logger, report: VerifyReport): void {
  const hints = remediationHints(report)
  if (hints.length === 0) return
  logger.info('')
  logger.info('Troubleshooting:')
  for (const hint of hints) logger.info(`  • ${hint}`)
}
