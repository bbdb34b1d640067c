import type {
  AnalysisStatus,
  AuditEventView,
  DeadLetterSummary,
  IntakeAck,
  Location,
  PipelineProgress,
  PipelineStatusView,
  PlanStatus,
  ReconcileReport,
  ReprocessAck,
  RequestStatus,
  RescueRequest,
} from '@relief-pipeline/shared';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

type Color = keyof typeof colors;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: Color): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function gray(text: string): string {
  return colorize(text, 'gray');
}

const statusColors: Record<RequestStatus | AnalysisStatus | PlanStatus, Color> = {
  submitted: 'yellow',
  pending: 'yellow',
  analyzing: 'blue',
  planning: 'blue',
  analyzed: 'cyan',
  complete: 'green',
  completed: 'green',
  failed: 'red',
};

/**
 * Format a request or stage record status with its color.
 */
export function formatStatus(status: RequestStatus | AnalysisStatus | PlanStatus): string {
  return colorize(status.toUpperCase(), statusColors[status]);
}

const progressLabels: Record<PipelineProgress, string> = {
  intake: 'waiting for damage analysis',
  damage_analysis: 'damage analysis',
  logistics_planning: 'logistics planning',
  done: 'done',
  failed: 'failed',
};

export function formatProgress(progress: PipelineProgress): string {
  const label = progressLabels[progress];
  if (progress === 'done') return green(label);
  if (progress === 'failed') return red(label);
  return blue(label);
}

/**
 * Format an ISO timestamp for display.
 */
export function formatDate(iso: string): string {
  return new Date(iso).toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(iso: string, now: number = Date.now()): string {
  const diff = now - new Date(iso).getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

export function formatLocation(location: Location): string {
  if (location.latitude === undefined || location.longitude === undefined) {
    return location.name;
  }
  return `${location.name} (${location.latitude.toFixed(4)}, ${location.longitude.toFixed(4)})`;
}

/**
 * Format a request with its stage records for detailed display.
 */
export function formatRequestDetail(view: PipelineStatusView): string {
  const { request, damageReport, logisticsPlan } = view;
  const lines: string[] = [];

  lines.push(bold('Rescue Request'));
  lines.push('');
  lines.push(`${bold('ID:')}          ${request.requestId}`);
  lines.push(`${bold('Status:')}      ${formatStatus(request.status)}`);
  lines.push(`${bold('Progress:')}    ${formatProgress(view.progress)}`);
  lines.push(`${bold('Location:')}    ${formatLocation(request.location)}`);
  if (request.eventName) {
    lines.push(`${bold('Event:')}       ${request.eventName}`);
  }
  lines.push(
    `${bold('Submitted:')}   ${formatDate(request.createdAt)} (${dim(formatRelativeTime(request.createdAt))})`
  );

  lines.push('');
  lines.push(bold('Imagery:'));
  lines.push(`  ${dim('Pre-event:')}   ${request.imagery.preEvent.length} reference(s)`);
  lines.push(`  ${dim('Post-event:')}  ${request.imagery.postEvent.length} reference(s)`);

  lines.push('');
  if (!damageReport) {
    lines.push(`${bold('Damage Analysis:')}  ${dim('not started')}`);
  } else {
    lines.push(
      `${bold('Damage Analysis:')}  ${formatStatus(damageReport.status)} ${dim(`(attempt ${damageReport.attempt})`)}`
    );
    if (damageReport.summary) {
      lines.push(`  ${damageReport.summary}`);
    }
    for (const finding of damageReport.findings) {
      const confidence = `${Math.round(finding.confidence * 100)}%`;
      lines.push(`  - ${padRight(finding.category, 14)} ${finding.location} ${dim(confidence)}`);
    }
    if (damageReport.error) {
      lines.push(`  ${red(damageReport.error)}`);
    }
  }

  lines.push('');
  if (!logisticsPlan) {
    lines.push(`${bold('Logistics Plan:')}   ${dim('not started')}`);
  } else {
    lines.push(
      `${bold('Logistics Plan:')}   ${formatStatus(logisticsPlan.status)} ${dim(`(attempt ${logisticsPlan.attempt})`)}`
    );
    if (logisticsPlan.summary) {
      lines.push(`  ${logisticsPlan.summary}`);
    }
    const actions = [...logisticsPlan.actions].sort((a, b) => a.priority - b.priority);
    for (const action of actions) {
      lines.push(
        `  P${action.priority}  ${action.quantity} x ${action.resourceType} -> ${action.destination}`
      );
    }
    if (logisticsPlan.error) {
      lines.push(`  ${red(logisticsPlan.error)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Table column definition. `color` is applied after padding so escape
 * codes do not count toward the width.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
  color?: (text: string, item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map((col) => {
      const header = col.align === 'right' ? padLeft(col.header, col.width) : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map((col) => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map((col) => {
        const value = truncate(col.value(item), col.width);
        const padded = col.align === 'right' ? padLeft(value, col.width) : padRight(value, col.width);
        return col.color ? col.color(padded, item) : padded;
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

/**
 * Format a list of requests as a table.
 */
export function formatRequestList(requests: RescueRequest[]): string {
  if (requests.length === 0) {
    return dim('No requests found.');
  }

  return formatTable(requests, [
    { header: 'ID', width: 30, value: (r) => r.requestId },
    {
      header: 'STATUS',
      width: 10,
      value: (r) => r.status.toUpperCase(),
      color: (text, r) => colorize(text, statusColors[r.status]),
    },
    { header: 'SUBMITTED', width: 16, value: (r) => formatRelativeTime(r.createdAt) },
    { header: 'LOCATION', width: 28, value: (r) => r.location.name },
    { header: 'EVENT', width: 20, value: (r) => r.eventName ?? '-' },
  ]);
}

export function formatIntakeAck(ack: IntakeAck): string {
  if (!ack.triggered) {
    return formatWarning(
      `Request ${ack.requestId} stored but its damage trigger was not published; reconcile will retry it`
    );
  }
  return formatSuccess(`Request ${bold(ack.requestId)} submitted`);
}

export function formatReprocessAck(ack: ReprocessAck): string {
  return formatSuccess(
    `Reprocessing ${ack.stage} for ${bold(ack.requestId)} (attempt ${ack.attempt}, message ${ack.messageId})`
  );
}

export function formatReconcileReport(report: ReconcileReport): string {
  if (report.stuck.length === 0) {
    return formatSuccess('No stuck requests');
  }

  const table = formatTable(report.stuck, [
    { header: 'REQUEST', width: 30, value: (s) => s.requestId },
    { header: 'STAGE', width: 9, value: (s) => s.stage },
    { header: 'REASON', width: 12, value: (s) => s.reason, color: (text) => yellow(text) },
    { header: 'ACTION', width: 27, value: (s) => s.action },
    { header: 'SINCE', width: 16, value: (s) => formatRelativeTime(s.since) },
  ]);

  const footer = report.dryRun
    ? formatInfo(`Dry run: ${report.stuck.length} stuck request(s), nothing changed`)
    : formatSuccess(`Repaired ${report.applied} of ${report.stuck.length} stuck request(s)`);

  return `${table}\n\n${footer}`;
}

export function formatDeadLetters(deadLetters: DeadLetterSummary[]): string {
  if (deadLetters.length === 0) {
    return dim('No dead-lettered triggers.');
  }

  return formatTable(deadLetters, [
    { header: 'MESSAGE', width: 26, value: (d) => d.messageId },
    { header: 'TOPIC', width: 20, value: (d) => d.topic },
    { header: 'REQUEST', width: 30, value: (d) => d.requestId ?? '-' },
    { header: 'TRIES', width: 5, align: 'right', value: (d) => String(d.deliveryCount) },
    { header: 'REASON', width: 48, value: (d) => d.reason, color: (text) => red(text) },
  ]);
}

export function formatAuditTrail(events: AuditEventView[]): string {
  if (events.length === 0) {
    return dim('No audit events.');
  }

  return events
    .map((event) => {
      const details = Object.entries(event.details)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
      return `${dim(formatDate(event.timestamp))}  ${padRight(event.eventType, 24)} ${details}`.trimEnd();
    })
    .join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format validation errors, one per line.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
