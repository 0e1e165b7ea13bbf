import type { RunOutcome } from '../orchestrator/engine.js';
import type { ThreadSummary } from '../orchestrator/summary.js';
import type { OrchestrationNode } from '../types/index.js';

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

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
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

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format an orchestration node with appropriate color.
 */
export function formatNode(node: OrchestrationNode): string {
  const nodeColors: Record<OrchestrationNode, keyof typeof colors> = {
    decompose: 'blue',
    assign: 'blue',
    execute: 'blue',
    review: 'magenta',
    suspended: 'yellow',
    synthesize: 'cyan',
    done: 'green',
  };
  return colorize(node.toUpperCase(), nodeColors[node]);
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

/**
 * Table column definition.
 */
export interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
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
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    const row = columns
      .map((col) => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right' ? padLeft(value, col.width) : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row);
  }

  return lines.join('\n');
}

function progress(summary: ThreadSummary): string {
  const subtasks = summary.subtasks;
  return subtasks ? `${subtasks.completed}/${subtasks.total}` : '-';
}

/**
 * Format a list of thread summaries as a table.
 */
export function formatThreadList(threads: ThreadSummary[]): string {
  if (threads.length === 0) {
    return dim('No threads found.');
  }

  return formatTable(threads, [
    { header: 'THREAD', width: 24, value: (t) => t.threadId },
    { header: 'NODE', width: 10, value: (t) => t.node },
    { header: 'DONE', width: 6, align: 'right', value: progress },
    { header: 'APPROVALS', width: 9, align: 'right', value: (t) => String(t.pendingApprovals.length) },
    { header: 'OBJECTIVE', width: 40, value: (t) => t.objective },
  ]);
}

/**
 * Format a thread summary for detailed display.
 */
export function formatThreadDetail(summary: ThreadSummary): string {
  const lines: string[] = [
    `${bold('Thread:')} ${summary.threadId}`,
    `${bold('Node:')} ${formatNode(summary.node)}`,
    `${bold('Objective:')} ${summary.objective}`,
    `${bold('Checkpoint:')} #${summary.sequence} (${summary.updatedAt})`,
  ];

  if (summary.goal !== null) {
    lines.push(`${bold('Goal:')} ${summary.goal}`);
  }

  const subtasks = summary.subtasks;
  if (subtasks) {
    lines.push('');
    lines.push(bold('Subtasks:'));
    lines.push(`  total ${subtasks.total}, completed ${subtasks.completed}, in progress ${subtasks.inProgress}`);
    lines.push(`  pending ${subtasks.pending} (ready ${subtasks.ready}), failed ${subtasks.failed}, blocked ${subtasks.blocked}`);
  }

  if (summary.pendingApprovals.length > 0) {
    lines.push('');
    lines.push(bold(yellow('Awaiting approval:')));
    for (const handle of summary.pendingApprovals) {
      lines.push(`  ${handle}`);
    }
  }

  const last = summary.lastTransition;
  if (last) {
    lines.push('');
    const subtask = last.subtaskId === null ? '' : ` [${last.subtaskId}]`;
    lines.push(`${bold('Last transition:')} ${last.from} --${last.event}--> ${last.to}${subtask}`);
  }

  return lines.join('\n');
}

/**
 * Format the result of running a thread until it halts.
 */
export function formatRunOutcome(outcome: RunOutcome): string {
  const lines: string[] = [`${bold('Thread:')} ${outcome.threadId}`, `${bold('Status:')} ${formatNode(outcome.state.node)}`];

  if (outcome.status === 'suspended') {
    lines.push('');
    lines.push(bold(yellow('Awaiting approval:')));
    for (const handle of outcome.pendingApprovals) {
      lines.push(`  ${handle}`);
    }
    lines.push('');
    lines.push(dim('Answer with: taskloom resume <handle> --approve | --reject'));
    return lines.join('\n');
  }

  const report = outcome.report;
  if (report) {
    lines.push(
      `${bold('Subtasks:')} ${report.completed.length} completed, ${report.failed.length} failed, ` +
        `${report.blocked.length} blocked, ${report.unreached.length} unreached`
    );
    lines.push('');
    lines.push(report.artifact);
  }
  return lines.join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${green(message)}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
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
 * Format and print validation errors.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
