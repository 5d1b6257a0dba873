/**
 * Console helpers for load and batch reporting
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  error: chalk.red,

  bold: chalk.bold,
  dim: chalk.dim,

  check: chalk.green(figures.tick),
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  bullet: chalk.dim(figures.bullet),

  separator: chalk.dim(' · '),
  divider: (label: string, width = 60) => {
    const prefix = `━━━ ${label} `;
    const remaining = Math.max(0, width - prefix.length);
    return chalk.cyan.dim(prefix + '━'.repeat(remaining));
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  start(text: string): Ora {
    if (activeSpinner) {
      activeSpinner.stop();
    }
    activeSpinner = ora({ text, spinner: 'dots', indent: 2 }).start();
    return activeSpinner;
  },

  succeed(text?: string): void {
    if (activeSpinner) {
      activeSpinner.succeed(text);
      activeSpinner = null;
    }
  },

  fail(text?: string): void {
    if (activeSpinner) {
      activeSpinner.fail(text);
      activeSpinner = null;
    }
  },

  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  update(completed: number, total: number): void;
  finish(): void;
}

/**
 * Lazily started progress bar; the first `update` call sizes it.
 */
export function createProgressTracker(label: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;
  let startTime = 0;
  let lastUpdate = 0;
  const MIN_UPDATE_INTERVAL = 100; // ms

  return {
    update(completed: number, total: number) {
      const now = Date.now();
      if (!bar) {
        spinner.stop();
        startTime = now;
        bar = new cliProgress.SingleBar({
          format: `  {bar} {percentage}%  {value}/{total} ${label}  {elapsed}`,
          barCompleteChar: '█',
          barIncompleteChar: '░',
          barsize: 20,
          hideCursor: true,
          clearOnComplete: false,
          stopOnComplete: false,
          fps: 10,
        });
        bar.start(total, 0, { elapsed: '0s' });
      }

      // Throttle redraws except for the final update
      if (now - lastUpdate < MIN_UPDATE_INTERVAL && completed < total) {
        return;
      }
      lastUpdate = now;
      bar.update(completed, { elapsed: formatDuration(now - startTime) });
    },

    finish() {
      if (bar) {
        bar.update(bar.getTotal(), { elapsed: formatDuration(Date.now() - startTime) });
        bar.stop();
        bar = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}

export function formatPercentage(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
