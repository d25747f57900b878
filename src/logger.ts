/**
 * Logger with namespace filtering and phase timing
 */
import { getErrorMessage } from "./common/utils.ts";

export interface TimingOptions {
  showTiming?: boolean;
}

/**
 * Phase durations recorded under one timing context
 */
class PhaseTimer {
  readonly createdAt = performance.now();
  /** Start times of phases still running */
  private readonly running = new Map<string, number>();
  /** Finished phases, in completion order */
  readonly durations = new Map<string, number>();

  begin(label: string): void {
    this.running.set(label, performance.now());
  }

  finish(label: string): number {
    const startedAt = this.running.get(label);
    if (startedAt === undefined) return 0;
    this.running.delete(label);
    const duration = performance.now() - startedAt;
    this.durations.set(label, duration);
    return duration;
  }

  get openLabels(): string[] {
    return [...this.running.keys()];
  }
}

function formatRow(label: string, ms: number, suffix = ""): string {
  return `  ${label.padEnd(20)} ${ms.toFixed(0)}ms${suffix}`;
}

export class Logger {
  /** Exact namespaces enabled through --log */
  static allowedNamespacesSet: Set<string> = new Set();
  /** Prefixes from wildcard namespaces such as "code*" */
  static allowedWildcards: string[] = [];

  /** When set (--verbose) every namespace prints */
  public enabled: boolean;

  private readonly timers = new Map<string, PhaseTimer>();
  private showTiming = false;

  constructor(enabled = false) {
    this.enabled = enabled;
  }

  static setAllowedNamespaces(namespaces: string[]): void {
    Logger.allowedNamespacesSet = new Set(namespaces.filter((ns) => !ns.endsWith("*")));
    Logger.allowedWildcards = namespaces.filter((ns) => ns.endsWith("*")).map((ns) => ns.slice(0, -1));
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setTimingOptions(options: TimingOptions): void {
    this.showTiming = options.showTiming === true;
  }

  isNamespaceEnabled(namespace?: string): boolean {
    if (!namespace) return false;
    return Logger.allowedNamespacesSet.has(namespace) ||
      Logger.allowedWildcards.some((prefix) => namespace.startsWith(prefix));
  }

  private write(message: string, namespace?: string): void {
    if (!this.enabled && !this.isNamespaceEnabled(namespace)) return;
    console.log(namespace ? `[${namespace}] ${message}` : message);
  }

  debug(message: string, namespace?: string): void {
    this.write(message, namespace);
  }

  info(message: string, namespace?: string): void {
    this.write(message, namespace);
  }

  /**
   * Warnings always print
   */
  warn(message: string, namespace?: string): void {
    console.warn(`warning: ${namespace ? `[${namespace}] ` : ""}${message}`);
  }

  /**
   * Errors always print
   */
  error(message: string, cause?: unknown, namespace?: string): void {
    const details = cause === undefined ? "" : `: ${getErrorMessage(cause)}`;
    console.error(`error: ${namespace ? `[${namespace}] ` : ""}${message}${details}`);
  }

  startTiming(context: string, label: string): void {
    let timer = this.timers.get(context);
    if (!timer) {
      timer = new PhaseTimer();
      this.timers.set(context, timer);
    }
    timer.begin(label);
  }

  endTiming(context: string, label: string): number {
    const duration = this.timers.get(context)?.finish(label) ?? 0;
    if (this.enabled) {
      this.debug(`${label} completed in ${duration.toFixed(0)}ms`, "timing");
    }
    return duration;
  }

  /**
   * Time a synchronous phase; the timing is closed even when `fn` throws
   */
  measure<T>(context: string, label: string, fn: () => T): T {
    this.startTiming(context, label);
    try {
      return fn();
    } finally {
      this.endTiming(context, label);
    }
  }

  /**
   * Labels started under a context and not ended yet
   */
  openTimings(context: string): string[] {
    return this.timers.get(context)?.openLabels ?? [];
  }

  /**
   * Print the phase table for a context when --time is on
   */
  logPerformance(context: string, filename?: string): void {
    const timer = this.timers.get(context);
    if (!this.showTiming || !timer) return;

    const measured = [...timer.durations.values()].reduce((sum, ms) => sum + ms, 0);
    const elapsed = performance.now() - timer.createdAt;
    const rows = [`=== Performance Metrics: ${context} ===`];
    if (filename) rows.push(filename);
    for (const [label, ms] of timer.durations) {
      const share = measured > 0 ? (ms / measured) * 100 : 0;
      rows.push(formatRow(label, ms, ` ${share.toFixed(1)}%`));
    }
    if (elapsed - measured > 1) rows.push(formatRow("Other", elapsed - measured));
    rows.push(formatRow("Total", elapsed));
    rows.push("=========================");
    console.log(rows.join("\n"));
  }
}

// Shared across modules
const globalLogger = new Logger();
export default globalLogger;
export { globalLogger };
