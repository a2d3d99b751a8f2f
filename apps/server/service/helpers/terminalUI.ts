/**
 * Terminal UI Helper Module
 *
 * Ora spinners and chalk styling for CLI output. Everything that prints is
 * silent in daemon mode; the `format*` helpers are pure.
 */

import chalk from "chalk";
import ora from "ora";
import type { LocationSummary, RunSummary } from "../types/loader-types";

// ---------------------------------------------------------------------------------
// Theme
// ---------------------------------------------------------------------------------

/**
 * Colors used across CLI output.
 */
export const theme = {
    /** Headings and the wordmark */
    primary: chalk.hex("#B45309"),
    /** Second wordmark line */
    accent: chalk.hex("#0EA5E9"),
    success: chalk.hex("#10B981"),
    warning: chalk.hex("#F59E0B"),
    error: chalk.hex("#EF4444"),
    /** Labels and rules */
    muted: chalk.hex("#6B7280"),
    /** Spinner text */
    info: chalk.hex("#3B82F6"),
    /** Values next to labels */
    highlight: chalk.hex("#EAB308"),
    dim: chalk.dim,
    bold: chalk.bold,
} as const;

/**
 * Notice tones and their colors.
 */
const TONES = {
    info: theme.info,
    success: theme.success,
    error: theme.error,
} as const;

export type NoticeTone = keyof typeof TONES;

const RULE = theme.muted(`  ${"─".repeat(53)}`);

const WORDMARK = [
    theme.primary("  ╦ ╦┌┐┌┌─┐┬  ┌─┐┬┌┬┐┌─┐┌┬┐"),
    theme.accent("  ║ ║│││├  │  ├─┤││││├┤  ││"),
    theme.primary("  ╚═╝┘└┘└─┘┴─┘┴ ┴┴┴ ┴└─┘─┴┘"),
].join("\n");

// ---------------------------------------------------------------------------------
// Daemon mode
// ---------------------------------------------------------------------------------

let isDaemonMode = false;

/**
 * Turns all terminal output off (daemon) or back on.
 */
export function setDaemonMode(enabled: boolean): void {
    isDaemonMode = enabled;
    if (enabled && spinner?.isSpinning) {
        spinner.stop();
        spinner = null;
    }
}

export function getDaemonMode(): boolean {
    return isDaemonMode;
}

/**
 * Prints the wordmark, the product name and the version.
 *
 * @param version - Version shown under the product name.
 */
export function displayBanner(version?: string): void {
    if (isDaemonMode) return;
    console.log(`\n${WORDMARK}\n`);
    console.log(RULE);
    console.log(`  ${theme.bold("California Unclaimed Property Search")}`);
    if (version) console.log(`  ${theme.muted(`Version ${version}`)}`);
    console.log(`${RULE}\n`);
}

// ---------------------------------------------------------------------------------
// Spinner
// ---------------------------------------------------------------------------------

/** The one spinner shown at a time; an ingestion works one archive at a time */
let spinner: ora.Ora | null = null;

/**
 * Starts the spinner, replacing any running one.
 */
export function startSpinner(text: string): void {
    if (isDaemonMode) return;
    if (spinner?.isSpinning) spinner.stop();

    spinner = ora({
        text: theme.info(text),
        spinner: { interval: 80, frames: ["◐", "◓", "◑", "◒"] },
        color: "cyan",
    }).start();
}

export function updateSpinner(text: string): void {
    if (spinner === null) return;
    spinner.text = theme.info(text);
}

/**
 * Stops the spinner with a final symbol and text; the spinner text stays
 * when none is given.
 */
const settleSpinner = (
    outcome: "succeed" | "fail" | "warn",
    color: chalk.Chalk,
    text?: string,
): void => {
    if (spinner === null) return;
    spinner[outcome](color(text ?? spinner.text));
    spinner = null;
};

export function succeedSpinner(text?: string): void {
    settleSpinner("succeed", theme.success, text);
}

export function failSpinner(text?: string): void {
    settleSpinner("fail", theme.error, text);
}

/**
 * Settles the spinner as a warning, as for a cancelled run.
 */
export function warnSpinner(text?: string): void {
    settleSpinner("warn", theme.warning, text);
}

// ---------------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------------

export function logSuccess(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.success("✔")} ${message}`);
}

/**
 * Prints an error line, then the stack of `error` when it has one.
 */
export function logError(message: string, error?: unknown): void {
    if (isDaemonMode) return;
    console.error(`${theme.error("✖")} ${theme.error(message)}`);
    if (error instanceof Error && error.stack) {
        console.error(theme.dim(error.stack));
    }
}

export function logInfo(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.info("ℹ")} ${message}`);
}

// ---------------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------------

/**
 * Formats a record count with US thousands separators.
 *
 * @example formatCount(1204100) === "1,204,100"
 */
export function formatCount(count: number): string {
    return count.toLocaleString("en-US");
}

const BYTE_UNITS = ["B", "KB", "MB", "GB"] as const;

/**
 * Formats an archive size in binary units. Whole bytes have no decimals.
 *
 * @example formatBytes(1536) === "1.5 KB"
 */
export function formatBytes(bytes: number): string {
    let size = bytes;
    let unit = 0;
    while (size >= 1024 && unit < BYTE_UNITS.length - 1) {
        size /= 1024;
        unit++;
    }
    return unit === 0 ? `${size} B` : `${size.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * Formats an elapsed time. Sub-second runs keep their milliseconds, which a
 * small tier archive often takes.
 *
 * @example formatDuration(65000) === "1m 05s"
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) return `${Math.round(ms)}ms`;

    const totalSeconds = Math.floor(ms / 1000);
    const seconds = totalSeconds % 60;
    const minutes = Math.floor(totalSeconds / 60) % 60;
    const hours = Math.floor(totalSeconds / 3600);
    const ss = String(seconds).padStart(2, "0");

    if (hours > 0) return `${hours}h ${String(minutes).padStart(2, "0")}m ${ss}s`;
    if (minutes > 0) return `${minutes}m ${ss}s`;
    return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One-line outcome of a single archive.
 *
 * @example "00_All_Records.zip: 2 inserted, 1 duplicate, 0 dropped in 250ms"
 */
export function formatLocationSummary(summary: LocationSummary): string {
    const duplicates = summary.skipped === 1 ? "duplicate" : "duplicates";
    return (
        `${summary.location}: ${formatCount(summary.inserted)} inserted, ` +
        `${formatCount(summary.skipped)} ${duplicates}, ` +
        `${formatCount(summary.dropped)} dropped in ${formatDuration(summary.durationMs)}`
    );
}

/**
 * Labelled totals of a finished run, ready for {@link displayKeyValue}.
 * The catch-up row only appears when an earlier run left records unindexed.
 */
export function runSummaryRows(
    summary: RunSummary,
    durationMs: number,
): Record<string, string> {
    return {
        Archives: formatCount(summary.locations.length),
        Processed: formatCount(summary.processed),
        Inserted: formatCount(summary.inserted),
        Duplicates: formatCount(summary.skipped),
        Dropped: formatCount(summary.dropped),
        ...(summary.recovered > 0 && {
            "Re-indexed": formatCount(summary.recovered),
        }),
        Duration: formatDuration(durationMs),
    };
}

// ---------------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------------

/**
 * Prints a section heading underlined to its width.
 */
export function displaySection(title: string): void {
    if (isDaemonMode) return;
    console.log(`\n${theme.primary("▸")} ${theme.bold(title)}`);
    console.log(theme.muted(`  ${"─".repeat(title.length + 2)}`));
}

/**
 * Prints labels and values in two aligned columns.
 *
 * @param rows - Values keyed by label, printed in insertion order.
 * @param indent - Spaces before each label.
 */
export function displayKeyValue(
    rows: Record<string, string | number>,
    indent = 2,
): void {
    if (isDaemonMode) return;

    const entries = Object.entries(rows);
    const width = entries.reduce((max, [label]) => Math.max(max, label.length), 0);
    for (const [label, value] of entries) {
        console.log(
            `${" ".repeat(indent)}${theme.muted(label.padEnd(width))}  ${theme.highlight(String(value))}`,
        );
    }
}

/**
 * Prints a framed notice, one framed line per line of `message`.
 */
export function displayNotice(message: string, tone: NoticeTone = "info"): void {
    if (isDaemonMode) return;

    const color = TONES[tone];
    const lines = message.split("\n");
    const width = lines.reduce((max, line) => Math.max(max, line.length), 0);
    const edge = "─".repeat(width + 4);

    console.log(color(`┌${edge}┐`));
    for (const line of lines) {
        console.log(`${color("│")}  ${line.padEnd(width)}  ${color("│")}`);
    }
    console.log(color(`└${edge}┘`));
}
