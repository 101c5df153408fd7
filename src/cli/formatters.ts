import chalk from "chalk";

import { SplicerError } from "../lib/errors.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

/**
 * Placeholder usage in one template
 */
export interface PlaceholderUsage {
  name: string;
  occurrences: number;
}

/**
 * What `inspect` reports about a template
 */
export interface PlaceholderReport {
  source: string;
  placeholders: PlaceholderUsage[];
  dependencies?: string[];
}

/**
 * Format a placeholder report for terminal output with colors
 */
export function formatTerminal(report: PlaceholderReport): string {
  if (report.placeholders.length === 0) {
    return chalk.yellow(`${report.source} declares no placeholders.`);
  }

  const count = report.placeholders.length;
  const lines: string[] = [];
  lines.push(chalk.bold(`${report.source}: ${count} placeholder${count === 1 ? "" : "s"}`));
  lines.push(chalk.gray("─".repeat(40)));

  for (const usage of report.placeholders) {
    const times = usage.occurrences === 1 ? "" : chalk.gray(` (x${usage.occurrences})`);
    lines.push(`  ${chalk.cyan(`@[${usage.name}]@`)}${times}`);
  }

  return lines.join("\n");
}

/**
 * Format a placeholder report as JSON
 */
export function formatJson(report: PlaceholderReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatReport(report: PlaceholderReport, format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(report);
    case "terminal":
    default:
      return formatTerminal(report);
  }
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return format === "terminal" || format === "json";
}

/**
 * Format an error for terminal output, with its code when it has one
 */
export function formatError(error: Error): string {
  if (error instanceof SplicerError) {
    return chalk.red(`Error [${error.code}]: ${error.message}`);
  }
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
