import type { BuildSummary, CleanSummary, ModuleInspection, ModuleOutcome } from "../stubs/orchestrator.js";

export interface CommandIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CommandIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

export function formatModuleOutcome(outcome: ModuleOutcome): string {
  const lines: string[] = [];
  lines.push(`module: ${outcome.moduleName}`);
  lines.push(`status: ${outcome.status}`);
  if (outcome.status === "skipped") {
    return lines.join("\n");
  }

  lines.push(`version: ${outcome.resolved?.value || "(unknown)"}`);
  if (outcome.reason) {
    lines.push(`regenerated: ${outcome.reason}`);
  }
  if (outcome.status === "failed") {
    lines.push(`error: ${outcome.error ?? "unknown error"}`);
    if (outcome.diagnostics) {
      lines.push("diagnostics:");
      lines.push(indent(outcome.diagnostics));
    }
    return lines.join("\n");
  }
  lines.push(`files: ${outcome.outputFiles}`);
  return lines.join("\n");
}

export function formatBuildSummary(summary: BuildSummary): string {
  const count = (status: ModuleOutcome["status"]) => summary.outcomes.filter((o) => o.status === status).length;
  const blocks = summary.outcomes.map(formatModuleOutcome);
  blocks.push(
    `summary: generated=${count("generated")} fresh=${count("fresh")} skipped=${count("skipped")} failed=${count("failed")}`
  );
  return blocks.join("\n\n");
}

export function formatCleanSummary(summary: CleanSummary): string {
  const lines: string[] = [];
  lines.push(`cleaned: ${summary.cleaned.length > 0 ? summary.cleaned.join(", ") : "(none)"}`);
  if (summary.orphans.length > 0) {
    lines.push(`orphans-removed: ${summary.orphans.join(", ")}`);
  }
  for (const failure of summary.failed) {
    lines.push(`failed: ${failure.moduleName} (${failure.error})`);
  }
  return lines.join("\n");
}

export function formatInspection(item: ModuleInspection): string {
  const lines: string[] = [];
  lines.push(`module: ${item.moduleName}`);
  lines.push(`package: ${item.packageName}`);
  lines.push(`enabled: ${item.enabled ? "true" : "false"}`);
  lines.push(`version: ${item.resolved.value || "(unknown)"} (${item.resolved.source})`);
  lines.push(`built-version: ${item.builtVersion ?? "(none)"}`);
  lines.push(`stale: ${item.reason ? `true (${item.reason})` : "false"}`);
  return lines.join("\n");
}
