import type { BranchResult, SynthesisFn } from "@helpdesk/types";
import { formatBranches } from "@helpdesk/runtime";

/**
 * Findings from every branch that answered, keyed by branch name, followed
 * by a note naming the branches that did not. Produces a reply even when
 * all branches failed.
 */
export const digestFindings: SynthesisFn = (branches, input) => {
  const found = branches.flatMap((b) => (b.status === "fulfilled" ? [finding(b.name, b.output.reply)] : []));
  const missing = branches.flatMap((b) => (b.status === "rejected" ? [`${b.name} (${failureLabel(b)})`] : []));

  if (found.length === 0) {
    return `I couldn't reach any of our diagnostic sources for "${input}" just now. Unavailable: ${missing.join(", ")}.`;
  }

  const lines = [`Here is what I found about "${input}":`, ...found];
  if (missing.length > 0) {
    lines.push(`Not available this time: ${missing.join(", ")}.`);
  }
  return lines.join("\n");
};

/** Every branch on its own line, failures included. */
export const listBranches: SynthesisFn = (branches) => formatBranches(branches);

/** Synthesis functions a tree definition can name. */
export const SYNTHESIS_FUNCTIONS: Readonly<Record<string, SynthesisFn>> = {
  "digest-findings": digestFindings,
  "list-branches": listBranches,
};

/** `- Name: first line`, with any further lines of the reply indented below it. */
function finding(name: string, reply: string): string {
  const [first = "", ...rest] = reply.split("\n").filter((line) => line.trim().length > 0);
  return [`- ${name}: ${first}`, ...rest.map((line) => `  ${line}`)].join("\n");
}

function failureLabel(branch: Extract<BranchResult, { status: "rejected" }>): string {
  return branch.error.kind === "Timeout" ? "timed out" : "failed";
}
