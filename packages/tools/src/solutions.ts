import { z } from "zod";
import type { Tool } from "@helpdesk/types";
import { defineTool } from "@helpdesk/runtime";

const GENERIC_STEPS = [
  "Review the full error message and recent changes.",
  "Check relevant logs or dashboards for more details.",
  "Verify configuration and credentials, if applicable.",
  "Try the simplest safe workaround or rollback.",
  "If the issue persists, collect details for escalation.",
];

const SPECIFIC_STEPS: Readonly<Record<string, string>> = {
  bug_report: "Update to the latest version and clear cached data.",
  performance: "Check the status page and retry outside peak hours.",
  password_reset: "Use 'Forgot Password' on the login page and check the spam folder.",
  integration: "Confirm the API key or webhook secret matches the environment in use.",
};

export function solutionSteps(errorType: string): string[] {
  const specific = SPECIFIC_STEPS[errorType];
  return specific ? [specific, ...GENERIC_STEPS] : [...GENERIC_STEPS];
}

export function solutionTools(): Tool[] {
  const generateSolutionSteps = defineTool({
    id: "generate_solution_steps",
    description: "Troubleshooting checklist for an error type",
    parameters: {
      errorType: z.string().min(1).describe("Kind of problem, e.g. 'bug_report' or 'performance'"),
      context: z.string().optional().describe("Findings gathered so far"),
    },
    execute({ errorType, context }) {
      const steps = solutionSteps(errorType);
      return {
        result: {
          errorType,
          context: context ?? null,
          steps,
          summary: `Suggested next steps: ${steps.slice(0, 3).map((s, i) => `${i + 1}. ${s}`).join(" ")}`,
        },
      };
    },
  });

  return [generateSolutionSteps];
}
