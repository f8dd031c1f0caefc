import { ValidationError } from "@outfitter/contracts";
import { z } from "zod";

/**
 * Shape of `gh pr list --json number` output. Extra fields are tolerated.
 */
export const PullRequestListSchema = z.array(
  z.object({
    number: z.number().int().positive(),
  })
);

const decoder = new TextDecoder("utf-8");

/**
 * Parse raw listing bytes into pull request numbers, preserving gh's order.
 * Throws ValidationError for anything that is not a `[{ number }]` array.
 */
export function extractPullRequestNumbers(raw: Uint8Array): number[] {
  const text = decoder.decode(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError({
      message: `Pull request listing is not valid JSON: ${reason}`,
    });
  }

  const result = PullRequestListSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError({
      message: `Unexpected pull request listing${where}: ${issue?.message ?? "invalid"}`,
    });
  }

  return result.data.map((pr) => pr.number);
}
