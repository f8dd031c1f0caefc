/**
 * Only an exact "y" or "Y" counts as consent. Whitespace, "yes" and the
 * empty answer all decline.
 */
export function isConfirmation(answer: string): boolean {
  return answer === "y" || answer === "Y";
}

export function formatConfirmPrompt(
  count: number,
  repo: string,
  commentFile: string
): string {
  return `Comment on ${count} pull requests in ${repo} with ${commentFile}? (y/N) `;
}
