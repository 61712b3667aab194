/**
 * Judge prompt construction and response parsing.
 *
 * The assistant is asked to name the branch that should be deleted. The
 * template wording is part of the contract: the parser relies on the
 * assistant echoing one of the two names.
 */

const JUDGE_DIRECTIVE = 'Respond with ONLY the branch name that should be DELETED (the worse one).';

export function buildComparePrompt(comparePrompt: string, first: string, second: string): string {
  return `${comparePrompt}\n\nBranch names to compare:\n- ${first}\n- ${second}\n\n${JUDGE_DIRECTIVE}`;
}

/**
 * Extract the losing branch from a judge response.
 *
 * Exactly one name mentioned wins. When both or neither are mentioned, the
 * last line counts if it is exactly one of the names. Otherwise `null`.
 */
export function parseLoserBranch(response: string, first: string, second: string): string | null {
  const text = response.trim();
  const hasFirst = text.includes(first);
  const hasSecond = text.includes(second);

  if (hasFirst !== hasSecond) {
    return hasFirst ? first : second;
  }

  const lines = text.split('\n');
  const lastLine = (lines[lines.length - 1] ?? '').trim();
  if (lastLine === first) return first;
  if (lastLine === second) return second;
  return null;
}
