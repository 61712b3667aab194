import { readdir } from 'node:fs/promises';

/** Directory entries of `cwd` rendered as `[a, b, c]`, in readdir order. */
export async function describeWorkingDirectory(cwd: string): Promise<string> {
  const entries = await readdir(cwd);
  return `[${entries.join(', ')}]`;
}

/** Environment for the child: the parent's, minus unset values. */
export function buildChildEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const clean: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) clean[key] = value;
  }
  return clean;
}
