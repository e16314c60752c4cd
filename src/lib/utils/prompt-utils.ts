import { createInterface } from 'node:readline/promises';

/** Ask a yes/no question on the terminal. Only "y" or "yes" count as approval. */
export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return isAffirmative(answer);
  } finally {
    rl.close();
  }
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}
