import * as p from '@clack/prompts';

/** Ask for a value without echoing it. Cancelled prompts yield an empty string. */
export async function promptSecret(message: string): Promise<string> {
  const value = await p.password({ message });
  if (p.isCancel(value)) return '';
  return (value ?? '').trim();
}

/** Ask for a plain text value. Cancelled prompts yield an empty string. */
export async function promptText(message: string): Promise<string> {
  const value = await p.text({ message });
  if (p.isCancel(value)) return '';
  return (value ?? '').trim();
}
