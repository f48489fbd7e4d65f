import { input, select } from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
}

/** Aborting `signal` rejects the pending prompt. */
export async function promptSelect<T>(opts: { message: string; choices: SelectChoice<T>[] }, signal?: AbortSignal): Promise<T> {
  return await select<T>({ message: opts.message, choices: opts.choices }, signal ? { signal } : undefined);
}

export async function promptInput(opts: { message: string; default?: string }, signal?: AbortSignal): Promise<string> {
  return await input({ message: opts.message, default: opts.default }, signal ? { signal } : undefined);
}
