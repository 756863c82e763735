import { config } from '../config';

// One-time warning utility gated by `config.warnings`.
const seen = new Set<string>();

export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget which warnings were already emitted (test harness helper). */
export function resetWarnings(): void {
  seen.clear();
}
