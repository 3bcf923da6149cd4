import { toFiniteNumber, toUnsignedId } from "@runeforge/shared-protocol";

export type Env = Record<string, string | undefined>;

/**
 * Reads a numeric variable, falling back when it is missing or not finite.
 */
export const readNumberEnv = (env: Env, name: string, fallback: number): number => {
  const value = env[name];
  if (!value) {
    return fallback;
  }
  return toFiniteNumber(value, fallback);
};

/**
 * Reads a comma separated list of ids. Entries that are not ids are skipped.
 */
export const readIdListEnv = (env: Env, name: string): number[] => {
  const value = env[name];
  if (!value) {
    return [];
  }
  const ids: number[] = [];
  for (const entry of value.split(",")) {
    const id = toUnsignedId(entry.trim());
    if (id !== undefined) {
      ids.push(id);
    }
  }
  return ids;
};

export const readStringEnv = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
};
