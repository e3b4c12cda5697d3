/**
 * Applies per-test overrides onto a stub's default members.
 */
export function withOverrides<T extends object>(
  base: T,
  overrides?: Partial<T>,
): T {
  return overrides ? { ...base, ...overrides } : base;
}
