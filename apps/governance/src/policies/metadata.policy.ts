/** `is_managed_location` from `DESCRIBE TABLE EXTENDED ... AS JSON`. */
export function checkManagedLocation(extended: Record<string, unknown>): boolean {
  const value = extended.is_managed_location;
  return value === true || value === "true";
}
