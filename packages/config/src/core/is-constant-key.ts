/**
 * Whether `key` names a constant: a string equal to its own upper-case form
 * that holds at least one cased character.
 *
 * `"PORT"`, `"DB_URL"` and `"TIMEOUT_2"` pass; `"port"`, `"Port"`, `"_"` and
 * `"123"` do not. Every loader filters through this, as does the
 * constructor's defaults.
 */
export function isConstantKey(key: unknown): key is string {
  return typeof key === "string" && key === key.toUpperCase() && key !== key.toLowerCase()
}
