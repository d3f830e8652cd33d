/**
 * Strip a single trailing dot (FQDN notation).
 *
 * - `example.com.` → `example.com`
 * - `example.com` → `example.com`
 */
export function trimTrailingDot(name: string): string {
  return name.endsWith('.') ? name.slice(0, -1) : name;
}

/**
 * Reduce a record name to its zone-relative form.
 *
 * Strips one trailing dot, then one trailing `.{zone}` suffix. Case is
 * preserved, so matching on the result stays case-sensitive.
 *
 * E.g. with zone "example.com":
 *      "_acme-challenge.example.com." → "_acme-challenge"
 *      "_acme-challenge" → "_acme-challenge"
 */
export function relativeName(name: string, zone: string): string {
  const trimmed = trimTrailingDot(name);
  const suffix = `.${trimTrailingDot(zone)}`;
  if (trimmed.endsWith(suffix)) return trimmed.slice(0, -suffix.length);
  return trimmed;
}

/**
 * True when two record names refer to the same owner within `zone`.
 */
export function sameRecordName(a: string, b: string, zone: string): boolean {
  return relativeName(a, zone) === relativeName(b, zone);
}
