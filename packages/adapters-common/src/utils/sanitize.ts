/**
 * Convert a tags object to Compute Engine labels.
 * Keys must be lowercase and start with a letter; keys and values max 63 chars.
 * Keys that cannot be made valid are dropped.
 */
export function sanitizeLabels(tags: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    const sanitizedKey = key.toLowerCase().replace(/[^a-z0-9_-]/g, "_").slice(0, 63);
    const sanitizedValue = value.toLowerCase().replace(/[^a-z0-9_-]/g, "_").slice(0, 63);
    if (/^[a-z]/.test(sanitizedKey)) {
      sanitized[sanitizedKey] = sanitizedValue;
    }
  }
  return sanitized;
}
