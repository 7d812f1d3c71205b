import type { SiteConfig } from "../types.js";

/**
 * Reduce a URL-form hostname to its bare host component.
 *
 * @param hostname - Host such as `example.com` or a URL such as `https://example.com/path`.
 * @returns Host without scheme, port or path.
 */
export function normalizeHostname(hostname: string): string {
  const trimmed = hostname.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  try {
    const host = new URL(trimmed).hostname;
    // IPv6 literals come back bracketed
    return host.replace(/^\[(.*)\]$/, "$1");
  } catch {
    return trimmed;
  }
}

/**
 * Compute the identity under which a site's state is persisted.
 *
 * Invariant: two configurations resolving to the same host and port share one key.
 *
 * @returns Key in the form `host:port`.
 */
export function siteKey(site: Pick<SiteConfig, "hostname" | "port">): string {
  return `${normalizeHostname(site.hostname)}:${site.port}`;
}
