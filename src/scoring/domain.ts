import { getDomain } from "tldts";

export function safeHost(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return "";
  }
}

export function stripWww(host: string): string {
  return host.toLowerCase().replace(/^www\./, "");
}

/**
 * The public-suffix-aware registrable domain (eTLD+1) of a host, so that
 * `www.acme.com` and `investors.acme.com` both give `acme.com`. Hosts without
 * one, such as IP addresses or `localhost`, fall back to the host itself.
 */
export function registrableDomain(host: string): string {
  const lower = host.toLowerCase();
  return getDomain(lower) ?? stripWww(lower);
}

/** True when both URLs share a registrable domain, whatever their subdomains. */
export function isSameSite(url: string, homeUrl: string): boolean {
  const host = safeHost(url);
  const home = safeHost(homeUrl);
  if (!host || !home) return false;
  return registrableDomain(host) === registrableDomain(home);
}
