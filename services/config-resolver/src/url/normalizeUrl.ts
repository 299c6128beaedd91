import { appLogger } from "../observability/logger.js";

const logger = appLogger.child({ subsystem: "url-normalizer" });

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
  "http:": "80",
  "https:": "443",
};

function parse(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

/**
 * Canonical form of a base URL used to decide whether two URLs point at the
 * same environment: scheme and host lower-cased, a leading `www.` and the
 * scheme's default port dropped, and a single trailing slash removed from
 * the path. Credentials in the authority are dropped. Input that cannot be
 * parsed is returned as given.
 */
export function normalizeUrl(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    logger.debug({ event: "url.normalize.empty" }, "Empty URL left unchanged");
    return value;
  }
  const parsed = parse(trimmed);
  if (!parsed || !parsed.host) {
    logger.debug({ event: "url.normalize.malformed", length: value.length }, "Malformed URL left unchanged");
    return value;
  }

  const protocol = parsed.protocol.toLowerCase();
  let hostname = parsed.hostname.toLowerCase();
  if (hostname.startsWith("www.")) {
    hostname = hostname.slice(4);
  }
  const port = parsed.port && parsed.port !== DEFAULT_PORTS[protocol] ? `:${parsed.port}` : "";

  let pathname = parsed.pathname;
  if (pathname.endsWith("/")) {
    pathname = pathname.slice(0, -1);
  }

  return `${protocol}//${hostname}${port}${pathname}${parsed.search}${parsed.hash}`;
}

export function sameEnvironmentUrl(left: string, right: string): boolean {
  return normalizeUrl(left) === normalizeUrl(right);
}

/**
 * Lower-cased hostname of a URL, or undefined when it has none.
 */
export function extractHostname(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parse(value.trim());
  const hostname = parsed?.hostname.toLowerCase();
  return hostname && hostname.length > 0 ? hostname : undefined;
}
