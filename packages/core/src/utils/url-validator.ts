/**
 * URL checks applied before a transport request is built, to keep calls
 * away from internal hosts (SSRF).
 */

export interface UrlValidationOptions {
  /**
   * Allow private network addresses (default: false)
   */
  allowPrivateIPs?: boolean;

  /**
   * Allow loopback addresses and `localhost` (default: false)
   */
  allowLocalhost?: boolean;

  /**
   * Allowed protocols (default: ['http:', 'https:'])
   */
  allowedProtocols?: string[];

  /**
   * Skip every check (default: false)
   */
  disableValidation?: boolean;
}

export class SSRFError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SSRFError";
  }
}

type HostClass = "loopback" | "private" | "link-local" | "public";

const PRIVATE_IPV6_PREFIXES = [/^fc/i, /^fd/i];
const LINK_LOCAL_IPV6_PREFIX = /^fe80:/i;
const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function classifyHost(hostname: string): HostClass {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, "");

  if (host === "localhost" || host === "::1" || host === "0.0.0.0") {
    return "loopback";
  }

  const ipv4 = IPV4.exec(host);
  if (ipv4) {
    const [a, b] = [Number(ipv4[1]), Number(ipv4[2])];
    if (a === 127) return "loopback";
    if (a === 10) return "private";
    if (a === 172 && b >= 16 && b <= 31) return "private";
    if (a === 192 && b === 168) return "private";
    if (a === 169 && b === 254) return "link-local";
    return "public";
  }

  if (LINK_LOCAL_IPV6_PREFIX.test(host)) return "link-local";
  if (host.includes(":") && PRIVATE_IPV6_PREFIXES.some((p) => p.test(host))) {
    return "private";
  }
  return "public";
}

/**
 * Validates a URL against the given options.
 *
 * @throws {SSRFError} If the URL is malformed or points at a disallowed host
 */
export function validateUrl(
  url: string,
  options: UrlValidationOptions = {}
): void {
  const {
    allowPrivateIPs = false,
    allowLocalhost = false,
    allowedProtocols = ["http:", "https:"],
    disableValidation = false,
  } = options;

  if (disableValidation) {
    return;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new SSRFError(`Invalid URL format: ${url}`);
  }

  const protocol = parsed.protocol.toLowerCase();
  if (!allowedProtocols.includes(protocol)) {
    throw new SSRFError(
      `Protocol "${protocol}" is not allowed. Only ${allowedProtocols.join(", ")} are permitted.`
    );
  }

  switch (classifyHost(parsed.hostname)) {
    case "loopback":
      if (!allowLocalhost) {
        throw new SSRFError(
          "Localhost addresses are not allowed. Set allowLocalhost=true to override."
        );
      }
      return;
    case "private":
      if (!allowPrivateIPs) {
        throw new SSRFError(
          "Private network addresses are not allowed. Set allowPrivateIPs=true to override."
        );
      }
      return;
    case "link-local":
      if (!allowPrivateIPs) {
        throw new SSRFError("Link-local addresses are not allowed.");
      }
      return;
    case "public":
      return;
  }
}
