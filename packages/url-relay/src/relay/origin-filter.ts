import ipaddr from "ipaddr.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Address = ipaddr.IPv4 | ipaddr.IPv6;

export type ParsedRange =
  | { family: "ipv4"; network: ipaddr.IPv4; prefix: number; source: string }
  | { family: "ipv6"; network: ipaddr.IPv6; prefix: number; source: string };

export interface OriginFilter {
  /** Whether a connection from `source` may proceed */
  allows(source: string | undefined): boolean;
  /** True only when "all" was configured explicitly */
  readonly allowAll: boolean;
  /** Normalized ranges, for the startup banner */
  readonly ranges: readonly string[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Range entries that disable the filter */
export const ALLOW_ALL_KEYWORDS: readonly string[] = ["all", "*"];

// ---------------------------------------------------------------------------
// Parsing (Pure Functions)
// ---------------------------------------------------------------------------

function isAllowAll(value: string): boolean {
  return ALLOW_ALL_KEYWORDS.includes(value.trim().toLowerCase());
}

/**
 * Parse an address literal, rejecting the short IPv4 forms ("10", "10.1")
 * that ipaddr.js would otherwise accept.
 */
function parseLiteral(value: string): Address {
  if (ipaddr.IPv4.isValid(value) && !ipaddr.IPv4.isValidFourPartDecimal(value)) {
    throw new Error(`"${value}" is not a dotted-quad IPv4 address`);
  }
  return ipaddr.parse(value);
}

function toRange(network: Address, prefix: number, source: string): ParsedRange {
  if (network instanceof ipaddr.IPv4) {
    return { family: "ipv4", network, prefix, source };
  }
  // ::ffff:10.0.0.0/120 describes IPv4 space; compare it as IPv4
  if (network.isIPv4MappedAddress() && prefix >= 96) {
    return { family: "ipv4", network: network.toIPv4Address(), prefix: prefix - 96, source };
  }
  return { family: "ipv6", network, prefix, source };
}

/**
 * Parse one configured range ("10.0.0.0/24", "fd00::/8", or a bare address)
 * into network + prefix form. Throws on malformed input.
 */
export function parseRange(value: string): ParsedRange {
  const trimmed = value.trim();
  const slash = trimmed.indexOf("/");

  if (slash === -1) {
    const address = parseLiteral(trimmed);
    return toRange(address, address instanceof ipaddr.IPv4 ? 32 : 128, trimmed);
  }

  parseLiteral(trimmed.slice(0, slash));
  const [network, prefix] = ipaddr.parseCIDR(trimmed);
  return toRange(network, prefix, trimmed);
}

/**
 * Whether a configured range entry is usable (including "all").
 */
export function isValidRange(value: string): boolean {
  if (isAllowAll(value)) return true;
  try {
    parseRange(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a peer address as reported by the socket.
 * IPv4-mapped IPv6 (`::ffff:10.0.0.5`) comes back as IPv4.
 * Returns null for anything unparsable.
 */
export function parseSourceAddress(source: string | undefined): Address | null {
  if (!source || !ipaddr.isValid(source)) {
    return null;
  }
  try {
    return ipaddr.process(source);
  } catch {
    return null;
  }
}

function contains(range: ParsedRange, address: Address): boolean {
  if (range.family === "ipv4") {
    return address instanceof ipaddr.IPv4 && address.match(range.network, range.prefix);
  }
  return address instanceof ipaddr.IPv6 && address.match(range.network, range.prefix);
}

// ---------------------------------------------------------------------------
// Filter
// ---------------------------------------------------------------------------

/**
 * Build an origin filter from the configured ranges.
 * Ranges are parsed once here; an empty list denies every address.
 */
export function createOriginFilter(ranges: readonly string[]): OriginFilter {
  const allowAll = ranges.some(isAllowAll);
  const parsed = allowAll ? [] : ranges.map(parseRange);

  return {
    allowAll,
    ranges: allowAll
      ? ["all"]
      : parsed.map((r) => `${r.network.toString()}/${r.prefix}`),
    allows(source) {
      const address = parseSourceAddress(source);
      if (!address) return false;
      if (allowAll) return true;
      return parsed.some((range) => contains(range, address));
    },
  };
}
