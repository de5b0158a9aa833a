import { BlockList, isIP } from "net";
import { promises as dns } from "dns";
import { TransportError, errorMessage } from "./errors.js";
import type { AddressFamily, Endpoint } from "./types.js";

export type LookupFn = (
  hostname: string
) => Promise<{ address: string; family: number }>;

const BRACKETED = /^\[([^\]]+)\]:(\d+)$/;
const HOST_PORT = /^([^:\[\]]+):(\d+)$/;

/**
 * Parse a literal socket address: "a.b.c.d:port" or "[v6]:port"
 *
 * @throws {TransportError} code=ADDRESS_RESOLUTION
 */
export function parseEndpoint(input: string): Endpoint {
  const parts = splitHostPort(input);
  const family = familyOf(parts.host);

  if (!family) {
    throw new TransportError(
      `Invalid socket address: ${input}`,
      "ADDRESS_RESOLUTION"
    );
  }

  return createEndpoint(parts.host, parts.port, family);
}

/**
 * Resolve "host:port", looking host names up when they are not IP literals
 *
 * @throws {TransportError} code=ADDRESS_RESOLUTION
 */
export async function resolveEndpoint(
  input: string,
  lookup: LookupFn = (hostname) => dns.lookup(hostname)
): Promise<Endpoint> {
  const parts = splitHostPort(input);
  const literal = familyOf(parts.host);

  if (literal) {
    return createEndpoint(parts.host, parts.port, literal);
  }

  let result: { address: string; family: number };
  try {
    result = await lookup(parts.host);
  } catch (err) {
    throw new TransportError(
      `Unable to resolve ${parts.host}: ${errorMessage(err)}`,
      "ADDRESS_RESOLUTION",
      { cause: err }
    );
  }

  const family = familyOf(result.address);
  if (!family) {
    throw new TransportError(
      `Lookup for ${parts.host} returned no usable address`,
      "ADDRESS_RESOLUTION"
    );
  }

  return createEndpoint(result.address, parts.port, family);
}

/**
 * Local wildcard address of the same family, port chosen by the OS
 */
export function wildcardFor(endpoint: Endpoint): Endpoint {
  return endpoint.family === "IPv4"
    ? createEndpoint("0.0.0.0", 0, "IPv4")
    : createEndpoint("::", 0, "IPv6");
}

export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.family === "IPv6"
    ? `[${endpoint.address}]:${endpoint.port}`
    : `${endpoint.address}:${endpoint.port}`;
}

/**
 * Build a predicate matching datagram sources against one endpoint.
 * IPv6 addresses compare by value, not by spelling.
 */
export function createEndpointMatcher(
  endpoint: Endpoint
): (address: string, port: number) => boolean {
  const type = endpoint.family === "IPv4" ? "ipv4" : "ipv6";
  const list = new BlockList();
  list.addAddress(endpoint.address, type);

  return (address, port) => {
    if (port !== endpoint.port) return false;
    if (familyOf(address) !== endpoint.family) return false;
    return list.check(address, type);
  };
}

export function endpointsEqual(a: Endpoint, b: Endpoint): boolean {
  return a.family === b.family && createEndpointMatcher(a)(b.address, b.port);
}

function createEndpoint(
  address: string,
  port: number,
  family: AddressFamily
): Endpoint {
  return Object.freeze({ address, port, family });
}

function familyOf(host: string): AddressFamily | null {
  switch (isIP(host)) {
    case 4:
      return "IPv4";
    case 6:
      return "IPv6";
    default:
      return null;
  }
}

function splitHostPort(input: string): { host: string; port: number } {
  const trimmed = input.trim();
  const match = BRACKETED.exec(trimmed) ?? HOST_PORT.exec(trimmed);

  const host = match?.[1];
  const portText = match?.[2];
  if (host === undefined || portText === undefined) {
    throw new TransportError(
      `Invalid socket address: ${input}`,
      "ADDRESS_RESOLUTION"
    );
  }

  const port = parseInt(portText, 10);
  if (port > 65535) {
    throw new TransportError(
      `Port out of range: ${portText}`,
      "ADDRESS_RESOLUTION"
    );
  }

  return { host, port };
}
