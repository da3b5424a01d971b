// ============================================
// Network Endpoints
// Bind/connect addresses derived for each role
// ============================================

import { isIPv4 } from 'net';
import { AddressParseError } from './errors';

export const ANY_IPV4 = '0.0.0.0';
export const MAX_PORT = 65535;

export interface NetworkEndpoint {
  family: 'ipv4';
  address: string;
  port: number;
}

/**
 * Listen and connect endpoints of one logical service.
 * Both always carry the same port.
 */
export interface EndpointPair {
  listen: NetworkEndpoint;
  connect: NetworkEndpoint;
}

// RFC 1123 hostname: dot-separated labels of letters, digits and inner hyphens
const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;
const NUMERIC_HOST = /^[0-9.]+$/;

/**
 * Check a host string without touching DNS.
 * All-numeric hosts must be valid dotted-quad IPv4 literals.
 */
export function isValidHost(host: string): boolean {
  if (NUMERIC_HOST.test(host)) {
    return isIPv4(host);
  }
  return HOSTNAME_PATTERN.test(host);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= MAX_PORT;
}

/**
 * Build the listen (wildcard) and connect (host) endpoints for a service.
 * Throws AddressParseError instead of falling back to another address.
 */
export function buildEndpoints(host: string, port: number): EndpointPair {
  if (!isValidPort(port)) {
    throw new AddressParseError(host, port, `port must be an integer in [0, ${MAX_PORT}]`);
  }
  if (!isValidHost(host)) {
    throw new AddressParseError(host, port, 'host is neither an IPv4 address nor a hostname');
  }

  return {
    listen: { family: 'ipv4', address: ANY_IPV4, port },
    connect: { family: 'ipv4', address: host, port },
  };
}

export function formatEndpoint(endpoint: NetworkEndpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

export function endpointUrl(endpoint: NetworkEndpoint): string {
  return `http://${formatEndpoint(endpoint)}`;
}
