import { z } from 'zod';
import { InvalidInputError } from './errors.js';

const ipv4Schema = z.string().ip({ version: 'v4' });

/**
 * Clean a record name: accepts URLs or bare hostnames.
 *
 * Examples:
 * - `https://home.example.com/path` → `home.example.com`
 * - `HOME.EXAMPLE.COM.` → `home.example.com`
 * - `www.example.com` → `www.example.com`
 *
 * A `www.` prefix is kept: it names a record of its own.
 */
export function cleanRecordName(input: string): string {
  let name = input.trim().toLowerCase();

  if (name.includes('://')) {
    try {
      name = new URL(name).hostname;
    } catch {
      name = name.split('://')[1]?.split('/')[0] ?? name;
    }
  }

  name = name.split('/')[0] ?? name;

  if (name.endsWith('.')) {
    name = name.slice(0, -1);
  }

  return name;
}

/** Validate and trim an IPv4 address for an `A` record */
export function parseAddress(input: string): string {
  const address = input.trim();
  if (!ipv4Schema.safeParse(address).success) {
    throw new InvalidInputError(`DreamHost: "${input}" is not a valid IPv4 address`);
  }
  return address;
}
