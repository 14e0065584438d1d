import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { TrustedAppsCatalog } from '../evidence/types.js';

// Digests are stored as uppercase hex prefixes of the certificate SHA-256.
const digestSchema = z
  .string()
  .regex(/^[0-9A-Fa-f]{8,64}$/, 'expected a hex certificate digest prefix')
  .transform((d) => d.toUpperCase());

const developerSchema = z.object({
  name: z.string().min(1),
  certDigests: z.array(digestSchema).min(1),
  packagePrefixes: z.array(z.string().min(1)).min(1),
  domain: z.enum(['PLAY_SIGNED', 'PLATFORM_SIGNED', 'APEX_MODULE', 'OEM_VENDOR', 'UNKNOWN']),
});

const trustedAppsSchema = z.object({
  developers: z.array(developerSchema),
  verifiedApps: z.record(z.string().min(1), z.array(digestSchema).min(1)),
});

export function parseTrustedApps(json: unknown, source: string): TrustedAppsCatalog {
  const result = trustedAppsSchema.safeParse(json);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid trusted apps list (${source}):\n${errors}`);
  }
  return result.data;
}

export function loadTrustedApps(filePath: string): TrustedAppsCatalog {
  const raw = readFileSync(filePath, 'utf-8');
  return parseTrustedApps(JSON.parse(raw), filePath);
}
