import { z } from 'zod';
import {
  ConfigSnapshotSchema,
  DeviceIntegrityEvidenceSchema,
  ScannedAppEvidenceSchema,
  SpecialAccessSnapshotSchema,
} from '../evidence/input.js';
import { SecurityEventSchema } from '../incidents/schema.js';

export const ScanRequestSchema = z.object({
  apps: z.array(ScannedAppEvidenceSchema).min(1),
  device: DeviceIntegrityEvidenceSchema.default({}),
  config: ConfigSnapshotSchema.nullable().default(null),
  specialAccess: z.array(SpecialAccessSnapshotSchema).default([]),
  /** A full inventory; baselines of packages missing from it are reported as removed. */
  fullInventory: z.boolean().default(true),
  /** Epoch ms; defaults to the server clock. */
  now: z.number().int().positive().optional(),
});
export type ScanRequest = z.infer<typeof ScanRequestSchema>;

export const ResolveRequestSchema = z.object({
  events: z.array(SecurityEventSchema).min(1),
  config: ConfigSnapshotSchema.nullable().default(null),
  now: z.number().int().positive().optional(),
});
export type ResolveRequest = z.infer<typeof ResolveRequestSchema>;

export const TimelineRequestSchema = z.object({
  /** Limit to these packages; all known packages when absent. */
  packageNames: z.array(z.string().min(1)).optional(),
  now: z.number().int().positive().optional(),
});
export type TimelineRequest = z.infer<typeof TimelineRequestSchema>;
