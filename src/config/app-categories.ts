import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { APP_CATEGORIES, type CategoryCatalog } from '../catalog/categories.js';

const lowercaseList = z.array(z.string().min(1).transform((s) => s.toLowerCase())).min(1);

const matcherSchema = z
  .object({
    packageEquals: lowercaseList.optional(),
    packageContains: lowercaseList.optional(),
    packageStartsWith: lowercaseList.optional(),
    nameContains: lowercaseList.optional(),
  })
  .strict()
  .refine((m) => Object.values(m).some((v) => v !== undefined), 'matcher needs at least one condition');

const categoryCatalogSchema = z.object({
  rules: z.array(
    z.object({
      category: z.enum(APP_CATEGORIES),
      match: z.array(matcherSchema).min(1),
    }),
  ),
  expectedPermissions: z.record(z.enum(APP_CATEGORIES), z.array(z.string().min(1))),
});

export function parseAppCategories(json: unknown, source: string): CategoryCatalog {
  const result = categoryCatalogSchema.safeParse(json);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid app categories (${source}):\n${errors}`);
  }
  return result.data;
}

export function loadAppCategories(filePath: string): CategoryCatalog {
  const raw = readFileSync(filePath, 'utf-8');
  return parseAppCategories(JSON.parse(raw), filePath);
}
