/**
 * Source seeding from config/sources.json
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Source } from '../types/index.js';
import { PRIORITY_RANGE } from '../types/index.js';
import type { SourceDefinition, SourceRepository } from '../types/storage.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

const sourceDefinitionSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().min(1),
    type: z.enum(['rss', 'facebook']),
    siteKey: z.string().min(1).nullish(),
    isActive: z.boolean().default(true),
    priority: z.number().int().min(PRIORITY_RANGE.min).max(PRIORITY_RANGE.max).default(5),
  })
  .superRefine((value, ctx) => {
    if (value.type === 'rss' && !/^https?:\/\//i.test(value.url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'RSS url must be http(s)' });
    }
    if (value.type === 'facebook' && !/^\d+$/.test(value.url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'Facebook url must be a numeric page id' });
    }
  });

const sourcesFileSchema = z.object({
  sources: z.array(sourceDefinitionSchema),
});

export function parseSourceDefinitions(raw: unknown): SourceDefinition[] {
  const result = sourcesFileSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid source definitions: ${issues}`);
  }

  return result.data.sources;
}

export async function loadSourceDefinitions(filePath: string): Promise<SourceDefinition[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read sources file ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Sources file ${filePath} is not valid JSON`, { cause: error });
  }

  return parseSourceDefinitions(raw);
}

/**
 * Upsert every definition; existing sources keep their failure counters
 */
export async function seedSources(
  repository: Pick<SourceRepository, 'upsertSource'>,
  definitions: SourceDefinition[]
): Promise<Source[]> {
  const seeded: Source[] = [];

  for (const definition of definitions) {
    seeded.push(await repository.upsertSource(definition));
  }

  logger.info({ count: seeded.length }, 'Sources seeded');
  return seeded;
}
