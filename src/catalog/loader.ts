/**
 * Tool catalog loading from a YAML document with a top-level `tools:` list.
 */

import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/types';
import { ERROR_CODES } from '../errors/codes';
import { getLogger } from '../monitoring/logger';
import { ToolCatalog } from './catalog';
import type { ToolDefinition } from './types';

const logger = getLogger();

const ToolExampleSchema = z.object({
  prompt: z.string().min(1),
  reasoning: z.string().default(''),
});

const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  endpoint: z.string().url(),
  capabilities: z.array(z.string().min(1)).min(1),
  parameters: z.object({
    required: z.array(z.string()),
    optional: z.array(z.string()).nullish().transform((v) => v ?? []),
  }),
  examples: z.array(ToolExampleSchema).nullish().transform((v) => v ?? []),
});

const CatalogDocumentSchema = z.object({
  tools: z.array(z.unknown()),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse an already-decoded catalog document.
 *
 * @throws ConfigError naming the offending entry
 */
export function parseCatalogDocument(raw: unknown): ToolCatalog {
  const document = CatalogDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new ConfigError(
      `Tool catalog must be a mapping with a 'tools' list (${formatIssues(document.error)})`,
      ERROR_CODES.CATALOG_INVALID
    );
  }

  const tools: ToolDefinition[] = document.data.tools.map((entry, index) => {
    const parsed = ToolDefinitionSchema.safeParse(entry);
    if (!parsed.success) {
      throw new ConfigError(
        `Failed to parse tool at index ${index}: ${formatIssues(parsed.error)}`,
        ERROR_CODES.CATALOG_INVALID,
        { index }
      );
    }
    return parsed.data;
  });

  return new ToolCatalog(tools);
}

export function parseCatalogYaml(content: string, source: string = '<inline>'): ToolCatalog {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      ERROR_CODES.CATALOG_INVALID,
      { source }
    );
  }
  return parseCatalogDocument(raw);
}

export function loadCatalogFromFile(filePath: string): ToolCatalog {
  logger.info('Loading tool catalog', { event: 'catalog_loading', filePath });

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Tool catalog not readable: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      ERROR_CODES.CATALOG_INVALID,
      { filePath }
    );
  }

  const catalog = parseCatalogYaml(content, filePath);

  logger.info('Tool catalog loaded', {
    event: 'catalog_loaded',
    filePath,
    tools: catalog.names(),
  });

  return catalog;
}
