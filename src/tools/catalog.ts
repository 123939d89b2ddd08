/**
 * Tool Catalog
 *
 * Flattens every backend's tools into one name-keyed catalog. Names are the
 * dispatch key; when two backends advertise the same name the backend
 * registered last wins.
 */

import { createLogger, errorMessage } from '@/lib/logger.js';
import type {
  ToolBackendMap,
  ToolCatalogEntry,
  ToolDefinition,
  ToolInfo,
  ToolResult,
} from '@/types/index.js';

const log = createLogger('catalog');

export interface ListingFailure {
  backend: string;
  result: ToolResult;
}

export interface ToolCatalog {
  entries: Map<string, ToolCatalogEntry>;
  /** Backends whose listing failed; they contribute no tools */
  failures: ListingFailure[];
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * List every backend's tools, in registration order
 */
export async function buildToolCatalog(
  backends: ToolBackendMap
): Promise<ToolCatalog> {
  const entries = new Map<string, ToolCatalogEntry>();
  const failures: ListingFailure[] = [];

  for (const [name, backend] of backends) {
    let tools: ToolInfo[];
    try {
      tools = await backend.listTools();
    } catch (error) {
      log.error(`Failed to list tools of ${name}: ${errorMessage(error)}`);
      failures.push({
        backend: name,
        result: errorResult(`Error listing tools: ${errorMessage(error)}`),
      });
      continue;
    }

    for (const tool of tools) {
      const existing = entries.get(tool.name);
      if (existing) {
        log.warn(
          `Tool ${tool.name} of ${name} shadows the one of ${existing.backend}`
        );
      }
      entries.set(tool.name, { ...tool, backend: name });
    }
  }

  return { entries, failures };
}

/**
 * Function-calling definitions advertised to the model
 */
export function toToolDefinitions(
  entries: Iterable<ToolCatalogEntry>
): ToolDefinition[] {
  return Array.from(entries, (entry) => ({
    type: 'function' as const,
    function: {
      name: entry.name,
      description: entry.description,
      parameters: entry.inputSchema,
    },
  }));
}
