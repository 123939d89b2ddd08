/**
 * Tool Domain Types
 *
 * SCOPE: tool backends (MCP servers), their catalogs and invocation results
 */

/**
 * Tool advertised by a backend
 */
export interface ToolInfo {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>; // JSON Schema
}

export interface ToolContentPart {
  type: string;
  text?: string;
}

/**
 * Result of one tool invocation
 */
export interface ToolResult {
  content: ToolContentPart[];
  structuredContent?: unknown;
  isError?: boolean;
}

/**
 * A connected tool backend
 */
export interface ToolBackend {
  readonly name: string;

  listTools(): Promise<ToolInfo[]>;

  /**
   * Invoke a tool. Credentials travel beside the arguments, never inside
   * the model-visible argument object.
   */
  callTool(
    toolName: string,
    args: Record<string, unknown>,
    credentials?: Record<string, unknown>
  ): Promise<ToolResult>;

  close(): Promise<void>;
}

/**
 * Backends by name, built once at startup and read-only afterwards
 */
export type ToolBackendMap = ReadonlyMap<string, ToolBackend>;

/**
 * Flattened catalog entry; the name is the dispatch key
 */
export interface ToolCatalogEntry extends ToolInfo {
  backend: string;
}
