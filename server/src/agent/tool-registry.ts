import type { z } from 'zod';
import { ToolArgumentError } from '../lib/errors.js';
import { formatIssues } from '../lib/validate.js';
import type { ExceptionEnvelope } from './target-api.js';

/**
 * Operations the target exposes that are deliberately left out of the
 * catalog, so a run shows whether a persona finds them on its own.
 */
export const OMITTED_OPERATIONS: readonly string[] = ['admin_users'];

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  /** One catalog line, `name(signature): purpose` */
  description: string;
  schema: S;
  execute(input: z.output<S>, signal?: AbortSignal): Promise<unknown>;
}

/** Identity helper that keeps `execute`'s input typed by its schema */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): ToolDefinition<S> {
  return definition;
}

/**
 * Name to operation table. Lookup is exact; unknown names and bad arguments
 * come back as JSON text, never as a thrown error.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: readonly ToolDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: ToolDefinition): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool '${definition.name}' is already registered`);
    }
    if (OMITTED_OPERATIONS.includes(definition.name)) {
      throw new Error(`Tool '${definition.name}' must stay out of the catalog`);
    }
    this.tools.set(definition.name, definition);
    return this;
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Catalog text in registration order, one line per operation. */
  describeCapabilities(): string {
    return [...this.tools.values()].map((tool) => tool.description).join('\n');
  }

  async invoke(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `{"error": ${JSON.stringify(`Tool '${name}' not found.`)}}`;
    }

    let result: unknown;
    try {
      const parsed = tool.schema.safeParse(args);
      if (!parsed.success) {
        throw new ToolArgumentError(name, formatIssues(parsed.error.issues));
      }
      result = await tool.execute(parsed.data, signal);
    } catch (err) {
      const envelope: ExceptionEnvelope = {
        error: 'Exception',
        details: err instanceof Error ? err.message : String(err),
      };
      result = envelope;
    }

    return JSON.stringify(result, null, 2) ?? 'null';
  }
}
