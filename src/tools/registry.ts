import { z } from 'zod';
import { ConfigError } from '../agent/errors.js';
import { AnyToolSpec } from './types.js';

const TOOL_NAME = /^[a-z][a-z0-9_]{1,63}$/;

export interface ToolCatalogEntry {
  name: string;
  description: string;
  sensitive: boolean;
  parameters: Array<{ name: string; type: string; optional: boolean; description?: string }>;
}

/**
 * Fixed set of capabilities a plan may reference. Built once at startup;
 * planner output is checked against it and never trusted to name code.
 */
export class ToolRegistry {
  private tools = new Map<string, AnyToolSpec>();

  constructor(tools: AnyToolSpec[]) {
    for (const tool of tools) {
      if (!TOOL_NAME.test(tool.name)) {
        throw new ConfigError(`Tool name "${tool.name}" must be snake_case (2-64 chars)`);
      }
      if (!tool.description.trim()) {
        throw new ConfigError(`Tool ${tool.name} has no description`);
      }
      if (this.tools.has(tool.name)) {
        throw new ConfigError(`Tool ${tool.name} is registered twice`);
      }
      if (tool.timeoutMs !== undefined && !(tool.timeoutMs > 0)) {
        throw new ConfigError(`Tool ${tool.name} has a non-positive timeout`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  list(): AnyToolSpec[] {
    return Array.from(this.tools.values());
  }

  get(name: string): AnyToolSpec | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  isSensitive(name: string): boolean {
    return this.tools.get(name)?.sensitive === true;
  }

  catalog(): ToolCatalogEntry[] {
    return this.list().map(t => ({
      name: t.name,
      description: t.description,
      sensitive: t.sensitive === true,
      parameters: describeParameters(t.schema),
    }));
  }

  // Text block handed to the planner prompt.
  describe(): string {
    return this.catalog()
      .map(entry => {
        const params = entry.parameters.length
          ? entry.parameters
              .map(p => `    - ${p.name}${p.optional ? '?' : ''} (${p.type})${p.description ? `: ${p.description}` : ''}`)
              .join('\n')
          : '    None';
        return `- ${entry.name}${entry.sensitive ? ' [sensitive]' : ''}: ${entry.description}\n  Parameters:\n${params}`;
      })
      .join('\n');
  }
}

function describeParameters(schema: z.ZodTypeAny | undefined): ToolCatalogEntry['parameters'] {
  if (!(schema instanceof z.ZodObject)) return [];
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    type: typeName(field),
    optional: field.isOptional(),
    description: field.description,
  }));
}

function typeName(field: z.ZodTypeAny): string {
  if (field instanceof z.ZodOptional || field instanceof z.ZodNullable) return typeName(field.unwrap());
  if (field instanceof z.ZodDefault) return typeName(field.removeDefault());
  if (field instanceof z.ZodString) return 'string';
  if (field instanceof z.ZodNumber) return 'number';
  if (field instanceof z.ZodBoolean) return 'boolean';
  if (field instanceof z.ZodEnum) return field.options.join(' | ');
  if (field instanceof z.ZodArray) return `${typeName(field.element)}[]`;
  return 'object';
}
