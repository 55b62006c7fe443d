// Tool Registry - Central registry for the retrieval tools
// Dispatches model tool requests by name and keeps the sources of the latest run of each tool

import type { ProviderTool, JsonSchemaProperty } from '../../providers/types.js';
import type { Source, Tool, ToolOutput, ToolParameter, ToolSchema } from './types.js';

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private sources: Map<string, Source[]> = new Map();

  /**
   * Registers a tool under its schema name. A second tool with the same name
   * replaces the first and keeps its position in the schema list.
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.schema.name)) {
      console.warn(`Tool "${tool.schema.name}" already registered, overwriting`);
      this.sources.delete(tool.schema.name);
    }
    this.tools.set(tool.schema.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  listSchemas(): ToolSchema[] {
    return Array.from(this.tools.values()).map(tool => tool.schema);
  }

  toProviderTools(): ProviderTool[] {
    return this.listSchemas().map(schema => ({
      name: schema.name,
      description: schema.description,
      input_schema: {
        type: 'object',
        properties: this.parametersToJsonSchema(schema.parameters),
        required: schema.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  /**
   * Executes the named tool. Unknown names come back as content so the model
   * sees the problem; errors thrown by the tool itself propagate.
   */
  async dispatch(name: string, args: Record<string, unknown>): Promise<ToolOutput> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { content: `Tool '${name}' not found`, sources: [] };
    }

    const output = await tool.execute(args);
    // Re-insert so iteration follows the latest invocation of each tool
    this.sources.delete(name);
    this.sources.set(name, output.sources);
    return output;
  }

  /** Latest sources of each tool, in the order the tools were last invoked. */
  collectSources(): Source[] {
    return Array.from(this.sources.values()).flat();
  }

  resetSources(): void {
    this.sources.clear();
  }

  private parametersToJsonSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
