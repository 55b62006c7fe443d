// Tool system types and interfaces
// Defines the schema and capability contract for retrieval tools

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

/** Citation for a piece of retrieved course material. */
export interface Source {
  name: string;
  link?: string;
}

export interface ToolOutput {
  content: string; // Formatted text handed back to the model
  sources: Source[];
}

export interface Tool {
  schema: ToolSchema;
  execute: (args: Record<string, unknown>) => Promise<ToolOutput>;
}
