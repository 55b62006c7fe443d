// Tool System Initialization
// Builds the registry of course retrieval tools

import type { CourseIndex } from '../vector-store.js';
import { ToolRegistry } from './registry.js';
import { createCourseSearchTool } from './course-search-tool.js';
import { createCourseOutlineTool } from './course-outline-tool.js';

export { ToolRegistry } from './registry.js';
export type { Tool, ToolOutput, ToolParameter, ToolSchema, Source } from './types.js';

export function initializeTools(index: CourseIndex, registry: ToolRegistry = new ToolRegistry()): ToolRegistry {
  console.log('Initializing tool system...');

  registry.register(createCourseSearchTool(index));
  console.log('✓ Course search tool registered');

  registry.register(createCourseOutlineTool(index));
  console.log('✓ Course outline tool registered');

  const names = registry.listSchemas().map(s => s.name);
  console.log(`Tool system initialized with ${names.length} tool(s): ${names.join(', ')}`);

  return registry;
}
