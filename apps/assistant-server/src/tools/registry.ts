import type { ToolName } from '../types';
import { createToolImplementations } from './implementations';
import type { ToolDefinition, ToolDefinitions } from './types';

export class ToolRegistry {
  constructor(private readonly tools: ToolDefinitions = createToolImplementations()) {}

  get<TName extends ToolName>(name: TName): ToolDefinition<TName> {
    return this.tools[name];
  }

  names(): ToolName[] {
    return Object.values(this.tools).map((tool) => tool.name);
  }
}
