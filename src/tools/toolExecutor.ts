import { z } from 'zod';
import { log } from '../log';
import { incToolCalls } from '../metrics';

export interface FunctionDeclaration {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description?: string }>;
    required: string[];
  };
}

export interface ToolDefinition<TArgs> {
  declaration: FunctionDeclaration;
  args: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  run(args: TArgs): string | Promise<string>;
}

export interface RegisteredTool {
  declaration: FunctionDeclaration;
  invoke(rawArgs: unknown): Promise<string>;
}

export class UnknownToolError extends Error {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends Error {
  public readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Tool ${toolName} failed: ${detail}`, { cause });
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/** Binds a tool's argument schema to its body so the registry can hold tools of any shape. */
export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): RegisteredTool {
  return {
    declaration: definition.declaration,
    invoke: async (rawArgs: unknown) => {
      const parsed = definition.args.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(args)'}: ${issue.message}`)
          .join(', ');
        throw new Error(`invalid arguments: ${issues}`);
      }
      return definition.run(parsed.data);
    },
  };
}

export interface ToolExecutor {
  execute(name: string, args: Record<string, unknown>): Promise<string>;
  declarations(): FunctionDeclaration[];
}

export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: RegisteredTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  public register(tool: RegisteredTool): void {
    const name = tool.declaration.name;
    if (this.tools.has(name)) {
      throw new Error(`tool already registered: ${name}`);
    }
    this.tools.set(name, tool);
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public declarations(): FunctionDeclaration[] {
    return [...this.tools.values()].map((tool) => tool.declaration);
  }

  public async execute(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      incToolCalls(name, 'unknown_tool');
      log.error({ event: 'tool_unknown', tool: name }, 'unknown tool requested');
      throw new UnknownToolError(name);
    }

    log.debug({ event: 'tool_execute', tool: name, args }, 'executing tool');
    try {
      const result = await tool.invoke(args);
      incToolCalls(name, 'ok');
      log.debug({ event: 'tool_result', tool: name, result }, 'tool returned');
      return result;
    } catch (error) {
      incToolCalls(name, 'failed');
      log.error({ err: error, event: 'tool_failed', tool: name }, 'tool execution failed');
      throw new ToolExecutionError(name, error);
    }
  }
}
