import type { FunctionDeclaration } from '../tools/toolExecutor';

/** One decoded message from the realtime AI session. */
export type AiResponse =
  | { kind: 'audio'; data: Buffer }
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; id: string; name: string; args: Record<string, unknown> }
  | { kind: 'interrupted' }
  | { kind: 'turn_complete' }
  | { kind: 'empty' };

export type ToolResponsePayload = { result: string } | { error: string };

export interface AiTransport {
  sendAudio(chunk: Buffer): Promise<void>;
  sendText(text: string): Promise<void>;
  respondToTool(callId: string, name: string, payload: ToolResponsePayload): Promise<void>;
  /** Single-consumer stream; ends when the transport closes. Safe to re-enter after a read error. */
  receive(): AsyncIterable<AiResponse>;
  close(): Promise<void>;
}

export interface AiConnectOptions {
  model: string;
  instructions: string;
  tools: FunctionDeclaration[];
  voice: string;
  signal?: AbortSignal;
}

export interface AiConnector {
  connect(options: AiConnectOptions): Promise<AiTransport>;
}
