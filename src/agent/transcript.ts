// This module owns the message history of one orchestration run.

import type { ToolCallRequest, TranscriptMessage } from '../types/domain.js';

export class Transcript {
  private readonly entries: TranscriptMessage[] = [];

  public get length(): number {
    return this.entries.length;
  }

  public addSystem(content: string): void {
    this.entries.push({ role: 'system', content });
  }

  public addUser(content: string): void {
    this.entries.push({ role: 'user', content });
  }

  public addAssistant(content: string | null, toolCalls: readonly ToolCallRequest[]): void {
    this.entries.push({ role: 'assistant', content, toolCalls: [...toolCalls] });
  }

  public addToolResult(call: ToolCallRequest, content: string, isError: boolean): void {
    this.entries.push({
      role: 'tool',
      toolCallId: call.id,
      toolName: call.name,
      content,
      isError
    });
  }

  // Returns a copy so provider requests never observe later appends.
  public messages(): readonly TranscriptMessage[] {
    return [...this.entries];
  }
}
