/**
 * The conversation one agent run sends to its model.
 *
 * Keeps the system message pinned and the rest within a token budget by
 * dropping the oldest turns first. A turn is either a single message or an
 * assistant message together with the tool results answering its calls, so
 * a call and its result are always dropped together. Dropped turns are
 * replaced by one marker message right after the system message.
 */

import type { LLMMessage } from '@conclave/agent-contracts';
import { AGENT_HISTORY } from '../constants.js';

export interface TruncationInfo {
  /** Messages dropped by this truncation pass */
  droppedMessages: number;
  /** Messages dropped since the history was created */
  totalDropped: number;
  /** Estimate after truncation */
  estimatedTokens: number;
}

export interface MessageHistoryOptions {
  systemPrompt: string;
  /** Token budget for the whole payload, system message included */
  maxTokens: number;
  estimateTokens?: (message: LLMMessage) => number;
  onTruncate?: (info: TruncationInfo) => void;
}

/**
 * chars/4 estimate over content and serialized tool calls, plus a fixed overhead.
 */
export function estimateMessageTokens(message: LLMMessage): number {
  let chars = message.content.length;
  if (message.toolCalls && message.toolCalls.length > 0) {
    chars += JSON.stringify(message.toolCalls).length;
  }
  return Math.ceil(chars / AGENT_HISTORY.charsPerToken) + AGENT_HISTORY.messageOverheadTokens;
}

export class MessageHistory {
  private readonly system: LLMMessage;
  private readonly maxTokens: number;
  private readonly estimate: (message: LLMMessage) => number;
  private readonly onTruncate?: (info: TruncationInfo) => void;

  private messages: LLMMessage[] = [];
  private tokenCounts: number[] = [];
  private messageTokens = 0;
  private dropped = 0;

  constructor(options: MessageHistoryOptions) {
    this.system = { role: 'system', content: options.systemPrompt };
    this.maxTokens = options.maxTokens;
    this.estimate = options.estimateTokens ?? estimateMessageTokens;
    this.onTruncate = options.onTruncate;
  }

  /**
   * Add a message, then truncate if the budget is exceeded.
   */
  append(message: LLMMessage): void {
    const tokens = this.estimate(message);
    this.messages.push(message);
    this.tokenCounts.push(tokens);
    this.messageTokens += tokens;
    this.truncate();
  }

  /**
   * Ordered payload for the next model call.
   */
  toRequestPayload(): LLMMessage[] {
    const marker = this.marker();
    return marker ? [this.system, marker, ...this.messages] : [this.system, ...this.messages];
  }

  /** Non-system messages currently kept, oldest first */
  getMessages(): readonly LLMMessage[] {
    return this.messages;
  }

  get length(): number {
    return this.messages.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get estimatedTokens(): number {
    const marker = this.marker();
    return this.estimate(this.system) + (marker ? this.estimate(marker) : 0) + this.messageTokens;
  }

  // ── Truncation ─────────────────────────────────────────────────────────────

  private truncate(): void {
    let droppedNow = 0;

    while (this.estimatedTokens > this.maxTokens) {
      const size = this.leadingTurnSize();
      // Never drop the newest turn: it may still be waiting for tool results
      if (size === 0 || size >= this.messages.length) {
        break;
      }
      this.messages.splice(0, size);
      const removed = this.tokenCounts.splice(0, size);
      this.messageTokens -= removed.reduce((sum, t) => sum + t, 0);
      this.dropped += size;
      droppedNow += size;
    }

    if (droppedNow > 0) {
      this.onTruncate?.({
        droppedMessages: droppedNow,
        totalDropped: this.dropped,
        estimatedTokens: this.estimatedTokens,
      });
    }
  }

  /**
   * Number of messages forming the oldest turn.
   */
  private leadingTurnSize(): number {
    const first = this.messages[0];
    if (!first) {
      return 0;
    }
    if (first.role !== 'assistant' || !first.toolCalls || first.toolCalls.length === 0) {
      return 1;
    }
    const callIds = new Set(first.toolCalls.map((call) => call.id));
    let size = 1;
    while (size < this.messages.length) {
      const next = this.messages[size];
      if (!next || next.role !== 'tool' || next.toolCallId === undefined || !callIds.has(next.toolCallId)) {
        break;
      }
      size++;
    }
    return size;
  }

  private marker(): LLMMessage | undefined {
    if (this.dropped === 0) {
      return undefined;
    }
    return { role: 'user', content: AGENT_HISTORY.truncationMarker(this.dropped) };
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Pairing check
// ═══════════════════════════════════════════════════════════════════════

export interface ToolPairingReport {
  ok: boolean;
  /** Call ids without a result */
  orphanCalls: string[];
  /** Result ids without a preceding call */
  orphanResults: string[];
}

/**
 * Verify that every tool call has exactly one result after it, and every
 * result answers an earlier call.
 */
export function checkToolPairing(messages: readonly LLMMessage[]): ToolPairingReport {
  const open = new Set<string>();
  const answered = new Set<string>();
  const orphanResults: string[] = [];

  for (const message of messages) {
    if (message.role === 'assistant' && message.toolCalls) {
      for (const call of message.toolCalls) {
        open.add(call.id);
      }
    } else if (message.role === 'tool') {
      const id = message.toolCallId ?? '';
      if (open.has(id) && !answered.has(id)) {
        answered.add(id);
      } else {
        orphanResults.push(id);
      }
    }
  }

  const orphanCalls = [...open].filter((id) => !answered.has(id));
  return { ok: orphanCalls.length === 0 && orphanResults.length === 0, orphanCalls, orphanResults };
}
