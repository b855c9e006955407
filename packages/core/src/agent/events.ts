import { createLogger } from "../infra/logger.js";
import type { AppLogger } from "../infra/logger.js";
import type { ToolResult } from "./tool-executor.js";
import type { GenerateTextResult, TextChunk, Usage } from "./types.js";

export type EngineOperation = "generateText" | "streamText";

export interface MemoryLimitWarning {
  readonly currentMessageCount: number;
  readonly maxMessages: number;
  readonly roundtripCount: number;
  /** Share of the message budget in use, 0-100. */
  readonly usagePercentage: number;
  readonly timestamp: number;
}

/** Payload for every event the engine emits, keyed by event name. */
export interface EngineEvents {
  requestStarted: {
    readonly provider: string;
    readonly model?: string;
    readonly operation: EngineOperation;
    readonly parameters: Record<string, unknown>;
    readonly timestamp: number;
  };
  requestCompleted: {
    readonly provider: string;
    readonly model?: string;
    readonly operation: EngineOperation;
    readonly result: GenerateTextResult | TextChunk;
    readonly durationMs: number;
    readonly usage?: Usage;
  };
  errorOccurred: {
    readonly error: Error;
    readonly provider?: string;
    readonly model?: string;
    readonly operation?: EngineOperation;
  };
  toolCallStarted: {
    readonly toolName: string;
    readonly arguments: Record<string, unknown>;
    readonly timestamp: number;
  };
  toolCallCompleted: {
    readonly toolName: string;
    readonly arguments: Record<string, unknown>;
    readonly result: ToolResult;
    readonly durationMs: number;
  };
  memoryLimitWarning: MemoryLimitWarning;
  streamChunkReceived: {
    readonly provider: string;
    readonly model?: string;
    readonly chunk: TextChunk;
    readonly chunkIndex: number;
  };
}

export type EngineEventName = keyof EngineEvents;

export type EventHandler<K extends EngineEventName> = (
  payload: EngineEvents[K],
) => void | Promise<void>;

export interface EventDispatcher {
  dispatch<K extends EngineEventName>(event: K, payload: EngineEvents[K]): Promise<void>;
}

export const noopEventDispatcher: EventDispatcher = {
  async dispatch() {},
};

export function memoryLimitWarning(
  currentMessageCount: number,
  maxMessages: number,
  roundtripCount: number,
): MemoryLimitWarning {
  return {
    currentMessageCount,
    maxMessages,
    roundtripCount,
    usagePercentage: (currentMessageCount / maxMessages) * 100,
    timestamp: Date.now(),
  };
}

export function isCritical(warning: MemoryLimitWarning, threshold = 90): boolean {
  return warning.usagePercentage >= threshold;
}

type ListenerMap = { [K in EngineEventName]?: EventHandler<K>[] };

/**
 * Typed event dispatch for engine lifecycle events. Handlers run
 * sequentially in registration order; a handler that throws is logged and
 * the remaining handlers still run.
 */
export class EventBus implements EventDispatcher {
  private listeners: ListenerMap = {};
  private readonly log: AppLogger;

  constructor(logger?: AppLogger) {
    this.log = logger ?? createLogger("events");
  }

  /** Subscribe to an event. Returns a function that unsubscribes. */
  on<K extends EngineEventName>(event: K, handler: EventHandler<K>): () => void {
    const current: EventHandler<K>[] = this.listeners[event] ?? [];
    this.listeners[event] = [...current, handler];
    return () => this.off(event, handler);
  }

  off<K extends EngineEventName>(event: K, handler: EventHandler<K>): void {
    const current: EventHandler<K>[] | undefined = this.listeners[event];
    if (!current) return;
    this.listeners[event] = current.filter((h) => h !== handler);
  }

  async dispatch<K extends EngineEventName>(event: K, payload: EngineEvents[K]): Promise<void> {
    const current: EventHandler<K>[] | undefined = this.listeners[event];
    if (!current || current.length === 0) return;

    for (const handler of current) {
      try {
        await handler(payload);
      } catch (err) {
        this.log.warn(
          `Event handler for "${event}" threw: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }

  listenerCount(event: EngineEventName): number {
    return this.listeners[event]?.length ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
