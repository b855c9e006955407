import { parseEngineConfig } from "../config/loader.js";
import type { EngineConfig, EngineConfigInput } from "../config/types.js";
import { InputValidationError, MemoryLimitExceededError, ProviderError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { AppLogger } from "../infra/logger.js";
import { memoryLimitWarning, noopEventDispatcher } from "./events.js";
import type { EngineOperation, EventDispatcher } from "./events.js";
import { assistantMessage, toolMessage, userMessage, validateConversation } from "./messages.js";
import type { GenerationOptions, TextProvider } from "./providers.js";
import { ToolExecutor, toolResultContent } from "./tool-executor.js";
import type { ToolExecutionPolicy } from "./tool-policy.js";
import { ToolRegistry } from "./tools.js";
import { HttpTransport } from "./transport.js";
import type { Tool } from "./tools.js";
import type {
  ContentPart,
  GenerateTextResult,
  Message,
  TextChunk,
  TextResult,
  ToolCall,
  Usage,
} from "./types.js";
import { sumUsage, ZERO_USAGE } from "./usage.js";

/**
 * Conversation engine: drives the request -> tool execution -> request loop
 * against a provider until the model stops asking for tools, the roundtrip
 * limit is reached, or the conversation outgrows its message limit.
 */

interface RequestOptions extends GenerationOptions {
  provider: TextProvider;
  /** Becomes a user message ahead of `messages`. */
  prompt?: string | readonly ContentPart[];
  messages?: readonly Message[];
  maxMessages?: number;
}

export interface GenerateTextOptions extends RequestOptions {
  maxToolRoundtrips?: number;
  toolExecutionPolicy?: ToolExecutionPolicy;
  onFinish?: (result: GenerateTextResult) => void | Promise<void>;
}

export interface StreamTextOptions extends RequestOptions {
  onChunk?: (chunk: TextChunk) => void | Promise<void>;
  /** Called with the last chunk when it completes the stream. */
  onFinish?: (chunk: TextChunk) => void | Promise<void>;
}

export interface ConversationEngineOptions {
  logger?: AppLogger;
  events?: EventDispatcher;
}

/** Limits resolved once per invocation. */
interface InvocationLimits {
  readonly maxToolRoundtrips: number;
  readonly maxMessages: number;
  readonly warningThreshold: number;
}

function coerceLimit(name: string, value: number, min: number): number {
  if (Number.isNaN(value)) {
    throw new InputValidationError(`${name} must be a number`, name);
  }
  return Math.max(min, Math.trunc(value));
}

function buildConversation(options: RequestOptions): Message[] {
  const messages: Message[] = [];
  if (options.prompt !== undefined) {
    messages.push(userMessage(options.prompt));
  }
  messages.push(...(options.messages ?? []));

  if (messages.length === 0) {
    throw InputValidationError.requiredParameter("prompt or messages");
  }
  validateConversation(messages);
  return messages;
}

function generationOptions(options: RequestOptions): GenerationOptions {
  return {
    model: options.model,
    system: options.system,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    topP: options.topP,
    stopSequences: options.stopSequences,
    tools: options.tools,
    toolChoice: options.toolChoice,
  };
}

/**
 * Tool messages are matched to calls by id, so a response that reuses one
 * cannot be answered. Reported as a provider error.
 */
function assertUniqueCallIds(
  calls: readonly ToolCall[],
  provider: string,
  model: string | undefined,
): void {
  const seen = new Set<string>();
  for (const call of calls) {
    if (seen.has(call.id)) {
      throw ProviderError.invalidResponse(provider, `duplicate tool call id "${call.id}"`, model);
    }
    seen.add(call.id);
  }
}

export class ConversationEngine {
  private readonly config: EngineConfig;
  private readonly log: AppLogger;
  private readonly events: EventDispatcher;
  private readonly transport: HttpTransport;

  constructor(config?: EngineConfigInput, options: ConversationEngineOptions = {}) {
    this.config = parseEngineConfig(config ?? {});
    this.log =
      options.logger ??
      createLogger("engine", {
        level: this.config.logging.level,
        redact: this.config.logging.redactSecrets,
      });
    this.events = options.events ?? noopEventDispatcher;
    this.transport = new HttpTransport(this.config, this.log);
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  /** HTTP transport for provider adapters, built from this engine's retry and stream settings. */
  getTransport(): HttpTransport {
    return this.transport;
  }

  /**
   * Run a conversation to completion, executing tool calls between
   * provider requests.
   */
  async generateText(options: GenerateTextOptions): Promise<GenerateTextResult> {
    const limits = this.resolveLimits(options.maxMessages, options.maxToolRoundtrips);
    const messages = buildConversation(options);
    const { provider } = options;
    const operation: EngineOperation = "generateText";
    const request = generationOptions(options);
    const tools = options.tools ?? [];
    const startedAt = Date.now();

    await this.events.dispatch("requestStarted", {
      provider: provider.name,
      model: options.model,
      operation,
      parameters: { messageCount: messages.length, hasTools: tools.length > 0 },
      timestamp: startedAt,
    });

    try {
      const canExecute =
        options.toolChoice !== "none" && tools.some((tool) => tool.isExecutable());
      const registry = canExecute ? registryOf(tools) : undefined;
      const executor = new ToolExecutor(options.toolExecutionPolicy, this.log);
      const roundtripUsage: Usage[] = [];
      let roundtrip = 0;
      let warned = false;

      for (;;) {
        warned = await this.checkMemory(messages.length, limits, roundtrip, warned);

        this.log.debug(
          `Requesting completion from ${provider.name} (roundtrip ${roundtrip}, ${messages.length} messages)`,
        );
        const result = await provider.generateText(Object.freeze([...messages]), request);

        if (result.toolCalls.length === 0 || !registry) {
          return await this.finish(options, result, roundtripUsage, startedAt);
        }

        roundtrip++;
        if (roundtrip > limits.maxToolRoundtrips) {
          this.log.warn(
            `Max tool roundtrips (${limits.maxToolRoundtrips}) reached; returning unexecuted tool calls`,
          );
          return await this.finish(options, result, roundtripUsage, startedAt);
        }

        assertUniqueCallIds(result.toolCalls, provider.name, options.model);
        roundtripUsage.push(result.usage ?? ZERO_USAGE);
        messages.push(assistantMessage(result.text, result.toolCalls));
        for (const call of result.toolCalls) {
          messages.push(toolMessage(call.id, await this.runTool(registry, executor, call)));
        }
      }
    } catch (err) {
      await this.reportError(err, provider.name, options.model, operation);
      throw err;
    }
  }

  /**
   * Stream a single completion. Tool calls are not executed; closing the
   * returned iterator closes the provider stream.
   */
  async *streamText(options: StreamTextOptions): AsyncGenerator<TextChunk, void, undefined> {
    const limits = this.resolveLimits(options.maxMessages);
    const messages = buildConversation(options);
    const { provider } = options;
    const operation: EngineOperation = "streamText";
    const startedAt = Date.now();

    await this.events.dispatch("requestStarted", {
      provider: provider.name,
      model: options.model,
      operation,
      parameters: { messageCount: messages.length, hasTools: (options.tools ?? []).length > 0 },
      timestamp: startedAt,
    });

    try {
      await this.checkMemory(messages.length, limits, 0, false);

      let last: TextChunk | undefined;
      let chunkIndex = 0;
      for await (const chunk of provider.streamText(
        Object.freeze([...messages]),
        generationOptions(options),
      )) {
        await options.onChunk?.(chunk);
        await this.events.dispatch("streamChunkReceived", {
          provider: provider.name,
          model: options.model,
          chunk,
          chunkIndex: chunkIndex++,
        });
        last = chunk;
        yield chunk;
      }

      if (last?.isComplete) {
        await options.onFinish?.(last);
        await this.events.dispatch("requestCompleted", {
          provider: provider.name,
          model: options.model,
          operation,
          result: last,
          durationMs: Date.now() - startedAt,
          usage: last.usage,
        });
      }
    } catch (err) {
      await this.reportError(err, provider.name, options.model, operation);
      throw err;
    }
  }

  private resolveLimits(
    maxMessagesOption?: number,
    maxToolRoundtripsOption?: number,
  ): InvocationLimits {
    const maxMessages = coerceLimit(
      "maxMessages",
      maxMessagesOption ?? this.config.maxMessages,
      1,
    );
    const maxToolRoundtrips = coerceLimit(
      "maxToolRoundtrips",
      maxToolRoundtripsOption ?? this.config.maxToolRoundtrips,
      0,
    );
    return {
      maxMessages,
      maxToolRoundtrips,
      warningThreshold: maxMessages * this.config.memoryWarningRatio,
    };
  }

  /**
   * Enforce the message limit. `warned` carries whether this invocation has
   * already warned; the resolved value is the updated flag.
   */
  private async checkMemory(
    count: number,
    limits: InvocationLimits,
    roundtripCount: number,
    warned: boolean,
  ): Promise<boolean> {
    if (count > limits.maxMessages) {
      throw new MemoryLimitExceededError(count, limits.maxMessages, roundtripCount);
    }
    if (warned || count < limits.warningThreshold) return warned;

    const warning = memoryLimitWarning(count, limits.maxMessages, roundtripCount);
    this.log.warn(
      `Conversation at ${Math.round(warning.usagePercentage)}% of its message limit (${count}/${limits.maxMessages})`,
    );
    await this.events.dispatch("memoryLimitWarning", warning);
    return true;
  }

  private async runTool(
    registry: ToolRegistry,
    executor: ToolExecutor,
    call: ToolCall,
  ): Promise<string> {
    const tool = registry.get(call.name);
    if (!tool) {
      this.log.warn(`Model requested unknown tool "${call.name}"`);
      return `Error: Tool '${call.name}' not found`;
    }

    const startedAt = Date.now();
    await this.events.dispatch("toolCallStarted", {
      toolName: call.name,
      arguments: call.arguments,
      timestamp: startedAt,
    });

    const result = await executor.execute(tool, call);

    await this.events.dispatch("toolCallCompleted", {
      toolName: call.name,
      arguments: call.arguments,
      result,
      durationMs: Date.now() - startedAt,
    });
    return toolResultContent(result);
  }

  private async finish(
    options: GenerateTextOptions,
    result: TextResult,
    roundtripUsage: readonly Usage[],
    startedAt: number,
  ): Promise<GenerateTextResult> {
    const usage = sumUsage([...roundtripUsage, result.usage ?? ZERO_USAGE]);
    const final: GenerateTextResult = Object.freeze({
      ...result,
      usage,
      roundtripUsage: Object.freeze([...roundtripUsage]),
    });

    await options.onFinish?.(final);
    await this.events.dispatch("requestCompleted", {
      provider: options.provider.name,
      model: options.model,
      operation: "generateText",
      result: final,
      durationMs: Date.now() - startedAt,
      usage,
    });
    return final;
  }

  private async reportError(
    err: unknown,
    provider: string,
    model: string | undefined,
    operation: EngineOperation,
  ): Promise<void> {
    const error = err instanceof Error ? err : new Error(String(err));
    this.log.error(`${operation} failed: ${error.message}`);
    await this.events.dispatch("errorOccurred", { error, provider, model, operation });
  }
}

function registryOf(tools: readonly Tool[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.set(tool);
  }
  return registry;
}
