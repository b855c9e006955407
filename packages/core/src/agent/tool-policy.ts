import { ToolSecurityError } from "../infra/errors.js";
import type { ToolCall } from "./types.js";

/**
 * Security policy for tool execution: allow/deny lists, a confirmation
 * gate, argument sanitizing and a per-call timeout.
 *
 * Policies are immutable; every builder method returns a new policy.
 */

export type PolicyDecision =
  | { readonly allowed: true; readonly args: Record<string, unknown> }
  | { readonly allowed: false; readonly violation: ToolSecurityError };

export type ConfirmationCallback = (
  toolName: string,
  args: Record<string, unknown>,
) => boolean | Promise<boolean>;

export type ArgumentSanitizer = (
  toolName: string,
  args: Record<string, unknown>,
) => Record<string, unknown>;

interface PolicyState {
  /** `null` means every tool not on the deny list is allowed. */
  readonly allowedTools: readonly string[] | null;
  readonly deniedTools: readonly string[];
  readonly confirmation: ConfirmationCallback | null;
  readonly timeoutMs: number | null;
  readonly sanitizer: ArgumentSanitizer | null;
}

const OPEN_STATE: PolicyState = {
  allowedTools: null,
  deniedTools: [],
  confirmation: null,
  timeoutMs: null,
  sanitizer: null,
};

function unique(names: Iterable<string>): readonly string[] {
  return Object.freeze(Array.from(new Set(names)));
}

export class ToolExecutionPolicy {
  private constructor(private readonly state: PolicyState) {}

  /** A policy with no restrictions. */
  static create(): ToolExecutionPolicy {
    return new ToolExecutionPolicy(OPEN_STATE);
  }

  /** Deny everything until tools are explicitly allowed. */
  static restrictive(): ToolExecutionPolicy {
    return new ToolExecutionPolicy({ ...OPEN_STATE, allowedTools: [] });
  }

  allowTools(names: readonly string[] | null): ToolExecutionPolicy {
    return this.with({ allowedTools: names === null ? null : unique(names) });
  }

  addAllowedTools(names: readonly string[]): ToolExecutionPolicy {
    const current = this.state.allowedTools;
    return this.with({
      allowedTools: unique(current === null ? names : [...current, ...names]),
    });
  }

  denyTools(names: readonly string[]): ToolExecutionPolicy {
    return this.with({ deniedTools: unique(names) });
  }

  addDeniedTools(names: readonly string[]): ToolExecutionPolicy {
    return this.with({ deniedTools: unique([...this.state.deniedTools, ...names]) });
  }

  withConfirmation(callback: ConfirmationCallback): ToolExecutionPolicy {
    return this.with({ confirmation: callback });
  }

  /** Per-call execution timeout in milliseconds; `null` disables it. */
  withTimeout(ms: number | null): ToolExecutionPolicy {
    if (ms !== null && (!Number.isFinite(ms) || ms <= 0)) {
      throw new RangeError(`Tool timeout must be a positive number of milliseconds, got ${ms}`);
    }
    return this.with({ timeoutMs: ms });
  }

  withArgumentSanitizer(sanitizer: ArgumentSanitizer): ToolExecutionPolicy {
    return this.with({ sanitizer });
  }

  isToolAllowed(name: string): boolean {
    if (this.state.deniedTools.includes(name)) return false;
    if (this.state.allowedTools !== null) {
      return this.state.allowedTools.includes(name);
    }
    return true;
  }

  sanitizeArguments(name: string, args: Record<string, unknown>): Record<string, unknown> {
    return this.state.sanitizer ? this.state.sanitizer(name, args) : args;
  }

  async confirmExecution(name: string, args: Record<string, unknown>): Promise<boolean> {
    if (!this.state.confirmation) return true;
    return this.state.confirmation(name, args);
  }

  /**
   * Check a call against the policy. The sanitizer runs once; the
   * confirmation callback sees those arguments and an allowed decision
   * carries them, so the tool runs with exactly what was confirmed.
   */
  async validate(call: ToolCall): Promise<PolicyDecision> {
    if (this.state.deniedTools.includes(call.name)) {
      return {
        allowed: false,
        violation: ToolSecurityError.explicitlyDenied(call.name, call.arguments),
      };
    }
    if (!this.isToolAllowed(call.name)) {
      return {
        allowed: false,
        violation: ToolSecurityError.notAllowed(call.name, call.arguments),
      };
    }

    const args = this.sanitizeArguments(call.name, call.arguments);
    if (!(await this.confirmExecution(call.name, args))) {
      return {
        allowed: false,
        violation: ToolSecurityError.confirmationDenied(call.name, args),
      };
    }
    return { allowed: true, args };
  }

  hasRestrictions(): boolean {
    return (
      this.state.allowedTools !== null ||
      this.state.deniedTools.length > 0 ||
      this.state.confirmation !== null ||
      this.state.timeoutMs !== null ||
      this.state.sanitizer !== null
    );
  }

  getAllowedTools(): readonly string[] | null {
    return this.state.allowedTools;
  }

  getDeniedTools(): readonly string[] {
    return this.state.deniedTools;
  }

  getTimeout(): number | null {
    return this.state.timeoutMs;
  }

  private with(changes: Partial<PolicyState>): ToolExecutionPolicy {
    return new ToolExecutionPolicy({ ...this.state, ...changes });
  }
}
