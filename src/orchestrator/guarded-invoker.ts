import type { GoalGuardStateMachine } from '../fsm/state-machine';
import { toolFailure } from '../tools/types';
import type { ToolCall, ToolInvoker, ToolResult } from '../tools/types';

/**
 * Tool contract decorator that only lets a call through when the state
 * machine allows it, and records the move once the tool has run. Gates are
 * handed this invoker, so each of their calls is checked and logged without the
 * gate knowing about the machine.
 */
export class GuardedToolInvoker implements ToolInvoker {
  constructor(
    private inner: ToolInvoker,
    private machine: GoalGuardStateMachine,
  ) {}

  async invoke(call: ToolCall): Promise<ToolResult> {
    if (!this.machine.canExecute(call.toolType)) {
      const allowed = [...this.machine.allowedTools()].join(', ') || 'none';
      return toolFailure(`Tool ${call.toolType} is not allowed in state ${this.machine.getState()} (allowed: ${allowed})`);
    }

    let result: ToolResult;
    try {
      result = await this.inner.invoke(call);
    } catch (error) {
      result = toolFailure(error instanceof Error ? error.message : String(error));
    }

    this.machine.transition(call.toolType);
    return result;
  }
}
