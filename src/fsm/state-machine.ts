import { isToolType } from '../tools/types';
import type { ToolType } from '../tools/types';
import { INITIAL_STATE } from './states';
import type { FSMState, State } from './states';
import { transitions as defaultTransitions } from './transitions';
import type { TransitionTable } from './transitions';
import { StateMachineEvents } from './events';

/**
 * Goal-guard state machine. Decides whether a tool may run in the current
 * pipeline phase and records the path a goal run has taken.
 *
 * Illegal moves are reported through return values and never throw; callers
 * must check `transition()` before assuming the state advanced.
 */
export class GoalGuardStateMachine {
  private state: FSMState = { currentState: INITIAL_STATE, history: [], toolHistory: [] };

  public events = new StateMachineEvents();

  constructor(private table: TransitionTable = defaultTransitions) {}

  getState(): State {
    return this.state.currentState;
  }

  getHistory(): State[] {
    return [...this.state.history];
  }

  getToolHistory(): ToolType[] {
    return [...this.state.toolHistory];
  }

  snapshot(): FSMState {
    return {
      currentState: this.state.currentState,
      history: this.getHistory(),
      toolHistory: this.getToolHistory(),
    };
  }

  canExecute(toolType: ToolType): boolean {
    return this.table[this.state.currentState][toolType] !== undefined;
  }

  allowedTools(): Set<ToolType> {
    return new Set(Object.keys(this.table[this.state.currentState]).filter(isToolType));
  }

  /** Apply a tool-driven move. Returns false, with no side effect, when the move is illegal. */
  transition(toolType: ToolType): boolean {
    const from = this.state.currentState;
    const next = this.table[from][toolType];
    if (next === undefined) {
      return false;
    }

    this.state.history.push(from);
    this.state.toolHistory.push(toolType);
    this.state.currentState = next;

    this.events.emitTransition({ from, to: next, toolType, forced: false });
    return true;
  }

  /** Move unconditionally, for verdicts that are not single tool invocations */
  forceTransition(state: State): void {
    const from = this.state.currentState;
    this.state.history.push(from);
    this.state.currentState = state;

    this.events.emitTransition({ from, to: state, forced: true });
  }

  toReflexionState(): void {
    this.forceTransition('reflexion');
  }

  toErrorState(): void {
    this.forceTransition('error');
  }

  reset(): void {
    this.state = { currentState: INITIAL_STATE, history: [], toolHistory: [] };
  }
}
