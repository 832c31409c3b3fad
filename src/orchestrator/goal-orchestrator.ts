import crypto from 'crypto';
import path from 'path';
import { GoalGuardStateMachine } from '../fsm/state-machine';
import type { State } from '../fsm/states';
import { DevGate } from '../gates/dev-gate';
import { ProductGate } from '../gates/product-gate';
import type { SupplementaryCheck } from '../gates/product-gate';
import type { Gate, GateResult } from '../gates/types';
import { StrictMode } from '../policy/strict-mode';
import { ReflexionLoop } from '../reflexion/reflexion-loop';
import type { RepairPlan, RetryState } from '../reflexion/repair-plans';
import { BacktestStatsSchema } from '../tools/schemas';
import type { ToolInvoker } from '../tools/types';
import type { GateFailure, GoalInput, GoalResult, GoalStatus, GoalStep, RunContext } from './data-flow';
import { GuardedToolInvoker } from './guarded-invoker';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { DEFAULT_WORKSPACE_DIR } from './run-store';
import type { RunStore } from './run-store';

// ── Options ─────────────────────────────────────────────────────────────

/** Configuration for creating a GoalOrchestrator */
export interface GoalOrchestratorOptions {
  /** Tool contract implementation (process-backed in production, scripted in tests) */
  invoker: ToolInvoker;
  /** Unique identifier for this goal run (auto-generated if omitted) */
  runId?: string;
  /** Directory under which `<runId>/` holds the spec and backtest output */
  workspaceDir?: string;
  /** Repair attempts allowed after gate failures (default: 3) */
  maxRetries?: number;
  maxDrawdownLimit?: number;
  determinismRuns?: number;
  /** Surface artifact ids only (default: true) */
  strictMode?: boolean;
  /** Look up prior commits for the goal before generating a strategy */
  searchMemory?: boolean;
  supplementaryChecks?: SupplementaryCheck[];
  logger?: WorkflowLogger;
  store?: RunStore;
  /** Pre-built state machine, primarily for testing */
  stateMachine?: GoalGuardStateMachine;
}

type StepOutcome = { next: GoalStep } | { done: GoalResult };

/** Where each repair plan resumes: the state to force and the step to run next */
export const RETRY_TARGETS: Readonly<Record<RetryState, { state: State; step: GoalStep }>> = {
  dev_gate: { state: 'dev_gate', step: 'dev_gate' },
  backtest: { state: 'backtest_ready', step: 'backtest' },
  init: { state: 'init', step: 'strategy' },
};

// ── Orchestrator ────────────────────────────────────────────────────────

/**
 * GoalOrchestrator drives one goal from strategy generation to commit.
 *
 * Every tool call goes through a guarded invoker bound to the goal-guard
 * state machine, gates turn their checks into a verdict, and failed verdicts
 * go to the reflexion loop, which either names a step to resume from or ends
 * the run once the retry budget is spent.
 */
export class GoalOrchestrator {
  private machine: GoalGuardStateMachine;
  private reflexion: ReflexionLoop;
  private invoker: GuardedToolInvoker;
  private devGate: DevGate;
  private productGate: ProductGate;
  private strict: StrictMode;
  private logger: WorkflowLogger;
  private store?: RunStore;
  private runId: string;
  private workspaceDir: string;
  private searchMemory: boolean;
  private startTime = 0;
  private input: GoalInput = { goal: '', dataPath: '' };
  private lastPlan?: RepairPlan;

  constructor(options: GoalOrchestratorOptions) {
    this.runId = options.runId ?? crypto.randomUUID();
    this.machine = options.stateMachine ?? new GoalGuardStateMachine();
    this.reflexion = new ReflexionLoop(options.maxRetries);
    this.logger = options.logger ?? new ConsoleWorkflowLogger(this.runId);
    this.invoker = new GuardedToolInvoker(options.invoker, this.machine);
    this.devGate = new DevGate(this.invoker, { determinismRuns: options.determinismRuns, logger: this.logger });
    this.productGate = new ProductGate(this.invoker, {
      maxDrawdownLimit: options.maxDrawdownLimit,
      supplementaryChecks: options.supplementaryChecks,
      logger: this.logger,
    });
    this.strict = new StrictMode(options.strictMode ?? true);
    this.store = options.store;
    this.workspaceDir = options.workspaceDir ?? DEFAULT_WORKSPACE_DIR;
    this.searchMemory = options.searchMemory ?? false;

    this.machine.events.onTransition((event) => {
      this.logger.debug('State transition', { from: event.from, to: event.to, tool: event.toolType ?? null, forced: event.forced });
    });
  }

  // ── Public API ──────────────────────────────────────────────────────

  async runGoal(input: GoalInput): Promise<GoalResult> {
    this.startTime = Date.now();
    this.input = input;
    this.lastPlan = undefined;
    this.machine.reset();
    this.reflexion.reset();

    const runDir = path.resolve(this.workspaceDir, this.runId);
    const ctx: RunContext = {
      goal: input.goal,
      dataPath: input.dataPath,
      specPath: path.join(runDir, 'strategy_spec.json'),
      outputDir: path.join(runDir, 'backtest'),
      artifacts: {},
    };

    this.logger.info('Starting goal run', { runId: this.runId, goal: input.goal, data: input.dataPath });

    if (this.searchMemory) {
      await this.lookUpPriorWork(ctx);
    }

    let step: GoalStep = 'strategy';
    for (;;) {
      const outcome = await this.executeStep(step, ctx);
      if ('done' in outcome) {
        await this.persist(outcome.done.status, outcome.done.artifactId, outcome.done.error);
        this.logger.info('Goal result', { status: outcome.done.status, finalState: outcome.done.finalState, attempts: outcome.done.attempts, durationMs: outcome.done.durationMs });
        return outcome.done;
      }
      await this.persist('running');
      step = outcome.next;
    }
  }

  getRunId(): string {
    return this.runId;
  }

  /** Expose the underlying state machine (useful for diagnostics / testing) */
  getStateMachine(): GoalGuardStateMachine {
    return this.machine;
  }

  getReflexionLoop(): ReflexionLoop {
    return this.reflexion;
  }

  // ── Steps ───────────────────────────────────────────────────────────

  private async executeStep(step: GoalStep, ctx: RunContext): Promise<StepOutcome> {
    this.logger.info(`Executing: ${step}`, { state: this.machine.getState() });

    switch (step) {
      case 'strategy':
        return this.generateStrategy(ctx);
      case 'backtest':
        return this.runBacktest(ctx);
      case 'dev_gate':
        return this.runGate(this.devGate, ctx, 'dev_gate_passed', 'product_gate');
      case 'product_gate':
        return this.runGate(this.productGate, ctx, 'product_gate_passed', 'commit');
      case 'commit':
        return this.commit(ctx);
    }
  }

  private async lookUpPriorWork(ctx: RunContext): Promise<void> {
    const result = await this.invoker.invoke({ toolType: 'memory_search', parameters: { query: ctx.goal, limit: 5 } });
    if (!result.success) {
      this.logger.warn('Memory search failed; continuing without prior work', { error: result.error });
      return;
    }
    const matches = result.output?.matches;
    ctx.priorWork = Array.isArray(matches) ? matches.filter((m): m is string => typeof m === 'string') : [];
    this.logger.info(`Found ${ctx.priorWork.length} prior result(s) for this goal`);
  }

  private async generateStrategy(ctx: RunContext): Promise<StepOutcome> {
    const result = await this.invoker.invoke({ toolType: 'generate_strategy', parameters: { goal: ctx.goal, spec_path: ctx.specPath } });
    if (!result.success) {
      return { done: this.fail(`Strategy generation failed: ${result.error}`) };
    }
    ctx.artifacts.strategy = result.artifactId;
    return { next: 'backtest' };
  }

  private async runBacktest(ctx: RunContext): Promise<StepOutcome> {
    const result = await this.invoker.invoke({
      toolType: 'backtest',
      parameters: { spec_path: ctx.specPath, data_path: ctx.dataPath, output_dir: ctx.outputDir },
    });
    if (!result.success) {
      return { done: this.fail(`Backtest failed: ${result.error}`) };
    }

    ctx.artifacts.backtest = result.artifactId;
    const stats = BacktestStatsSchema.safeParse(result.output?.stats);
    ctx.stats = stats.success ? stats.data : undefined;
    return { next: 'dev_gate' };
  }

  /**
   * Gates call their tools through the guarded invoker, so the gate's first
   * tool call moves the machine into the gate state. A gate that fails before
   * calling any tool (no CRV report on disk) goes to reflexion from the
   * previous passed state.
   */
  private async runGate(gate: Gate, ctx: RunContext, passedState: State, next: GoalStep): Promise<StepOutcome> {
    const result = await gate.run({ spec_path: ctx.specPath, data_path: ctx.dataPath, output_dir: ctx.outputDir });

    if (result.passed) {
      this.logger.info(`${gate.name} passed`, { checks: result.checks });
      this.machine.forceTransition(passedState);
      return { next };
    }

    return this.handleGateFailure(gate, result);
  }

  private handleGateFailure(gate: Gate, result: GateResult): StepOutcome {
    this.machine.toReflexionState();

    const plan = this.reflexion.analyzeFailure(result);
    this.lastPlan = plan;
    const summary = this.reflexion.generateFailureSummary(result);

    this.logger.warn(`${gate.name} failed`, { failureType: plan.failureType, checks: result.checks });
    this.logger.debug(summary);

    if (!this.reflexion.shouldRetry()) {
      this.logger.error('Repair attempts exhausted', {
        attempts: this.reflexion.getAttemptCount(),
        maxRetries: this.reflexion.getMaxRetries(),
      });
      const failure: GateFailure = { gate: gate.name, result, summary };
      return { done: this.fail(`${gate.name} failed after ${this.reflexion.getAttemptCount()} repair attempt(s)`, plan, failure) };
    }

    this.reflexion.incrementAttempt();
    const target = RETRY_TARGETS[plan.retryState];
    this.logger.info(`Attempting repair (attempt ${this.reflexion.getAttemptCount()}/${this.reflexion.getMaxRetries()})`, {
      failureType: plan.failureType,
      retryState: plan.retryState,
    });
    this.machine.forceTransition(target.state);
    return { next: target.step };
  }

  private async commit(ctx: RunContext): Promise<StepOutcome> {
    const artifactIds = [ctx.artifacts.strategy, ctx.artifacts.backtest].filter((id): id is string => id !== undefined);
    const result = await this.invoker.invoke({
      toolType: 'memory_commit',
      parameters: { goal: ctx.goal, spec_path: ctx.specPath, output_dir: ctx.outputDir, artifact_ids: artifactIds },
    });
    if (!result.success) {
      return { done: this.fail(`Commit failed: ${result.error}`) };
    }

    const artifactId = result.artifactId;
    const response = this.strict.enabled
      ? this.strict.formatArtifactResponse(artifactId ? [artifactId] : [], 'Committed')
      : `Committed ${artifactId ?? '(no artifact id)'} for goal: ${ctx.goal}`;

    if (!this.strict.validateResponse(response)) {
      return { done: this.fail('Strict mode violation: response must cite an artifact id and little else') };
    }

    return { done: this.buildResult('completed', { artifactId, stats: ctx.stats, response }) };
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private fail(error: string, repairPlan?: RepairPlan, gateFailure?: GateFailure): GoalResult {
    if (this.machine.getState() !== 'error') {
      this.machine.toErrorState();
    }
    this.logger.error(error);
    return this.buildResult('failed', { error, repairPlan, gateFailure });
  }

  private buildResult(status: GoalResult['status'], extra: Pick<GoalResult, 'artifactId' | 'stats' | 'response' | 'error' | 'repairPlan' | 'gateFailure'>): GoalResult {
    return {
      status,
      runId: this.runId,
      goal: this.input.goal,
      finalState: this.machine.getState(),
      attempts: this.reflexion.getAttemptCount(),
      history: this.machine.getHistory(),
      toolHistory: this.machine.getToolHistory(),
      durationMs: Date.now() - this.startTime,
      ...extra,
    };
  }

  private async persist(status: GoalStatus, artifactId?: string, error?: string): Promise<void> {
    if (!this.store) return;
    const snapshot = this.machine.snapshot();
    await this.store.save({
      runId: this.runId,
      goal: this.input.goal,
      dataPath: this.input.dataPath,
      status,
      currentState: snapshot.currentState,
      history: snapshot.history,
      toolHistory: snapshot.toolHistory,
      attempts: this.reflexion.getAttemptCount(),
      artifactId,
      repairPlan: this.lastPlan,
      error,
      updatedAt: new Date().toISOString(),
    });
  }
}
