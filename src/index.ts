export * from './tools/types';
export * from './tools/schemas';
export { stableHashBytes, canonicalJson, canonicalJsonHash, isArtifactId, ARTIFACT_ID_PATTERN } from './tools/hashing';
export { ToolError, BinaryNotFoundError, CommandSpawnError } from './tools/errors';
export { runCommand, splitCommandLine } from './tools/process-runner';
export type { CommandOutput, CommandOptions, CommandRunner } from './tools/process-runner';
export { ProcessToolInvoker, hashBacktestArtifacts, BACKTEST_ARTIFACTS } from './tools/process-invoker';
export type { ProcessInvokerOptions } from './tools/process-invoker';
export { parseGoal, generateStrategySpec } from './tools/strategy-generator';
export type { GoalIntent, StrategyDefaults } from './tools/strategy-generator';
export { ENGINE_BINARY, MEMORY_BINARY, locateBinary, tryLocateBinary } from './tools/binaries';

export * from './fsm/states';
export { transitions } from './fsm/transitions';
export type { TransitionRow, TransitionTable } from './fsm/transitions';
export { StateMachineEvents } from './fsm/events';
export type { StateChangeEvent } from './fsm/events';
export { GoalGuardStateMachine } from './fsm/state-machine';

export * from './gates';

export { ReflexionLoop, DEFAULT_MAX_RETRIES } from './reflexion/reflexion-loop';
export { REPAIR_PLANS, CLASSIFIED_CHECKS } from './reflexion/repair-plans';
export type { FailureType, RepairPlan, RetryState } from './reflexion/repair-plans';

export { StrictMode, MAX_STRICT_TEXT_LENGTH } from './policy/strict-mode';

export { GoalOrchestrator, RETRY_TARGETS } from './orchestrator/goal-orchestrator';
export type { GoalOrchestratorOptions } from './orchestrator/goal-orchestrator';
export { GuardedToolInvoker } from './orchestrator/guarded-invoker';
export { ConsoleWorkflowLogger, silentLogger } from './orchestrator/logger';
export type { WorkflowLogger } from './orchestrator/logger';
export { RunStore, RunRecordSchema, DEFAULT_WORKSPACE_DIR } from './orchestrator/run-store';
export type { RunRecord } from './orchestrator/run-store';
export { createGoalOrchestrator, createToolInvoker } from './orchestrator/runtime';
export type { GoalInput, GoalResult, GoalStatus, GoalStep, GateFailure, RunContext } from './orchestrator/data-flow';

export { loadConfig, ConfigValidationError } from './config/loader';
export type { Config } from './config/validator';
