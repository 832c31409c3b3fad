import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { STATES } from '../fsm/states';
import { TOOL_TYPES } from '../tools/types';

export const DEFAULT_WORKSPACE_DIR = '.goalguard';

const RepairPlanSchema = z.object({
  failureType: z.enum(['test_failure', 'determinism_failure', 'lint_failure', 'crv_failure', 'unknown']),
  description: z.string(),
  actions: z.array(z.string()),
  retryState: z.enum(['dev_gate', 'backtest', 'init']),
});

export const RunRecordSchema = z.object({
  runId: z.string(),
  goal: z.string(),
  dataPath: z.string(),
  status: z.enum(['running', 'completed', 'failed']),
  currentState: z.enum(STATES),
  history: z.array(z.enum(STATES)),
  toolHistory: z.array(z.enum(TOOL_TYPES)),
  attempts: z.number().int().min(0),
  artifactId: z.string().optional(),
  repairPlan: RepairPlanSchema.optional(),
  error: z.string().optional(),
  updatedAt: z.string(),
});

/** Persisted view of one goal run */
export type RunRecord = z.infer<typeof RunRecordSchema>;

/** Stores one `run.json` per goal run under `<rootDir>/<runId>/` */
export class RunStore {
  constructor(private rootDir: string = DEFAULT_WORKSPACE_DIR) {}

  private recordPath(runId: string): string {
    return path.join(this.rootDir, runId, 'run.json');
  }

  async save(record: RunRecord): Promise<void> {
    const file = this.recordPath(record.runId);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(record, null, 2), 'utf8');
  }

  /** The stored record, or null when the run is unknown or its file is not a run record */
  async load(runId: string): Promise<RunRecord | null> {
    let data: string;
    try {
      data = await fs.readFile(this.recordPath(runId), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      return null;
    }
    const record = RunRecordSchema.safeParse(parsed);
    return record.success ? record.data : null;
  }

  async listRunIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  /** All readable records, most recently updated first */
  async list(): Promise<RunRecord[]> {
    const runIds = await this.listRunIds();
    const records = await Promise.all(runIds.map((id) => this.load(id)));
    return records.filter((r): r is RunRecord => r !== null).sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));
  }

  async latest(): Promise<RunRecord | null> {
    const records = await this.list();
    return records[0] ?? null;
  }
}
