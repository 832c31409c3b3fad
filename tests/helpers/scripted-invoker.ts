import fs from 'node:fs/promises';
import path from 'node:path';
import { toolFailure } from '../../src/tools/types';
import type { ToolCall, ToolInvoker, ToolResult, ToolType } from '../../src/tools/types';

export type ToolHandler = (call: ToolCall) => ToolResult | Promise<ToolResult>;

/**
 * In-process tool contract for tests. Queued responses (`once`) are used
 * first, then the standing response (`on`); unscripted tools fail.
 */
export class ScriptedInvoker implements ToolInvoker {
  readonly calls: ToolCall[] = [];
  private queued = new Map<ToolType, Array<ToolResult | ToolHandler>>();
  private standing = new Map<ToolType, ToolResult | ToolHandler>();

  on(toolType: ToolType, response: ToolResult | ToolHandler): this {
    this.standing.set(toolType, response);
    return this;
  }

  once(toolType: ToolType, response: ToolResult | ToolHandler): this {
    const queue = this.queued.get(toolType) ?? [];
    queue.push(response);
    this.queued.set(toolType, queue);
    return this;
  }

  async invoke(call: ToolCall): Promise<ToolResult> {
    this.calls.push(call);
    const response = this.queued.get(call.toolType)?.shift() ?? this.standing.get(call.toolType);
    if (response === undefined) {
      return toolFailure(`No script for ${call.toolType}`);
    }
    return typeof response === 'function' ? response(call) : response;
  }

  toolTypes(): ToolType[] {
    return this.calls.map((c) => c.toolType);
  }
}

/** Writes what a finished backtest leaves behind, including the CRV report the product gate looks for */
export async function writeBacktestOutput(outputDir: string, stats: Record<string, unknown> = { total_return: 0.1, sharpe_ratio: 1, max_drawdown: 0.05 }): Promise<void> {
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(path.join(outputDir, 'stats.json'), JSON.stringify(stats), 'utf8');
  await fs.writeFile(path.join(outputDir, 'trades.csv'), 'timestamp,symbol,qty,price\n', 'utf8');
  await fs.writeFile(path.join(outputDir, 'equity_curve.csv'), 'timestamp,equity\n', 'utf8');
  await fs.writeFile(path.join(outputDir, 'crv_report.json'), JSON.stringify({ passed: true, violations: [] }), 'utf8');
}
