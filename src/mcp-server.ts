#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for kpi-variance-nl.
 *
 * Exposes the monthly KPI analysis over workbooks on disk as MCP tools.
 *
 * Tools:
 *   - analyze_workbooks: merge a new month into the history and analyze it
 *   - ask_question: answer a rule-based question about the records
 *   - top_movers: rank IDH by the latest variation of a metric
 *   - list_metrics: list the tracked metrics
 *
 * Resources:
 *   - kpi-variance-nl://metrics: full metric definitions
 *
 * Prompts:
 *   - monthly_review: guided month-over-month review
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { AnalysisCache } from './core/analysis-cache.js';
import { runAnalysis, runAsk, runMovers, type EngineError } from './core/analysis-engine.js';
import { loadConfig } from './core/config.js';
import { METRIC_IDS, type AnalysisResult, type RecordTable } from './core/types.js';
import { loadWorkbook } from './ingest/workbook-loader.js';
import { METRIC_DEFINITIONS } from './processing/metric-definitions.js';
import { createPredictor } from './processing/predictors.js';
import { serializeAnalysis } from './output/json-renderer.js';

const config = loadConfig();
const predictor = createPredictor(config.predictor);
const cache = new AnalysisCache<AnalysisResult>();

const server = new McpServer(
  { name: 'kpi-variance-nl', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {}, prompts: {} } }
);

const sourceShape = {
  historical_path: z.string().describe('Path to the historical workbook (.xlsx or .csv)'),
  incoming_path: z.string().optional().describe('Path to the new period workbook to merge in'),
  sheet: z.string().optional().describe('Sheet name to read (default: first sheet)'),
  period: z.string().optional().describe('Period to report on, e.g. 2024-03 (default: latest)'),
};

async function loadSources(historicalPath: string, incomingPath: string | undefined, sheet: string | undefined): Promise<{ historical: RecordTable; incoming?: RecordTable }> {
  const opts = { sheet: sheet ?? config.sheet };
  const historical = await loadWorkbook(historicalPath, opts);
  if (!incomingPath) return { historical };
  return { historical, incoming: await loadWorkbook(incomingPath, opts) };
}

function errorContent(error: EngineError) {
  let errorText = error.message;
  if (error.availablePeriods?.length) {
    errorText += '\n\nAvailable periods:\n' + error.availablePeriods.map(p => `  ${p}`).join('\n');
  }
  return { content: [{ type: 'text' as const, text: errorText }], isError: true };
}

function failureContent(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  return { content: [{ type: 'text' as const, text: message }], isError: true };
}

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'analyze_workbooks',
  'Merge a new monthly workbook into the historical one (deduplicating by period and IDH), then return per-period totals of L14, volume and unit cost, their percentage variations, brand totals, top IDH movers, the summary email text and a next-period unit cost estimate.',
  {
    ...sourceShape,
    top_n: z.number().int().min(1).max(100).optional().describe('Movers per list (default 5)'),
  },
  async ({ historical_path, incoming_path, sheet, period, top_n }) => {
    try {
      const sources = await loadSources(historical_path, incoming_path, sheet);
      const result = runAnalysis(
        { ...sources, period, topN: top_n ?? config.topN },
        { predictor, cache }
      );
      if (!result.success) return errorContent(result.error);

      return { content: [{ type: 'text', text: JSON.stringify(serializeAnalysis(result.result), null, 2) }] };
    } catch (err) {
      return failureContent(err);
    }
  }
);

server.tool(
  'ask_question',
  'Answer a short Spanish question about the records, such as "top idh", "costo unitario ultimo", "variacion l14", "volumen ultimo" or "peor marca".',
  {
    ...sourceShape,
    question: z.string().describe('Question to answer'),
    top_n: z.number().int().min(1).max(100).optional().describe('Rows per ranked list (default 5)'),
  },
  async ({ historical_path, incoming_path, sheet, period, question, top_n }) => {
    try {
      const sources = await loadSources(historical_path, incoming_path, sheet);
      const result = runAsk({ ...sources, period, question, topN: top_n ?? config.topN });
      if (!result.success) return errorContent(result.error);

      const output = {
        question,
        intent: result.result.intent,
        period: result.result.period,
        answer: result.result.text,
      };
      return { content: [{ type: 'text', text: JSON.stringify(output, null, 2) }] };
    } catch (err) {
      return failureContent(err);
    }
  }
);

server.tool(
  'top_movers',
  'Rank IDH by the latest percentage variation of L14, volume or unit cost.',
  {
    ...sourceShape,
    metric: z.enum(METRIC_IDS).optional().default('cost_per_unit').describe('Metric to rank by'),
    direction: z.enum(['gainers', 'decliners']).optional().default('gainers').describe('Largest increases or largest decreases'),
    top_n: z.number().int().min(1).max(100).optional().describe('Rows to return (default 5)'),
  },
  async ({ historical_path, incoming_path, sheet, period, metric, direction, top_n }) => {
    try {
      const sources = await loadSources(historical_path, incoming_path, sheet);
      const result = runMovers({ ...sources, period, metric, direction, topN: top_n ?? config.topN });
      if (!result.success) return errorContent(result.error);

      return { content: [{ type: 'text', text: JSON.stringify({ metric, direction, movers: result.result }, null, 2) }] };
    } catch (err) {
      return failureContent(err);
    }
  }
);

server.tool(
  'list_metrics',
  'List the tracked metrics with their descriptions and source columns.',
  {},
  async () => {
    const metrics = METRIC_DEFINITIONS.map(m => ({
      id: m.id,
      display_name: m.display_name,
      description: m.description,
      unit_type: m.unit_type,
    }));

    return { content: [{ type: 'text', text: JSON.stringify({ metrics }, null, 2) }] };
  }
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'metrics',
  'kpi-variance-nl://metrics',
  { description: 'Tracked metrics, how they aggregate and the columns they come from', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(METRIC_DEFINITIONS, null, 2),
    }],
  })
);

// ── Prompts ────────────────────────────────────────────────────────────

server.prompt(
  'monthly_review',
  'Month-over-month review of the KPI workbooks',
  {
    historical_path: z.string().describe('Path to the historical workbook'),
    incoming_path: z.string().optional().describe('Path to the new period workbook'),
  },
  async ({ historical_path, incoming_path }) => ({
    messages: [{
      role: 'user' as const,
      content: {
        type: 'text' as const,
        text: `Review the monthly KPI results in ${historical_path}${incoming_path ? ` after merging ${incoming_path}` : ''}. Follow these steps:

1. **Merge**: Run analyze_workbooks and report how many rows were replaced and which periods are new.

2. **Totals**: Summarize L14, volume and unit cost for the latest period against the previous one.

3. **Movers**: Use top_movers for cost_per_unit in both directions and name the IDH driving the change.

4. **Brands**: Ask "peor marca" and list the brands with the lowest L14.

5. **Summary**: Close with the generated email text and the next-period unit cost estimate, noting any data gaps flagged in the provenance notes.`,
      },
    }],
  })
);

// ── Start Server ───────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
