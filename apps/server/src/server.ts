/**
 * MCP shell around the two view tools.
 *
 * Tool handlers never throw: failures come back as error envelopes with
 * `isError` set on the result.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ROW_LIMITS, serializeEnvelope, type ViewTools } from '@viewquery/core';

export const SERVER_NAME = 'viewquery';

export function serverInstructions(viewName: string, maxRowLimit: number = ROW_LIMITS.max): string {
  return `
This server provides read-only access to restaurant roleplay task performance data
in the ${viewName} view.

REQUIRED WORKFLOW:
1. Call get_view_schema_and_samples first to learn the columns.
2. Then call execute_custom_query using the column names from step 1.

All column names are in Chinese and need double quotes in SQL, e.g. "餐厅完整名称".
Only single SELECT statements are accepted; results are capped at ${maxRowLimit} rows.
`.trim();
}

export interface ServerOptions {
  version: string;
  defaultRowLimit?: number;
  maxRowLimit?: number;
}

export function createViewQueryServer(tools: ViewTools, options: ServerOptions): McpServer {
  const viewName = tools.viewName;
  const defaultRowLimit = options.defaultRowLimit ?? ROW_LIMITS.default;
  const maxRowLimit = options.maxRowLimit ?? ROW_LIMITS.max;

  const server = new McpServer(
    { name: SERVER_NAME, version: options.version },
    { instructions: serverInstructions(viewName, maxRowLimit) },
  );

  server.registerTool(
    'get_view_schema_and_samples',
    {
      title: 'Get view schema and samples',
      description: [
        `REQUIRED FIRST STEP: call this before executing any query against ${viewName}.`,
        '',
        'Returns every column (Chinese name, English name, inferred type, description),',
        'the most recent sample records, metadata (row count, date range, restaurant list)',
        'and SQL usage hints.',
        '',
        `获取 ${viewName} 视图的完整结构和示例数据。`,
      ].join('\n'),
      annotations: { readOnlyHint: true },
    },
    async () => toToolResult(await tools.getViewSchemaAndSamples()),
  );

  server.registerTool(
    'execute_custom_query',
    {
      title: 'Execute custom query',
      description: [
        'PREREQUISITE: call get_view_schema_and_samples first.',
        '',
        `Execute one read-only SELECT against the ${viewName} view.`,
        'Write statements, DDL and multiple statements are rejected before execution.',
        `A LIMIT of row_limit (default ${defaultRowLimit}, max ${maxRowLimit}) is appended or clamped.`,
        'Responses above the character budget are truncated with _truncated set.',
        '',
        `在 ${viewName} 视图上执行自定义SQL查询。`,
      ].join('\n'),
      inputSchema: {
        query: z
          .string()
          .describe(
            `SQL SELECT query on ${viewName}. Use double quotes for Chinese column names like "餐厅完整名称".`,
          ),
        row_limit: z
          .number()
          .int()
          .nullable()
          .optional()
          .describe(`Maximum rows to return. Default ${defaultRowLimit}, maximum ${maxRowLimit}; out-of-range values are clamped.`),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ query, row_limit }) => toToolResult(await tools.executeCustomQuery({ query, row_limit })),
  );

  return server;
}

export function toToolResult(envelope: { success: boolean }): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text: serializeEnvelope(envelope) }],
  };
  if (!envelope.success) {
    result.isError = true;
  }
  return result;
}
