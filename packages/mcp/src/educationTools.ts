import {
  advanceView,
  type EducationConfig,
  EducationOrchestrator,
  formatError,
  processSummaryView,
  processView,
  startedProcessView,
  suggestionView,
} from '@edu-sessions/core';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z, ZodError } from 'zod';

function textResult(payload: object, isError = false): CallToolResult {
  const content: CallToolResult['content'] = [{ type: 'text', text: JSON.stringify(payload) }];
  return isError ? { content, isError: true } : { content };
}

/**
 * Runs a tool body and renders its outcome as a JSON text result.
 * `undefined` means the process does not exist; thrown errors become error results.
 */
async function runTool(
  config: EducationConfig,
  action: string,
  body: () => Promise<object | undefined>,
): Promise<CallToolResult> {
  try {
    const payload = await body();
    if (payload === undefined) {
      return textResult({ error: 'process_not_found' }, true);
    }
    return textResult(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      return textResult(
        {
          error: 'Invalid request',
          issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
        true,
      );
    }
    config.logger?.error({ error: formatError(error), action }, 'education tool error');
    return textResult({ error: `Failed to ${action}` }, true);
  }
}

/**
 * Registers the education process tools on an MCP server.
 * Tool results carry the same JSON bodies as the HTTP routes.
 *
 * @example
 * ```typescript
 * const server = new McpServer({ name: 'edu-sessions', version: '0.1.0' });
 * registerEducationTools(server, { storage: new MemoryStorage() });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function registerEducationTools(server: McpServer, config: EducationConfig): void {
  const orchestrator = new EducationOrchestrator(config);

  server.registerTool(
    'start_education_process',
    {
      description: 'Start a new education process for a user and topic.',
      inputSchema: {
        user_id: z.string().describe('Identifier of the learner'),
        topic: z.string().describe('Topic to learn'),
        process_type: z
          .string()
          .optional()
          .describe('One of fundamental_explanation | guided_practice | assessment'),
      },
    },
    async ({ user_id, topic, process_type }) =>
      runTool(config, 'start education process', async () =>
        startedProcessView(
          await orchestrator.startProcess({ userId: user_id, topic, processType: process_type }),
        ),
      ),
  );

  server.registerTool(
    'advance_education_process',
    {
      description: 'Run the current step of a process with optional learner input.',
      inputSchema: {
        process_id: z.string().describe('Education process id'),
        user_input: z.string().nullish().describe("Learner's answer for the current step"),
      },
    },
    async ({ process_id, user_input }) =>
      runTool(config, 'advance education process', async () => {
        const outcome = await orchestrator.advance(process_id, user_input);
        return outcome && advanceView(outcome);
      }),
  );

  server.registerTool(
    'get_education_process',
    {
      description: 'Get the current state of an education process.',
      inputSchema: {
        process_id: z.string().describe('Education process id'),
      },
    },
    async ({ process_id }) =>
      runTool(config, 'get education process', async () => {
        const instance = await orchestrator.getProcess(process_id);
        return instance && processView(instance);
      }),
  );

  server.registerTool(
    'list_education_processes',
    {
      description: 'List education processes, most recently updated first.',
      inputSchema: {
        user_id: z.string().optional().describe('Only list processes of this user'),
        limit: z.number().int().positive().optional().describe('Maximum number of processes'),
      },
    },
    async ({ user_id, limit }) =>
      runTool(config, 'list education processes', async () => {
        const processes = await orchestrator.listProcesses({ userId: user_id, limit });
        return { count: processes.length, processes: processes.map(processSummaryView) };
      }),
  );

  server.registerTool(
    'suggest_education_next_step',
    {
      description:
        'Suggest the next pedagogical step from the latest score and optionally insert it into the plan.',
      inputSchema: {
        process_id: z.string().describe('Education process id'),
        score: z
          .number()
          .min(0)
          .max(1)
          .optional()
          .describe('Latest evaluation score in [0, 1]; defaults to the last one in history'),
        apply: z.boolean().optional().describe('Insert the suggested step at the current position'),
      },
    },
    async ({ process_id, score, apply }) =>
      runTool(config, 'suggest next step', async () => {
        const suggestion = await orchestrator.suggestNextStep(process_id, { score, apply });
        return suggestion && suggestionView(suggestion);
      }),
  );
}
