import type { EducationConfig } from '@edu-sessions/core';
import { MemoryStorage } from '@edu-sessions/memory';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { createEducationMcpServer } from '../src/index.js';

const UNKNOWN_ID = '5f0c7a1e-2b3d-4e6f-8a9b-0c1d2e3f4a5b';

const TextResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).length(1),
  isError: z.boolean().optional(),
});

const StartedSchema = z.object({ process_id: z.string() });

describe('education MCP tools', () => {
  let storage: MemoryStorage;
  let config: EducationConfig;
  let server: McpServer;
  let client: Client;

  const call = async (name: string, args: Record<string, unknown> = {}) => {
    const result = TextResultSchema.parse(await client.callTool({ name, arguments: args }));
    const body: unknown = JSON.parse(result.content[0].text);
    return { isError: result.isError ?? false, body };
  };

  const start = async (args: Record<string, string>) => {
    const { body } = await call('start_education_process', args);
    return StartedSchema.parse(body).process_id;
  };

  beforeEach(async () => {
    storage = new MemoryStorage();
    config = { storage, logger: pino({ enabled: false }) };
    server = createEducationMcpServer(config);
    client = new Client({ name: 'edu-sessions-test', version: '0.1.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('registers the education tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'advance_education_process',
      'get_education_process',
      'list_education_processes',
      'start_education_process',
      'suggest_education_next_step',
    ]);
  });

  it('starts a process', async () => {
    const result = await call('start_education_process', {
      user_id: 'u1',
      topic: 'fractions',
      process_type: 'guided_practice',
    });

    expect(result).toEqual({
      isError: false,
      body: {
        process_id: expect.any(String),
        process_type: 'guided_practice',
        steps: ['example', 'exercise', 'feedback'],
        current_step: 'example',
      },
    });
  });

  it('advances a process and reports its state', async () => {
    const id = await start({ user_id: 'u1', topic: 'fractions', process_type: 'assessment' });

    const advanced = await call('advance_education_process', {
      process_id: id,
      user_input: 'two thirds',
    });
    expect(advanced.body).toEqual({
      completed: false,
      step_result: {
        step: 'exercise',
        content: "Exercise: solve a problem related to 'fractions'.",
        context: { citations: [], user_input: 'two thirds' },
        created_at: expect.any(String),
      },
    });

    const state = await call('get_education_process', { process_id: id });
    expect(state.body).toMatchObject({
      process_id: id,
      current_index: 1,
      current_step: 'evaluate',
      completed: false,
    });
  });

  it('lists processes by user', async () => {
    await start({ user_id: 'u1', topic: 'fractions' });
    await start({ user_id: 'u2', topic: 'decimals' });

    const { body } = await call('list_education_processes', { user_id: 'u2' });

    expect(body).toMatchObject({ count: 1, processes: [{ user_id: 'u2', topic: 'decimals' }] });
  });

  it('suggests the next step from a score', async () => {
    const id = await start({ user_id: 'u1', topic: 'fractions' });

    const { body } = await call('suggest_education_next_step', { process_id: id, score: 0.9 });

    expect(body).toEqual({
      completed: false,
      suggestion: 'feedback',
      rationale: 'Strong performance (score=0.90); consolidate with feedback and wrap up.',
      confidence: 0.75,
      applied: false,
    });
  });

  it('returns an error result for an unknown process', async () => {
    expect(await call('get_education_process', { process_id: UNKNOWN_ID })).toEqual({
      isError: true,
      body: { error: 'process_not_found' },
    });
  });

  it('returns an error result for an id that is not a UUID', async () => {
    const result = await call('advance_education_process', { process_id: 'not-a-uuid' });

    expect(result.isError).toBe(true);
    expect(result.body).toMatchObject({ error: 'Invalid request' });
  });

  it('logs and hides unexpected failures', async () => {
    const logger = pino({ enabled: false });
    const errorSpy = vi.spyOn(logger, 'error');
    config.logger = logger;
    vi.spyOn(storage, 'listSessions').mockRejectedValue(new Error('connection lost'));

    expect(await call('list_education_processes')).toEqual({
      isError: true,
      body: { error: 'Failed to list education processes' },
    });
    expect(errorSpy).toHaveBeenCalledWith(
      { error: 'connection lost', action: 'list education processes' },
      'education tool error',
    );
  });
});
