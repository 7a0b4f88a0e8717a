import { describe, expect, it } from 'vitest';

import {
  JsonValueSchema,
  NewEducationSessionSchema,
  ProcessStateSchema,
  SessionIdSchema,
  StartProcessSchema,
  StoredStepResultSchema,
} from '../src/schemas/index.js';
import {
  currentStep,
  isComplete,
  StoredProcessError,
  toProcessInstance,
  toSessionUpdate,
} from '../src/services/processInstance.service.js';
import { createMockProcessInstance } from './helpers/fixtures.js';

describe('SessionIdSchema', () => {
  it('accepts UUIDs and rejects other strings', () => {
    expect(SessionIdSchema.safeParse('0b9d6a52-3f7e-4c1a-9d2b-6f1e8a4c7b30').success).toBe(
      true,
    );
    expect(SessionIdSchema.safeParse('session-1').success).toBe(false);
  });
});

describe('JsonValueSchema', () => {
  it('accepts nested structured data', () => {
    const value = { a: [1, 'two', { three: null }], b: true };
    expect(JsonValueSchema.parse(value)).toEqual(value);
  });

  it('rejects values that are not JSON', () => {
    expect(JsonValueSchema.safeParse(undefined).success).toBe(false);
    expect(JsonValueSchema.safeParse(() => 1).success).toBe(false);
  });
});

describe('NewEducationSessionSchema', () => {
  it('fills in store defaults', () => {
    expect(
      NewEducationSessionSchema.parse({
        userId: 'u1',
        topic: 'fractions',
        processType: 'socratic',
      }),
    ).toEqual({
      userId: 'u1',
      topic: 'fractions',
      processType: 'socratic',
      steps: [],
      currentIndex: 0,
      history: [],
    });
  });

  it('requires user, topic and process type', () => {
    const result = NewEducationSessionSchema.safeParse({ userId: 'u1', topic: null });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path.join('.'))).toEqual([
      'topic',
      'processType',
    ]);
  });
});

describe('StartProcessSchema', () => {
  it('defaults the process type', () => {
    expect(StartProcessSchema.parse({ userId: 'u1', topic: 'fractions' }).processType).toBe(
      'fundamental_explanation',
    );
  });

  it('rejects unknown process types', () => {
    expect(
      StartProcessSchema.safeParse({ userId: 'u1', topic: 'x', processType: 'socratic' })
        .success,
    ).toBe(false);
  });
});

describe('StoredStepResultSchema', () => {
  it('maps created_at to createdAt', () => {
    expect(
      StoredStepResultSchema.parse({
        step: 'example',
        content: 'Worked example',
        context: { citations: [] },
        created_at: '2024-03-01T10:00:00.000Z',
      }),
    ).toEqual({
      step: 'example',
      content: 'Worked example',
      context: { citations: [] },
      createdAt: '2024-03-01T10:00:00.000Z',
    });
  });

  it('fills in missing content and context', () => {
    const result = StoredStepResultSchema.parse({ step: 'feedback' });
    expect(result.content).toBe('');
    expect(result.context).toEqual({});
    expect(typeof result.createdAt).toBe('string');
  });
});

describe('process instance mapping', () => {
  it('parses a stored session and serializes it back', () => {
    const instance = createMockProcessInstance({
      currentIndex: 1,
      history: [
        {
          step: 'explain',
          content: 'Explanation',
          context: { citations: [] },
          createdAt: '2024-03-01T10:01:00.000Z',
        },
      ],
    });

    const update = toSessionUpdate(instance);
    expect(update).toEqual({
      steps: ['explain', 'example', 'exercise', 'evaluate', 'feedback'],
      currentIndex: 1,
      history: [
        {
          step: 'explain',
          content: 'Explanation',
          context: { citations: [] },
          created_at: '2024-03-01T10:01:00.000Z',
        },
      ],
    });

    const parsed = toProcessInstance({
      ...instance,
      steps: update.steps ?? [],
      history: update.history ?? [],
    });
    expect(parsed).toEqual(instance);
  });

  it('rejects unknown step names', () => {
    expect(
      ProcessStateSchema.safeParse({
        processType: 'assessment',
        steps: ['exercise', 'daydream'],
        history: [],
      }).success,
    ).toBe(false);
  });
});

describe('toProcessInstance', () => {
  it('raises a StoredProcessError for an unreadable stored state', () => {
    const { steps, ...session } = createMockProcessInstance();

    let caught: unknown;
    try {
      toProcessInstance({ ...session, processType: 'socratic', steps: [...steps], history: [] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StoredProcessError);
    expect(caught).toMatchObject({ sessionId: session.id, name: 'StoredProcessError' });
  });
});

describe('process cursor', () => {
  it('agrees on completion for every cursor position', () => {
    for (const [currentIndex, step, complete] of [
      [-1, null, true],
      [0, 'explain', false],
      [4, 'feedback', false],
      [5, null, true],
      [9, null, true],
    ] as const) {
      const instance = createMockProcessInstance({ currentIndex });
      expect(currentStep(instance)).toBe(step);
      expect(isComplete(instance)).toBe(complete);
    }
  });
});
