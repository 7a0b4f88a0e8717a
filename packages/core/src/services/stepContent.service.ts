import type { JsonValue } from '../interfaces/json.js';
import type { StepResult, StepType } from '../schemas/process.schema.js';

export interface StepInput {
  step: StepType;
  topic: string;
  /** Learner answer for the step, if any */
  userInput?: string | null;
  /** Supporting chunks retrieved for the step */
  citations: JsonValue[];
}

/**
 * Scores a learner answer. Any non-empty answer gets full marks for now;
 * a missing one gets half.
 */
export function scoreAnswer(userInput?: string | null): number {
  return userInput ? 1 : 0.5;
}

function describeStep(step: StepType, topic: string, userInput?: string | null): string {
  switch (step) {
    case 'explain':
      return `Explanation of '${topic}' based on relevant sources.`;
    case 'example':
      return `Worked example on '${topic}'.`;
    case 'exercise':
      return `Exercise: solve a problem related to '${topic}'.`;
    case 'evaluate':
      return `Answer evaluation: score=${scoreAnswer(userInput).toFixed(2)}.`;
    case 'feedback':
      return 'Objective feedback and next steps.';
  }
}

/**
 * Builds the result of running one step of a workflow.
 *
 * @param input - Step, topic, learner input and citations
 * @returns Step result stamped with the current time
 */
export function buildStepResult(input: StepInput): StepResult {
  const { step, topic, userInput, citations } = input;
  const context: Record<string, JsonValue> = {
    citations,
    user_input: userInput ?? null,
  };

  if (step === 'evaluate') {
    context.score = scoreAnswer(userInput);
  }

  return {
    step,
    content: describeStep(step, topic, userInput),
    context,
    createdAt: new Date().toISOString(),
  };
}
