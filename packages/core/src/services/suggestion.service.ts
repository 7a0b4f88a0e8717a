import type { ProcessInstance } from '../interfaces/processInstance.js';
import type { StepResult, StepType } from '../schemas/process.schema.js';

export const LOW_SCORE_THRESHOLD = 0.6;
export const HIGH_SCORE_THRESHOLD = 0.85;

export interface StepRecommendation {
  suggestion: StepType | null;
  rationale: string;
  confidence: number;
}

/**
 * Finds the most recent evaluation score recorded in a history.
 */
export function findLastScore(history: readonly StepResult[]): number | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const { step, context } = history[i];
    const score = context.score;
    if (step === 'evaluate' && typeof score === 'number') {
      return score;
    }
  }
  return undefined;
}

/**
 * Recommends the next step from the learner's latest score.
 *
 * - no score: the next planned step
 * - below 0.6: reinforce (explain if the workflow has it, example otherwise)
 * - below 0.85: another exercise
 * - otherwise: feedback to wrap up
 *
 * @param instance - Process to recommend for
 * @param score - Explicit score; falls back to the last evaluation in history
 */
export function recommendNextStep(
  instance: ProcessInstance,
  score?: number,
): StepRecommendation {
  const lastScore = score ?? findLastScore(instance.history);

  if (lastScore === undefined) {
    return {
      suggestion: instance.steps[instance.currentIndex] ?? null,
      rationale: 'Continue with the planned workflow.',
      confidence: 0.6,
    };
  }

  const formatted = lastScore.toFixed(2);
  if (lastScore < LOW_SCORE_THRESHOLD) {
    return {
      suggestion: instance.steps.includes('explain') ? 'explain' : 'example',
      rationale: `Low performance (score=${formatted}); reinforce with an explanation or example.`,
      confidence: 0.8,
    };
  }
  if (lastScore < HIGH_SCORE_THRESHOLD) {
    return {
      suggestion: 'exercise',
      rationale: `Fair performance (score=${formatted}); practice with another exercise.`,
      confidence: 0.7,
    };
  }
  return {
    suggestion: 'feedback',
    rationale: `Strong performance (score=${formatted}); consolidate with feedback and wrap up.`,
    confidence: 0.75,
  };
}
