import { type EducationConfig, EducationOrchestrator } from '@edu-sessions/core';

// one orchestrator per config object
const orchestrators = new WeakMap<EducationConfig, EducationOrchestrator>();

/**
 * Gets or creates the orchestrator instance for the provided configuration.
 * @param config - The education configuration object
 * @returns The orchestrator instance
 */
export function getEducationOrchestrator(config: EducationConfig): EducationOrchestrator {
  let orchestrator = orchestrators.get(config);
  if (!orchestrator) {
    orchestrator = new EducationOrchestrator(config);
    orchestrators.set(config, orchestrator);
  }
  return orchestrator;
}
