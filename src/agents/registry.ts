/**
 * Stage Registry — defines the stage dependency DAG and its execution order.
 */

import type { AgentName, StageType } from "../shared/types.js";
import type { StageDefinition } from "./types.js";

export const STAGE_DEFINITIONS: readonly StageDefinition[] = [
  {
    stage: "ANOMALY_CHECK",
    agent: "AnomalyDetectionAgent",
    dependsOn: [],
    conditional: false,
  },
  {
    stage: "ALLOY_RECOMMENDATION",
    agent: "AlloyCorrectionAgent",
    dependsOn: ["ANOMALY_CHECK"],
    conditional: true,
  },
];

/**
 * Get the topological execution order for all stages.
 * Returns stages sorted so that dependencies come before dependents.
 */
export function getExecutionOrder(): StageType[] {
  const defMap = new Map(STAGE_DEFINITIONS.map((d) => [d.stage, d]));
  const visited = new Set<StageType>();
  const visiting = new Set<StageType>();
  const order: StageType[] = [];

  function visit(stage: StageType): void {
    if (visited.has(stage)) return;
    if (visiting.has(stage)) throw new Error(`Stage dependency cycle at: ${stage}`);
    visiting.add(stage);
    const def = defMap.get(stage);
    if (!def) throw new Error(`Unknown stage: ${stage}`);
    for (const dep of def.dependsOn) {
      visit(dep);
    }
    visiting.delete(stage);
    visited.add(stage);
    order.push(stage);
  }

  for (const def of STAGE_DEFINITIONS) {
    visit(def.stage);
  }

  return order;
}

/**
 * Lookup a stage definition by type.
 */
export function getStageDefinition(stage: StageType): StageDefinition {
  const def = STAGE_DEFINITIONS.find((d) => d.stage === stage);
  if (!def) throw new Error(`Unknown stage: ${stage}`);
  return def;
}

export function agentForStage(stage: StageType): AgentName {
  return getStageDefinition(stage).agent;
}
