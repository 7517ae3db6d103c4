import type { OrchestrationStrategy } from '../types/domain.js';
import { FixedPlanOracle, type FixedPlanOptions } from './fixed-plan.js';
import { ToolCallingOracle } from './tool-calling.js';
import type { OracleFactory, PlanningOracle } from './types.js';

export type * from './types.js';
export { ToolCallingOracle } from './tool-calling.js';
export { FixedPlanOracle } from './fixed-plan.js';

export function createOracleFactory(options: FixedPlanOptions): OracleFactory {
  return (strategy: OrchestrationStrategy): PlanningOracle => {
    switch (strategy) {
      case 'fixed_plan':
        return new FixedPlanOracle(options);
      case 'dynamic':
        return new ToolCallingOracle(options);
    }
  };
}
