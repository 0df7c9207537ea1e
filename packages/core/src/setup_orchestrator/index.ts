export { SetupOrchestrator } from './setup_orchestrator';
export type {
  SetupState,
  FailedState,
  RunState,
  RunContext,
  SetupRunResult,
  SetupOrchestratorDependencies,
} from './setup_orchestrator.types';
