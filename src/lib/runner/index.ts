export { generateVmName, isManagedVmName, slotIdFromVmName } from './naming.js';
export { Orchestrator, type OrchestratorDeps } from './orchestrator.js';
export {
  isTerminalState,
  RunnerSupervisor,
  type SupervisorDeps,
  type SupervisorSnapshot,
} from './runner-supervisor.js';
