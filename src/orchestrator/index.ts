export { Orchestrator } from './orchestrator.js';
export type {
  InboundMessage,
  OutboundReply,
  MessageOutcome,
  MessageTrace,
  OrchestratorDeps,
  OrchestratorSettings,
  ReplyGenerator,
} from './orchestrator.js';
export { StateMachine, TRANSITIONS, IllegalTransitionError, canTransition } from './states.js';
export type { OrchestratorState } from './states.js';
