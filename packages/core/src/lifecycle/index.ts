export {
  SchedulerStateMachine,
  type SchedulerState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
