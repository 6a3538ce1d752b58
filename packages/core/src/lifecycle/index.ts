export {
  RuntimeStateMachine,
  type RuntimeState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
