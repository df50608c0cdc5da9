export {
  NodeStateMachine,
  type NodeState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
