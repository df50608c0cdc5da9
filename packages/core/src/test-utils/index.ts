export {
  makeMockLogger,
  createTestNode,
  collectMessages,
  type TestNode,
} from "./node.js";
