export {
  CofferError,
  AuthenticationError,
  KeyLengthError,
  InvalidBlobIdError,
  ConfigError,
  ModeMismatchError,
  ResponseTimeoutError,
} from "./catalog.js";
