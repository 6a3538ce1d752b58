export {
  CoreError,
  TransportError,
  ListerTimeoutError,
  OperationTimeoutError,
  ResourceNotFoundError,
  LeaseNotFoundError,
  LeaseRenewalError,
  NoListerError,
  UnknownNamespaceError,
  DuplicateTaskError,
  CancellationRequestedError,
  InternalInvariantViolationError,
  errorMessage,
  toTransportError,
} from "./catalog.js";
