// skein core: client, server and the service dispatch table.

// ============================================================================
// Client
// ============================================================================

export { Client, createClient, defaultClientConfig, type ClientConfig, type CallOptions } from "./client.ts";
export { Call } from "./call.ts";
export { Channel, createChannel } from "./channel.ts";

// ============================================================================
// Server
// ============================================================================

export {
  Server,
  defaultServer,
  defaultServerConfig,
  register,
  accept,
  type Listener,
  type ServerConfig,
} from "./server.ts";
export {
  buildService,
  defineService,
  MethodType,
  RegistrationError,
  Service,
  type Handler,
  type MethodShape,
  type RegistrationErrorKind,
  type ServiceDescriptor,
} from "./service.ts";
export { SendLock } from "./send_lock.ts";

// ============================================================================
// Logging
// ============================================================================

export {
  callLogger,
  createLogger,
  isEnabled,
  matchPattern,
  type CallHooks,
  type CallOutcome,
  type CallRecord,
  type Logger,
  type LoggingOptions,
} from "./logging.ts";
