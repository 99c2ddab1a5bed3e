// Types
export type {
  Segment,
  CommandPattern,
  PatternInput,
  Datatype,
  ArgValue,
  KeySpecEntry,
  FlagSpecEntry,
  AnySpec,
  KeySpec,
  FlagSpec,
  GlobalFlags,
  ParsedArgs,
  CommandContext,
  CommandHandler,
  CommandEntry,
} from "./types/command.js";

export { WILDCARD } from "./types/command.js";

export type {
  TextElement,
  ListElement,
  TableCell,
  TableElement,
  AlertElement,
  StatusElement,
  Status,
  ExitStatus,
  ErrorStatus,
  HandlerResult,
  Printable,
} from "./types/status.js";

export {
  text,
  list,
  table,
  alert,
  exitStatus,
  errorStatus,
  isExitStatus,
  isErrorStatus,
} from "./types/status.js";

export type { RenderedOutput, Writer } from "./types/writer.js";

export type {
  ConfigCallback,
  ConfigFormatter,
  ConfigStore,
  WhitelistResult,
} from "./types/config.js";

export type { RemoteTransport, NodeFinder, RemoteRunResult } from "./types/transport.js";

export type { Usage, RegistrationApi, CliPlugin } from "./types/plugin.js";

// Errors
export {
  CorralError,
  UnknownCommandError,
  ValidationError,
  ConfigError,
  RenderError,
  HandlerError,
  RegistrationError,
  TransportError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
