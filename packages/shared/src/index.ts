export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { RuntimeConfigSchema, NodeNameSchema } from "./utils/config-schema.js";
export type { RuntimeConfig, RuntimeConfigInput } from "./utils/config-schema.js";
