// Server-only infrastructure shared by every server app.

export { logger, type Logger } from "./logger";
export { readIdListEnv, readNumberEnv, readStringEnv, type Env } from "./env";
export { silenceLogger } from "./test-utils/silence-logger";
