export * from "./types/game";
export * from "./types/match";
export { canonicalEncode, hashValue, linkHash } from "./hash";
export { TranscriptBuilder, isMatchTranscript, verifyTranscript } from "./transcript";
export type { TranscriptCheck, TranscriptMove } from "./transcript";
export { OracleInvariantViolation, ConfigError } from "./errors";
export { default as log, createLogger, createSilentLogger } from "./logger";
export type { Logger, CreateLoggerOptions } from "./logger";
