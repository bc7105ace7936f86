export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal"
