/** Level names in ascending severity. pino numbers them 10, 20, ... 60. */
export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]
